import type { CounterSnapshot, DiskRates } from '@hostpulse/shared';
import { BYTES_PER_MEBIBYTE, InconsistentCounterShapeError, RATE_DECIMALS } from '@hostpulse/shared';

const IDLE_SLOT = 3;
const IOWAIT_SLOT = 4;

/**
 * Round half away from zero in decimal, not binary: 1.005 becomes 1.01 even
 * though 1.005 * 100 is 100.49999999999999 as a double.
 */
export function roundHalfUp(value: number, decimals: number = RATE_DECIMALS): number {
  if (!Number.isFinite(value)) return 0;
  if (Math.abs(value) >= 1e15) return value;

  const sign = value < 0 ? -1 : 1;
  const [mantissa, exponent = '0'] = String(Math.abs(value)).split('e');
  const shifted = Math.round(Number(`${mantissa}e${Number(exponent) + decimals}`));
  const rounded = sign * Number(`${shifted}e-${decimals}`);
  return rounded === 0 ? 0 : rounded;
}

/**
 * Share of the tick delta spent outside idle and iowait, as a percentage.
 */
export function calculateCpuPercent(
  previousTicks: readonly number[],
  currentTicks: readonly number[],
): number {
  if (previousTicks.length !== currentTicks.length) {
    throw new InconsistentCounterShapeError(previousTicks.length, currentTicks.length);
  }

  let total = 0;
  let idle = 0;
  for (let slot = 0; slot < currentTicks.length; slot++) {
    // A slot that went backwards was reset; it contributes nothing to this window.
    const delta = Math.max(0, (currentTicks[slot] ?? 0) - (previousTicks[slot] ?? 0));
    total += delta;
    if (slot === IDLE_SLOT || slot === IOWAIT_SLOT) {
      idle += delta;
    }
  }

  if (total <= 0 || !Number.isFinite(total)) return 0;

  const percent = ((total - idle) / total) * 100;
  return roundHalfUp(Math.min(100, Math.max(0, percent)));
}

function unroundedByteRate(
  previousTotal: number,
  currentTotal: number,
  intervalSeconds: number,
): number {
  if (!(intervalSeconds > 0) || !Number.isFinite(intervalSeconds)) return 0;

  const delta = currentTotal - previousTotal;
  if (!(delta > 0) || !Number.isFinite(delta)) return 0;

  return delta / (intervalSeconds * BYTES_PER_MEBIBYTE);
}

/**
 * MB/s between two readings of a byte counter. A counter that went backwards
 * (subsystem restart) reports 0, never negative throughput.
 */
export function calculateByteRate(
  previousTotal: number,
  currentTotal: number,
  intervalSeconds: number,
): number {
  return roundHalfUp(unroundedByteRate(previousTotal, currentTotal, intervalSeconds));
}

/**
 * Seconds between two snapshots as measured by their capture times. Falls back
 * to the nominal interval when either time is unknown or the clock went back.
 */
export function measuredWindowSeconds(
  previous: CounterSnapshot,
  current: CounterSnapshot,
  intervalSeconds: number,
): number {
  if (previous.capturedAt <= 0 || current.capturedAt <= 0) return intervalSeconds;

  const elapsedSeconds = (current.capturedAt - previous.capturedAt) / 1000;
  return elapsedSeconds > 0 ? elapsedSeconds : intervalSeconds;
}

export function calculateDiskRates(
  previous: CounterSnapshot,
  current: CounterSnapshot,
  intervalSeconds: number,
): DiskRates {
  const windowSeconds = measuredWindowSeconds(previous, current, intervalSeconds);
  const read = unroundedByteRate(
    previous.diskReadBytesTotal,
    current.diskReadBytesTotal,
    windowSeconds,
  );
  const write = unroundedByteRate(
    previous.diskWriteBytesTotal,
    current.diskWriteBytesTotal,
    windowSeconds,
  );

  return {
    readMbps: roundHalfUp(read),
    writeMbps: roundHalfUp(write),
    totalMbps: roundHalfUp(read + write),
  };
}
