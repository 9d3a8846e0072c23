import { EventEmitter } from 'node:events';
import { getLogger } from '@hostpulse/shared';

const logger = getLogger();

export interface TimerHandle {
  cancel(): void;
}

export interface Clock {
  now(): number;
  setTimeout(callback: () => void, delayMs: number): TimerHandle;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  setTimeout(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    return { cancel: () => clearTimeout(timer) };
  },
};

export type CycleTask = (cycle: number) => Promise<void>;

export interface SchedulerOptions {
  periodMs: number;
  clock?: Clock;
}

export interface CycleReport {
  cycle: number;
  durationMs: number;
  error?: unknown;
}

/**
 * Fixed-rate loop that never runs two cycles at once.
 *
 * The first tick fires immediately. Ticks are due at start + n * period; when a
 * cycle runs past the next due time the missed slots are dropped and the next
 * tick fires as soon as the late cycle ends.
 *
 * Events: 'cycle-complete' and 'cycle-failed' with a CycleReport, 'stopped'.
 */
export class Scheduler extends EventEmitter {
  private task: CycleTask;
  private periodMs: number;
  private clock: Clock;
  private running: boolean = false;
  private cycleInProgress: boolean = false;
  private inFlight: Promise<void> | null = null;
  private timer: TimerHandle | null = null;
  private nextDueAt: number = 0;
  private cycles: number = 0;

  constructor(task: CycleTask, options: SchedulerOptions) {
    super();
    if (!Number.isFinite(options.periodMs) || options.periodMs <= 0) {
      throw new RangeError(`Scheduler period must be positive, got ${options.periodMs}`);
    }
    this.task = task;
    this.periodMs = options.periodMs;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Begin ticking. The first tick fires after `firstTickDelayMs`, immediately
   * by default; later ticks follow at the fixed period from there.
   */
  start(firstTickDelayMs: number = 0): void {
    if (this.running) return;

    const delayMs = Math.max(0, firstTickDelayMs);
    this.running = true;
    this.nextDueAt = this.clock.now() + delayMs;
    this.arm(delayMs);
    logger.info({ periodMs: this.periodMs, firstTickDelayMs: delayMs }, 'Scheduler started');
  }

  /**
   * Cancel the timer and wait for the cycle in flight, if any, to settle.
   */
  async stop(): Promise<void> {
    if (!this.running && !this.inFlight) return;

    this.running = false;
    this.timer?.cancel();
    this.timer = null;

    if (this.inFlight) {
      logger.info('Waiting for in-flight cycle to finish');
      await this.inFlight;
    }

    this.emit('stopped');
    logger.info({ cycles: this.cycles }, 'Scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  isCycleInProgress(): boolean {
    return this.cycleInProgress;
  }

  getCycleCount(): number {
    return this.cycles;
  }

  private arm(delayMs: number): void {
    this.timer = this.clock.setTimeout(() => {
      this.timer = null;
      this.tick().catch((err: unknown) => {
        logger.error({ err }, 'Scheduler tick failed');
      });
    }, delayMs);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    if (this.cycleInProgress) {
      logger.warn('Tick fired while a cycle was in progress, skipping');
      return;
    }

    this.cycleInProgress = true;
    this.cycles += 1;
    this.inFlight = this.execute(this.cycles);

    try {
      await this.inFlight;
    } finally {
      this.inFlight = null;
      this.cycleInProgress = false;
      this.scheduleNext();
    }
  }

  private async execute(cycle: number): Promise<void> {
    const startedAt = this.clock.now();
    let failure: { error: unknown } | null = null;

    try {
      await this.task(cycle);
    } catch (err) {
      failure = { error: err };
      logger.error({ err, cycle }, 'Cycle failed');
    }

    const report: CycleReport = { cycle, durationMs: this.clock.now() - startedAt };
    try {
      if (failure) {
        this.emit('cycle-failed', { ...report, error: failure.error });
      } else {
        this.emit('cycle-complete', report);
      }
    } catch (err) {
      logger.error({ err, cycle }, 'Cycle listener threw');
    }
  }

  private scheduleNext(): void {
    if (!this.running) return;

    const now = this.clock.now();
    this.nextDueAt += this.periodMs;

    if (this.nextDueAt < now) {
      const missed = Math.floor((now - this.nextDueAt) / this.periodMs) + 1;
      logger.warn({ missed, periodMs: this.periodMs }, 'Cycle overran its interval');
      this.nextDueAt = now;
    }

    this.arm(this.nextDueAt - now);
  }
}
