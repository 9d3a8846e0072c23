import type { MetricsSample } from '@hostpulse/shared';

export interface StoredSample {
  sample: MetricsSample;
  receivedAt: Date;
}

/**
 * Holds the most recent sample only. Older samples are replaced, not kept.
 */
export class SampleStore {
  private latest: StoredSample | null = null;
  private received: number = 0;

  put(sample: MetricsSample, receivedAt: Date = new Date()): void {
    this.latest = { sample, receivedAt };
    this.received += 1;
  }

  getLatest(): StoredSample | null {
    return this.latest;
  }

  getReceivedCount(): number {
    return this.received;
  }
}
