import type { MetricsSample, PublishError } from '@hostpulse/shared';
import {
  BadStatusError,
  HOSTPULSE_VERSION,
  TransportError,
  getLogger,
  serializeSample,
} from '@hostpulse/shared';

const logger = getLogger();

export interface PublisherOptions {
  url: string;
  timeoutMs: number;
}

export interface PublishAck {
  status: number;
  durationMs: number;
}

export type PublishResult = { ok: true; ack: PublishAck } | { ok: false; error: PublishError };

/**
 * Posts samples to the collector. One request per call, no retries. Failures
 * come back as values, never thrown.
 */
export class Publisher {
  private url: string;
  private timeoutMs: number;

  constructor(options: PublisherOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
  }

  getUrl(): string {
    return this.url;
  }

  async publish(sample: MetricsSample): Promise<PublishResult> {
    const body = serializeSample(sample);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': `hostpulse-agent/${HOSTPULSE_VERSION}`,
        },
        body,
        signal: controller.signal,
      });

      // Read the body so the keep-alive connection is released for the next cycle.
      const text = await response.text();

      if (!response.ok) {
        logger.debug({ status: response.status, body: text.slice(0, 200) }, 'Backend rejected sample');
        return { ok: false, error: new BadStatusError(response.status) };
      }

      return { ok: true, ack: { status: response.status, durationMs: Date.now() - startedAt } };
    } catch (err) {
      return { ok: false, error: new TransportError(err, controller.signal.aborted) };
    } finally {
      clearTimeout(timer);
    }
  }
}
