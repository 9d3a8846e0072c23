import { EventEmitter } from 'node:events';
import type { CounterSnapshot, MetricsSample, PublishError } from '@hostpulse/shared';
import {
  BadStatusError,
  DEFAULT_LOOPBACK_PREFIX,
  DEFAULT_TOP_PROCESS_LIMIT,
  getLogger,
} from '@hostpulse/shared';
import type { HostProbe } from './host/HostProbe.js';
import { LinuxHostProbe } from './host/LinuxHostProbe.js';
import { MetricsCollector } from './MetricsCollector.js';
import type { CollectionResult } from './MetricsCollector.js';
import { Publisher } from './Publisher.js';
import type { PublishAck } from './Publisher.js';
import { Scheduler, systemClock } from './Scheduler.js';
import type { Clock } from './Scheduler.js';
import type { AgentOptions } from './types.js';

const logger = getLogger();

/**
 * Runs the sampling loop: collect, replace the baseline, publish.
 *
 * Events: 'sample' (sample, degraded), 'published' (ack, sample),
 * 'publish-failed' (error, sample), 'stopped'.
 */
export class Agent extends EventEmitter {
  private collector: MetricsCollector;
  private publisher: Publisher;
  private scheduler: Scheduler;
  private baseline: CounterSnapshot | null = null;
  private lastSample: MetricsSample | null = null;
  private clock: Clock;
  private periodMs: number;
  /** Clock time of the startup baseline read, null until primed. */
  private primedAt: number | null = null;
  private starting: Promise<void> | null = null;
  private stopRequested: boolean = false;

  constructor(options: AgentOptions) {
    super();
    const clock: Clock = options.clock ?? systemClock;
    const probe: HostProbe = options.probe ?? new LinuxHostProbe({ now: () => clock.now() });
    this.clock = clock;
    this.periodMs = options.intervalSeconds * 1000;

    this.collector = new MetricsCollector(probe, {
      intervalSeconds: options.intervalSeconds,
      topProcessLimit: options.topProcessLimit ?? DEFAULT_TOP_PROCESS_LIMIT,
      loopbackPrefix: options.loopbackPrefix ?? DEFAULT_LOOPBACK_PREFIX,
      now: () => clock.now(),
    });
    this.publisher = new Publisher({ url: options.backendUrl, timeoutMs: options.timeoutMs });
    this.scheduler = new Scheduler(() => this.runCycle(), {
      periodMs: this.periodMs,
      clock,
    });
  }

  /**
   * Read the startup baseline the first cycle is measured against.
   */
  async prime(): Promise<void> {
    this.baseline = await this.collector.readBaseline();
    this.primedAt = this.clock.now();
  }

  /**
   * Prime if needed, then start the loop. The first cycle runs one full
   * interval after the baseline read, so its rates cover a whole window.
   */
  async start(): Promise<void> {
    if (this.scheduler.isRunning()) return;
    if (this.starting) return this.starting;

    this.stopRequested = false;
    this.starting = this.begin().finally(() => {
      this.starting = null;
    });
    return this.starting;
  }

  async stop(): Promise<void> {
    logger.info('Stopping agent');
    if (this.starting) {
      this.stopRequested = true;
      await this.starting;
    }
    await this.scheduler.stop();
    this.emit('stopped');
  }

  private async begin(): Promise<void> {
    logger.info({ backendUrl: this.publisher.getUrl() }, 'Starting agent');
    if (this.primedAt === null) {
      await this.prime();
    }
    if (this.stopRequested) return;

    const sincePrimed = this.clock.now() - (this.primedAt ?? this.clock.now());
    this.scheduler.start(Math.max(0, this.periodMs - sincePrimed));
  }

  isRunning(): boolean {
    return this.scheduler.isRunning();
  }

  getLastSample(): MetricsSample | null {
    return this.lastSample;
  }

  /**
   * Collect one sample against the held baseline and make the fresh counters
   * the baseline for the next call.
   */
  async collect(): Promise<CollectionResult> {
    const result = await this.collector.collect(this.baseline);
    this.baseline = result.snapshot;
    this.lastSample = result.sample;

    if (result.degraded.length > 0) {
      logger.warn({ degraded: result.degraded }, 'Sample collected with defaults');
    }
    this.emit('sample', result.sample, result.degraded);
    return result;
  }

  async runCycle(): Promise<void> {
    const { sample } = await this.collect();
    const result = await this.publisher.publish(sample);

    if (result.ok) {
      this.onPublished(result.ack, sample);
    } else {
      this.onPublishFailed(result.error, sample);
    }
  }

  private onPublished(ack: PublishAck, sample: MetricsSample): void {
    logger.info({ cpu: sample.cpu_percent, durationMs: ack.durationMs }, 'Metrics sent');
    this.emit('published', ack, sample);
  }

  private onPublishFailed(error: PublishError, sample: MetricsSample): void {
    if (error instanceof BadStatusError) {
      logger.warn({ status: error.status }, 'Failed to send metrics');
    } else {
      logger.warn({ err: error }, 'Error sending metrics');
    }
    this.emit('publish-failed', error, sample);
  }
}
