import Fastify, { type FastifyInstance } from 'fastify';
import type { ReceiverConfig } from '@hostpulse/shared';
import { DEFAULT_RECEIVER_HOST, DEFAULT_RECEIVER_PORT, getLogger } from '@hostpulse/shared';
import { SampleStore } from './SampleStore.js';
import { registerSystemRoutes } from './routes/system.js';

const logger = getLogger();

export interface ReceiverServerOptions extends ReceiverConfig {
  store?: SampleStore;
}

/**
 * Development stand-in for the collector backend. Accepts samples on
 * /api/system-update and serves the latest one back.
 */
export class ReceiverServer {
  private app: FastifyInstance;
  private port: number;
  private host: string;
  private store: SampleStore;

  constructor(options: ReceiverServerOptions = {}) {
    this.port = options.port ?? DEFAULT_RECEIVER_PORT;
    this.host = options.host ?? DEFAULT_RECEIVER_HOST;
    this.store = options.store ?? new SampleStore();

    this.app = Fastify({ logger: false });
    this.setupRoutes();
  }

  private setupRoutes(): void {
    registerSystemRoutes(this.app, this.store);

    // Health endpoint
    this.app.get('/api/v1/health', async () => ({
      status: 'ok',
      timestamp: new Date(),
      samplesReceived: this.store.getReceivedCount(),
    }));
  }

  async start(): Promise<void> {
    await this.app.listen({ port: this.port, host: this.host });

    // Port 0 asks the OS for a free port; report the one actually bound.
    const address = this.app.server.address();
    if (address && typeof address === 'object') {
      this.port = address.port;
    }
    logger.info({ port: this.port, host: this.host }, 'Receiver listening');
  }

  async stop(): Promise<void> {
    await this.app.close();
  }

  getApp(): FastifyInstance {
    return this.app;
  }

  getStore(): SampleStore {
    return this.store;
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}`;
  }
}
