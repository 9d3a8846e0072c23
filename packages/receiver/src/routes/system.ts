import type { FastifyInstance } from 'fastify';
import type { MetricsSample } from '@hostpulse/shared';
import { getLogger, metricsSampleSchema } from '@hostpulse/shared';
import type { SampleStore } from '../SampleStore.js';

const logger = getLogger();

export interface SystemInfoView {
  source: string;
  os: string;
  cpu_percent: number;
  cpu_model: string;
  cpu_cores: { physical: number; logical: number };
  memory_percent: number;
  memory_total_gb: number;
  memory_used_gb: number;
  disk_io_mbps: number;
  disk_read_mbps: number;
  disk_write_mbps: number;
  process_count: number;
  thread_count: number;
  top_processes: MetricsSample['top_processes'];
  network_interfaces: MetricsSample['network_interfaces'];
  timestamp: number;
}

export function toSystemInfoView(sample: MetricsSample): SystemInfoView {
  return {
    source: 'hostpulse-agent',
    os: sample.os_name,
    cpu_percent: sample.cpu_percent,
    cpu_model: sample.cpu_model,
    cpu_cores: { physical: sample.cpu_cores_physical, logical: sample.cpu_cores_logical },
    memory_percent: sample.memory_percent,
    memory_total_gb: sample.memory_total_gb,
    memory_used_gb: sample.memory_used_gb,
    disk_io_mbps: sample.disk_io_total_mbps,
    disk_read_mbps: sample.disk_read_mbps,
    disk_write_mbps: sample.disk_write_mbps,
    process_count: sample.process_count,
    thread_count: sample.thread_count,
    top_processes: sample.top_processes,
    network_interfaces: sample.network_interfaces,
    timestamp: sample.timestamp,
  };
}

export function registerSystemRoutes(app: FastifyInstance, store: SampleStore): void {
  // Ingest a sample from an agent
  app.post('/api/system-update', async (request, reply) => {
    const parsed = metricsSampleSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return {
        status: 'error',
        message: 'Invalid metrics payload',
        errors: parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
        ),
      };
    }

    store.put(parsed.data);
    logger.info(
      { cpu: parsed.data.cpu_percent, memory: parsed.data.memory_percent },
      'Metrics received',
    );
    return { status: 'ok', message: 'Metrics received' };
  });

  // Latest sample in the dashboard's shape
  app.get('/api/system-info-enhanced', async (_request, reply) => {
    const latest = store.getLatest();
    if (!latest) {
      reply.status(404);
      return { error: 'No metrics received yet' };
    }
    return toSystemInfoView(latest.sample);
  });

  // Raw latest sample as posted
  app.get('/api/system-latest', async (_request, reply) => {
    const latest = store.getLatest();
    if (!latest) {
      reply.status(404);
      return { error: 'No metrics received yet' };
    }
    return { receivedAt: latest.receivedAt.toISOString(), sample: latest.sample };
  });
}
