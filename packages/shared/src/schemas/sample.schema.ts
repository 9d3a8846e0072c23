import { z } from 'zod';

const nonNegative = z.number().finite().nonnegative();
const percent = z.number().finite().min(0).max(100);
const count = z.number().int().nonnegative();

export const networkInterfaceSchema = z
  .object({
    name: z.string(),
    display_name: z.string(),
    bytes_sent: count,
    bytes_recv: count,
    packets_sent: count,
    packets_recv: count,
  })
  .strict();

export const topProcessSchema = z
  .object({
    pid: count,
    name: z.string(),
    cpu_percent: nonNegative,
    memory_bytes: count,
    state: z.string(),
  })
  .strict();

export const metricsSampleSchema = z
  .object({
    os_name: z.string(),
    os_version: z.string(),
    os_manufacturer: z.string(),
    cpu_model: z.string(),
    cpu_cores_physical: count,
    cpu_cores_logical: count,
    cpu_percent: percent,
    cpu_frequency_mhz: count,
    memory_total_gb: nonNegative,
    memory_available_gb: nonNegative,
    memory_used_gb: nonNegative,
    memory_percent: percent,
    disk_read_mbps: nonNegative,
    disk_write_mbps: nonNegative,
    disk_io_total_mbps: nonNegative,
    network_interfaces: z.array(networkInterfaceSchema),
    process_count: count,
    thread_count: count,
    top_processes: z.array(topProcessSchema),
    timestamp: count,
  })
  .strict();

export type ValidatedMetricsSample = z.infer<typeof metricsSampleSchema>;
