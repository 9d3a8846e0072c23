import type { MetricsSample } from '../types/metrics.js';

/**
 * Build the wire object for a sample. Fields are copied one by one so the
 * payload carries exactly the documented keys in a stable order.
 */
export function toWirePayload(sample: MetricsSample): MetricsSample {
  return {
    os_name: sample.os_name,
    os_version: sample.os_version,
    os_manufacturer: sample.os_manufacturer,
    cpu_model: sample.cpu_model,
    cpu_cores_physical: sample.cpu_cores_physical,
    cpu_cores_logical: sample.cpu_cores_logical,
    cpu_percent: sample.cpu_percent,
    cpu_frequency_mhz: sample.cpu_frequency_mhz,
    memory_total_gb: sample.memory_total_gb,
    memory_available_gb: sample.memory_available_gb,
    memory_used_gb: sample.memory_used_gb,
    memory_percent: sample.memory_percent,
    disk_read_mbps: sample.disk_read_mbps,
    disk_write_mbps: sample.disk_write_mbps,
    disk_io_total_mbps: sample.disk_io_total_mbps,
    network_interfaces: sample.network_interfaces.map((iface) => ({
      name: iface.name,
      display_name: iface.display_name,
      bytes_sent: iface.bytes_sent,
      bytes_recv: iface.bytes_recv,
      packets_sent: iface.packets_sent,
      packets_recv: iface.packets_recv,
    })),
    process_count: sample.process_count,
    thread_count: sample.thread_count,
    top_processes: sample.top_processes.map((proc) => ({
      pid: proc.pid,
      name: proc.name,
      cpu_percent: proc.cpu_percent,
      memory_bytes: proc.memory_bytes,
      state: proc.state,
    })),
    timestamp: sample.timestamp,
  };
}

export function serializeSample(sample: MetricsSample): string {
  return JSON.stringify(toWirePayload(sample));
}
