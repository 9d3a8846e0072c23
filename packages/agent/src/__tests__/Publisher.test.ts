import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import type { MetricsSample } from '@hostpulse/shared';
import { BadStatusError, HOSTPULSE_VERSION, TransportError } from '@hostpulse/shared';
import { Publisher } from '../Publisher.js';

const BACKEND_URL = 'http://collector.test/api/system-update';

const sample: MetricsSample = {
  os_name: 'Linux',
  os_version: '1.0 build 6.1.0-test',
  os_manufacturer: 'GNU/Linux',
  cpu_model: 'Test CPU',
  cpu_cores_physical: 2,
  cpu_cores_logical: 4,
  cpu_percent: 42.5,
  cpu_frequency_mhz: 2400,
  memory_total_gb: 8,
  memory_available_gb: 6,
  memory_used_gb: 2,
  memory_percent: 25,
  disk_read_mbps: 1,
  disk_write_mbps: 0.5,
  disk_io_total_mbps: 1.5,
  network_interfaces: [],
  process_count: 10,
  thread_count: 20,
  top_processes: [],
  timestamp: 1_700_000_000_000,
};

describe('Publisher', () => {
  let fetchMock: Mock<(url: string, init: RequestInit) => Promise<Response>>;

  beforeEach(() => {
    fetchMock = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it('should acknowledge a 2xx response', async () => {
    fetchMock.mockResolvedValue(new Response('{"status":"ok"}', { status: 200 }));
    const publisher = new Publisher({ url: BACKEND_URL, timeoutMs: 1000 });

    const result = await publisher.publish(sample);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.ack.status).toBe(200);
      expect(result.ack.durationMs).toBeGreaterThanOrEqual(0);
    }
  });

  it('should post the sample as JSON', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));
    const publisher = new Publisher({ url: BACKEND_URL, timeoutMs: 1000 });

    await publisher.publish(sample);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(BACKEND_URL);
    expect(init).toMatchObject({
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': `hostpulse-agent/${HOSTPULSE_VERSION}`,
      },
    });
    expect(JSON.parse(String(init?.body))).toEqual(sample);
  });

  it('should return BadStatusError for a non-2xx response', async () => {
    fetchMock.mockResolvedValue(new Response('unavailable', { status: 503 }));
    const publisher = new Publisher({ url: BACKEND_URL, timeoutMs: 1000 });

    const result = await publisher.publish(sample);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(BadStatusError);
      expect(result.error.code).toBe('PUBLISH_BAD_STATUS');
      expect(result.error.message).toBe('Backend responded with status 503');
    }
  });

  it('should return TransportError when the request fails', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const publisher = new Publisher({ url: BACKEND_URL, timeoutMs: 1000 });

    const result = await publisher.publish(sample);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('Request to backend failed: fetch failed');
    }
  });

  it('should abort and report a timeout when the backend does not answer', async () => {
    vi.useFakeTimers();
    fetchMock.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const publisher = new Publisher({ url: BACKEND_URL, timeoutMs: 2000 });

    const pending = publisher.publish(sample);
    await vi.advanceTimersByTimeAsync(2000);
    const result = await pending;

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TransportError);
      expect(result.error.message).toBe('Request to backend timed out');
      expect(result.error instanceof TransportError && result.error.timedOut).toBe(true);
    }
  });

  it('should expose the target url', () => {
    expect(new Publisher({ url: BACKEND_URL, timeoutMs: 1000 }).getUrl()).toBe(BACKEND_URL);
  });
});
