import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ProcessGoneError } from '@hostpulse/shared';

const { pidusageMock } = vi.hoisted(() => ({ pidusageMock: vi.fn() }));

vi.mock('pidusage', () => ({ default: pidusageMock }));

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, readdir: vi.fn(actual.readdir) };
});

import { readdir } from 'node:fs/promises';
import { LinuxHostProbe } from '../host/LinuxHostProbe.js';

function procStat(
  pid: number,
  name: string,
  utime: number,
  stime: number,
  threads: number,
  start: number,
): string {
  const fields = ['S', 1, pid, pid, 0, -1, 0, 0, 0, 0, 0, utime, stime, 0, 0, 20, 0, threads, 0, start, 0, 0];
  return `${pid} (${name}) ${fields.join(' ')}\n`;
}

describe('LinuxHostProbe', () => {
  let root: string;
  let probe: LinuxHostProbe;

  function write(relative: string, content: string): void {
    const path = join(root, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
  }

  beforeEach(() => {
    pidusageMock.mockReset();
    root = mkdtempSync(join(tmpdir(), 'hostpulse-proc-'));

    write('proc/stat', 'cpu  100 0 50 800 50 0 0 0 0 0\ncpu0 100 0 50 800 50 0 0 0 0 0\n');
    write('proc/diskstats', '   8       0 sda 10 0 2048 5 20 0 1024 5 0 10 10\n');
    write(
      'proc/net/dev',
      'Inter-| Receive | Transmit\n face |bytes packets|bytes packets\n' +
        '  eth0: 2000 20 0 0 0 0 0 0 1000 10 0 0 0 0 0 0\n',
    );
    write('proc/meminfo', 'MemTotal: 2048 kB\nMemAvailable: 1024 kB\n');
    write('proc/uptime', '110.00 400.00\n');
    write('proc/10/stat', procStat(10, 'idle daemon', 10, 10, 1, 1000));
    write('proc/20/stat', procStat(20, 'busy worker', 800, 200, 4, 1000));
    write('proc/30/stat', procStat(30, 'medium', 300, 200, 2, 1000));
    write('proc/self/stat', procStat(99, 'not a pid dir', 0, 0, 1, 0));
    write('sys/devices/system/cpu/cpu0/cpufreq/cpuinfo_max_freq', '3400000\n');
    write('etc/os-release', 'NAME="Example OS"\nVERSION_ID="22.04"\nVERSION_CODENAME=jammy\n');

    probe = new LinuxHostProbe({
      procRoot: join(root, 'proc'),
      sysRoot: join(root, 'sys'),
      osReleasePath: join(root, 'etc/os-release'),
      now: () => 1_700_000_000_000,
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should read the counter snapshot from procfs', async () => {
    const snapshot = await probe.readCounterSnapshot();

    expect(snapshot.cpuTicks).toEqual([100, 0, 50, 800, 50, 0, 0, 0]);
    expect(snapshot.diskReadBytesTotal).toBe(2048 * 512);
    expect(snapshot.diskWriteBytesTotal).toBe(1024 * 512);
    expect(snapshot.netInterfaces.get('eth0')).toEqual({
      displayName: 'eth0',
      bytesRecv: 2000,
      packetsRecv: 20,
      bytesSent: 1000,
      packetsSent: 10,
    });
  });

  it('should stamp the snapshot with the capture time', async () => {
    const snapshot = await probe.readCounterSnapshot();

    expect(snapshot.capturedAt).toBe(1_700_000_000_000);
  });

  it('should report zero disk totals when diskstats is missing', async () => {
    rmSync(join(root, 'proc/diskstats'));

    const snapshot = await probe.readCounterSnapshot();

    expect(snapshot.diskReadBytesTotal).toBe(0);
    expect(snapshot.diskWriteBytesTotal).toBe(0);
  });

  it('should read memory gauges from meminfo', async () => {
    await expect(probe.readMemoryGauges()).resolves.toEqual({
      totalBytes: 2048 * 1024,
      availableBytes: 1024 * 1024,
    });
  });

  it('should count processes and threads from numeric entries only', async () => {
    await expect(probe.readProcessTotals()).resolves.toEqual({ processCount: 3, threadCount: 7 });
  });

  it('should rank processes by lifetime cpu', async () => {
    const refs = await probe.listProcesses({ sortBy: 'cpu-desc', limit: 2 });

    // cpu seconds 10, 5 and 0.2 over 100 seconds of life
    expect(refs).toEqual([
      { pid: 20, cpuPercent: 10 },
      { pid: 30, cpuPercent: 5 },
    ]);
  });

  it('should walk /proc once for totals and ranking requested together', async () => {
    vi.mocked(readdir).mockClear();

    const [totals, refs] = await Promise.all([
      probe.readProcessTotals(),
      probe.listProcesses({ sortBy: 'cpu-desc', limit: 3 }),
    ]);

    expect(readdir).toHaveBeenCalledTimes(1);
    expect(totals).toEqual({ processCount: 3, threadCount: 7 });
    expect(refs.map((ref) => ref.pid)).toEqual([20, 30, 10]);
  });

  it('should walk /proc again on the next request', async () => {
    vi.mocked(readdir).mockClear();

    await probe.readProcessTotals();
    await probe.readProcessTotals();

    expect(readdir).toHaveBeenCalledTimes(2);
  });

  it('should read process details through pidusage', async () => {
    pidusageMock.mockResolvedValue({ cpu: 12.5, memory: 65536 });

    await expect(probe.readProcess(20)).resolves.toEqual({
      pid: 20,
      name: 'busy worker',
      cpuPercent: 12.5,
      memoryBytes: 65536,
      state: 'S',
    });
    expect(pidusageMock).toHaveBeenCalledWith(20);
  });

  it('should reject with ProcessGoneError when the process has exited', async () => {
    pidusageMock.mockRejectedValue(new Error('No matching pid found'));

    await expect(probe.readProcess(4242)).rejects.toBeInstanceOf(ProcessGoneError);
  });

  it('should read static facts from os-release, cpufreq and node:os', async () => {
    const facts = await probe.readStaticHostFacts();

    expect(facts.osVersion).toMatch(/^22\.04 \(Jammy\) build /);
    expect(facts.cpuFrequencyMhz).toBe(3400);
    expect(facts.cpuCoresPhysical).toBe(facts.cpuCoresLogical);
  });
});
