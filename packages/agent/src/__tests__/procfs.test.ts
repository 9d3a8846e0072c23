import { describe, it, expect } from 'vitest';
import {
  countPhysicalCores,
  formatOsVersion,
  isPhysicalDisk,
  lifetimeCpuPercent,
  parseCpuTicks,
  parseDiskStats,
  parseMemInfo,
  parseNetDev,
  parseOsRelease,
  parseProcStat,
  parseUptimeSeconds,
} from '../host/procfs.js';

describe('parseCpuTicks', () => {
  it('should read the aggregate line into eight slots', () => {
    const stat = [
      'cpu  4705 356 584 3699176 23060 0 277 0 0 0',
      'cpu0 1393 280 290 924300 6100 0 83 0 0 0',
      'intr 114930548 113199788 3 0 5 263',
    ].join('\n');

    expect(parseCpuTicks(stat)).toEqual([4705, 356, 584, 3699176, 23060, 0, 277, 0]);
  });

  it('should pad kernels that report fewer states', () => {
    expect(parseCpuTicks('cpu  10 20 30 40\n')).toEqual([10, 20, 30, 40, 0, 0, 0, 0]);
  });

  it('should throw without an aggregate line', () => {
    expect(() => parseCpuTicks('cpu0 1 2 3 4\n')).toThrow('No aggregate cpu line');
  });
});

describe('isPhysicalDisk', () => {
  it.each(['sda', 'vdb', 'nvme0n1', 'mmcblk0', 'xvda'])('should accept %s', (name) => {
    expect(isPhysicalDisk(name)).toBe(true);
  });

  it.each(['sda1', 'nvme0n1p2', 'mmcblk0p1', 'loop0', 'ram1', 'dm-0', 'sr0', 'zram0'])(
    'should reject %s',
    (name) => {
      expect(isPhysicalDisk(name)).toBe(false);
    },
  );
});

describe('parseDiskStats', () => {
  it('should sum sectors of whole disks into bytes', () => {
    const diskstats = [
      '   8       0 sda 1000 0 200 50 400 0 100 60 0 90 110',
      '   8       1 sda1 900 0 180 40 350 0 90 50 0 80 90',
      '   7       0 loop0 10 0 1000 1 0 0 0 0 0 1 1',
      ' 259       0 nvme0n1 500 0 300 20 100 0 50 10 0 30 30',
    ].join('\n');

    expect(parseDiskStats(diskstats)).toEqual({
      readBytes: (200 + 300) * 512,
      writeBytes: (100 + 50) * 512,
    });
  });

  it('should return zero totals for an empty table', () => {
    expect(parseDiskStats('')).toEqual({ readBytes: 0, writeBytes: 0 });
  });
});

describe('parseNetDev', () => {
  it('should map receive and transmit columns', () => {
    const netDev = [
      'Inter-|   Receive                                                |  Transmit',
      ' face |bytes    packets errs drop fifo frame compressed multicast|bytes    packets errs drop fifo colls carrier compressed',
      '    lo:    4200      42    0    0    0     0          0         0     4200      42    0    0    0     0       0          0',
      '  eth0: 2000 20 0 0 0 0 0 0 1000 10 0 0 0 0 0 0',
    ].join('\n');

    const interfaces = parseNetDev(netDev);

    expect([...interfaces.keys()]).toEqual(['lo', 'eth0']);
    expect(interfaces.get('eth0')).toEqual({
      displayName: 'eth0',
      bytesRecv: 2000,
      packetsRecv: 20,
      bytesSent: 1000,
      packetsSent: 10,
    });
  });
});

describe('parseMemInfo', () => {
  it('should use MemAvailable when present', () => {
    const meminfo = 'MemTotal:       16000 kB\nMemFree:         1000 kB\nMemAvailable:    8000 kB\n';

    expect(parseMemInfo(meminfo)).toEqual({
      totalBytes: 16000 * 1024,
      availableBytes: 8000 * 1024,
    });
  });

  it('should estimate availability on older kernels', () => {
    const meminfo = 'MemTotal: 1000 kB\nMemFree: 100 kB\nBuffers: 50 kB\nCached: 250 kB\n';

    expect(parseMemInfo(meminfo).availableBytes).toBe(400 * 1024);
  });

  it('should throw without MemTotal', () => {
    expect(() => parseMemInfo('MemFree: 100 kB\n')).toThrow('MemTotal missing');
  });
});

describe('parseProcStat', () => {
  it('should handle command names with spaces and parentheses', () => {
    const fields = ['S', '1', '1234', '1234', '0', '-1', '4194560', '100', '0', '0', '0'];
    const rest = [...fields, '250', '50', '0', '0', '20', '0', '6', '0', '9000', '104857600', '300'];
    const stat = `1234 (my (odd) worker) ${rest.join(' ')}`;

    expect(parseProcStat(stat)).toEqual({
      pid: 1234,
      name: 'my (odd) worker',
      state: 'S',
      utimeTicks: 250,
      stimeTicks: 50,
      threads: 6,
      startTimeTicks: 9000,
    });
  });

  it('should throw on malformed input', () => {
    expect(() => parseProcStat('garbage')).toThrow('Malformed');
  });
});

describe('lifetimeCpuPercent', () => {
  it('should divide cpu time by wall time since start', () => {
    const stat = parseProcStat(
      '7 (busy) R 1 7 7 0 -1 0 0 0 0 0 500 500 0 0 20 0 1 0 1000 0 0',
    );

    // 10 cpu-seconds over (110 - 10) seconds of life
    expect(lifetimeCpuPercent(stat, 110)).toBe(10);
  });

  it('should return 0 for a process that started at uptime', () => {
    const stat = parseProcStat('7 (new) R 1 7 7 0 -1 0 0 0 0 0 5 5 0 0 20 0 1 0 1000 0 0');

    expect(lifetimeCpuPercent(stat, 10)).toBe(0);
  });
});

describe('parseUptimeSeconds', () => {
  it('should read the first column', () => {
    expect(parseUptimeSeconds('3512.47 13800.10\n')).toBe(3512.47);
  });
});

describe('os-release', () => {
  it('should parse quoted and unquoted values', () => {
    const release = parseOsRelease('NAME="Example OS"\nVERSION_ID="22.04"\nVERSION_CODENAME=jammy\n');

    expect(release).toEqual({ NAME: 'Example OS', VERSION_ID: '22.04', VERSION_CODENAME: 'jammy' });
  });

  it('should format version, codename and kernel', () => {
    expect(formatOsVersion({ VERSION_ID: '22.04', VERSION_CODENAME: 'jammy' }, '6.1.0-test')).toBe(
      '22.04 (Jammy) build 6.1.0-test',
    );
    expect(formatOsVersion({ VERSION_ID: '12' }, '6.1.0-test')).toBe('12 build 6.1.0-test');
    expect(formatOsVersion({}, '6.1.0-test')).toBe('6.1.0-test');
  });
});

describe('countPhysicalCores', () => {
  it('should count distinct physical and core id pairs', () => {
    const block = (cpu: number, core: number): string =>
      `processor\t: ${cpu}\nphysical id\t: 0\ncore id\t\t: ${core}\n`;
    const cpuinfo = [block(0, 0), block(1, 1), block(2, 0), block(3, 1)].join('\n');

    expect(countPhysicalCores(cpuinfo)).toBe(2);
  });

  it('should return 0 without topology', () => {
    expect(countPhysicalCores('processor\t: 0\nmodel name\t: Test CPU\n')).toBe(0);
  });
});
