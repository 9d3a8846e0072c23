import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { resolve } from 'node:path';
import { Command } from 'commander';

// Mock chalk to return plain text
vi.mock('chalk', () => {
  const handler: ProxyHandler<object> = {
    get(_target, prop) {
      if (prop === 'default') return chainable;
      return chainable;
    },
    apply(_target, _thisArg, args) {
      return String(args[0]);
    },
  };

  const chainable: unknown = new Proxy(function () {}, handler);

  return { default: chainable };
});

// Mock ora to prevent spinner side effects
vi.mock('ora', () => {
  const spinner = {
    start: vi.fn().mockReturnThis(),
    stop: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    warn: vi.fn().mockReturnThis(),
    text: '',
  };
  return { default: vi.fn(() => spinner) };
});

// Mock node:fs to prevent file system operations in command actions
vi.mock('node:fs', () => ({
  existsSync: vi.fn().mockReturnValue(false),
  readFileSync: vi.fn().mockReturnValue('{}'),
  writeFileSync: vi.fn(),
}));

import { existsSync, writeFileSync } from 'node:fs';
import { startCommand } from '../commands/start.js';
import { onceCommand } from '../commands/once.js';
import { doctorCommand } from '../commands/doctor.js';
import { initCommand, defaultConfig } from '../commands/init.js';
import { receiveCommand } from '../commands/receive.js';

// Helper to extract option long names from a command
function getOptionLongNames(command: Command): string[] {
  return command.options.map((opt) => opt.long ?? '').filter(Boolean);
}

const AGENT_OPTIONS = [
  '--config',
  '--url',
  '--interval',
  '--timeout',
  '--top',
  '--loopback-prefix',
  '--log-level',
];

describe('CLI Command Definitions', () => {
  describe('startCommand', () => {
    it('should be a Commander Command instance', () => {
      expect(startCommand).toBeInstanceOf(Command);
    });

    it('should have the name "start"', () => {
      expect(startCommand.name()).toBe('start');
    });

    it('should accept the agent options', () => {
      expect(getOptionLongNames(startCommand)).toEqual(AGENT_OPTIONS);
    });
  });

  describe('onceCommand', () => {
    it('should have the name "once"', () => {
      expect(onceCommand.name()).toBe('once');
    });

    it('should add --json and --publish to the agent options', () => {
      expect(getOptionLongNames(onceCommand)).toEqual([...AGENT_OPTIONS, '--json', '--publish']);
    });
  });

  describe('doctorCommand', () => {
    it('should have the name "doctor" and a --config option', () => {
      expect(doctorCommand.name()).toBe('doctor');
      expect(getOptionLongNames(doctorCommand)).toEqual(['--config']);
    });
  });

  describe('receiveCommand', () => {
    it('should default to the loopback address and port 8000', () => {
      const port = receiveCommand.options.find((o) => o.long === '--port');
      const host = receiveCommand.options.find((o) => o.long === '--host');

      expect(port?.defaultValue).toBe('8000');
      expect(host?.defaultValue).toBe('127.0.0.1');
    });
  });

  describe('initCommand', () => {
    it('should have the name "init"', () => {
      expect(initCommand.name()).toBe('init');
    });

    it('should mention the config file in its description', () => {
      expect(initCommand.description()).toBe('Generate a hostpulse.config.json file');
    });
  });
});

describe('init action', () => {
  beforeEach(() => {
    vi.mocked(writeFileSync).mockClear();
    vi.mocked(existsSync).mockReset().mockReturnValue(false);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should write the default configuration with the given url', async () => {
    await initCommand.parseAsync(['--url', 'http://collector.test/ingest'], { from: 'user' });

    expect(writeFileSync).toHaveBeenCalledWith(
      resolve('hostpulse.config.json'),
      `${JSON.stringify(
        {
          backend_url: 'http://collector.test/ingest',
          interval: 5,
          timeout: '10s',
          top_processes: 10,
          loopback_prefix: 'lo',
          log_level: 'info',
        },
        null,
        2,
      )}\n`,
    );
  });

  it('should not overwrite an existing file', async () => {
    vi.mocked(existsSync).mockReturnValue(true);

    await initCommand.parseAsync([], { from: 'user' });

    expect(writeFileSync).not.toHaveBeenCalled();
  });
});

describe('defaultConfig', () => {
  it('should pass the agent config schema defaults through', () => {
    expect(defaultConfig()).toEqual({
      backend_url: 'http://localhost:8000/api/system-update',
      interval: 5,
      timeout: '10s',
      top_processes: 10,
      loopback_prefix: 'lo',
      log_level: 'info',
    });
  });
});
