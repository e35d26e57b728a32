import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  clearConfigCache,
  getConfig,
  isLogLevelEnabled,
  loadConfig,
} from '../../apps/api/src/services/config';

const ENV_KEYS = ['CONFIG_PATH', 'PORT', 'LOG_LEVEL', 'ALLOWED_ORIGINS'] as const;
const originalEnv = Object.fromEntries(ENV_KEYS.map(key => [key, process.env[key]]));

function restoreEnv(): void {
  for (const key of ENV_KEYS) {
    const value = originalEnv[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

function writeTempConfig(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'record-table-config-'));
  const file = path.join(dir, 'config.json');
  fs.writeFileSync(file, contents);
  return file;
}

describe('Config Service', () => {
  afterEach(() => {
    restoreEnv();
    clearConfigCache();
    vi.restoreAllMocks();
  });

  describe('Config Loading', () => {
    it('should load the default config file', () => {
      delete process.env.CONFIG_PATH;
      const config = loadConfig();

      expect(config.server.port).toBeGreaterThan(0);
      expect(config.table.emptyMessage).toBe('No records');
      expect(config.table.headerBackground).toBe('#d9e1f2');
      expect(config.table.legacyAttributes).toBe(false);
    });

    it('should cache the loaded config', () => {
      expect(getConfig()).toBe(getConfig());
    });

    it('should resolve a relative CONFIG_PATH from the repository root', () => {
      const originalCwd = process.cwd();
      try {
        process.chdir(os.tmpdir());
        process.env.CONFIG_PATH = 'config/default.json';
        expect(loadConfig().table.rowBackgroundB).toBe('#f2f2f2');
      } finally {
        process.chdir(originalCwd);
      }
    });

    it('should throw when the config file is missing', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      process.env.CONFIG_PATH = path.join(os.tmpdir(), 'record-table-missing', 'none.json');

      expect(() => loadConfig()).toThrow('Configuration file not found or invalid');
    });

    it('should reject a config with the wrong shape', () => {
      process.env.CONFIG_PATH = writeTempConfig(
        JSON.stringify({ server: { port: 'eighty' }, table: {}, logging: { level: 'info' } })
      );

      expect(() => loadConfig()).toThrow(/is invalid: server\.port/);
    });

    it('should reject an invalid theme date format', () => {
      process.env.CONFIG_PATH = writeTempConfig(
        JSON.stringify({
          server: { port: 4000, allowedOrigins: [] },
          table: { dateFormat: 'yyyy j' },
          logging: { level: 'info' },
        })
      );

      expect(() => loadConfig()).toThrow('table.dateFormat: Invalid date-fns format string');
    });
  });

  describe('Environment Variable Overrides', () => {
    it('should override the port from PORT', () => {
      process.env.PORT = '5050';
      expect(loadConfig().server.port).toBe(5050);
    });

    it('should ignore a non-numeric PORT', () => {
      process.env.PORT = 'abc';
      expect(loadConfig().server.port).toBe(4000);
    });

    it('should split ALLOWED_ORIGINS', () => {
      process.env.ALLOWED_ORIGINS = 'http://a.test,http://b.test';
      expect(loadConfig().server.allowedOrigins).toEqual(['http://a.test', 'http://b.test']);
    });

    it('should override and gate the log level', () => {
      process.env.LOG_LEVEL = 'warn';
      expect(loadConfig().logging.level).toBe('warn');
      expect(isLogLevelEnabled('info')).toBe(false);
      expect(isLogLevelEnabled('warn')).toBe(true);
      expect(isLogLevelEnabled('error')).toBe(true);
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(loadConfig().logging.level).toBe('info');
    });
  });
});
