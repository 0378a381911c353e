import { tmpdir } from 'node:os';
import { describe, expect, test } from 'vitest';

import { loadServerConfig } from './server-config';

describe('loadServerConfig', () => {
  test('applies defaults for an empty environment', () => {
    expect(loadServerConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      maxWorkers: 4,
      ocrLanguage: 'eng',
      uploadDir: tmpdir(),
      maxUploadBytes: 16 * 1024 * 1024,
      cacheTtlMs: 3_600_000,
      activeRetentionMs: 300_000,
      taskRetentionMs: 3_600_000,
      downloadTimeoutMs: 30_000,
      maintenanceCron: '* * * * *',
      maxPageFailureRatio: 1,
      logLevel: 'info',
    });
  });

  test('coerces numeric variables and converts seconds to ms', () => {
    const config = loadServerConfig({
      PORT: '9000',
      MAX_WORKERS: '8',
      CACHE_TTL_SECONDS: '60',
      TASK_RETENTION_SECONDS: '120',
      MAX_PAGE_FAILURE_RATIO: '0.25',
      UPLOAD_DIR: '/var/pdfloom',
      LOG_LEVEL: 'debug',
    });

    expect(config.port).toBe(9000);
    expect(config.maxWorkers).toBe(8);
    expect(config.cacheTtlMs).toBe(60_000);
    expect(config.taskRetentionMs).toBe(120_000);
    expect(config.maxPageFailureRatio).toBe(0.25);
    expect(config.uploadDir).toBe('/var/pdfloom');
    expect(config.logLevel).toBe('debug');
  });

  test('accepts a custom cron expression', () => {
    expect(
      loadServerConfig({ MAINTENANCE_CRON: '*/5 * * * *' }).maintenanceCron,
    ).toBe('*/5 * * * *');
  });

  test('rejects an invalid cron expression', () => {
    expect(() => loadServerConfig({ MAINTENANCE_CRON: 'every minute' })).toThrow(
      'Invalid server configuration: MAINTENANCE_CRON: Invalid cron expression',
    );
  });

  test('rejects out-of-range values', () => {
    expect(() => loadServerConfig({ MAX_WORKERS: '0' })).toThrow(
      /MAX_WORKERS/,
    );
    expect(() => loadServerConfig({ MAX_PAGE_FAILURE_RATIO: '2' })).toThrow(
      /MAX_PAGE_FAILURE_RATIO/,
    );
    expect(() => loadServerConfig({ PORT: 'http' })).toThrow(/PORT/);
  });

  test('rejects an unknown log level', () => {
    expect(() => loadServerConfig({ LOG_LEVEL: 'verbose' })).toThrow(
      /LOG_LEVEL/,
    );
  });
});
