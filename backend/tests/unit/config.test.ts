import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/config';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('development');
    expect(config.database.host).toBe('localhost');
    expect(config.database.port).toBe(5432);
    expect(config.database.poolMax).toBe(20);
    expect(config.database.ssl).toBe(false);
    expect(config.database.sslRejectUnauthorized).toBe(true);
    expect(config.database.autoMigrate).toBe(false);
    expect(config.database.connectionString).toBeUndefined();
    expect(config.retention).toEqual({ cleanupSchedule: '0 * * * *', runOnStartup: true });
    expect(config.sharing.passwordSaltRounds).toBe(12);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      DATABASE_URL: 'postgres://app:test-secret@db:5432/files',
      DB_POOL_MAX: '5',
      DB_AUTO_MIGRATE: 'true',
      RETENTION_CLEANUP_SCHEDULE: '*/5 * * * *',
      RETENTION_RUN_ON_STARTUP: 'false',
      SHARE_PASSWORD_SALT_ROUNDS: '10'
    });

    expect(config.nodeEnv).toBe('production');
    expect(config.database.connectionString).toBe('postgres://app:test-secret@db:5432/files');
    expect(config.database.poolMax).toBe(5);
    expect(config.database.autoMigrate).toBe(true);
    expect(config.retention).toEqual({ cleanupSchedule: '*/5 * * * *', runOnStartup: false });
    expect(config.sharing.passwordSaltRounds).toBe(10);
  });

  it('ignores numbers that do not parse', () => {
    expect(loadConfig({ DB_PORT: 'not-a-port' }).database.port).toBe(5432);
  });
});
