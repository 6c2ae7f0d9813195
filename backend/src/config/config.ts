import dotenv from 'dotenv';

dotenv.config();

export interface DatabaseConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  poolMax: number;
  idleTimeout: number;
  connectionTimeout: number;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
  autoMigrate: boolean;
}

export interface RetentionConfig {
  cleanupSchedule: string;
  runOnStartup: boolean;
}

export interface SharingConfig {
  passwordSaltRounds: number;
}

export interface AppConfig {
  nodeEnv: string;
  database: DatabaseConfig;
  retention: RetentionConfig;
  sharing: SharingConfig;
}

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function flagFrom(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true';
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    nodeEnv: env.NODE_ENV || 'development',

    database: {
      connectionString: env.DATABASE_URL || undefined,
      host: env.DB_HOST || 'localhost',
      port: intFrom(env.DB_PORT, 5432),
      database: env.DB_NAME || 'sealdrop',
      user: env.DB_USER || 'sealdrop_user',
      password: env.DB_PASSWORD || 'sealdrop_password',
      poolMax: intFrom(env.DB_POOL_MAX, 20),
      idleTimeout: intFrom(env.DB_IDLE_TIMEOUT, 30000),
      connectionTimeout: intFrom(env.DB_CONNECTION_TIMEOUT, 10000),
      ssl: flagFrom(env.DB_SSL, false),
      sslRejectUnauthorized: flagFrom(env.DB_SSL_REJECT_UNAUTHORIZED, true),
      autoMigrate: flagFrom(env.DB_AUTO_MIGRATE, false)
    },

    retention: {
      cleanupSchedule: env.RETENTION_CLEANUP_SCHEDULE || '0 * * * *', // hourly
      runOnStartup: flagFrom(env.RETENTION_RUN_ON_STARTUP, true)
    },

    sharing: {
      passwordSaltRounds: intFrom(env.SHARE_PASSWORD_SALT_ROUNDS, 12)
    }
  };
}

export const config: AppConfig = loadConfig();
