import { Pool, PoolConfig } from 'pg';
import { readFileSync } from 'fs';
import { join } from 'path';
import { DatabaseConfig } from '../config/config';

export const SCHEMA_PATH = join(__dirname, '../../database/schema.sql');

export function readSchema(): string {
  return readFileSync(SCHEMA_PATH, 'utf8');
}

export function toPoolConfig(config: DatabaseConfig): PoolConfig {
  const ssl = config.ssl ? {
    rejectUnauthorized: config.sslRejectUnauthorized
  } : false;

  const shared: PoolConfig = {
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeout,
    connectionTimeoutMillis: config.connectionTimeout,
    ssl
  };

  if (config.connectionString) {
    return { ...shared, connectionString: config.connectionString };
  }

  return {
    ...shared,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password
  };
}

/**
 * Owns the process-wide pool. Created once at startup, handed to the
 * repositories, and closed on shutdown.
 */
export class DatabaseConnection {
  readonly pool: Pool;
  private closed = false;

  static fromConfig(config: DatabaseConfig, verbose: boolean = false): DatabaseConnection {
    return new DatabaseConnection(new Pool(toPoolConfig(config)), verbose);
  }

  constructor(pool: Pool, verbose: boolean = false) {
    this.pool = pool;

    // Handle pool errors
    this.pool.on('error', (err: Error) => {
      console.error('Unexpected error on idle database client:', err);
    });

    if (verbose) {
      this.pool.on('connect', () => {
        console.log('📦 New database client connected');
      });

      this.pool.on('remove', () => {
        console.log('📦 Database client removed');
      });
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT NOW()');
      } finally {
        client.release();
      }
      return true;
    } catch (error) {
      console.error('Database connection test failed:', error);
      return false;
    }
  }

  async initializeSchema(): Promise<void> {
    try {
      const client = await this.pool.connect();

      try {
        await client.query(readSchema());
        console.log('✅ Database schema initialized successfully');
      } finally {
        client.release();
      }
    } catch (error) {
      console.error('❌ Failed to initialize database schema:', error);
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.pool.end();
    console.log('📦 Database pool closed');
  }
}
