import pg from 'pg';
import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

const { Pool } = pg;

/**
 * Anything that can run a query: a pg Pool, a checked-out client, or a test double
 */
export type QueryClient = Pick<pg.Pool, 'query'>;

/**
 * Query client that owns its connections
 */
export type ClosableQueryClient = QueryClient & { end(): Promise<void> };

export interface ConnectionCheck {
  status: 'ok' | 'unavailable' | 'not_configured';
  message?: string;
}

/**
 * PostgreSQL Database Configuration
 *
 * The database is only read from (prompt templates). Pools are created on
 * demand and owned by the caller; nothing is cached at module level.
 */
export class DatabaseConfig {
  /**
   * Connection settings from DATABASE_URL or the PG* variables
   */
  static getConfig(): pg.PoolConfig {
    const connectionString = process.env.DATABASE_URL;
    if (connectionString) {
      return { connectionString, max: 5, idleTimeoutMillis: 30000 };
    }

    if (!process.env.PGHOST || !process.env.PGDATABASE) {
      throw new ConfigurationError(
        'Missing database configuration. ' +
          'Please set DATABASE_URL or PGHOST/PGDATABASE in .env'
      );
    }

    return {
      host: process.env.PGHOST,
      port: parseInt(process.env.PGPORT || '5432', 10),
      user: process.env.PGUSER,
      password: process.env.PGPASSWORD,
      database: process.env.PGDATABASE,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 30000,
    };
  }

  /**
   * Create a new connection pool. The caller must end() it.
   */
  static createPool(): pg.Pool {
    const pool = new Pool(this.getConfig());
    console.log(
      `📊 Database pool initialized: ${process.env.PGUSER ?? 'default'}@${process.env.PGHOST ?? 'url'}/${process.env.PGDATABASE ?? ''}`
    );
    return pool;
  }

  /**
   * Probe the database. Missing settings are reported as not_configured
   * rather than thrown.
   */
  static async checkConnection(
    createPool: () => ClosableQueryClient = () => DatabaseConfig.createPool()
  ): Promise<ConnectionCheck> {
    let pool: ClosableQueryClient;
    try {
      pool = createPool();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { status: 'not_configured', message: error.message };
      }
      throw error;
    }

    try {
      const ok = await new ReadOnlyDatabase(pool).testConnection();
      return { status: ok ? 'ok' : 'unavailable' };
    } finally {
      await pool.end();
    }
  }
}

/**
 * READ-ONLY query runner
 *
 * Rejects anything that is not a SELECT before it reaches the database.
 */
export class ReadOnlyDatabase {
  constructor(private readonly client: QueryClient) {}

  async query<T extends pg.QueryResultRow>(sql: string, params: unknown[] = []): Promise<T[]> {
    const trimmedQuery = sql.trim().toUpperCase();
    if (!trimmedQuery.startsWith('SELECT')) {
      throw new ConfigurationError(
        'Only SELECT queries are allowed on the read-only connection.'
      );
    }

    const result = await this.client.query<T>(sql, params);
    return result.rows;
  }

  async testConnection(): Promise<boolean> {
    try {
      const rows = await this.query<{ now: Date }>('SELECT NOW() as now');
      console.log('✅ Database connection successful:', rows[0]?.now);
      return true;
    } catch (error) {
      console.error('❌ Database connection failed:', error);
      return false;
    }
  }
}
