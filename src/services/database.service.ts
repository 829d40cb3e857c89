import { Pool, PoolClient, QueryResultRow } from 'pg';
import { Config } from '../config/types';
import { logger } from '../utils/logger';

/**
 * Rows and count of one statement
 */
export interface SqlResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export interface SqlSession {
  query(text: string, params?: unknown[]): Promise<SqlResult>;
}

/**
 * A connection checked out of the pool, used for one transaction
 */
export interface SqlClient extends SqlSession {
  release(): void;
}

/**
 * What repositories need from the database layer
 */
export interface SqlExecutor extends SqlSession {
  getClient(): Promise<SqlClient>;
}

export type DatabaseConfig = Pick<
  Config,
  | 'NODE_ENV'
  | 'SERVICE_NAME'
  | 'DATABASE_HOST'
  | 'DATABASE_PORT'
  | 'DATABASE_NAME'
  | 'DATABASE_USER'
  | 'DATABASE_PASSWORD'
  | 'DATABASE_POOL_MIN'
  | 'DATABASE_POOL_MAX'
  | 'DATABASE_IDLE_TIMEOUT_MS'
  | 'DATABASE_CONNECTION_TIMEOUT_MS'
  | 'DATABASE_STATEMENT_TIMEOUT_MS'
  | 'DATABASE_QUERY_TIMEOUT_MS'
>;

class PooledSqlClient implements SqlClient {
  constructor(private readonly client: PoolClient) {}

  async query(text: string, params?: unknown[]): Promise<SqlResult> {
    return this.client.query(text, params);
  }

  release(): void {
    this.client.release();
  }
}

/**
 * Database connection pool service
 * Handles only connection pooling and lifecycle management
 */
export class DatabaseService implements SqlExecutor {
  private pool: Pool;

  constructor(cfg: DatabaseConfig) {
    this.pool = new Pool({
      host: cfg.DATABASE_HOST,
      port: cfg.DATABASE_PORT,
      database: cfg.DATABASE_NAME,
      user: cfg.DATABASE_USER,
      password: cfg.DATABASE_PASSWORD,
      max: cfg.DATABASE_POOL_MAX,
      min: cfg.DATABASE_POOL_MIN,
      idleTimeoutMillis: cfg.DATABASE_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: cfg.DATABASE_CONNECTION_TIMEOUT_MS,
      statement_timeout: cfg.DATABASE_STATEMENT_TIMEOUT_MS,
      query_timeout: cfg.DATABASE_QUERY_TIMEOUT_MS,
      application_name: cfg.SERVICE_NAME,
    });

    // Handle pool errors
    this.pool.on('error', err => {
      logger.error('DatabaseService', 'Unexpected error on idle client', err);
    });

    // Log pool events in development
    if (cfg.NODE_ENV === 'development') {
      this.pool.on('connect', () => {
        logger.debug('DatabaseService', 'New client connected to database');
      });

      this.pool.on('remove', () => {
        logger.debug('DatabaseService', 'Client removed from pool');
      });
    }
  }

  async query(text: string, params?: unknown[]): Promise<SqlResult> {
    return this.pool.query(text, params);
  }

  /**
   * Get a client from the pool for transactions
   */
  async getClient(): Promise<SqlClient> {
    return new PooledSqlClient(await this.pool.connect());
  }

  /**
   * Get pool status for monitoring
   */
  getPoolStatus(): { totalCount: number; idleCount: number; waitingCount: number } {
    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  /**
   * Close all connections (for graceful shutdown)
   */
  async close(): Promise<void> {
    logger.info('DatabaseService', 'Closing database pool');
    await this.pool.end();
  }
}
