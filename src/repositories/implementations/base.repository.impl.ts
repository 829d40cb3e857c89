import { BaseRepository } from '../interfaces/base.repository';
import { SqlClient, SqlExecutor, SqlResult, SqlSession } from '../../services/database.service';
import { logger } from '../../utils/logger';

export interface RepositoryOptions {
  /** Log every statement at debug level */
  logQueries?: boolean;
}

function truncateQuery(text: string): string {
  const compact = text.replace(/\s+/g, ' ').trim();
  return compact.substring(0, 100) + (compact.length > 100 ? '...' : '');
}

/**
 * Base repository implementation providing common database operations
 */
export abstract class BaseRepositoryImpl implements BaseRepository {
  constructor(
    protected readonly db: SqlExecutor,
    private readonly options: RepositoryOptions = {}
  ) {}

  /**
   * Execute a query, on the pool or on a transaction client
   */
  protected async query(
    text: string,
    params?: unknown[],
    session: SqlSession = this.db
  ): Promise<SqlResult> {
    const start = Date.now();
    try {
      const result = await session.query(text, params);

      if (this.options.logQueries) {
        logger.debug('BaseRepository', 'Query executed', {
          query: truncateQuery(text),
          duration: `${Date.now() - start}ms`,
          rows: result.rowCount ?? 0,
        });
      }

      return result;
    } catch (error) {
      logger.error('BaseRepository', 'Query failed', error, {
        query: truncateQuery(text),
        duration: `${Date.now() - start}ms`,
        params: params ? '[REDACTED]' : undefined,
      });
      throw error;
    }
  }

  /**
   * Execute operation within a database transaction
   */
  async withTransaction<T>(operation: (client: SqlClient) => Promise<T>): Promise<T> {
    const client = await this.db.getClient();
    try {
      await client.query('BEGIN');
      const result = await operation(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Check database connectivity
   */
  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.query('SELECT 1 as health');
      return result.rows.length === 1 && result.rows[0]?.['health'] === 1;
    } catch (error) {
      logger.error('BaseRepository', 'Database health check failed', error);
      return false;
    }
  }
}
