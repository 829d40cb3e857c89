import { SqlClient } from '../../services/database.service';

/**
 * What every SQL-backed repository offers on top of its own queries.
 */
export interface BaseRepository {
  /**
   * Run the operation on one pooled client between BEGIN and COMMIT; ROLLBACK on throw
   */
  withTransaction<T>(operation: (client: SqlClient) => Promise<T>): Promise<T>;

  /** Readiness probe */
  healthCheck(): Promise<boolean>;
}
