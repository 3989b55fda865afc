import type { DbExecutor } from '../core/execution/db-executor.js';

/**
 * Database executor factory interface.
 */
export interface DbExecutorFactory {
  /**
   * Creates an executor for one row-returning call.
   * @returns The database executor
   */
  createExecutor(): DbExecutor;

  /**
   * Creates an executor that keeps a single connection until disposed,
   * so begin, statement and commit all run on it.
   * @returns The transactional database executor
   */
  createTransactionalExecutor(): DbExecutor;

  /**
   * Disposes any underlying resources (connection pools, temporary files).
   */
  dispose(): Promise<void>;
}

/**
 * Factory over one already-open executor, e.g. a single PGlite or sqlite3
 * handle. Disposing the executors it hands out leaves that handle open.
 */
export const createSingleExecutorFactory = (
  executor: DbExecutor,
  dispose: () => Promise<void> = async () => { }
): DbExecutorFactory => {
  const borrowed: DbExecutor = {
    executeSql: (sql, params) => executor.executeSql(sql, params),
    runSql: (sql, params) => executor.runSql(sql, params),
    beginTransaction: () => executor.beginTransaction(),
    commitTransaction: () => executor.commitTransaction(),
    rollbackTransaction: () => executor.rollbackTransaction(),
    dispose: async () => { },
  };

  return {
    createExecutor: () => borrowed,
    createTransactionalExecutor: () => borrowed,
    dispose,
  };
};
