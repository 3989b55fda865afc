import type { DbExecutor } from '../core/execution/db-executor.js';

/**
 * One statement as the engine saw it, reported once it settles.
 */
export interface QueryLogEntry {
  /** `query` for row-returning statements, `run` for the rest */
  kind: 'query' | 'run';
  /** SQL after named parameters were rewritten */
  sql: string;
  params?: readonly unknown[];
  durationMs: number;
  /** Rows returned, or rows affected when the engine reported them */
  rowCount?: number;
  /** Set when the statement failed */
  error?: unknown;
}

export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Wraps `executor` so every statement reaches `logger` with its timing and
 * outcome. Transaction control statements are not reported.
 */
export const createQueryLoggingExecutor = (
  executor: DbExecutor,
  logger?: QueryLogger
): DbExecutor => {
  if (!logger) {
    return executor;
  }

  const timed = async <T>(
    kind: QueryLogEntry['kind'],
    sql: string,
    params: readonly unknown[] | undefined,
    run: () => Promise<T>,
    rowCount: (result: T) => number | undefined
  ): Promise<T> => {
    const started = performance.now();
    try {
      const result = await run();
      logger({ kind, sql, params, durationMs: performance.now() - started, rowCount: rowCount(result) });
      return result;
    } catch (error) {
      logger({ kind, sql, params, durationMs: performance.now() - started, error });
      throw error;
    }
  };

  return {
    executeSql: (sql, params) =>
      timed('query', sql, params, () => executor.executeSql(sql, params), result => result.values.length),
    runSql: (sql, params) =>
      timed('run', sql, params, () => executor.runSql(sql, params), result => result.rowsAffected),
    beginTransaction: () => executor.beginTransaction(),
    commitTransaction: () => executor.commitTransaction(),
    rollbackTransaction: () => executor.rollbackTransaction(),
    dispose: () => executor.dispose(),
  };
};
