// src/core/execution/executors/sqlite-executor.ts
import { errorMessage } from '../../errors.js';
import { silentLogger, type Logger } from '../../../logging/logger.js';
import {
  DbExecutor,
  isRowRecord,
  rowsToQueryResult
} from '../db-executor.js';

export interface SqliteStatementLike {
  all(params: readonly unknown[]): Promise<unknown[]>;
  run(params: readonly unknown[]): Promise<{ changes?: number; lastID?: number }>;
  finalize(): Promise<void>;
}

export interface SqliteClientLike {
  prepare(sql: string): Promise<SqliteStatementLike>;
  exec(sql: string): Promise<void>;
  close?(): Promise<void>;
}

export interface SqliteExecutorOptions {
  /** Close the client when the executor is disposed */
  closeOnDispose?: boolean;
  /** Receives finalize failures that follow a failed statement */
  logger?: Logger;
}

/**
 * Creates a database executor for SQLite.
 * Every statement is prepared, run once and finalized, whatever the outcome.
 * @param client A SQLite client instance.
 * @returns A DbExecutor implementation for SQLite.
 */
export function createSqliteExecutor(
  client: SqliteClientLike,
  options: SqliteExecutorOptions = {}
): DbExecutor {
  const logger = options.logger ?? silentLogger;
  let disposed = false;

  const withStatement = async <T>(
    sql: string,
    use: (statement: SqliteStatementLike) => Promise<T>
  ): Promise<T> => {
    const statement = await client.prepare(sql);
    let result: T;
    try {
      result = await use(statement);
    } catch (error) {
      // the statement error is the one reported
      try {
        await statement.finalize();
      } catch (finalizeError) {
        logger.warn(`finalize failed after '${sql}' errored: ${errorMessage(finalizeError)}`);
      }
      throw error;
    }
    await statement.finalize();
    return result;
  };

  return {
    async executeSql(sql, params) {
      const rows = await withStatement(sql, statement => statement.all(params ?? []));
      return rowsToQueryResult(rows.filter(isRowRecord));
    },
    async runSql(sql, params) {
      const { changes, lastID } = await withStatement(sql, statement => statement.run(params ?? []));
      return { rowsAffected: changes, lastInsertId: lastID };
    },
    async beginTransaction() {
      await client.exec('BEGIN');
    },
    async commitTransaction() {
      await client.exec('COMMIT');
    },
    async rollbackTransaction() {
      await client.exec('ROLLBACK');
    },
    async dispose() {
      if (disposed) return;
      disposed = true;
      if (options.closeOnDispose) {
        await client.close?.();
      }
    },
  };
}
