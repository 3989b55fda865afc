// src/core/execution/executors/postgres-executor.ts
import {
  DbExecutor,
  StatementResult,
  isRowRecord,
  rowsToQueryResult
} from '../db-executor.js';

/**
 * The part of a `pg` client (or PGlite) the executor needs.
 */
export interface PostgresClientLike {
  query(
    text: string,
    params?: unknown[]
  ): Promise<PostgresQueryResultLike>;
}

export interface PostgresQueryResultLike {
  rows: unknown[];
  fields?: ReadonlyArray<{ name: string }>;
  /** Reported by `pg`. */
  rowCount?: number | null;
  /** Reported by PGlite. */
  affectedRows?: number;
}

export interface PostgresExecutorOptions {
  /** Called once by dispose(), e.g. to release a pooled client. */
  release?: () => void | Promise<void>;
}

/**
 * Creates a database executor for PostgreSQL.
 * Transactions are plain BEGIN/COMMIT/ROLLBACK on the same client, so the
 * client must be a single connection when transactions are used.
 */
export function createPostgresExecutor(
  client: PostgresClientLike,
  options: PostgresExecutorOptions = {}
): DbExecutor {
  let disposed = false;

  return {
    async executeSql(sql, params) {
      const result = await client.query(sql, params ? [...params] : undefined);
      const rows = result.rows.filter(isRowRecord);
      return rowsToQueryResult(rows, result.fields?.map(field => field.name));
    },
    async runSql(sql, params) {
      const result = await client.query(sql, params ? [...params] : undefined);
      return toStatementResult(result);
    },
    async beginTransaction() {
      await client.query('BEGIN');
    },
    async commitTransaction() {
      await client.query('COMMIT');
    },
    async rollbackTransaction() {
      await client.query('ROLLBACK');
    },
    async dispose() {
      if (disposed) return;
      disposed = true;
      await options.release?.();
    },
  };
}

// PostgreSQL has no last-insert-id; callers use RETURNING instead.
const toStatementResult = (result: PostgresQueryResultLike): StatementResult => {
  const rowsAffected = typeof result.rowCount === 'number'
    ? result.rowCount
    : result.affectedRows;
  return rowsAffected === undefined ? {} : { rowsAffected };
};
