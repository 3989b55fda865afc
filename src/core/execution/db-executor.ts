// src/core/execution/db-executor.ts

// rows of one statement, as columns plus positional values
export type QueryResult = {
  columns: string[];
  values: unknown[][];
};

/**
 * What the engine reported about a data-changing statement.
 * Either field is absent when the engine cannot supply it.
 */
export type StatementResult = {
  rowsAffected?: number;
  lastInsertId?: number;
};

export interface DbExecutor {
  /** Prepares and runs a row-returning statement. */
  executeSql(sql: string, params?: readonly unknown[]): Promise<QueryResult>;
  /** Prepares and runs a statement for its effect. */
  runSql(sql: string, params?: readonly unknown[]): Promise<StatementResult>;

  beginTransaction(): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;

  /** Releases whatever connection the executor holds. Idempotent. */
  dispose(): Promise<void>;
}

// --- helpers ---

/**
 * Convert an array of row objects into a QueryResult.
 * Driver field metadata, when present, fixes the column order and keeps
 * the columns of an empty result.
 */
export function rowsToQueryResult(
  rows: ReadonlyArray<Record<string, unknown>>,
  fieldNames?: readonly string[]
): QueryResult {
  const columns = fieldNames && fieldNames.length > 0
    ? [...fieldNames]
    : rows.length > 0 ? Object.keys(rows[0]) : [];

  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}

export const isRowRecord = (row: unknown): row is Record<string, unknown> =>
  typeof row === 'object' && row !== null && !Array.isArray(row);
