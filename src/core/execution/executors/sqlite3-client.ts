// src/core/execution/executors/sqlite3-client.ts
import sqlite3 from 'sqlite3';
import type { Database, RunResult, Statement } from 'sqlite3';

import type { SqliteClientLike, SqliteStatementLike } from './sqlite-executor.js';

/**
 * sqlite3 binds a BigInt as NULL. Safe integers go in as numbers; wider
 * values as decimal text, which INTEGER affinity stores back as an integer.
 */
export const toSqlite3Param = (value: unknown): unknown => {
  if (typeof value !== 'bigint') return value;
  const narrowed = Number(value);
  return Number.isSafeInteger(narrowed) ? narrowed : value.toString();
};

const wrapStatement = (statement: Statement): SqliteStatementLike => ({
  all(params) {
    return new Promise((resolve, reject) => {
      statement.all(params.map(toSqlite3Param), (err: Error | null, rows: unknown[]) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(rows);
      });
    });
  },
  run(params) {
    return new Promise((resolve, reject) => {
      statement.run(params.map(toSqlite3Param), function (this: RunResult, err: Error | null) {
        if (err) {
          reject(err);
          return;
        }
        resolve({ changes: this.changes, lastID: this.lastID });
      });
    });
  },
  finalize() {
    return new Promise((resolve, reject) => {
      statement.finalize((err: Error | null) => (err ? reject(err) : resolve()));
    });
  },
});

/**
 * Adapts a `sqlite3` database handle to the promise-based client the executor uses.
 */
export const createSqlite3Client = (db: Database): SqliteClientLike => ({
  prepare(sql) {
    return new Promise((resolve, reject) => {
      const statement = db.prepare(sql, (err: Error | null) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(wrapStatement(statement));
      });
    });
  },
  exec(sql) {
    return new Promise((resolve, reject) => {
      db.exec(sql, err => (err ? reject(err) : resolve()));
    });
  },
  close() {
    return new Promise((resolve, reject) => {
      db.close(err => (err ? reject(err) : resolve()));
    });
  },
});

export const openSqlite3Database = (filename: string, mode?: number): Promise<Database> =>
  new Promise((resolve, reject) => {
    const db = new sqlite3.Database(
      filename,
      mode ?? sqlite3.OPEN_READWRITE | sqlite3.OPEN_CREATE,
      err => (err ? reject(err) : resolve(db))
    );
  });
