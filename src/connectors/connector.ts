import type { DbExecutorFactory } from '../repository/executor-factory.js';

/**
 * Supplies executors for a configured database.
 * `getConnection` is lazy and may be called any number of times.
 */
export interface Connector {
  getConnection(): Promise<DbExecutorFactory>;
  close(): Promise<void>;
}
