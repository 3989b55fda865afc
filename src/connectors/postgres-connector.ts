import pg from 'pg';

import type { PostgresConfig } from '../config/database-config.js';
import { ConnectionError, errorMessage } from '../core/errors.js';
import {
  createPostgresExecutor,
  type PostgresClientLike,
  type PostgresQueryResultLike,
} from '../core/execution/executors/postgres-executor.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { DbExecutorFactory } from '../repository/executor-factory.js';
import type { Connector } from './connector.js';
import { createPooledExecutorFactory, type ConnectionSource } from './pooled-executor-factory.js';
import { withRetry } from './retry.js';

export interface PostgresPoolClientLike extends PostgresClientLike {
  release(): void;
}

export interface PostgresPoolLike {
  query(text: string, params?: unknown[]): Promise<PostgresQueryResultLike>;
  connect(): Promise<PostgresPoolClientLike>;
  end(): Promise<void>;
}

export interface PostgresConnectorOptions {
  /** Builds the driver pool; defaults to a `pg.Pool` */
  createPool?: (config: PostgresConfig) => PostgresPoolLike;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export const createPgPool = (config: PostgresConfig): PostgresPoolLike => {
  const pool = new pg.Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.pool.max,
    idleTimeoutMillis: config.pool.idleTimeoutMillis,
    connectionTimeoutMillis: config.pool.connectionTimeoutMillis,
  });

  return {
    query: (text, params) => pool.query(text, params),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, params) => client.query(text, params),
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
};

const poolSource = (pool: PostgresPoolLike): ConnectionSource<PostgresPoolClientLike> => ({
  async acquire() {
    const client = await pool.connect();
    let released = false;
    return {
      resource: client,
      release: async () => {
        if (released) return;
        released = true;
        client.release();
      },
    };
  },
  destroy: () => pool.end(),
});

/**
 * Lazily opens one shared PostgreSQL pool, verifying it before first use.
 * Failed attempts are retried with exponential backoff; concurrent callers
 * wait on the same attempt.
 */
export class PostgresConnector implements Connector {
  private readonly createPool: (config: PostgresConfig) => PostgresPoolLike;
  private readonly logger: Logger;
  private readonly sleep?: (ms: number) => Promise<void>;
  private connecting: Promise<DbExecutorFactory> | null = null;

  constructor(
    private readonly config: PostgresConfig,
    options: PostgresConnectorOptions = {}
  ) {
    this.createPool = options.createPool ?? createPgPool;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep;
  }

  getConnection(): Promise<DbExecutorFactory> {
    if (!this.connecting) {
      this.connecting = this.connect().catch((error: unknown) => {
        this.connecting = null;
        throw error;
      });
    }
    return this.connecting;
  }

  async close(): Promise<void> {
    const connecting = this.connecting;
    this.connecting = null;
    if (!connecting) return;

    await connecting.then(
      factory => factory.dispose(),
      (error: unknown) => {
        this.logger.debug(`close(): connection was never established: ${errorMessage(error)}`);
      }
    );
  }

  private async connect(): Promise<DbExecutorFactory> {
    const { attempts, baseDelayMillis } = this.config.retry;

    try {
      const pool = await withRetry(() => this.tryConnect(), {
        attempts,
        baseDelayMillis,
        sleep: this.sleep,
        onRetry: (attempt, error, delay) => {
          this.logger.warn(`connection attempt ${attempt} failed (${errorMessage(error)}); retrying in ${delay}ms`);
        },
      });

      return createPooledExecutorFactory({
        source: poolSource(pool),
        bind: client => createPostgresExecutor(client),
      });
    } catch (error) {
      throw new ConnectionError(
        `failed to connect after ${attempts} attempts: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private async tryConnect(): Promise<PostgresPoolLike> {
    const pool = this.createPool(this.config);
    try {
      await pool.query('SELECT 1');
      return pool;
    } catch (error) {
      await pool.end();
      throw error;
    }
  }
}
