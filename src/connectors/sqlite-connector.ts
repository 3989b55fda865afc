import { copyFile, mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { SqliteConfig } from '../config/database-config.js';
import { ConnectionError, errorMessage } from '../core/errors.js';
import { createSqliteExecutor, type SqliteClientLike } from '../core/execution/executors/sqlite-executor.js';
import { createSqlite3Client, openSqlite3Database } from '../core/execution/executors/sqlite3-client.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { DbExecutorFactory } from '../repository/executor-factory.js';
import type { Connector } from './connector.js';
import { createPooledExecutorFactory, type ConnectionSource } from './pooled-executor-factory.js';

export interface SqliteConnectorOptions {
  /** Work on a temporary copy of the file (default: true) */
  copyToTemp?: boolean;
  logger?: Logger;
}

// Every lease opens its own handle on the file and closes it on release.
const fileSource = (file: string, onDestroy: () => Promise<void>): ConnectionSource<SqliteClientLike> => ({
  async acquire() {
    const client = createSqlite3Client(await openSqlite3Database(file));
    let released = false;
    return {
      resource: client,
      release: async () => {
        if (released) return;
        released = true;
        await client.close?.();
      },
    };
  },
  destroy: onDestroy,
});

/**
 * Connector for a SQLite database file.
 */
export class SqliteConnector implements Connector {
  private readonly copyToTemp: boolean;
  private readonly logger: Logger;
  private connecting: Promise<DbExecutorFactory> | null = null;

  private constructor(
    private readonly file: string,
    options: SqliteConnectorOptions
  ) {
    this.copyToTemp = options.copyToTemp ?? true;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * @throws ConnectionError when the database file cannot be found
   */
  static async open(file: string, options: SqliteConnectorOptions = {}): Promise<SqliteConnector> {
    try {
      await stat(file);
    } catch (error) {
      throw new ConnectionError(`failed to locate database file ${file}: ${errorMessage(error)}`, { cause: error });
    }
    return new SqliteConnector(file, options);
  }

  static fromConfig(config: SqliteConfig, options: Omit<SqliteConnectorOptions, 'copyToTemp'> = {}): Promise<SqliteConnector> {
    return SqliteConnector.open(config.path, { ...options, copyToTemp: config.copyToTemp });
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
    let working = this.file;
    let cleanup = async (): Promise<void> => { };

    if (this.copyToTemp) {
      const dir = await mkdtemp(path.join(tmpdir(), 'sql-rowmap-'));
      working = path.join(dir, path.basename(this.file));
      try {
        await copyFile(this.file, working);
      } catch (error) {
        await rm(dir, { recursive: true, force: true });
        throw new ConnectionError(`failed to copy database file ${this.file}: ${errorMessage(error)}`, { cause: error });
      }
      this.logger.debug(`working on temporary copy ${working}`);
      cleanup = () => rm(dir, { recursive: true, force: true });
    }

    return createPooledExecutorFactory({
      source: fileSource(working, cleanup),
      bind: client => createSqliteExecutor(client, { logger: this.logger }),
    });
  }
}
