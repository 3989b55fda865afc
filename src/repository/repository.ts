import type { DbExecutor, QueryResult } from '../core/execution/db-executor.js';
import { RowMap } from '../core/decoding/row-map.js';
import { QueryExecutionError, TooManyRowsError, errorMessage } from '../core/errors.js';
import type { NamedArguments, SqlValue } from '../core/params/argument-shape.js';
import {
  normalize,
  postgresPlaceholder,
  type PlaceholderFormatter,
  type RewriteResult,
} from '../core/params/named-parameters.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { DbExecutorFactory } from './executor-factory.js';
import { createQueryLoggingExecutor, type QueryLogger } from './query-logger.js';
import { runInTransaction } from './transaction-runner.js';

/**
 * Turns one decoded row into a caller type. Throwing (usually through
 * `row.result(...)`) fails the whole call.
 */
export type RowMapper<T> = (row: RowMap) => T | Promise<T>;

/**
 * Outcome of `execute`; -1 marks a figure the engine could not report.
 */
export interface ExecutionOutcome {
  rowsAffected: number;
  lastInsertId: number;
}

export interface RepositoryOptions {
  /** Receives every statement sent to the engine */
  queryLogger?: QueryLogger;
  /** Diagnostics; silent by default */
  logger?: Logger;
  /** Positional marker style for rewritten named parameters (default `$n`) */
  placeholder?: PlaceholderFormatter;
}

/**
 * Runs SQL and maps result rows through caller-supplied functions.
 *
 * The `*Named` variants take `:name` placeholders and an argument object;
 * list values expand to one positional slot per element, for `IN (...)`.
 */
export class Repository {
  private readonly executors: DbExecutorFactory;
  private readonly queryLogger?: QueryLogger;
  private readonly logger: Logger;
  private readonly placeholder: PlaceholderFormatter;

  constructor(executors: DbExecutorFactory, options: RepositoryOptions = {}) {
    this.executors = executors;
    this.queryLogger = options.queryLogger;
    this.logger = options.logger ?? silentLogger;
    this.placeholder = options.placeholder ?? postgresPlaceholder;
  }

  async mapRows<T>(sql: string, params: readonly SqlValue[], mapper: RowMapper<T>): Promise<T[]> {
    const executor = this.wrap(this.executors.createExecutor());
    try {
      let result: QueryResult;
      try {
        result = await executor.executeSql(sql, params);
      } catch (error) {
        this.logger.error(`unable to execute query '${sql}': ${errorMessage(error)}`);
        throw new QueryExecutionError('mapRows', sql, error);
      }

      const mapped: T[] = [];
      for (const values of result.values) {
        mapped.push(await mapper(new RowMap(result.columns, values)));
      }

      this.logger.debug(`mapRows resulted in ${mapped.length} row(s)`);
      return mapped;
    } finally {
      await executor.dispose();
    }
  }

  async mapRowsNamed<T>(sql: string, args: NamedArguments, mapper: RowMapper<T>): Promise<T[]> {
    const rewritten = this.rewrite(sql, args);
    return this.mapRows(rewritten.sql, rewritten.params, mapper);
  }

  /**
   * At most one mapped row: `undefined` when the query returned none.
   * @throws TooManyRowsError when more than one row came back
   */
  async mapRow<T>(sql: string, params: readonly SqlValue[], mapper: RowMapper<T>): Promise<T | undefined> {
    const rows = await this.mapRows(sql, params, mapper);

    if (rows.length > 1) {
      this.logger.error(`mapRow resulted in ${rows.length} rows when expecting 0 or 1`);
      throw new TooManyRowsError(rows.length);
    }

    return rows[0];
  }

  async mapRowNamed<T>(sql: string, args: NamedArguments, mapper: RowMapper<T>): Promise<T | undefined> {
    const rewritten = this.rewrite(sql, args);
    return this.mapRow(rewritten.sql, rewritten.params, mapper);
  }

  /**
   * Runs a statement inside its own transaction: begin, run, commit.
   * Any failure rolls back; commit never follows a failed statement.
   */
  async execute(sql: string, params: readonly SqlValue[]): Promise<ExecutionOutcome> {
    const executor = this.wrap(this.executors.createTransactionalExecutor());
    try {
      const result = await runInTransaction(
        executor,
        () => executor.runSql(sql, params),
        rollbackError => {
          this.logger.error(`rollback failed in execute(): ${errorMessage(rollbackError)}`);
        }
      );

      return {
        rowsAffected: this.reported('rows affected', result.rowsAffected),
        lastInsertId: this.reported('last insert id', result.lastInsertId),
      };
    } catch (error) {
      this.logger.error(`execute() failed for '${sql}': ${errorMessage(error)}`);
      throw new QueryExecutionError('execute', sql, error);
    } finally {
      await executor.dispose();
    }
  }

  async executeNamed(sql: string, args: NamedArguments): Promise<ExecutionOutcome> {
    const rewritten = this.rewrite(sql, args);
    return this.execute(rewritten.sql, rewritten.params);
  }

  private rewrite(sql: string, args: NamedArguments): RewriteResult {
    try {
      return normalize(sql, args, { placeholder: this.placeholder });
    } catch (error) {
      this.logger.error(`substitution of named parameters failed for '${sql}': ${errorMessage(error)}`);
      throw error;
    }
  }

  private reported(label: string, value: number | undefined): number {
    if (value === undefined) {
      this.logger.warn(`engine did not report ${label}`);
      return -1;
    }
    return value;
  }

  private wrap(executor: DbExecutor): DbExecutor {
    return createQueryLoggingExecutor(executor, this.queryLogger);
  }
}
