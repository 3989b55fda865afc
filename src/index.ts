/**
 * sql-rowmap exports.
 * Named-parameter rewriting, typed row decoding and row mapping over
 * PostgreSQL and SQLite.
 */
export * from './core/errors.js';
export * from './core/params/argument-shape.js';
export * from './core/params/named-parameters.js';
export * from './core/decoding/coercion.js';
export * from './core/decoding/row-map.js';

// execution abstraction + helpers
export * from './core/execution/db-executor.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/execution/executors/sqlite-executor.js';
export * from './core/execution/executors/sqlite3-client.js';

export * from './repository/executor-factory.js';
export * from './repository/query-logger.js';
export * from './repository/transaction-runner.js';
export * from './repository/repository.js';

export * from './connectors/connector.js';
export * from './connectors/pooled-executor-factory.js';
export * from './connectors/retry.js';
export * from './connectors/postgres-connector.js';
export * from './connectors/sqlite-connector.js';
export * from './connectors/create-connector.js';

export * from './config/database-config.js';
export * from './logging/logger.js';
