// src/core/errors.ts

/**
 * Base class of every error raised by sql-rowmap.
 */
export class SqlRowMapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A named argument whose value has no supported SQL shape.
 */
export class InvalidArgumentError extends SqlRowMapError {
  constructor(
    readonly parameter: string,
    readonly reason: string
  ) {
    super(`argument '${parameter}' ${reason}`);
  }
}

/**
 * A named placeholder in the query text with no matching argument.
 */
export class UnresolvedParameterError extends SqlRowMapError {
  constructor(readonly parameter: string) {
    super(`parameter '${parameter}' not found in arguments`);
  }
}

/**
 * The supplied arguments and the placeholders found in the text disagree.
 */
export class ArgumentCountMismatchError extends SqlRowMapError {
  constructor(
    readonly supplied: number,
    readonly replaced: number
  ) {
    super(`received ${supplied} arguments and only replaced ${replaced}`);
  }
}

/**
 * A typed column read that failed. Recorded by RowMap, never thrown by it.
 */
export class ColumnReadError extends SqlRowMapError {
  constructor(
    readonly key: string,
    readonly value: unknown,
    readonly target: string,
    message = `cannot convert key '${key}' value '${describeValue(value)}' to '${target}'`
  ) {
    super(message);
  }
}

export class ColumnNotFoundError extends ColumnReadError {
  constructor(key: string, target: string) {
    super(key, undefined, target, `key '${key}' does not exist in row map`);
  }
}

/**
 * Every error a row recorded, joined into one.
 */
export class RowDecodeError extends AggregateError {
  declare readonly errors: ColumnReadError[];

  constructor(errors: readonly ColumnReadError[]) {
    super([...errors], errors.map(error => error.message).join('\n'));
    this.name = 'RowDecodeError';
  }
}

export class TooManyRowsError extends SqlRowMapError {
  constructor(readonly rowCount: number) {
    super(`query resulted in ${rowCount} rows when expecting 0 or 1`);
  }
}

/**
 * An engine failure (prepare, query, run, commit) wrapped with call context.
 */
export class QueryExecutionError extends SqlRowMapError {
  constructor(
    readonly operation: string,
    readonly sql: string,
    cause: unknown
  ) {
    super(`${operation} failed for '${sql}': ${errorMessage(cause)}`, { cause });
  }
}

export class ConnectionError extends SqlRowMapError {}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const describeValue = (value: unknown): string => {
  if (value instanceof Uint8Array) {
    return `<${value.length} bytes>`;
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return value.toISOString();
  }
  return String(value);
};
