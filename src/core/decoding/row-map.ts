// src/core/decoding/row-map.ts
import { ColumnNotFoundError, ColumnReadError, RowDecodeError } from '../errors.js';
import {
  toBoolean,
  toBytes,
  toDate,
  toFloat,
  toInteger,
  toText,
  type Coerced,
} from './coercion.js';

/**
 * Typed, error-accumulating access to one result row.
 *
 * Accessors never throw. A missing column or a value of the wrong shape is
 * recorded and the accessor returns the zero value of its type, so a mapper
 * can read every column and check once:
 *
 * @example
 * const artist = (row: RowMap) =>
 *   row.result({ id: row.int64('ArtistId'), name: row.string('Name') });
 */
export class RowMap {
  private readonly values = new Map<string, unknown>();
  private readonly recorded: ColumnReadError[] = [];

  constructor(columns: readonly string[], values: readonly unknown[]) {
    if (columns.length !== values.length) {
      throw new Error(`row has ${values.length} values for ${columns.length} columns`);
    }
    columns.forEach((column, idx) => {
      this.values.set(column, values[idx]);
    });
  }

  get columns(): string[] {
    return [...this.values.keys()];
  }

  get errors(): readonly ColumnReadError[] {
    return this.recorded;
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  string(key: string): string {
    return this.read(key, 'string', toText, '');
  }

  /**
   * Any stored integer width, wrapped to 64 bits.
   */
  int64(key: string): bigint {
    return this.read(key, 'int64', value => toInteger(value, 64), 0n);
  }

  /**
   * Any stored integer width; wider values are truncated to 32 bits.
   */
  int32(key: string): number {
    return Number(this.read(key, 'int32', value => toInteger(value, 32), 0n));
  }

  int16(key: string): number {
    return Number(this.read(key, 'int16', value => toInteger(value, 16), 0n));
  }

  int8(key: string): number {
    return Number(this.read(key, 'int8', value => toInteger(value, 8), 0n));
  }

  float64(key: string): number {
    return this.read(key, 'float64', value => toFloat(value, 64), 0);
  }

  float32(key: string): number {
    return this.read(key, 'float32', value => toFloat(value, 32), 0);
  }

  /**
   * Stored booleans as is; stored integers are true when nonzero.
   */
  bool(key: string): boolean {
    return this.read(key, 'bool', toBoolean, false);
  }

  bytes(key: string): Uint8Array {
    return this.read(key, 'bytes', toBytes, new Uint8Array(0));
  }

  date(key: string): Date {
    return this.read(key, 'date', toDate, new Date(0));
  }

  isNull(key: string): boolean {
    if (!this.values.has(key)) {
      this.recorded.push(new ColumnNotFoundError(key, 'null'));
      return false;
    }
    const value = this.values.get(key);
    return value === null || value === undefined;
  }

  /**
   * The stored value without conversion.
   */
  raw(key: string): unknown {
    if (!this.values.has(key)) {
      this.recorded.push(new ColumnNotFoundError(key, 'unknown'));
      return undefined;
    }
    return this.values.get(key);
  }

  /**
   * All recorded errors joined into one, or undefined when every read succeeded.
   */
  err(): RowDecodeError | undefined {
    return this.recorded.length > 0 ? new RowDecodeError(this.recorded) : undefined;
  }

  /**
   * Returns `value` when every read succeeded; throws the joined error otherwise.
   */
  result<T>(value: T): T {
    const error = this.err();
    if (error) {
      throw error;
    }
    return value;
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }

  private read<T>(key: string, target: string, coerce: (value: unknown) => Coerced<T>, zero: T): T {
    if (!this.values.has(key)) {
      this.recorded.push(new ColumnNotFoundError(key, target));
      return zero;
    }

    const value = this.values.get(key);
    const coerced = coerce(value);
    if (!coerced.ok) {
      this.recorded.push(new ColumnReadError(key, value, target));
      return zero;
    }
    return coerced.value;
  }
}
