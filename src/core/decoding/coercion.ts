// src/core/decoding/coercion.ts

export type IntegerWidth = 8 | 16 | 32 | 64;
export type FloatWidth = 32 | 64;

export type Coerced<T> = { ok: true; value: T } | { ok: false };

const ok = <T>(value: T): Coerced<T> => ({ ok: true, value });
const FAILED: Coerced<never> = { ok: false };

const INTEGER_TEXT = /^[+-]?\d+$/;
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Reads a stored integer and wraps it to `width` bits.
 * Drivers hand back integers as numbers, bigints, or (PostgreSQL int8) text.
 */
export function toInteger(value: unknown, width: IntegerWidth): Coerced<bigint> {
  let wide: bigint;
  if (typeof value === 'bigint') {
    wide = value;
  } else if (typeof value === 'number' && Number.isInteger(value)) {
    wide = BigInt(value);
  } else if (typeof value === 'string' && INTEGER_TEXT.test(value)) {
    wide = BigInt(value);
  } else {
    return FAILED;
  }
  return ok(BigInt.asIntN(width, wide));
}

export function toFloat(value: unknown, width: FloatWidth): Coerced<number> {
  let wide: number;
  if (typeof value === 'number') {
    wide = value;
  } else if (typeof value === 'bigint') {
    wide = Number(value);
  } else if (typeof value === 'string' && NUMERIC_TEXT.test(value)) {
    wide = Number(value);
  } else {
    return FAILED;
  }
  return ok(width === 32 ? Math.fround(wide) : wide);
}

export function toText(value: unknown): Coerced<string> {
  return typeof value === 'string' ? ok(value) : FAILED;
}

/**
 * Booleans pass through; integer shapes read nonzero as true.
 */
export function toBoolean(value: unknown): Coerced<boolean> {
  if (typeof value === 'boolean') return ok(value);
  if (typeof value === 'bigint') return ok(value !== 0n);
  if (typeof value === 'number' && Number.isInteger(value)) return ok(value !== 0);
  return FAILED;
}

export function toBytes(value: unknown): Coerced<Uint8Array> {
  return value instanceof Uint8Array ? ok(value) : FAILED;
}

export function toDate(value: unknown): Coerced<Date> {
  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else if (typeof value === 'string') {
    date = new Date(value);
  } else {
    return FAILED;
  }
  return Number.isNaN(date.getTime()) ? FAILED : ok(date);
}
