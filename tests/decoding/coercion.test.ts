// tests/decoding/coercion.test.ts
import { describe, it, expect } from 'vitest';
import { toBoolean, toBytes, toDate, toFloat, toInteger, toText } from '../../src/core/decoding/coercion.js';

describe('toInteger', () => {
  it('accepts every integer representation a driver hands back', () => {
    expect(toInteger(42, 64)).toEqual({ ok: true, value: 42n });
    expect(toInteger(42n, 64)).toEqual({ ok: true, value: 42n });
    expect(toInteger('-17', 64)).toEqual({ ok: true, value: -17n });
    expect(toInteger('9223372036854775807', 64)).toEqual({ ok: true, value: 9223372036854775807n });
  });

  it('wraps values to the requested width', () => {
    expect(toInteger(300, 8)).toEqual({ ok: true, value: 44n });
    expect(toInteger(70000, 16)).toEqual({ ok: true, value: 4464n });
    expect(toInteger(2 ** 31, 32)).toEqual({ ok: true, value: -2147483648n });
  });

  it('refuses non-integral values', () => {
    expect(toInteger(1.5, 64)).toEqual({ ok: false });
    expect(toInteger('12abc', 64)).toEqual({ ok: false });
    expect(toInteger('', 64)).toEqual({ ok: false });
    expect(toInteger(null, 64)).toEqual({ ok: false });
    expect(toInteger(true, 64)).toEqual({ ok: false });
  });
});

describe('toFloat', () => {
  it('accepts numbers, bigints and numeric text', () => {
    expect(toFloat(2.5, 64)).toEqual({ ok: true, value: 2.5 });
    expect(toFloat(3n, 64)).toEqual({ ok: true, value: 3 });
    expect(toFloat('0.99', 64)).toEqual({ ok: true, value: 0.99 });
    expect(toFloat('1e3', 64)).toEqual({ ok: true, value: 1000 });
  });

  it('rounds to single precision for width 32', () => {
    expect(toFloat(1.1, 32)).toEqual({ ok: true, value: Math.fround(1.1) });
  });

  it('refuses other shapes', () => {
    expect(toFloat('abc', 64)).toEqual({ ok: false });
    expect(toFloat(null, 64)).toEqual({ ok: false });
  });
});

describe('toText', () => {
  it('only accepts strings', () => {
    expect(toText('x')).toEqual({ ok: true, value: 'x' });
    expect(toText(1)).toEqual({ ok: false });
  });
});

describe('toBoolean', () => {
  it('passes booleans through and reads integers as nonzero', () => {
    expect(toBoolean(true)).toEqual({ ok: true, value: true });
    expect(toBoolean(0)).toEqual({ ok: true, value: false });
    expect(toBoolean(2)).toEqual({ ok: true, value: true });
    expect(toBoolean(-1n)).toEqual({ ok: true, value: true });
    expect(toBoolean(0n)).toEqual({ ok: true, value: false });
  });

  it('refuses text and fractions', () => {
    expect(toBoolean('true')).toEqual({ ok: false });
    expect(toBoolean(0.5)).toEqual({ ok: false });
  });
});

describe('toBytes', () => {
  it('accepts byte arrays including Buffers', () => {
    const buf = Buffer.from([1, 2, 3]);

    expect(toBytes(buf)).toEqual({ ok: true, value: buf });
    expect(toBytes('010203')).toEqual({ ok: false });
  });
});

describe('toDate', () => {
  it('accepts dates and parseable text', () => {
    const at = new Date('2024-05-06T07:08:09.000Z');

    expect(toDate(at)).toEqual({ ok: true, value: at });
    expect(toDate('2024-05-06T07:08:09.000Z')).toEqual({ ok: true, value: at });
  });

  it('refuses invalid dates', () => {
    expect(toDate('not a date')).toEqual({ ok: false });
    expect(toDate(new Date(Number.NaN))).toEqual({ ok: false });
    expect(toDate(1714979289000)).toEqual({ ok: false });
  });
});
