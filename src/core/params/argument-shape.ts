// src/core/params/argument-shape.ts
import { InvalidArgumentError } from '../errors.js';

/**
 * A single value that can be bound to one positional slot.
 */
export type SqlValue = string | number | bigint | boolean | Uint8Array | Date | null;

/**
 * A named argument: one value, or a list expanded into one slot per element.
 */
export type NamedArgument = SqlValue | readonly SqlValue[];

export type NamedArguments = Readonly<Record<string, NamedArgument>>;

export type ScalarShape =
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'float'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'timestamp'; value: Date }
  | { kind: 'null'; value: null };

export type ArgumentShape = ScalarShape | { kind: 'list'; items: ScalarShape[] };

const classifyScalar = (name: string, value: unknown): ScalarShape => {
  if (value === null) return { kind: 'null', value };

  switch (typeof value) {
    case 'string':
      return { kind: 'text', value };
    case 'boolean':
      return { kind: 'boolean', value };
    case 'bigint':
      return { kind: 'integer', value };
    case 'number':
      return Number.isInteger(value) ? { kind: 'integer', value } : { kind: 'float', value };
    default:
      break;
  }

  if (value instanceof Uint8Array) return { kind: 'bytes', value };
  if (value instanceof Date) return { kind: 'timestamp', value };

  throw new InvalidArgumentError(name, `has unsupported type ${describeType(value)}`);
};

/**
 * Decides the shape of a named argument once, before any rewriting happens.
 * Lists must be non-empty and may only hold scalars.
 */
export function classifyArgument(name: string, value: unknown): ArgumentShape {
  if (!Array.isArray(value)) {
    return classifyScalar(name, value);
  }

  if (value.length === 0) {
    throw new InvalidArgumentError(name, 'is an empty list');
  }

  const items = value.map((item: unknown, index) => {
    if (Array.isArray(item)) {
      throw new InvalidArgumentError(name, `contains a nested list at index ${index}`);
    }
    return classifyScalar(name, item);
  });

  return { kind: 'list', items };
}

export const slotCount = (shape: ArgumentShape): number =>
  shape.kind === 'list' ? shape.items.length : 1;

/**
 * Values an argument contributes to the positional sequence, in order.
 */
export const toPositional = (shape: ArgumentShape): SqlValue[] =>
  shape.kind === 'list' ? shape.items.map(item => item.value) : [shape.value];

const describeType = (value: unknown): string => {
  if (typeof value === 'object' && value !== null) {
    return Object.prototype.toString.call(value).slice(8, -1);
  }
  return typeof value;
};
