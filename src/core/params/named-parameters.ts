// src/core/params/named-parameters.ts
import { ArgumentCountMismatchError, UnresolvedParameterError } from '../errors.js';
import {
  classifyArgument,
  slotCount,
  toPositional,
  type ArgumentShape,
  type NamedArguments,
  type SqlValue,
} from './argument-shape.js';

/**
 * One named placeholder and the run of positional slots it occupies.
 */
export interface ParameterEntry {
  name: string;
  /** 1-based index of the first slot. */
  position: number;
  value: ArgumentShape;
  slotCount: number;
}

export interface RewriteResult {
  sql: string;
  params: SqlValue[];
}

/**
 * Renders the positional marker for a 1-based slot index.
 */
export type PlaceholderFormatter = (position: number) => string;

export const postgresPlaceholder: PlaceholderFormatter = position => `$${position}`;
export const sqlitePlaceholder: PlaceholderFormatter = position => `?${position}`;
export const mssqlPlaceholder: PlaceholderFormatter = position => `@p${position}`;

export interface NormalizeOptions {
  placeholder?: PlaceholderFormatter;
}

type PlaceholderToken = {
  prefix: string;
  name: string;
  suffix: string;
};

// Leading punctuation, the sigil, the name, then anything after the first non-name character.
const PLACEHOLDER = /^([^\p{L}\p{N}_:]*):([\p{L}_][\p{L}\p{N}_]*)([^\p{L}\p{N}_].*)?$/u;

// The capture group keeps whitespace runs at odd indexes so the text can be rebuilt as written.
const splitWords = (text: string): string[] => text.split(/(\s+)/);

const parsePlaceholder = (word: string): PlaceholderToken | undefined => {
  const match = PLACEHOLDER.exec(word);
  if (!match) return undefined;
  const [, prefix = '', name = '', suffix = ''] = match;
  return { prefix, name, suffix };
};

/**
 * First pass: assigns every distinct placeholder name its slot run.
 * Names absent from `args` get no entry; `substitute` reports them.
 */
export function namedParameters(text: string, args: NamedArguments): Map<string, ParameterEntry> {
  const entries = new Map<string, ParameterEntry>();
  let position = 1;

  for (const word of splitWords(text)) {
    const token = parsePlaceholder(word);
    if (!token || entries.has(token.name) || !Object.hasOwn(args, token.name)) {
      continue;
    }

    const value = classifyArgument(token.name, args[token.name]);
    const entry: ParameterEntry = {
      name: token.name,
      position,
      value,
      slotCount: slotCount(value),
    };
    entries.set(entry.name, entry);
    position += entry.slotCount;
  }

  return entries;
}

/**
 * Second pass: replaces each placeholder with its positional markers.
 * Repeated names render the same slot run every time.
 */
export function substitute(
  text: string,
  entries: ReadonlyMap<string, ParameterEntry>,
  args: NamedArguments,
  placeholder: PlaceholderFormatter = postgresPlaceholder
): string {
  const replaced = new Set<string>();

  const rewritten = splitWords(text).map(word => {
    const token = parsePlaceholder(word);
    if (!token) return word;

    const entry = entries.get(token.name);
    if (!entry) {
      throw new UnresolvedParameterError(token.name);
    }
    replaced.add(entry.name);

    const markers: string[] = [];
    for (let i = 0; i < entry.slotCount; i++) {
      markers.push(placeholder(entry.position + i));
    }
    return `${token.prefix}${markers.join(', ')}${token.suffix}`;
  });

  const supplied = Object.keys(args).length;
  if (replaced.size !== supplied) {
    throw new ArgumentCountMismatchError(supplied, replaced.size);
  }

  return rewritten.join('');
}

/**
 * Positional argument sequence, ordered by slot position, lists expanded.
 */
export function flattenArgs(entries: ReadonlyMap<string, ParameterEntry>): SqlValue[] {
  return [...entries.values()]
    .sort((a, b) => a.position - b.position)
    .flatMap(entry => toPositional(entry.value));
}

/**
 * Rewrites `:name` placeholders to positional markers and orders the
 * arguments to match. Nothing is executed; failures surface before any
 * statement reaches the engine.
 *
 * @example
 * normalize('select * from t where id in ( :ids ) and kind = :kind', { ids: [1, 2], kind: 'a' });
 * // { sql: 'select * from t where id in ( $1, $2 ) and kind = $3', params: [1, 2, 'a'] }
 */
export function normalize(text: string, args: NamedArguments, options: NormalizeOptions = {}): RewriteResult {
  const entries = namedParameters(text, args);
  const sql = substitute(text, entries, args, options.placeholder);
  return { sql, params: flattenArgs(entries) };
}
