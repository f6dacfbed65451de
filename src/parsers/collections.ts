import Decimal from 'decimal.js';
import type { Parser } from '../types';
import { TypeMismatchError, toModelError } from '../shared/errors';
import { isPlainObject } from './base';

/**
 * Parse each item with `items`, reporting failures under the item's index (or key).
 */
function parseItem<T>(items: Parser<T>, value: unknown, segment: string): T {
  try {
    return items.parse(value);
  } catch (e) {
    throw toModelError(e, value, items.description).at(segment);
  }
}

export class ListParser<T> implements Parser<T[]> {
  readonly description: string;

  constructor(readonly items: Parser<T>) {
    this.description = `list<${items.description}>`;
  }

  accepts(value: unknown): boolean {
    return Array.isArray(value);
  }

  parse(value: unknown): T[] {
    if (!Array.isArray(value)) throw new TypeMismatchError(value, this.description);
    return value.map((item: unknown, i) => parseItem(this.items, item, String(i)));
  }
}

/** Decimals compare by value; everything else by identity. */
function setKey(item: unknown): unknown {
  return item instanceof Decimal ? `decimal:${item.toString()}` : item;
}

/**
 * Builds a `Set`; a JSON array is the usual source. Items equal by value keep
 * the first occurrence.
 */
export class SetParser<T> implements Parser<Set<T>> {
  readonly description: string;

  constructor(readonly items: Parser<T>) {
    this.description = `set<${items.description}>`;
  }

  accepts(value: unknown): boolean {
    return Array.isArray(value) || value instanceof Set;
  }

  parse(value: unknown): Set<T> {
    if (!Array.isArray(value) && !(value instanceof Set)) throw new TypeMismatchError(value, this.description);
    const seen = new Map<unknown, T>();
    let i = 0;
    for (const item of value) {
      const parsed = parseItem(this.items, item, String(i++));
      const key = setKey(parsed);
      if (!seen.has(key)) seen.set(key, parsed);
    }
    return new Set(seen.values());
  }
}

/** String-keyed mapping; keys are kept as-is and only values are parsed. */
export class MapParser<T> implements Parser<Record<string, T>> {
  readonly description: string;

  constructor(readonly values: Parser<T>) {
    this.description = `map<string, ${values.description}>`;
  }

  accepts(value: unknown): boolean {
    return isPlainObject(value);
  }

  parse(value: unknown): Record<string, T> {
    if (!isPlainObject(value)) throw new TypeMismatchError(value, this.description);
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, parseItem(this.values, item, key)]));
  }
}
