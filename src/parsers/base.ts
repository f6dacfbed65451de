import type { Parser, ScalarKind } from '../types';
import { TypeMismatchError } from '../shared/errors';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Identity parser for untyped fields. */
export class PassthroughParser implements Parser<unknown> {
  readonly description = 'any';

  accepts(_value: unknown): boolean {
    return true;
  }

  parse(value: unknown): unknown {
    return value;
  }
}

type ScalarValue<K extends ScalarKind> = K extends 'string' ? string : K extends 'boolean' ? boolean : number;

function matchesScalar(kind: ScalarKind, value: unknown): boolean {
  switch (kind) {
    case 'string': return typeof value === 'string';
    case 'boolean': return typeof value === 'boolean';
    case 'integer': return Number.isInteger(value);
    default: return typeof value === 'number';
  }
}

/** Checks a JSON scalar against its declared kind and returns it unchanged. */
export class ScalarParser<K extends ScalarKind> implements Parser<ScalarValue<K>> {
  readonly description: K;

  constructor(readonly kind: K) {
    this.description = kind;
  }

  accepts(value: unknown): value is ScalarValue<K> {
    return matchesScalar(this.kind, value);
  }

  parse(value: unknown): ScalarValue<K> {
    if (!this.accepts(value)) throw new TypeMismatchError(value, this.description);
    return value;
  }
}

/**
 * Scalar parser for non-strict registries: values of any shape are returned
 * unchanged, but `accepts` still reports the declared kind so unions dispatch
 * on shape.
 */
export class LenientScalarParser implements Parser<unknown> {
  readonly description: ScalarKind;

  constructor(readonly kind: ScalarKind) {
    this.description = kind;
  }

  accepts(value: unknown): boolean {
    return matchesScalar(this.kind, value);
  }

  parse(value: unknown): unknown {
    return value;
  }
}

export class NullParser implements Parser<null> {
  readonly description = 'null';

  accepts(value: unknown): boolean {
    return value === null;
  }

  parse(value: unknown): null {
    if (value !== null) throw new TypeMismatchError(value, this.description);
    return null;
  }
}

export const passthroughParser = new PassthroughParser();
export const nullParser = new NullParser();
export const scalarParsers = {
  string: new ScalarParser('string'),
  number: new ScalarParser('number'),
  integer: new ScalarParser('integer'),
  boolean: new ScalarParser('boolean'),
} as const satisfies { [K in ScalarKind]: ScalarParser<K> };
export const lenientScalarParsers: { readonly [K in ScalarKind]: LenientScalarParser } = {
  string: new LenientScalarParser('string'),
  number: new LenientScalarParser('number'),
  integer: new LenientScalarParser('integer'),
  boolean: new LenientScalarParser('boolean'),
};
