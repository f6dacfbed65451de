import type { EnumLike, Parser } from '../types';
import { TypeMismatchError } from '../shared/errors';

type EnumValue = string | number;

/**
 * Member names of an enum object. Numeric enums also map each value back to
 * its name under a numeric key; those keys are skipped.
 */
export function enumMembers(values: EnumLike): Array<[string, EnumValue]> {
  const out: Array<[string, EnumValue]> = [];
  for (const key of Object.keys(values)) {
    if (isReverseMappingKey(values, key)) continue;
    const member = values[key];
    if (member !== undefined) out.push([key, member]);
  }
  return out;
}

function isReverseMappingKey(values: EnumLike, key: string): boolean {
  if (!/^-?\d+(\.\d+)?$/.test(key)) return false;
  const name = values[key];
  return typeof name === 'string' && values[name] === Number(key);
}

/** Matches the member name exactly. */
export class EnumNameParser implements Parser<EnumValue> {
  private readonly members: Map<string, EnumValue>;

  constructor(values: EnumLike, readonly description: string) {
    this.members = new Map(enumMembers(values));
  }

  accepts(value: unknown): boolean {
    return typeof value === 'string' && this.members.has(value);
  }

  parse(value: unknown): EnumValue {
    const member = typeof value === 'string' ? this.members.get(value) : undefined;
    if (member === undefined) throw invalidLiteral(value, this.description);
    return member;
  }
}

/** Matches the member name in any casing, through a lowercased lookup built once. */
export class CaseInsensitiveEnumParser implements Parser<EnumValue> {
  private readonly members: Map<string, EnumValue>;

  constructor(values: EnumLike, readonly description: string) {
    this.members = new Map(enumMembers(values).map(([name, member]) => [name.toLowerCase(), member]));
  }

  accepts(value: unknown): boolean {
    return typeof value === 'string' && this.members.has(value.toLowerCase());
  }

  parse(value: unknown): EnumValue {
    const member = typeof value === 'string' ? this.members.get(value.toLowerCase()) : undefined;
    if (member === undefined) throw invalidLiteral(value, this.description);
    return member;
  }
}

/** Matches the member's value rather than its name. */
export class EnumValueParser implements Parser<EnumValue> {
  private readonly members: ReadonlyArray<EnumValue>;

  constructor(values: EnumLike, readonly description: string) {
    this.members = enumMembers(values).map(([, member]) => member);
  }

  accepts(value: unknown): boolean {
    return this.members.some((m) => m === value);
  }

  parse(value: unknown): EnumValue {
    const member = this.members.find((m) => m === value);
    if (member === undefined) throw invalidLiteral(value, this.description);
    return member;
  }
}

function invalidLiteral(value: unknown, description: string): TypeMismatchError {
  return new TypeMismatchError(value, description, {
    reason: `${JSON.stringify(value) ?? String(value)} is not a valid value for enum ${description}`,
  });
}
