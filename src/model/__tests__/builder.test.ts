import { describe, it, expect } from 'vitest';
import { createModelRegistry } from '../registry';
import { unwrapOptional } from '../builder';
import { field, t } from '../../schema';
import { camelCase } from '../../shared/naming';
import { ConfigurationError } from '../../shared/errors';
import { UnionParser, scalarParsers } from '../../parsers';

class Person {
  constructor(
    readonly first_name: string,
    readonly last_name: string,
    readonly nickname: string = '',
  ) {}
}

describe('attribute model', () => {
  it('lists fields in declaration order with json names', () => {
    const registry = createModelRegistry({ nameRule: camelCase });
    registry.declare(Person, {
      fields: [field('first_name', t.string), field('last_name', t.string), field('nickname', t.string, { optional: true })],
    });
    const model = registry.model(Person);
    expect(model.name).toBe('Person');
    expect(model.target).toBe(Person);
    expect(model.attributes.map((a) => [a.name, a.jsonName, a.optional])).toEqual([
      ['first_name', 'firstName', false],
      ['last_name', 'lastName', false],
      ['nickname', 'nickname', true],
    ]);
  });

  it('prefers the class name rule over the registry default', () => {
    const registry = createModelRegistry({ nameRule: camelCase });
    registry.declare(Person, {
      nameRule: (name) => name.toUpperCase(),
      fields: [field('first_name', t.string), field('last_name', t.string)],
    });
    expect(registry.model(Person).attributes.map((a) => a.jsonName)).toEqual(['FIRST_NAME', 'LAST_NAME']);
  });

  it('uses the declared name in diagnostics', () => {
    const registry = createModelRegistry();
    registry.declare(Person, { name: 'Human', fields: [field('first_name', t.string)] });
    expect(registry.model(Person).name).toBe('Human');
  });

  it('freezes the model', () => {
    const registry = createModelRegistry();
    registry.declare(Person, { fields: [field('first_name', t.string)] });
    const model = registry.model(Person);
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.attributes)).toBe(true);
    expect(Object.isFrozen(model.attributes[0])).toBe(true);
  });
});

describe('optional fields', () => {
  class Profile {
    constructor(
      readonly bio?: string,
      readonly age?: number,
      readonly links: string | number | null = null,
    ) {}
  }

  const registry = createModelRegistry();
  registry.declare(Profile, {
    fields: [
      field('bio', t.optional(t.string)),
      field('age', t.union(t.null, t.integer)),
      field('links', t.union(t.string, t.number, t.null)),
    ],
  });
  const [bio, age, links] = registry.model(Profile).attributes;

  it('unwraps optional(T) and forces optional', () => {
    expect(bio?.optional).toBe(true);
    expect(bio?.type).toEqual(t.string);
    expect(bio?.parser).toBe(scalarParsers.string);
  });

  it('unwraps a two-armed union with null in either position', () => {
    expect(age?.optional).toBe(true);
    expect(age?.type).toEqual(t.integer);
  });

  it('keeps wider unions as declared', () => {
    expect(links?.optional).toBe(false);
    expect(links?.parser).toBeInstanceOf(UnionParser);
  });

  it('unwrapOptional leaves plain types alone', () => {
    expect(unwrapOptional(t.string)).toBeUndefined();
    expect(unwrapOptional(t.union(t.string, t.number))).toBeUndefined();
  });
});

describe('configuration errors', () => {
  class Broken {
    constructor(readonly a: string, readonly b: string) {}
  }

  it('fails without a declaration', () => {
    const registry = createModelRegistry();
    expect(() => registry.model(Broken)).toThrow(ConfigurationError);
    expect(() => registry.model(Broken)).toThrow('Broken: no model declared; declare it on the registry or give the class a static "jsonModel"');
  });

  it('fails on an untyped field', () => {
    const registry = createModelRegistry().declare(Broken, { fields: [field('a', t.string), { name: 'b' }] });
    expect(() => registry.model(Broken)).toThrow('Broken.b: parameter has no declared type');
  });

  it('fails on a rest parameter', () => {
    const registry = createModelRegistry().declare(Broken, { fields: [{ name: 'a', type: t.string, rest: true }] });
    expect(() => registry.model(Broken)).toThrow('Broken.a: rest parameters cannot be bound; only named parameters are supported');
  });

  it('fails when two fields map to the same json name', () => {
    const registry = createModelRegistry({ nameRule: camelCase }).declare(Broken, {
      fields: [field('user_id', t.string), field('userId', t.string)],
    });
    expect(() => registry.model(Broken)).toThrow('Broken: fields "user_id" and "userId" both map to JSON name "userId"');
  });

  it('fails on a malformed static declaration', () => {
    class Static {
      static jsonModel = { fields: [{ name: '' }] };
      constructor(readonly a: string) {}
    }
    const registry = createModelRegistry();
    expect(() => registry.model(Static)).toThrow(/^Static: invalid model declaration: fields\.0\.name: /);
  });

  it('does not cache a failed build', () => {
    const registry = createModelRegistry().declare(Broken, { fields: [{ name: 'a' }] });
    expect(() => registry.model(Broken)).toThrow(ConfigurationError);
    expect(registry.has(Broken)).toBe(false);
  });
});
