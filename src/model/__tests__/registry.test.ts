import { describe, it, expect, vi } from 'vitest';
import { ModelRegistry, createModelRegistry } from '../registry';
import { defineModel, field, t } from '../../schema';
import { ConfigurationError } from '../../shared/errors';
import type { RegistryOptions } from '../../types';

class Foo {
  constructor(readonly bar: string) {}
}

class TreeNode {
  static jsonModel = defineModel({
    fields: [field('label', t.string), field('children', t.list(t.lazy(() => TreeNode)), { optional: true })],
  });

  constructor(
    readonly label: string,
    readonly children: TreeNode[] = [],
  ) {}
}

describe('model cache', () => {
  it('builds once and returns the cached model', () => {
    const registry = createModelRegistry().declare(Foo, { fields: [field('bar', t.string)] });
    expect(registry.has(Foo)).toBe(false);
    const cold = registry.model(Foo);
    const warm = registry.model(Foo);
    expect(warm).toBe(cold);
    expect(registry.has(Foo)).toBe(true);
  });

  it('builds structurally identical models in separate registries', () => {
    const declaration = { fields: [field('bar', t.string)] };
    const a = createModelRegistry().declare(Foo, declaration).model(Foo);
    const b = createModelRegistry().declare(Foo, declaration).model(Foo);
    const shape = (m: typeof a) => m.attributes.map(({ name, jsonName, type, optional }) => ({ name, jsonName, type, optional }));
    expect(shape(a)).toEqual(shape(b));
  });

  it('refuses changes once a model is built', () => {
    const registry = createModelRegistry().declare(Foo, { fields: [field('bar', t.string)] });
    registry.model(Foo);
    expect(() => registry.declare(Foo, { fields: [] })).toThrow('Foo: cannot declare after the model was built');
    expect(() => registry.elementType(Foo, 'bar', t.string)).toThrow('Foo: cannot override after the model was built');
  });

  it('prefers a registry declaration over the static one', () => {
    const registry = createModelRegistry().declare(TreeNode, { name: 'Node', fields: [field('label', t.string)] });
    expect(registry.model(TreeNode).attributes.map((a) => a.name)).toEqual(['label']);
  });
});

describe('recursive models', () => {
  it('defers a class that references itself', () => {
    const logger = { debug: vi.fn() };
    const registry = createModelRegistry({ debug: true, logger });
    const tree = registry.parse(TreeNode, { label: 'root', children: [{ label: 'leaf' }] });
    expect(tree.children[0]).toBeInstanceOf(TreeNode);
    expect(tree.children[0]?.label).toBe('leaf');
    expect(tree.children[0]?.children).toEqual([]);
    expect(logger.debug).toHaveBeenCalledWith('[jsonmodel] model deferred', { model: 'TreeNode' });
  });

  it('builds mutually referencing classes', () => {
    class Author {
      constructor(readonly name: string, readonly books: Book[] = []) {}
    }
    class Book {
      constructor(readonly title: string, readonly author?: Author) {}
    }
    const registry = createModelRegistry()
      .declare(Author, { fields: [field('name', t.string), field('books', t.list(t.model(Book)), { optional: true })] })
      .declare(Book, { fields: [field('title', t.string), field('author', t.optional(t.model(Author)))] });
    registry.model(Author);
    expect(registry.has(Book)).toBe(true);
    const author = registry.parse(Author, { name: 'Ann', books: [{ title: 'One', author: { name: 'Ann' } }] });
    expect(author.books[0]?.author?.name).toBe('Ann');
  });
});

describe('registry options', () => {
  it('logs model builds when debug is set', () => {
    const logger = { debug: vi.fn() };
    createModelRegistry({ debug: true, logger }).declare(Foo, { fields: [field('bar', t.string)] }).model(Foo);
    expect(logger.debug).toHaveBeenCalledWith('[jsonmodel] model built', { model: 'Foo', fields: ['bar'] });
  });

  it('stays quiet by default', () => {
    const logger = { debug: vi.fn() };
    createModelRegistry({ logger }).declare(Foo, { fields: [field('bar', t.string)] }).model(Foo);
    expect(logger.debug).not.toHaveBeenCalled();
  });

  it('rejects invalid options', () => {
    const options: RegistryOptions = JSON.parse('{"strict":"yes"}');
    expect(() => new ModelRegistry(options)).toThrow(ConfigurationError);
    expect(() => new ModelRegistry(options)).toThrow('invalid registry options: strict: Expected boolean, received string');
  });

  it('passes scalars through when not strict', () => {
    const registry = createModelRegistry({ strict: false }).declare(Foo, { fields: [field('bar', t.string)] });
    expect(registry.parse(Foo, { bar: 3 }).bar).toBe(3);
  });
});
