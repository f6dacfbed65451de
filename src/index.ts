/**
 * jsonmodel: build typed class instances from decoded JSON.
 *
 * @example
 * import { createModelRegistry, defineModel, field, t } from "jsonmodel";
 *
 * class Point {
 *   static jsonModel = defineModel({ fields: [field("x", t.number), field("y", t.number, { optional: true })] });
 *   constructor(readonly x: number, readonly y = 0) {}
 * }
 *
 * const registry = createModelRegistry();
 * registry.parse(Point, JSON.parse('{"x": 3}')); // Point { x: 3, y: 0 }
 */
export { ModelRegistry, createModelRegistry } from './model/registry';
export { ModelBuilder, MODEL_PROPERTY, unwrapOptional } from './model/builder';
export { ParserProvider } from './provider';
export type { ResolveContext, ParserProviderHost } from './provider';
export { parseModel } from './parse';
export { t, field, defineModel, describeType } from './schema';
export { identity, camelCase } from './shared/naming';
export {
  ModelError,
  ConfigurationError,
  MissingFieldError,
  TypeMismatchError,
  toModelError,
  describeValue,
} from './shared/errors';
export type { ErrorCode, ModelErrorOptions } from './shared/errors';
export * from './parsers';
export * from './types';
