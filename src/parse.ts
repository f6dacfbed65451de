import type { ClassModel, ModelClass } from './types';
import { MissingFieldError, TypeMismatchError, toModelError } from './shared/errors';
import { isPlainObject } from './parsers/base';

/**
 * Build an instance from `json` using an already built model.
 *
 * Attributes are read in model order. A required attribute missing from the
 * payload fails the whole parse; an optional one that is missing or `null`
 * is passed to the constructor as `undefined`, so its default applies.
 * Payload keys with no attribute are ignored.
 */
export function parseModel<T>(model: ClassModel, target: ModelClass<T>, json: unknown): T {
  if (!isPlainObject(json)) throw new TypeMismatchError(json, `object (${model.name})`, { model: model.name });
  const args = model.attributes.map((attr) => {
    const value = Object.hasOwn(json, attr.jsonName) ? json[attr.jsonName] : undefined;
    if (value === undefined || (value === null && attr.optional)) {
      if (!attr.optional) throw new MissingFieldError(attr.jsonName, { model: model.name });
      return undefined;
    }
    try {
      return attr.parser.parse(value);
    } catch (e) {
      throw toModelError(e, value, attr.parser.description).at(attr.jsonName, model.name);
    }
  });
  // Reflect.construct is typed `any`; constructing `target` yields a T.
  return Reflect.construct(target, args);
}
