import type { ModelClass, Parser } from '../types';
import { TypeMismatchError } from '../shared/errors';
import { isPlainObject } from './base';

/** What a nested-model parser needs from the registry that owns it. */
export interface ModelParserHost {
  parse<T>(target: ModelClass<T>, json: unknown): T;
}

/** Parses a JSON object into an instance of another declared class. */
export class ModelParser<T> implements Parser<T> {
  constructor(
    private readonly target: () => ModelClass<T>,
    private readonly host: ModelParserHost,
  ) {}

  get description(): string {
    return this.target().name || 'model';
  }

  accepts(value: unknown): boolean {
    return isPlainObject(value);
  }

  parse(value: unknown): T {
    if (!isPlainObject(value)) throw new TypeMismatchError(value, this.description);
    return this.host.parse(this.target(), value);
  }
}
