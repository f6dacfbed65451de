import type {
  ClassModel,
  EnumLike,
  FieldOverride,
  ModelClass,
  ModelDeclaration,
  ModelLogger,
  NameRule,
  RegistryOptions,
  TypeDescriptor,
} from '../types';
import { ConfigurationError } from '../shared/errors';
import { identity } from '../shared/naming';
import { RegistryOptionsSchema, formatIssues } from '../schema';
import { ParserProvider } from '../provider';
import type { ParserProviderHost } from '../provider';
import { parseModel } from '../parse';
import { ModelBuilder, staticDeclaration } from './builder';

/**
 * Owns class declarations, field overrides and the model cache.
 *
 * A model is built the first time it is needed and kept for the life of the
 * registry. Builds run synchronously, so each class is populated at most once;
 * a class that is reached again while its own model is being built (a
 * recursive type) is looked up when first parsed instead.
 *
 * @example
 * const registry = createModelRegistry({ nameRule: camelCase });
 * registry.declare(User, { fields: [field('user_id', t.string), field('tags', t.list(t.string))] });
 * const user = registry.parse(User, { userId: 'u1', tags: ['admin'] });
 */
export class ModelRegistry implements ParserProviderHost {
  private readonly models = new Map<ModelClass, ClassModel>();
  private readonly declarations = new Map<ModelClass, ModelDeclaration>();
  private readonly building = new Set<ModelClass>();
  private readonly provider: ParserProvider;
  private readonly nameRule: NameRule;
  private readonly debug: boolean;
  private readonly logger: ModelLogger;

  constructor(options: RegistryOptions = {}) {
    const result = RegistryOptionsSchema.safeParse(options);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ConfigurationError(`invalid registry options: ${issues.join('; ')}`, { details: { issues } });
    }
    const opts = result.data;
    this.provider = new ParserProvider(this, opts.strict ?? true);
    this.nameRule = opts.nameRule ?? identity;
    this.debug = opts.debug ?? false;
    this.logger = opts.logger ?? console;
  }

  /** Declare how `target` is constructed. Takes precedence over a static `jsonModel`. */
  declare<T>(target: ModelClass<T>, declaration: ModelDeclaration): this {
    this.assertNotBuilt(target, 'declare');
    this.declarations.set(target, declaration);
    return this;
  }

  /** Replace the parser of one field, or supply the element type of a bare container field. */
  override<T>(target: ModelClass<T>, field: string, override: FieldOverride): this {
    this.assertNotBuilt(target, 'override');
    this.provider.override(target, field, override);
    return this;
  }

  /** Shorthand for an `items` override. */
  elementType<T>(target: ModelClass<T>, field: string, items: TypeDescriptor): this {
    return this.override(target, field, { items });
  }

  /** Match members of `values` by name in any casing, in models built from now on. */
  caseInsensitive(values: EnumLike): this {
    this.provider.markCaseInsensitive(values);
    return this;
  }

  has<T>(target: ModelClass<T>): boolean {
    return this.models.has(target);
  }

  /** The model of `target`, built on first use. */
  model<T>(target: ModelClass<T>): ClassModel {
    const cached = this.models.get(target);
    if (cached) return cached;
    if (this.building.has(target)) {
      throw new ConfigurationError('model requested while it is still being built', { model: target.name });
    }
    this.building.add(target);
    try {
      const declaration = this.declarations.get(target) ?? staticDeclaration(target);
      const model = new ModelBuilder(target, declaration, this.provider, this.nameRule).build();
      this.models.set(target, model);
      if (this.debug) this.logger.debug('[jsonmodel] model built', { model: model.name, fields: model.attributes.map((a) => a.jsonName) });
      return model;
    } finally {
      this.building.delete(target);
    }
  }

  /** Build an instance of `target` from a decoded JSON object. */
  parse<T>(target: ModelClass<T>, json: unknown): T {
    return parseModel(this.model(target), target, json);
  }

  prepare(target: ModelClass): void {
    if (this.building.has(target)) {
      if (this.debug) this.logger.debug('[jsonmodel] model deferred', { model: target.name });
      return;
    }
    this.model(target);
  }

  private assertNotBuilt(target: ModelClass, action: string): void {
    if (this.models.has(target)) {
      throw new ConfigurationError(`cannot ${action} after the model was built`, { model: target.name });
    }
  }
}

export function createModelRegistry(options: RegistryOptions = {}): ModelRegistry {
  return new ModelRegistry(options);
}
