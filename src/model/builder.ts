import type { AttributeModel, ClassModel, FieldDeclaration, ModelClass, ModelDeclaration, NameRule, Parser, TypeDescriptor } from '../types';
import { ConfigurationError, ModelError } from '../shared/errors';
import { ModelDeclarationSchema, formatIssues } from '../schema';
import type { ParserProvider } from '../provider';

/** Static property a class may carry instead of being declared on a registry. */
export const MODEL_PROPERTY = 'jsonModel';

/**
 * Derives the attribute model of one class from its declaration.
 */
export class ModelBuilder {
  private name: string;

  /**
   * @param declaration - Registry-declared or static declaration; validated by `build`.
   */
  constructor(
    private readonly target: ModelClass,
    private readonly declaration: unknown,
    private readonly provider: ParserProvider,
    private readonly defaultNameRule: NameRule,
  ) {
    this.name = target.name || 'anonymous';
  }

  build(): ClassModel {
    const declaration = this.validDeclaration();
    if (declaration.name) this.name = declaration.name;
    const nameRule = declaration.nameRule ?? this.defaultNameRule;
    const attributes = declaration.fields.map((f) => this.buildAttribute(f, nameRule, declaration.enumValues === true));
    const owners = new Map<string, string>();
    for (const attr of attributes) {
      const other = owners.get(attr.jsonName);
      if (other !== undefined) {
        throw new ConfigurationError(`fields "${other}" and "${attr.name}" both map to JSON name "${attr.jsonName}"`, {
          model: this.name,
          details: { jsonName: attr.jsonName, fields: [other, attr.name] },
        });
      }
      owners.set(attr.jsonName, attr.name);
    }
    return Object.freeze({ name: this.name, target: this.target, attributes: Object.freeze(attributes) });
  }

  private validDeclaration(): ModelDeclaration {
    if (this.declaration === undefined) {
      throw new ConfigurationError(`no model declared; declare it on the registry or give the class a static "${MODEL_PROPERTY}"`, { model: this.name });
    }
    const result = ModelDeclarationSchema.safeParse(this.declaration);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new ConfigurationError(`invalid model declaration: ${issues.join('; ')}`, { model: this.name, details: { issues } });
    }
    return result.data;
  }

  private buildAttribute(f: FieldDeclaration, nameRule: NameRule, enumValues: boolean): AttributeModel {
    if (f.rest) throw this.fieldError(f.name, 'rest parameters cannot be bound; only named parameters are supported');
    if (!f.type) throw this.fieldError(f.name, 'parameter has no declared type');
    const jsonName = nameRule(f.name);
    const inner = unwrapOptional(f.type);
    const type = inner ?? f.type;
    const optional = inner !== undefined || f.optional === true;
    return Object.freeze({ name: f.name, jsonName, type, optional, parser: this.resolve(type, f.name, enumValues) });
  }

  private resolve(type: TypeDescriptor, field: string, enumValues: boolean): Parser {
    try {
      return this.provider.resolve(type, { owner: this.target, field, enumValues });
    } catch (e) {
      if (e instanceof ModelError) throw e.at(field, this.name);
      throw new ConfigurationError(`cannot resolve parser: ${e instanceof Error ? e.message : String(e)}`, {
        model: this.name,
        path: [field],
        cause: e,
      });
    }
  }

  private fieldError(field: string, reason: string): ConfigurationError {
    return new ConfigurationError(reason, { model: this.name, path: [field] });
  }
}

/**
 * `optional(T)`, `union(T, null)` and `union(null, T)` all declare an optional `T`.
 */
export function unwrapOptional(type: TypeDescriptor): TypeDescriptor | undefined {
  if (type.kind === 'optional') return type.inner;
  if (type.kind !== 'union' || type.options.length !== 2) return undefined;
  const [first, second] = type.options;
  if (first && second?.kind === 'null') return first;
  if (second && first?.kind === 'null') return second;
  return undefined;
}

/** Declaration carried by the class itself, if any. */
export function staticDeclaration(target: ModelClass): unknown {
  return Object.hasOwn(target, MODEL_PROPERTY) ? Reflect.get(target, MODEL_PROPERTY) : undefined;
}
