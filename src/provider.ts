import type { EnumLike, FieldOverride, ModelClass, Parser, TypeDescriptor, TypeKind } from './types';
import { ConfigurationError } from './shared/errors';
import { describeType } from './schema';
import {
  CaseInsensitiveEnumParser,
  EnumNameParser,
  EnumValueParser,
  ListParser,
  MapParser,
  ModelParser,
  SetParser,
  UnionParser,
  decimalParser,
  lenientScalarParsers,
  nullParser,
  passthroughParser,
  scalarParsers,
} from './parsers';
import type { ModelParserHost } from './parsers';

/** The field a parser is being resolved for. */
export interface ResolveContext {
  readonly owner: ModelClass;
  readonly field: string;
  /** The owning model matches enums on member values. */
  readonly enumValues: boolean;
}

export interface ParserProviderHost extends ModelParserHost {
  /** Build the model of `target` now, unless it is already being built. */
  prepare(target: ModelClass): void;
}

type RuleTable = { [K in TypeKind]: (type: TypeDescriptor<K>, ctx: ResolveContext) => Parser };

function applyRule<K extends TypeKind>(rules: RuleTable, type: TypeDescriptor<K>, ctx: ResolveContext): Parser {
  const rule: RuleTable[K] = rules[type.kind];
  return rule(type, ctx);
}

/**
 * Chooses the parser for a declared type. Per-field overrides win; otherwise
 * the rule registered for the type's kind builds it, recursing into element
 * and alternative types.
 */
export class ParserProvider {
  private readonly overrides = new WeakMap<ModelClass, Map<string, FieldOverride>>();
  private readonly caseInsensitiveEnums = new WeakSet<EnumLike>();
  private readonly rules: RuleTable;

  constructor(
    private readonly host: ParserProviderHost,
    private readonly strict: boolean,
  ) {
    this.rules = {
      any: () => passthroughParser,
      scalar: (type) => (this.strict ? scalarParsers[type.scalar] : lenientScalarParsers[type.scalar]),
      null: () => nullParser,
      decimal: () => decimalParser,
      list: (type, ctx) => new ListParser(this.resolveType(requireElement(type.items, 'list'), ctx)),
      set: (type, ctx) => new SetParser(this.resolveType(requireElement(type.items, 'set'), ctx)),
      map: (type, ctx) => new MapParser(type.values ? this.resolveType(type.values, ctx) : passthroughParser),
      enum: (type, ctx) => this.enumParser(type, ctx),
      model: (type) => {
        this.host.prepare(type.target());
        return new ModelParser(type.target, this.host);
      },
      union: (type, ctx) => {
        if (type.options.length === 0) throw new ConfigurationError('union has no alternatives');
        return new UnionParser(type.options.map((o) => this.resolveType(o, ctx)));
      },
      optional: (type, ctx) => new UnionParser([this.resolveType(type.inner, ctx), nullParser]),
    };
  }

  /** Register an override for one field of `owner`. Later registrations replace earlier ones. */
  override(owner: ModelClass, field: string, override: FieldOverride): void {
    let fields = this.overrides.get(owner);
    if (!fields) {
      fields = new Map();
      this.overrides.set(owner, fields);
    }
    fields.set(field, override);
  }

  markCaseInsensitive(values: EnumLike): void {
    this.caseInsensitiveEnums.add(values);
  }

  /**
   * Resolve the parser for a field's declared type. Overrides apply here, at
   * the field's top level, and never to nested element types.
   */
  resolve(type: TypeDescriptor, ctx: ResolveContext): Parser {
    const override = this.overrides.get(ctx.owner)?.get(ctx.field);
    if (!override) return this.resolveType(type, ctx);
    if ('parser' in override) return override.parser;
    return this.resolveType(withElement(type, override.items), ctx);
  }

  private resolveType(type: TypeDescriptor, ctx: ResolveContext): Parser {
    if (!(type.kind in this.rules)) throw new ConfigurationError(`unsupported type "${String(type.kind)}"`);
    return applyRule(this.rules, type, ctx);
  }

  private enumParser(type: TypeDescriptor<'enum'>, ctx: ResolveContext): Parser {
    const description = type.name ?? 'enum';
    if (ctx.enumValues) return new EnumValueParser(type.values, description);
    if (this.caseInsensitiveEnums.has(type.values)) return new CaseInsensitiveEnumParser(type.values, description);
    return new EnumNameParser(type.values, description);
  }
}

function requireElement(items: TypeDescriptor | undefined, kind: 'list' | 'set'): TypeDescriptor {
  if (!items) throw new ConfigurationError(`${kind} has no element type; declare it with t.${kind}(...) or an element type override`);
  return items;
}

function withElement(type: TypeDescriptor, items: TypeDescriptor): TypeDescriptor {
  switch (type.kind) {
    case 'list':
    case 'set':
      return { ...type, items };
    case 'map':
      return { ...type, values: items };
    default:
      throw new ConfigurationError(`element type override given for ${describeType(type)}, which is not a container`);
  }
}
