import { z } from 'zod';
import type {
  EnumLike,
  FieldDeclaration,
  ModelClass,
  ModelDeclaration,
  ModelLogger,
  NameRule,
  ScalarKind,
  TypeDescriptor,
  TypeKind,
} from './types';

const anyType: TypeDescriptor<'any'> = { kind: 'any' };
const nullType: TypeDescriptor<'null'> = { kind: 'null' };
const decimalType: TypeDescriptor<'decimal'> = { kind: 'decimal' };

/**
 * Builders for declared field types.
 *
 * @example
 * class Order {
 *   static jsonModel = defineModel({
 *     fields: [
 *       field('id', t.string),
 *       field('lines', t.list(t.model(Line))),
 *       field('note', t.optional(t.string)),
 *     ],
 *   });
 *   constructor(readonly id: string, readonly lines: Line[], readonly note = '') {}
 * }
 */
export const t = {
  any: anyType,
  string: scalar('string'),
  number: scalar('number'),
  integer: scalar('integer'),
  boolean: scalar('boolean'),
  null: nullType,
  decimal: decimalType,
  list(items?: TypeDescriptor): TypeDescriptor<'list'> {
    return { kind: 'list', items };
  },
  set(items?: TypeDescriptor): TypeDescriptor<'set'> {
    return { kind: 'set', items };
  },
  map(values?: TypeDescriptor): TypeDescriptor<'map'> {
    return { kind: 'map', values };
  },
  enumeration(values: EnumLike, name?: string): TypeDescriptor<'enum'> {
    return { kind: 'enum', values, name };
  },
  model<T>(target: ModelClass<T>): TypeDescriptor<'model'> {
    return { kind: 'model', target: () => target };
  },
  /** Reference a class that is not defined yet, or the class being declared. */
  lazy<T>(target: () => ModelClass<T>): TypeDescriptor<'model'> {
    return { kind: 'model', target };
  },
  union(...options: TypeDescriptor[]): TypeDescriptor<'union'> {
    return { kind: 'union', options };
  },
  optional(inner: TypeDescriptor): TypeDescriptor<'optional'> {
    return { kind: 'optional', inner };
  },
} as const;

function scalar(kind: ScalarKind): TypeDescriptor<'scalar'> {
  return { kind: 'scalar', scalar: kind };
}

/**
 * Declare one constructor parameter.
 *
 * @param options - `optional` when the parameter has a default value.
 */
export function field(name: string, type: TypeDescriptor, options: { optional?: boolean } = {}): FieldDeclaration {
  return { name, type, optional: options.optional };
}

/**
 * Identity helper giving a static `jsonModel` property its type.
 */
export function defineModel(declaration: ModelDeclaration): ModelDeclaration {
  return declaration;
}

/**
 * Render a declared type for diagnostics.
 */
export function describeType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'any': return 'any';
    case 'scalar': return type.scalar;
    case 'null': return 'null';
    case 'decimal': return 'decimal';
    case 'list': return type.items ? `list<${describeType(type.items)}>` : 'list';
    case 'set': return type.items ? `set<${describeType(type.items)}>` : 'set';
    case 'map': return type.values ? `map<string, ${describeType(type.values)}>` : 'map';
    case 'enum': return type.name ?? 'enum';
    case 'model': return type.target().name || 'model';
    case 'union': return `union<${type.options.map(describeType).join(' | ')}>`;
    case 'optional': return `optional<${describeType(type.inner)}>`;
  }
}

const TYPE_KINDS = ['any', 'scalar', 'null', 'list', 'set', 'map', 'enum', 'decimal', 'model', 'union', 'optional'] as const satisfies readonly TypeKind[];

const TYPE_KIND_SET: ReadonlySet<string> = new Set(TYPE_KINDS);

const typeDescriptorSchema = z.custom<TypeDescriptor>(
  (v) => typeof v === 'object' && v !== null && 'kind' in v && typeof v.kind === 'string' && TYPE_KIND_SET.has(v.kind),
  { message: `type must be a type descriptor (kind one of ${TYPE_KINDS.join(', ')})` },
);

const nameRuleSchema = z.custom<NameRule>((v) => typeof v === 'function', { message: 'nameRule must be a function' });

export const FieldDeclarationSchema = z.object({
  name: z.string().min(1),
  type: typeDescriptorSchema.optional(),
  optional: z.boolean().optional(),
  rest: z.boolean().optional(),
});

export const ModelDeclarationSchema = z
  .object({
    name: z.string().min(1).optional(),
    fields: z.array(FieldDeclarationSchema),
    nameRule: nameRuleSchema.optional(),
    enumValues: z.boolean().optional(),
  })
  .superRefine((decl, ctx) => {
    const seen = new Set<string>();
    decl.fields.forEach((f, i) => {
      if (seen.has(f.name)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields', i, 'name'], message: `duplicate field "${f.name}"` });
      seen.add(f.name);
    });
  });

export const RegistryOptionsSchema = z.object({
  strict: z.boolean().optional(),
  nameRule: nameRuleSchema.optional(),
  debug: z.boolean().optional(),
  logger: z
    .custom<ModelLogger>((v) => typeof v === 'object' && v !== null && 'debug' in v && typeof v.debug === 'function', {
      message: 'logger must have a debug method',
    })
    .optional(),
});

/**
 * Flatten zod issues into `path: message` strings for error details.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}
