/**
 * Public types for declaring models and the parsers derived from them.
 */

/**
 * A class whose instances are built from JSON. Arguments are supplied
 * positionally in declaration order; an absent optional field is passed as
 * `undefined` so the constructor's own default applies.
 */
export type ModelClass<T = unknown> = new (...args: never[]) => T;

/**
 * A TypeScript enum object (or any object literal used the same way).
 * Numeric enums carry reverse-mapping keys; those are not member names.
 */
export type EnumLike = Record<string, string | number>;

export type ScalarKind = 'string' | 'number' | 'integer' | 'boolean';

/**
 * Payload of each declared-type variant, keyed by its `kind` tag.
 */
export interface TypeDescriptorMap {
  any: {};
  scalar: { readonly scalar: ScalarKind };
  null: {};
  /** `items` absent means a bare list whose element type must come from a field override. */
  list: { readonly items?: TypeDescriptor };
  set: { readonly items?: TypeDescriptor };
  /** Keys stay strings; `values` absent leaves values untouched. */
  map: { readonly values?: TypeDescriptor };
  enum: { readonly values: EnumLike; readonly name?: string };
  decimal: {};
  /** Thunk so that a model may reference itself or a class declared later. */
  model: { readonly target: () => ModelClass };
  union: { readonly options: readonly TypeDescriptor[] };
  optional: { readonly inner: TypeDescriptor };
}

export type TypeKind = keyof TypeDescriptorMap;

/**
 * Declared type of a field: a tagged variant over `TypeDescriptorMap`.
 * `TypeDescriptor<'list'>` narrows to the list variant.
 */
export type TypeDescriptor<K extends TypeKind = TypeKind> = {
  [P in K]: { readonly kind: P } & TypeDescriptorMap[P];
}[K];

/**
 * Converts one decoded JSON value into its declared type.
 */
export interface Parser<T = unknown> {
  /** Human-readable target, used in diagnostics (`list<string>`). */
  readonly description: string;
  /**
   * JSON-shape predicate. Unions pick the first alternative whose predicate
   * holds, so it must be total and must not throw.
   */
  accepts(value: unknown): boolean;
  /** Convert `value` or throw a `ModelError`. */
  parse(value: unknown): T;
}

/**
 * Maps a declared field name to the name used in the JSON payload.
 */
export type NameRule = (name: string) => string;

/**
 * One constructor parameter of a model class.
 */
export interface FieldDeclaration {
  /** Parameter name as declared in code. */
  readonly name: string;
  /** Declared type; a field without one is rejected when the model is built. */
  readonly type?: TypeDescriptor;
  /** The parameter declares a default, so the field may be absent from the payload. */
  readonly optional?: boolean;
  /** Rest parameter. Only named parameters can be bound, so this is rejected. */
  readonly rest?: boolean;
}

/**
 * Explicit description of how a model class is constructed.
 */
export interface ModelDeclaration {
  /** Name used in diagnostics; defaults to the class name. */
  readonly name?: string;
  /** Constructor parameters in order. */
  readonly fields: readonly FieldDeclaration[];
  /** Overrides the registry's name rule for this class. */
  readonly nameRule?: NameRule;
  /** Enum fields of this class match on member values instead of member names. */
  readonly enumValues?: boolean;
}

/**
 * Replaces the parser a field would otherwise get from its declared type.
 * `items` supplies the element type of a bare list or set, or the value type of a bare map.
 */
export type FieldOverride = { readonly parser: Parser } | { readonly items: TypeDescriptor };

/**
 * One declared field of a built model.
 */
export interface AttributeModel {
  /** Name as declared in code. */
  readonly name: string;
  /** Name in the JSON payload. Unique within a model. */
  readonly jsonName: string;
  /** Declared type, with any `optional` wrapper removed. */
  readonly type: TypeDescriptor;
  readonly optional: boolean;
  readonly parser: Parser;
}

/**
 * Ordered attribute list of one class. Immutable once built.
 */
export interface ClassModel {
  readonly name: string;
  readonly target: ModelClass;
  readonly attributes: readonly AttributeModel[];
}

export interface ModelLogger {
  debug(...args: unknown[]): void;
}

/**
 * Options for creating a model registry.
 */
export interface RegistryOptions {
  /** Check scalar fields against their declared kind. When false, scalars pass through unchecked. Default true. */
  readonly strict?: boolean;
  /** Default name rule for every class without its own. Default identity. */
  readonly nameRule?: NameRule;
  /** Log model builds. */
  readonly debug?: boolean;
  /** Receives debug output. Defaults to `console`. */
  readonly logger?: ModelLogger;
}
