export type ErrorCode = 'CONFIGURATION' | 'MISSING_FIELD' | 'TYPE_MISMATCH';

export interface ModelErrorOptions {
	path?: readonly string[];
	model?: string;
	details?: Record<string, unknown>;
	cause?: unknown;
}

/**
 * Base class for every failure raised while building models or parsing values.
 *
 * `reason` is the bare description; `message` prefixes it with the dotted path
 * from the root model (`Order.lines.0.sku: expected string, got number 3`).
 */
export abstract class ModelError extends Error {
	abstract readonly code: ErrorCode;
	readonly reason: string;
	readonly path: readonly string[];
	readonly model?: string;
	readonly details?: Record<string, unknown>;

	constructor(reason: string, options: ModelErrorOptions = {}) {
		super(formatMessage(reason, options.path ?? [], options.model), { cause: options.cause });
		this.name = new.target.name;
		this.reason = reason;
		this.path = options.path ?? [];
		this.model = options.model;
		this.details = options.details;
	}

	/** Copy of this error with `segment` prepended to its path, reported against `model` when given. */
	abstract at(segment: string, model?: string): ModelError;

	protected relocated(segment: string, model?: string): ModelErrorOptions {
		return { path: [segment, ...this.path], model: model ?? this.model, details: this.details, cause: this.cause };
	}
}

/** Static class-shape problem, raised when a model is first built. */
export class ConfigurationError extends ModelError {
	readonly code = 'CONFIGURATION' as const;

	at(segment: string, model?: string): ConfigurationError {
		return new ConfigurationError(this.reason, this.relocated(segment, model));
	}
}

/** A required field is absent from the payload. */
export class MissingFieldError extends ModelError {
	readonly code = 'MISSING_FIELD' as const;
	readonly field: string;

	constructor(field: string, options: ModelErrorOptions = {}) {
		super(`missing required field "${field}"`, options);
		this.field = field;
	}

	at(segment: string, model?: string): MissingFieldError {
		return new MissingFieldError(this.field, this.relocated(segment, model));
	}
}

/** A present value does not have the shape its parser expects. */
export class TypeMismatchError extends ModelError {
	readonly code = 'TYPE_MISMATCH' as const;
	readonly value: unknown;
	readonly expected: string;

	constructor(value: unknown, expected: string, options: ModelErrorOptions & { reason?: string } = {}) {
		super(options.reason ?? `expected ${expected}, got ${describeValue(value)}`, options);
		this.value = value;
		this.expected = expected;
	}

	at(segment: string, model?: string): TypeMismatchError {
		return new TypeMismatchError(this.value, this.expected, { ...this.relocated(segment, model), reason: this.reason });
	}
}

/**
 * Normalize anything thrown by a parser. Library errors pass through; foreign
 * errors become a TypeMismatchError against `expected` carrying the original as cause.
 */
export function toModelError(e: unknown, value: unknown, expected: string): ModelError {
	if (e instanceof ModelError) return e;
	const message = e instanceof Error ? e.message : String(e);
	return new TypeMismatchError(value, expected, { reason: `cannot parse ${describeValue(value)} as ${expected}: ${message}`, cause: e });
}

export function describeValue(value: unknown): string {
	if (value === null) return 'null';
	if (value === undefined) return 'undefined';
	if (Array.isArray(value)) return `array(${value.length})`;
	if (typeof value === 'string') return `string ${JSON.stringify(truncate(value))}`;
	if (typeof value === 'number' || typeof value === 'boolean') return `${typeof value} ${String(value)}`;
	if (typeof value === 'object') return 'object';
	return typeof value;
}

function truncate(s: string): string {
	return s.length > 40 ? `${s.slice(0, 37)}...` : s;
}

function formatMessage(reason: string, path: readonly string[], model?: string): string {
	if (!model && path.length === 0) return reason;
	const where = [model, ...path].filter((p): p is string => Boolean(p)).join('.');
	return `${where}: ${reason}`;
}
