import type { Parser } from '../types';
import { TypeMismatchError } from '../shared/errors';

/**
 * Tries alternatives in declared order and parses with the first one whose
 * shape predicate accepts the value. Only that alternative runs: a failure
 * inside it is reported as is, without falling through to later ones.
 */
export class UnionParser implements Parser<unknown> {
  readonly description: string;

  constructor(readonly options: readonly Parser[]) {
    this.description = `union<${options.map((p) => p.description).join(' | ')}>`;
  }

  accepts(value: unknown): boolean {
    return this.options.some((p) => p.accepts(value));
  }

  parse(value: unknown): unknown {
    const match = this.options.find((p) => p.accepts(value));
    if (!match) throw new TypeMismatchError(value, this.description);
    return match.parse(value);
  }
}
