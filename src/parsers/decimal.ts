import Decimal from 'decimal.js';
import type { Parser } from '../types';
import { TypeMismatchError } from '../shared/errors';

/**
 * Arbitrary precision decimal from a JSON number or numeric string.
 * The value is taken as written; no rounding happens here.
 */
export class DecimalParser implements Parser<Decimal> {
  readonly description = 'decimal';

  accepts(value: unknown): boolean {
    if (typeof value === 'number') return Number.isFinite(value);
    return typeof value === 'string' && isDecimalLiteral(value);
  }

  parse(value: unknown): Decimal {
    if (!this.accepts(value) || (typeof value !== 'number' && typeof value !== 'string')) {
      throw new TypeMismatchError(value, this.description);
    }
    return new Decimal(value);
  }
}

// Plain decimal notation only; decimal.js would also take 0x, 0b and 0o prefixes.
const DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

function isDecimalLiteral(s: string): boolean {
  return DECIMAL_LITERAL.test(s) && new Decimal(s).isFinite();
}

export const decimalParser = new DecimalParser();
