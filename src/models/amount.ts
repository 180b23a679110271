/**
 * Amount Value Object
 *
 * Immutable representation of a PayPal money value.
 * Uses bigint minor units plus a decimal scale so API values round-trip
 * exactly (no floating-point).
 */

import { z } from 'zod';
import { MissingKeyError, PayPalError } from '../errors.js';

const DECIMAL_REGEX = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/**
 * Decimal strings PayPal uses for amounts and quantities, e.g. `-0.49`, `1250`.
 */
export const DECIMAL_STRING_REGEX = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

/**
 * `{ value, currency_code }` object as PayPal sends it.
 */
export const AmountSourceSchema = z.object({
  value: z.string().regex(DECIMAL_STRING_REGEX),
  currency_code: z.string(),
});

export type AmountSource = z.infer<typeof AmountSourceSchema>;

interface ParsedDecimal {
  units: bigint;
  scale: number;
}

function parseDecimal(text: string): ParsedDecimal | null {
  const match = DECIMAL_REGEX.exec(text.trim());
  if (!match) {
    return null;
  }
  const [, sign = '', whole = '', fraction = ''] = match;
  if (whole === '' && fraction === '') {
    return null;
  }
  const digits = `${whole}${fraction}` || '0';
  const units = BigInt(digits);
  return { units: sign === '-' ? -units : units, scale: fraction.length };
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

export class Amount {
  private constructor(
    private readonly units: bigint,
    private readonly scale: number,
    public readonly currency: string
  ) {}

  /**
   * Create an Amount from a decimal string, e.g. `Amount.of('7.99', 'USD')`.
   */
  static of(value: string, currency: string): Amount {
    const parsed = parseDecimal(value);
    if (!parsed) {
      throw new PayPalError(`invalid decimal amount '${value}'`);
    }
    return new Amount(parsed.units, parsed.scale, currency);
  }

  /**
   * Create an Amount from an API `{ value, currency_code }` object.
   *
   * @throws {MissingKeyError} If `value` or `currency_code` is absent
   */
  static fromApi(source: unknown): Amount {
    const result = AmountSourceSchema.safeParse(source);
    if (!result.success) {
      const missing = result.error.issues.find(
        (issue) => issue.code === 'invalid_type' && issue.received === 'undefined'
      );
      const key = missing?.path[0];
      if (typeof key === 'string') {
        throw new MissingKeyError(`amount object has no '${key}'`, [key]);
      }
      throw new PayPalError(`invalid amount object: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }
    return Amount.of(result.data.value, result.data.currency_code);
  }

  /**
   * Canonical decimal string, keeping the source's fractional digits.
   */
  get value(): string {
    const negative = this.units < 0n;
    const digits = (negative ? -this.units : this.units).toString().padStart(this.scale + 1, '0');
    const whole = digits.slice(0, digits.length - this.scale);
    const fraction = digits.slice(digits.length - this.scale);
    return `${negative ? '-' : ''}${whole}${this.scale > 0 ? `.${fraction}` : ''}`;
  }

  /**
   * Divide by a quantity. The result keeps this amount's scale, rounding
   * half away from zero.
   */
  dividedBy(divisor: number | string): Amount {
    const parsed = parseDecimal(String(divisor));
    if (!parsed) {
      throw new RangeError(`invalid divisor '${divisor}'`);
    }
    if (parsed.units === 0n) {
      throw new RangeError('Division by zero');
    }
    const numerator = this.units * 10n ** BigInt(parsed.scale);
    let quotient = numerator / parsed.units;
    const remainder = numerator % parsed.units;
    const absRemainder = remainder < 0n ? -remainder : remainder;
    const absDivisor = parsed.units < 0n ? -parsed.units : parsed.units;
    if (absRemainder * 2n >= absDivisor) {
      quotient += (numerator < 0n) === (parsed.units < 0n) ? 1n : -1n;
    }
    return new Amount(quotient, this.scale, this.currency);
  }

  /**
   * Check equality (same currency, same numeric value)
   */
  equals(other: Amount): boolean {
    if (this.currency !== other.currency) {
      return false;
    }
    const scale = Math.max(this.scale, other.scale);
    return (
      this.units * 10n ** BigInt(scale - this.scale) ===
      other.units * 10n ** BigInt(scale - other.scale)
    );
  }

  /**
   * Approximate numeric value, for display and sorting only.
   */
  toNumber(): number {
    return Number(this.value);
  }

  /**
   * Convert back to the API's JSON shape.
   */
  toJSON(): AmountSource {
    return { value: this.value, currency_code: this.currency };
  }

  /**
   * String representation, e.g. `1,200.30 USD`
   */
  toString(): string {
    const [whole = '', fraction] = this.value.split('.');
    const sign = whole.startsWith('-') ? '-' : '';
    const grouped = groupThousands(sign ? whole.slice(1) : whole);
    return `${sign}${grouped}${fraction !== undefined ? `.${fraction}` : ''} ${this.currency}`;
  }
}
