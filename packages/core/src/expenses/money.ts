/**
 * Money
 *
 * Exact two-decimal amounts held as a bigint count of cents.
 */

import { InvalidAmountError } from './expense-errors.js';
import type { ParseResult } from './expense-types.js';

const CENTS_PER_UNIT = 100n;
const AMOUNT_PATTERN = /^([+-]?)(\d+\.?\d*|\.\d+)$/;

/** 999,999,999,999.99. Every amount up to here survives a trip through a JSON number. */
export const MAX_AMOUNT_CENTS = 99_999_999_999_999n;

export class Money {
  private constructor(readonly cents: bigint) {}

  static zero(): Money {
    return new Money(0n);
  }

  static fromCents(cents: bigint): Money {
    return new Money(cents);
  }

  /**
   * Parse a decimal amount such as `12.50`, `3`, `.5` or `5.`
   *
   * Trailing fractional zeros are ignored (`12.500` is 12.50). Rejects
   * anything that is not a plain decimal, has a non-zero digit past the
   * cents, is zero or negative, or exceeds MAX_AMOUNT_CENTS.
   */
  static parse(text: string): ParseResult<Money, InvalidAmountError> {
    const match = AMOUNT_PATTERN.exec(text.trim());
    if (!match) {
      return { success: false, error: new InvalidAmountError(`Amount must be a number, got "${text}"`) };
    }

    const sign = match[1] ?? '';
    const [wholeDigits = '', fractionDigits = ''] = (match[2] ?? '').split('.');
    const whole = wholeDigits === '' ? '0' : wholeDigits;
    const fraction = fractionDigits.replace(/0+$/, '');

    if (fraction.length > 2) {
      return {
        success: false,
        error: new InvalidAmountError('Amount must have at most two decimal places'),
      };
    }

    const magnitude = BigInt(whole) * CENTS_PER_UNIT + BigInt(fraction.padEnd(2, '0'));
    const cents = sign === '-' ? -magnitude : magnitude;

    if (cents <= 0n) {
      return { success: false, error: new InvalidAmountError('Amount must be greater than 0') };
    }
    if (cents > MAX_AMOUNT_CENTS) {
      return {
        success: false,
        error: new InvalidAmountError(
          `Amount must not exceed ${Money.fromCents(MAX_AMOUNT_CENTS).toString()}`
        ),
      };
    }

    return { success: true, data: new Money(cents) };
  }

  plus(other: Money): Money {
    return new Money(this.cents + other.cents);
  }

  equals(other: Money): boolean {
    return this.cents === other.cents;
  }

  /**
   * Plain decimal with exactly two fractional digits, e.g. `35.75`
   */
  toString(): string {
    const negative = this.cents < 0n;
    const magnitude = negative ? -this.cents : this.cents;
    const whole = magnitude / CENTS_PER_UNIT;
    const fraction = (magnitude % CENTS_PER_UNIT).toString().padStart(2, '0');
    return `${negative ? '-' : ''}${whole.toString()}.${fraction}`;
  }

  /**
   * Nearest JSON number. String(toNumber()) parses back to the same amount
   * for everything up to MAX_AMOUNT_CENTS.
   */
  toNumber(): number {
    return Number(this.toString());
  }
}
