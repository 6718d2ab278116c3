import { describe, it, expect } from 'vitest';
import { Money, MAX_AMOUNT_CENTS } from '../money.js';
import { InvalidAmountError } from '../expense-errors.js';

function parsed(text: string): Money {
  const result = Money.parse(text);
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}

function rejection(text: string): InvalidAmountError {
  const result = Money.parse(text);
  if (result.success) {
    throw new Error(`Expected "${text}" to be rejected`);
  }
  return result.error;
}

describe('Money', () => {
  describe('parse', () => {
    it('should parse whole and fractional amounts into cents', () => {
      expect(parsed('12.50').cents).toBe(1250n);
      expect(parsed('3').cents).toBe(300n);
      expect(parsed('0.5').cents).toBe(50n);
      expect(parsed(' 7.05 ').cents).toBe(705n);
      expect(parsed('+4.10').cents).toBe(410n);
    });

    it('should accept a bare leading or trailing decimal point', () => {
      expect(parsed('.5').cents).toBe(50n);
      expect(parsed('5.').cents).toBe(500n);
      expect(rejection('.').message).toBe('Amount must be a number, got "."');
    });

    it('should ignore trailing zeros past the cents', () => {
      expect(parsed('12.500').cents).toBe(1250n);
      expect(parsed('3.000').cents).toBe(300n);
      expect(rejection('0.000').message).toBe('Amount must be greater than 0');
    });

    it('should reject text that is not a number', () => {
      const error = rejection('abc');
      expect(error).toBeInstanceOf(InvalidAmountError);
      expect(error.message).toBe('Amount must be a number, got "abc"');
      expect(rejection('').message).toBe('Amount must be a number, got ""');
      expect(rejection('1e3').message).toBe('Amount must be a number, got "1e3"');
    });

    it('should reject zero and negative amounts', () => {
      expect(rejection('0').message).toBe('Amount must be greater than 0');
      expect(rejection('0.00').message).toBe('Amount must be greater than 0');
      expect(rejection('-5').message).toBe('Amount must be greater than 0');
    });

    it('should reject more than two decimal places', () => {
      expect(rejection('1.005').message).toBe('Amount must have at most two decimal places');
      expect(rejection('1.0050').message).toBe('Amount must have at most two decimal places');
    });

    it('should reject amounts above the maximum', () => {
      expect(parsed('999999999999.99').cents).toBe(MAX_AMOUNT_CENTS);
      expect(rejection('1000000000000').message).toBe('Amount must not exceed 999999999999.99');
    });
  });

  describe('arithmetic', () => {
    it('should add exactly where floating point would drift', () => {
      const sum = parsed('0.10').plus(parsed('0.20'));
      expect(sum.toString()).toBe('0.30');
      expect(sum.equals(Money.fromCents(30n))).toBe(true);
    });

    it('should start from zero', () => {
      expect(Money.zero().toString()).toBe('0.00');
      expect(Money.zero().equals(Money.fromCents(0n))).toBe(true);
    });
  });

  describe('formatting', () => {
    it('should always print two fractional digits', () => {
      expect(Money.fromCents(1250n).toString()).toBe('12.50');
      expect(Money.fromCents(5n).toString()).toBe('0.05');
      expect(Money.fromCents(-325n).toString()).toBe('-3.25');
    });

    it('should convert to a number that parses back to the same amount', () => {
      const amount = Money.fromCents(1234567n);
      expect(amount.toNumber()).toBe(12345.67);
      expect(parsed(String(amount.toNumber())).equals(amount)).toBe(true);
      expect(String(Money.fromCents(MAX_AMOUNT_CENTS).toNumber())).toBe('999999999999.99');
    });
  });
});
