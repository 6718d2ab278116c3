import { describe, it, expect } from 'vitest';
import {
  parseExpenseDate,
  parseCategory,
  parseDescription,
  parseExpenseInput,
} from '../expense-parsers.js';
import {
  InvalidAmountError,
  InvalidCategoryError,
  InvalidDateError,
  InvalidDescriptionError,
} from '../expense-errors.js';

describe('parseExpenseDate', () => {
  it('should return the trimmed date', () => {
    expect(parseExpenseDate(' 2025-12-16 ')).toEqual({ success: true, data: '2025-12-16' });
  });

  it('should reject dates in another layout', () => {
    const result = parseExpenseDate('16-12-2025');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidDateError);
      expect(result.error.message).toBe('Date must use the YYYY-MM-DD format, got "16-12-2025"');
    }
  });

  it('should reject impossible dates', () => {
    const result = parseExpenseDate('2024-13-40');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Date is not a real calendar date, got "2024-13-40"');
    }
  });
});

describe('parseCategory', () => {
  it('should keep case and spacing', () => {
    expect(parseCategory('Food')).toEqual({ success: true, data: 'Food' });
  });

  it('should reject an empty category', () => {
    const result = parseCategory('');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidCategoryError);
      expect(result.error.message).toBe('Category cannot be empty');
    }
  });

  it('should reject an over-long category', () => {
    const result = parseCategory('c'.repeat(31));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Category too long (max 30 characters)');
    }
  });
});

describe('parseDescription', () => {
  it('should accept an empty description', () => {
    expect(parseDescription('')).toEqual({ success: true, data: '' });
  });

  it('should reject an over-long description', () => {
    const result = parseDescription('d'.repeat(121));
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidDescriptionError);
      expect(result.error.message).toBe('Description too long (max 120 characters)');
    }
  });
});

describe('parseExpenseInput', () => {
  it('should build a frozen expense from valid input', () => {
    const result = parseExpenseInput({
      date: '2024-01-15',
      category: 'food',
      description: 'lunch',
      amount: '12.50',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.date).toBe('2024-01-15');
      expect(result.data.category).toBe('food');
      expect(result.data.description).toBe('lunch');
      expect(result.data.amount.toString()).toBe('12.50');
      expect(Object.isFrozen(result.data)).toBe(true);
    }
  });

  it('should report the first invalid field', () => {
    const result = parseExpenseInput({
      date: '2024-13-40',
      category: '',
      description: '',
      amount: 'abc',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidDateError);
    }
  });

  it('should report an invalid amount once the other fields pass', () => {
    const result = parseExpenseInput({
      date: '2024-01-15',
      category: 'food',
      description: '',
      amount: '0',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(InvalidAmountError);
      expect(result.error.message).toBe('Amount must be greater than 0');
    }
  });
});
