import { describe, expect, it } from 'vitest';
import Decimal from 'decimal.js';

import { formatMoney, isMoneyString, multiplyMoney, normalizeMoney, sumMoney } from '../../src/utils/money';

describe('money helpers', () => {
  it('accepts plain amounts with up to two fractional digits', () => {
    expect(isMoneyString('2500')).toBe(true);
    expect(isMoneyString('99.9')).toBe(true);
    expect(isMoneyString('0.01')).toBe(true);
    expect(isMoneyString('1.999')).toBe(false);
    expect(isMoneyString('-5')).toBe(false);
    expect(isMoneyString('1e3')).toBe(false);
    expect(isMoneyString('')).toBe(false);
  });

  it('normalises stored values from either driver', () => {
    expect(normalizeMoney('2500')).toBe('2500.00');
    expect(normalizeMoney(2500)).toBe('2500.00');
    expect(normalizeMoney('99.90')).toBe('99.90');
    expect(normalizeMoney(0.1)).toBe('0.10');
  });

  it('rounds half up', () => {
    expect(formatMoney(new Decimal('0.005'))).toBe('0.01');
    expect(formatMoney(new Decimal('66.665'))).toBe('66.67');
    expect(formatMoney(new Decimal('66.664'))).toBe('66.66');
  });

  it('multiplies without binary float drift', () => {
    expect(multiplyMoney('99.99', 2)).toBe('199.98');
    expect(multiplyMoney('0.10', 3)).toBe('0.30');
    expect(multiplyMoney(19.99, 7)).toBe('139.93');
  });

  it('sums exactly', () => {
    expect(formatMoney(sumMoney(['0.10', '0.20']))).toBe('0.30');
    expect(formatMoney(sumMoney([]))).toBe('0.00');
  });
});
