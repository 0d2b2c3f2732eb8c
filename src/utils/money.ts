import Decimal from 'decimal.js';

// NUMERIC(10, 2)
export const MONEY_SCALE = 2;
export const MAX_MONEY = new Decimal('99999999.99');
// NUMERIC(12, 2), sales totals
export const MAX_TOTAL = new Decimal('9999999999.99');

const MONEY_PATTERN = /^\d+(\.\d{1,2})?$/;

/**
 * True for a non-negative amount written with at most two fractional digits.
 */
export const isMoneyString = (value: string): boolean => MONEY_PATTERN.test(value);

/**
 * Converts a NUMERIC column value into a Decimal. node-postgres hands NUMERIC
 * back as a string, other drivers may hand back a number.
 */
export const toDecimal = (value: string | number | Decimal): Decimal => new Decimal(value);

export const formatMoney = (value: Decimal): string =>
  value.toDecimalPlaces(MONEY_SCALE, Decimal.ROUND_HALF_UP).toFixed(MONEY_SCALE);

/**
 * Normalises a stored or user-supplied amount into its canonical two-digit form.
 */
export const normalizeMoney = (value: string | number | Decimal): string => formatMoney(toDecimal(value));

export const multiplyMoney = (unitPrice: string | number | Decimal, quantity: number): string =>
  formatMoney(toDecimal(unitPrice).times(quantity));

export const sumMoney = (amounts: Array<string | number | Decimal>): Decimal =>
  amounts.reduce<Decimal>((total, amount) => total.plus(toDecimal(amount)), new Decimal(0));
