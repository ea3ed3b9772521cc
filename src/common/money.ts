import { PRICE_DECIMALS, PRICE_SCALE } from './constants';

/** Fixed-point amount: integer count of 1/PRICE_SCALE currency units */
export type Money = number;

const DECIMAL_REGEX = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/**
 * Parses a decimal string ("2.55", "1,250.00", "-.5") into fixed-point units.
 * Digits past PRICE_DECIMALS are rounded half away from zero.
 * Returns null for anything that is not a plain decimal number.
 */
export function parseMoney(text: string | undefined): Money | null {
  const cleaned = (text ?? '').trim().replace(/,/g, '');
  const match = DECIMAL_REGEX.exec(cleaned);
  if (!match) return null;

  const [, sign, whole = '', fraction = ''] = match;
  if (whole === '' && fraction === '') return null;

  const padded = fraction.padEnd(PRICE_DECIMALS + 1, '0');
  let units = Number(whole || '0') * PRICE_SCALE + Number(padded.slice(0, PRICE_DECIMALS));
  if (Number(padded.charAt(PRICE_DECIMALS)) >= 5) {
    units += 1;
  }

  return sign === '-' && units !== 0 ? -units : units;
}

/** Converts fixed-point units back to a plain number for storage or display */
export function toDecimal(amount: Money): number {
  return amount / PRICE_SCALE;
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}
