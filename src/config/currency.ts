/**
 * Base currency (catalog, USD) to display currency (IDR) conversion.
 * The rate is fixed for the process lifetime.
 */

export const EXCHANGE_RATE = parseFloat(process.env.EXCHANGE_RATE || '15500');

/**
 * Convert a base amount to whole display units, truncating toward zero.
 * Anything that is not a finite number (or numeric string) converts to 0.
 */
export function toDisplayCurrency(amount: unknown, rate: number = EXCHANGE_RATE): number {
  let value: number;
  if (typeof amount === 'number') {
    value = amount;
  } else if (typeof amount === 'string' && amount.trim() !== '') {
    value = Number(amount);
  } else {
    return 0;
  }

  const converted = Math.trunc(value * rate);
  if (!Number.isFinite(converted) || converted === 0) {
    // also folds -0 into 0
    return 0;
  }
  return converted;
}

/**
 * Round a base amount to cents. Exact halves go to the even cent.
 */
export function roundBase(amount: number): number {
  const scaled = amount * 100;
  const floor = Math.floor(scaled);
  const cents = scaled - floor === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return cents === 0 ? 0 : cents / 100;
}

/**
 * Express a display-currency amount (e.g. a fee) in base currency
 */
export function toBaseCurrency(displayAmount: number, rate: number = EXCHANGE_RATE): number {
  return displayAmount / rate;
}
