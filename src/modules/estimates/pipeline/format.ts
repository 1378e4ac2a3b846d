import { roundHalfEven } from './rounding';

const currency = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * A double sits exactly halfway between two cents only when it is an odd
 * multiple of 1/8; those ties go to the even cent.
 */
function toCents(amount: number): number {
  const eighths = amount * 8;
  if (Number.isInteger(eighths) && Math.abs(eighths) % 2 === 1) {
    return roundHalfEven(amount * 100) / 100;
  }
  return amount;
}

/** `1234.5` → `$1,234.50`; negatives keep the sign after the symbol. */
export function formatCurrency(amount: number): string {
  const cents = toCents(amount);
  return `$${currency.format(Object.is(cents, -0) ? 0 : cents)}`;
}

export function formatPercentage(value: number): string {
  return `${roundHalfEven(value)}%`;
}
