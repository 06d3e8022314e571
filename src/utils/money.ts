/**
 * Money helpers. Amounts are plain dollars rounded to cents.
 */

/** Round an amount to 2 decimal places */
export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/** Convert dollars to integer cents for exact comparisons */
export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

/** Format as `$1,234.50` */
export function formatMoney(amount: number): string {
  return `$${roundMoney(amount).toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}
