/**
 * Round to a fixed number of decimals (cents by default)
 *
 * Ties are resolved on the exact binary value, so 0.125 becomes 0.13.
 * The result re-rounds to itself.
 */
export function roundCurrency(value: number, decimals = 2): number {
  return Number(value.toFixed(decimals));
}
