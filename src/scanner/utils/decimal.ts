import Decimal from 'decimal.js';

/**
 * Decimal constructor used for every rate and money amount. Operations keep
 * 80 significant digits, enough to tell apart any two uint256 amounts, and
 * truncate, so a result is never rounded up.
 */
export const Dec = Decimal.clone({
  precision: 80,
  rounding: Decimal.ROUND_DOWN,
});
