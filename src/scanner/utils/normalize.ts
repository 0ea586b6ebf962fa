import { Quote, TokenPair } from '../../dex/types';
import { NormalizedRate } from '../types';
import { Dec } from './decimal';

/**
 * Convert a raw quote into tokenOut per tokenIn in human units.
 *
 * The quotient keeps `Dec` precision relative to its magnitude, so any
 * non-zero output yields a non-zero rate. Only a zero output amount yields
 * exactly 0.
 */
export function normalize(quote: Quote, pair: TokenPair): NormalizedRate {
  if (!quote.amountIn.gt(0)) {
    throw new RangeError('quote.amountIn must be strictly positive');
  }
  if (quote.amountOut.isZero()) return new Dec(0);

  const numerator = new Dec(quote.amountOut.toString()).times(
    Dec.pow(10, pair.tokenIn.decimals),
  );
  const denominator = new Dec(quote.amountIn.toString()).times(
    Dec.pow(10, pair.tokenOut.decimals),
  );
  return numerator.div(denominator);
}
