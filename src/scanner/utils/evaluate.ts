import Decimal from 'decimal.js';
import { Opportunity, Profit } from '../types';

export function isUsable(direction: Profit): boolean {
  return !direction.buyRate.isZero() && !direction.sellRate.isZero();
}

export function clearsThreshold(direction: Profit, threshold: Decimal): boolean {
  return (
    isUsable(direction) &&
    direction.netProfit.gt(0) &&
    direction.netProfit.gt(threshold)
  );
}

export function toOpportunity(
  direction: Profit,
  threshold: Decimal,
): Opportunity {
  return Object.freeze({
    ...direction,
    threshold,
    isProfitable: clearsThreshold(direction, threshold),
  });
}

/**
 * Highest net profit among the directions clearing `threshold`; on an exact
 * tie the earlier direction wins. Null when none clears it.
 */
export function selectBest(
  directions: Profit[],
  threshold: Decimal,
): Opportunity | null {
  let best: Profit | null = null;
  for (const direction of directions) {
    if (!clearsThreshold(direction, threshold)) continue;
    if (best === null || direction.netProfit.gt(best.netProfit)) {
      best = direction;
    }
  }
  return best === null ? null : toOpportunity(best, threshold);
}

export function evaluate(
  directionA: Profit,
  directionB: Profit,
  threshold: Decimal,
): Opportunity | null {
  return selectBest([directionA, directionB], threshold);
}
