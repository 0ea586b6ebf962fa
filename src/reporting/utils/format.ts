import { TokenPair } from '../../dex/types';
import {
  FailedCycleReport,
  NoOpportunityReport,
  Opportunity,
  Profit,
} from '../../scanner/types';
import { isUsable } from '../../scanner/utils';

const DP = 4;

export function formatOpportunity(
  opportunity: Opportunity,
  pair: TokenPair,
): string[] {
  const { tokenIn, tokenOut } = pair;
  const size = opportunity.tradeSize.toString();
  return [
    '!!! Arbitrage Opportunity Detected !!!',
    `  - Action: BUY ${size} ${tokenIn.symbol} on ${opportunity.buy.name} @ ${opportunity.buyRate.toFixed(DP)} ${tokenOut.symbol}`,
    `  - Action: SELL ${size} ${tokenIn.symbol} on ${opportunity.sell.name} @ ${opportunity.sellRate.toFixed(DP)} ${tokenOut.symbol}`,
    `  - Est. Gross Proceeds: ${opportunity.grossProceeds.toFixed(DP)} ${tokenOut.symbol}`,
    `  - Cost: ${opportunity.cost.toFixed(DP)} ${tokenOut.symbol}`,
    `  - Simplified Gas Cost: -${opportunity.gasCost.toFixed(DP)} ${tokenOut.symbol}`,
    `  - SIMULATED NET PROFIT: ${opportunity.netProfit.toFixed(DP)} ${tokenOut.symbol}`,
  ];
}

export function formatDirection(direction: Profit, pair: TokenPair): string {
  return `${direction.buy.name} -> ${direction.sell.name}: net ${direction.netProfit.toFixed(DP)} ${pair.tokenOut.symbol}`;
}

// Directions priced off an empty pool are never a candidate.
function bestDirection(directions: Profit[]): Profit | undefined {
  return directions.filter(isUsable).reduce<Profit | undefined>(
    (best, d) => (best === undefined || d.netProfit.gt(best.netProfit) ? d : best),
    undefined,
  );
}

export function formatNoOpportunity(
  report: NoOpportunityReport,
  pair: TokenPair,
): string {
  const rates = report.rates
    .map(({ quote, rate }) => `${quote.endpoint.name} ${rate.toFixed(DP)}`)
    .join(', ');
  const best = bestDirection(report.directions);
  const summary = best ? `; best ${formatDirection(best, pair)}` : '';
  return `Cycle #${report.cycle}: no opportunity [${pair.tokenOut.symbol} per ${pair.tokenIn.symbol}: ${rates}${summary}]`;
}

export function formatFailure(report: FailedCycleReport): string {
  return `Cycle #${report.cycle} skipped: ${report.reasons.join('; ')}`;
}
