import { Profit, RatedQuote, TradeParameters } from '../types';

/**
 * Round trip of `params.tradeSize` tokenIn: bought at `buy.rate`, sold at
 * `sell.rate`. Amounts are in tokenOut.
 */
export function computeProfit(
  buy: RatedQuote,
  sell: RatedQuote,
  params: TradeParameters,
): Profit {
  const grossProceeds = params.tradeSize.times(sell.rate);
  const cost = params.tradeSize.times(buy.rate);
  const netProfit = grossProceeds.minus(cost).minus(params.gasCostEstimate);

  return {
    buy: buy.quote.endpoint,
    sell: sell.quote.endpoint,
    buyRate: buy.rate,
    sellRate: sell.rate,
    tradeSize: params.tradeSize,
    grossProceeds,
    cost,
    gasCost: params.gasCostEstimate,
    netProfit,
  };
}

/** Every ordered (buy, sell) pair of distinct venues, in declaration order. */
export function computeDirections(
  rated: RatedQuote[],
  params: TradeParameters,
): Profit[] {
  const directions: Profit[] = [];
  rated.forEach((buy, i) => {
    rated.forEach((sell, j) => {
      if (i !== j) directions.push(computeProfit(buy, sell, params));
    });
  });
  return directions;
}
