import Decimal from 'decimal.js';
import { BigNumber } from 'ethers';
import { ExchangeEndpoint, Quote } from '../../dex/types';

/** Output token per input token, human units. Zero means no liquidity. */
export type NormalizedRate = Decimal;

export interface RatedQuote {
  quote: Quote;
  rate: NormalizedRate;
}

export interface TradeParameters {
  amountIn: BigNumber; // tokenIn smallest unit
  tradeSize: Decimal; // amountIn in tokenIn human units
  gasCostEstimate: Decimal; // tokenOut human units
  profitThreshold: Decimal;
}

export interface Profit {
  buy: ExchangeEndpoint;
  sell: ExchangeEndpoint;
  buyRate: NormalizedRate;
  sellRate: NormalizedRate;
  tradeSize: Decimal;
  grossProceeds: Decimal;
  cost: Decimal;
  gasCost: Decimal;
  netProfit: Decimal;
}

export interface Opportunity extends Profit {
  readonly threshold: Decimal;
  readonly isProfitable: boolean;
}

interface CycleReportBase {
  cycle: number;
  startedAt: Date;
  finishedAt: Date;
}

export interface OpportunityReport extends CycleReportBase {
  status: 'opportunity';
  rates: RatedQuote[];
  directions: Profit[];
  opportunity: Opportunity;
}

export interface NoOpportunityReport extends CycleReportBase {
  status: 'no-opportunity';
  rates: RatedQuote[];
  directions: Profit[];
}

export interface FailedCycleReport extends CycleReportBase {
  status: 'failed';
  reasons: string[];
}

export type CycleReport =
  | OpportunityReport
  | NoOpportunityReport
  | FailedCycleReport;
