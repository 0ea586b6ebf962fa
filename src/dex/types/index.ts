import { BigNumber } from 'ethers';

/** Router calling conventions this scanner knows how to quote against. */
export type RouterVariant = 'uniswap-v2';

export const ROUTER_VARIANTS: readonly RouterVariant[] = ['uniswap-v2'];

export interface TokenInfo {
  address: string;
  decimals: number;
  symbol: string;
}

export interface TokenPair {
  tokenIn: TokenInfo;
  tokenOut: TokenInfo;
}

export interface ExchangeEndpoint {
  name: string;
  router: string;
  variant: RouterVariant;
}

export interface Quote {
  endpoint: ExchangeEndpoint;
  amountIn: BigNumber;
  amountOut: BigNumber; // tokenOut smallest unit
}

/**
 * Read-only on-chain call capability used by the adapters.
 * Implementations reject with whatever their transport throws; the adapter
 * classifies it.
 */
export interface RouterTransport {
  getAmountsOut(
    router: string,
    amountIn: BigNumber,
    path: string[],
  ): Promise<unknown>;
}

export interface QuoteSource {
  readonly endpoint: ExchangeEndpoint;
  getQuote(pair: TokenPair, amountIn: BigNumber): Promise<Quote>;
}
