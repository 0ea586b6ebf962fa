import { BigNumber, ethers } from 'ethers';
import {
  ExchangeEndpoint,
  RouterTransport,
  TokenPair,
} from '../../dex/types';
import { Settings } from '../../settings/types';
import { RatedQuote, TradeParameters } from '../types';
import { Dec } from './decimal';

export const QUICKSWAP: ExchangeEndpoint = {
  name: 'QuickSwap',
  router: '0x00000000000000000000000000000000000000a1',
  variant: 'uniswap-v2',
};

export const SUSHISWAP: ExchangeEndpoint = {
  name: 'SushiSwap',
  router: '0x00000000000000000000000000000000000000b2',
  variant: 'uniswap-v2',
};

export const PAIR: TokenPair = {
  tokenIn: {
    symbol: 'WETH',
    address: '0x00000000000000000000000000000000000000c3',
    decimals: 18,
  },
  tokenOut: {
    symbol: 'USDC',
    address: '0x00000000000000000000000000000000000000d4',
    decimals: 6,
  },
};

export function tradeParams(
  size: string,
  gas: number,
  threshold: number,
): TradeParameters {
  return {
    amountIn: ethers.utils.parseUnits(size, PAIR.tokenIn.decimals),
    tradeSize: new Dec(size),
    gasCostEstimate: new Dec(gas),
    profitThreshold: new Dec(threshold),
  };
}

/** A quote on `endpoint` whose normalized rate is `rate`. */
export function rated(
  endpoint: ExchangeEndpoint,
  rate: string,
  params: TradeParameters,
): RatedQuote {
  return {
    quote: {
      endpoint,
      amountIn: params.amountIn,
      amountOut: BigNumber.from(0),
    },
    rate: new Dec(rate),
  };
}

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return {
    rpcUrl: 'http://127.0.0.1:8545',
    quoteTimeoutMs: 1_000,
    port: 3000,
    logLevel: 'log',
    pollIntervalMs: 30_000,
    pair: PAIR,
    exchanges: [QUICKSWAP, SUSHISWAP],
    trade: tradeParams('1000', 2, 5),
    ...overrides,
  };
}

type Reply = { value: unknown } | Error | (() => Promise<unknown>);

/**
 * In-memory router transport. Each router answers with a fixed amounts
 * array, a rejection, or a custom async function.
 */
export class FakeTransport implements RouterTransport {
  readonly calls: { router: string; amountIn: BigNumber; path: string[] }[] =
    [];
  private readonly replies = new Map<string, Reply>();

  reply(router: string, reply: Reply): this {
    this.replies.set(router, reply);
    return this;
  }

  /** Answer as a router paying `amountOut` raw units for any input. */
  pays(router: string, amountIn: BigNumber, amountOut: BigNumber): this {
    return this.reply(router, { value: [amountIn, amountOut] });
  }

  async getAmountsOut(
    router: string,
    amountIn: BigNumber,
    path: string[],
  ): Promise<unknown> {
    this.calls.push({ router, amountIn, path });
    const reply = this.replies.get(router);
    if (reply === undefined) throw new Error(`no reply set for ${router}`);
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply();
    return reply.value;
  }
}

/** Raw USDC (6 decimals) for a human amount. */
export const usdc = (amount: string) =>
  ethers.utils.parseUnits(amount, PAIR.tokenOut.decimals);

/** Raw WETH (18 decimals) for a human amount. */
export const weth = (amount: string) =>
  ethers.utils.parseUnits(amount, PAIR.tokenIn.decimals);
