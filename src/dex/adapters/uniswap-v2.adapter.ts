import { BigNumber } from 'ethers';
import { FetchError } from '../errors';
import {
  ExchangeEndpoint,
  Quote,
  QuoteSource,
  RouterTransport,
  TokenPair,
} from '../types';

/**
 * Constant-product router (`getAmountsOut(amountIn, path)`), as exposed by
 * Uniswap V2 and its forks (QuickSwap, SushiSwap, PancakeSwap...).
 */
export class UniswapV2QuoteSource implements QuoteSource {
  constructor(
    readonly endpoint: ExchangeEndpoint,
    private readonly transport: RouterTransport,
  ) {}

  async getQuote(pair: TokenPair, amountIn: BigNumber): Promise<Quote> {
    if (!amountIn.gt(0)) {
      throw new RangeError(
        `amountIn must be strictly positive, got ${amountIn.toString()}`,
      );
    }
    const path = [pair.tokenIn.address, pair.tokenOut.address];

    let amounts: unknown;
    try {
      amounts = await this.transport.getAmountsOut(
        this.endpoint.router,
        amountIn,
        path,
      );
    } catch (error) {
      throw FetchError.fromUnknown(error, this.endpoint.name);
    }

    return {
      endpoint: this.endpoint,
      amountIn,
      amountOut: this.decodeAmountOut(amounts, path.length),
    };
  }

  private decodeAmountOut(amounts: unknown, pathLength: number): BigNumber {
    if (!Array.isArray(amounts) || amounts.length !== pathLength) {
      throw FetchError.decode(
        this.endpoint.name,
        `expected ${pathLength} amounts, got ${describe(amounts)}`,
      );
    }
    const last: unknown = amounts[amounts.length - 1];
    if (!BigNumber.isBigNumber(last) || last.isNegative()) {
      throw FetchError.decode(
        this.endpoint.name,
        `amount out is not a uint256: ${describe(last)}`,
      );
    }
    return last;
  }
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value === null) return 'null';
  return typeof value;
}
