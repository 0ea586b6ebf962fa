import { ExchangeEndpoint, QuoteSource, RouterTransport } from '../types';
import { UniswapV2QuoteSource } from './uniswap-v2.adapter';

export { UniswapV2QuoteSource };

export function createQuoteSource(
  endpoint: ExchangeEndpoint,
  transport: RouterTransport,
): QuoteSource {
  switch (endpoint.variant) {
    case 'uniswap-v2':
      return new UniswapV2QuoteSource(endpoint, transport);
    default:
      return assertNever(endpoint.variant);
  }
}

function assertNever(variant: never): never {
  throw new Error(`Unsupported router variant: ${String(variant)}`);
}
