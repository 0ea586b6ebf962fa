import { Inject, Injectable, Logger } from '@nestjs/common';
import { SETTINGS, Settings } from '../settings/types';
import { createQuoteSource } from './adapters';
import { ROUTER_TRANSPORT } from './config';
import { CycleAbortedError, FetchError } from './errors';
import { Quote, QuoteSource, RouterTransport } from './types';
import { withDeadline } from '../utils/deadline';

export type QuoteFetchResult =
  | { ok: true; quotes: Quote[] }
  | { ok: false; errors: FetchError[] };

@Injectable()
export class DexService {
  private readonly logger = new Logger(DexService.name);
  private readonly sources: QuoteSource[];

  constructor(
    @Inject(SETTINGS) private readonly settings: Settings,
    @Inject(ROUTER_TRANSPORT) transport: RouterTransport,
  ) {
    this.sources = settings.exchanges.map((endpoint) =>
      createQuoteSource(endpoint, transport),
    );
  }

  get exchanges() {
    return this.sources.map((source) => source.endpoint);
  }

  /**
   * Query every configured exchange concurrently for the configured trade
   * size and wait for all of them. Quotes come back in declaration order.
   * Rejects with CycleAbortedError on cancellation.
   */
  async fetchQuotes(signal?: AbortSignal): Promise<QuoteFetchResult> {
    const { pair, trade, quoteTimeoutMs } = this.settings;

    const settled = await Promise.allSettled(
      this.sources.map((source) =>
        withDeadline(
          source.getQuote(pair, trade.amountIn),
          quoteTimeoutMs,
          () =>
            FetchError.network(
              source.endpoint.name,
              `timed out after ${quoteTimeoutMs}ms`,
            ),
          signal,
        ),
      ),
    );

    const quotes: Quote[] = [];
    const errors: FetchError[] = [];
    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        quotes.push(result.value);
        return;
      }
      if (result.reason instanceof CycleAbortedError) return;
      // caller error, not a fetch failure
      if (result.reason instanceof RangeError) throw result.reason;
      const error = FetchError.fromUnknown(
        result.reason,
        this.sources[i].endpoint.name,
      );
      this.logger.debug(`Quote failed: ${error.message}`);
      errors.push(error);
    });

    if (signal?.aborted) throw new CycleAbortedError();
    if (errors.length > 0) return { ok: false, errors };
    return { ok: true, quotes };
  }
}
