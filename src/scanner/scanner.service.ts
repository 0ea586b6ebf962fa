import { Inject, Injectable, Logger } from '@nestjs/common';
import { DexService } from '../dex/dex.service';
import { CycleAbortedError } from '../dex/errors';
import { Quote } from '../dex/types';
import { SETTINGS, Settings } from '../settings/types';
import { CycleReport, RatedQuote } from './types';
import { computeDirections, normalize, selectBest } from './utils';

export type CycleStage = 'fetching' | 'evaluating';

export interface CycleOptions {
  /** Sequence number stamped on the report; 0 for an on-demand check. */
  cycle?: number;
  signal?: AbortSignal;
  onStage?: (stage: CycleStage) => void;
}

@Injectable()
export class ScannerService {
  private readonly logger = new Logger(ScannerService.name);

  constructor(
    private readonly dexService: DexService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  /**
   * Fetch every venue's quote, then normalize, price both directions and
   * pick the opportunity, if any. Fetch failures come back as a `failed`
   * report; only cancellation rejects.
   */
  async runCycle({
    cycle = 0,
    signal,
    onStage,
  }: CycleOptions = {}): Promise<CycleReport> {
    const startedAt = new Date();

    onStage?.('fetching');
    const fetched = await this.dexService.fetchQuotes(signal);
    if (signal?.aborted) throw new CycleAbortedError();

    if (!fetched.ok) {
      return {
        status: 'failed',
        cycle,
        startedAt,
        finishedAt: new Date(),
        reasons: fetched.errors.map((error) => error.message),
      };
    }

    onStage?.('evaluating');
    return this.assess(cycle, startedAt, fetched.quotes);
  }

  private assess(cycle: number, startedAt: Date, quotes: Quote[]): CycleReport {
    const { pair, trade } = this.settings;
    const rates: RatedQuote[] = quotes.map((quote) => ({
      quote,
      rate: normalize(quote, pair),
    }));

    for (const { quote, rate } of rates) {
      if (rate.isZero()) {
        this.logger.warn(`${quote.endpoint.name} returned no liquidity`);
      }
    }

    const directions = computeDirections(rates, trade);
    const opportunity = selectBest(directions, trade.profitThreshold);
    const finishedAt = new Date();

    if (opportunity) {
      return {
        status: 'opportunity',
        cycle,
        startedAt,
        finishedAt,
        rates,
        directions,
        opportunity,
      };
    }
    return {
      status: 'no-opportunity',
      cycle,
      startedAt,
      finishedAt,
      rates,
      directions,
    };
  }
}
