import { ExchangeEndpoint, TokenPair } from '../dex/types';
import { TradeParameters } from '../scanner/types';
import { LOG_LEVELS } from './settings.schema';

export const SETTINGS = Symbol('SETTINGS');

export interface Settings {
  readonly rpcUrl: string;
  readonly quoteTimeoutMs: number;
  readonly discordWebhookUrl?: string;
  readonly port: number;
  readonly logLevel: (typeof LOG_LEVELS)[number];
  readonly pollIntervalMs: number;
  readonly pair: TokenPair;
  readonly exchanges: readonly ExchangeEndpoint[];
  readonly trade: TradeParameters;
}

/** Fatal: raised before the scanner starts, never while it runs. */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
