import { ethers } from 'ethers';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { ExchangeEndpoint, TokenPair } from '../dex/types';
import { TradeParameters } from '../scanner/types';
import { Dec } from '../scanner/utils/decimal';
import { Env, envSchema, SettingsFile, settingsFileSchema } from './settings.schema';
import { ConfigError, Settings } from './types';

function formatIssues(error: z.ZodError, prefix = ''): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${prefix}${path || '(root)'}: ${issue.message}`;
  });
}

export function parseEnv(env: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error, 'env.'));
  }
  return result.data;
}

export function readSettingsFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`settings file ${path} could not be read: ${reason}`]);
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([`settings file ${path} is not valid JSON: ${reason}`]);
  }
}

function buildTradeParameters(file: SettingsFile): TradeParameters {
  const { tokenIn } = file.tokens;
  let amountIn: ethers.BigNumber;
  try {
    amountIn = ethers.utils.parseUnits(String(file.amountIn), tokenIn.decimals);
  } catch {
    throw new ConfigError([
      `amountIn: ${String(file.amountIn)} cannot be expressed with ${tokenIn.decimals} decimals`,
    ]);
  }
  if (!amountIn.gt(0)) {
    throw new ConfigError(['amountIn: must be strictly positive']);
  }
  return Object.freeze({
    amountIn,
    tradeSize: new Dec(ethers.utils.formatUnits(amountIn, tokenIn.decimals)),
    gasCostEstimate: new Dec(file.gasCostEstimate),
    profitThreshold: new Dec(file.minimumProfitThreshold),
  });
}

/** Validate the parsed settings file against an already parsed env. */
export function parseSettings(raw: unknown, env: Env): Settings {
  const result = settingsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  const file = result.data;

  const pair: TokenPair = Object.freeze({
    tokenIn: Object.freeze({ ...file.tokens.tokenIn }),
    tokenOut: Object.freeze({ ...file.tokens.tokenOut }),
  });
  const exchanges: readonly ExchangeEndpoint[] = Object.freeze(
    file.dexes.map((dex) => Object.freeze({ ...dex })),
  );

  return Object.freeze({
    rpcUrl: env.RPC_URL,
    quoteTimeoutMs: env.QUOTE_TIMEOUT_MS,
    discordWebhookUrl: env.DISCORD_WEBHOOK_URL,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    pollIntervalMs: Math.round(file.checkIntervalSeconds * 1000),
    pair,
    exchanges,
    trade: buildTradeParameters(file),
  });
}

/**
 * Load `.env`-provided variables and the JSON settings file once at startup.
 * Throws ConfigError with every problem found.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsedEnv = parseEnv(env);
  const raw = readSettingsFile(resolve(parsedEnv.SETTINGS_PATH));
  return parseSettings(raw, parsedEnv);
}
