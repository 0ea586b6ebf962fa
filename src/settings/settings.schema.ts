import { ethers } from 'ethers';
import { z } from 'zod';
import { DEFAULT_QUOTE_TIMEOUT_MS } from '../dex/config';
import { ROUTER_VARIANTS, RouterVariant } from '../dex/types';

const toInt = (def: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const optionalString = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() === '' ? undefined : v),
  z.string().trim().url().optional(),
);

const address = z
  .string()
  .trim()
  .refine((v) => ethers.utils.isAddress(v), 'not a valid address')
  .transform((v) => ethers.utils.getAddress(v));

const decimalLike = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^\d+(\.\d+)?$/, 'must be a non-negative decimal'),
]);

export const LOG_LEVELS = ['error', 'warn', 'log', 'debug', 'verbose'] as const;

export const envSchema = z.object({
  RPC_URL: z.string().trim().url('RPC_URL must be a URL'),
  SETTINGS_PATH: z.string().trim().default('config/settings.json'),
  QUOTE_TIMEOUT_MS: toInt(DEFAULT_QUOTE_TIMEOUT_MS).pipe(z.number().int().min(100).max(120_000)),
  DISCORD_WEBHOOK_URL: optionalString,
  PORT: toInt(3000).pipe(z.number().int().min(1).max(65535)),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('log'),
});

export type Env = z.infer<typeof envSchema>;

const tokenSchema = z.object({
  address,
  decimals: z.number().int().min(0).max(36),
  symbol: z.string().trim().min(1),
});

const dexSchema = z.object({
  name: z.string().trim().min(1),
  router: address,
  variant: z
    .string()
    .default('uniswap-v2')
    .refine(
      (v): v is RouterVariant => ROUTER_VARIANTS.some((known) => known === v),
      `variant must be one of: ${ROUTER_VARIANTS.join(', ')}`,
    ),
});

export const settingsFileSchema = z
  .object({
    // upper bound keeps the interval within Node's 32-bit timer range
    checkIntervalSeconds: z.number().min(1).max(2_147_483).default(30),
    minimumProfitThreshold: z.number().finite(),
    amountIn: decimalLike,
    gasCostEstimate: z.number().finite().min(0),
    tokens: z.object({
      tokenIn: tokenSchema,
      tokenOut: tokenSchema,
    }),
    dexes: z
      .array(dexSchema)
      .min(2, 'Configuration must include at least two DEXes'),
  })
  .superRefine((value, ctx) => {
    if (value.tokens.tokenIn.address === value.tokens.tokenOut.address) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tokens'],
        message: 'tokenIn and tokenOut must differ',
      });
    }
    const names = new Set<string>();
    value.dexes.forEach((dex, i) => {
      if (names.has(dex.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['dexes', i, 'name'],
          message: `duplicate DEX name "${dex.name}"`,
        });
      }
      names.add(dex.name);
    });
  });

export type SettingsFile = z.infer<typeof settingsFileSchema>;
