import { Logger } from '@nestjs/common';
import {
  FailedCycleReport,
  NoOpportunityReport,
  OpportunityReport,
} from '../scanner/types';
import {
  computeDirections,
  selectBest,
} from '../scanner/utils';
import {
  QUICKSWAP,
  rated,
  SUSHISWAP,
  testSettings,
  tradeParams,
} from '../scanner/utils/fixtures';
import { ReporterService } from './reporter.service';

const mockPost = jest.fn<Promise<unknown>, [string, unknown, unknown]>();

jest.mock('axios', () => ({
  post: (url: string, body: unknown, config: unknown) =>
    mockPost(url, body, config),
}));
jest.mock('async-await-retry', () =>
  jest.fn((fn: () => Promise<unknown>) => fn()),
);

const WEBHOOK = 'https://discord.test/api/webhooks/test';
const params = tradeParams('1000', 2, 5);
const at = new Date('2026-01-01T00:00:00Z');

function opportunityReport(): OpportunityReport {
  const rates = [rated(QUICKSWAP, '1.00', params), rated(SUSHISWAP, '1.02', params)];
  const directions = computeDirections(rates, params);
  const opportunity = selectBest(directions, params.profitThreshold);
  if (!opportunity) throw new Error('fixture should clear the threshold');
  return {
    status: 'opportunity',
    cycle: 1,
    startedAt: at,
    finishedAt: at,
    rates,
    directions,
    opportunity,
  };
}

function noOpportunityReport(): NoOpportunityReport {
  const rates = [rated(QUICKSWAP, '1.00', params), rated(SUSHISWAP, '1.001', params)];
  return {
    status: 'no-opportunity',
    cycle: 2,
    startedAt: at,
    finishedAt: at,
    rates,
    directions: computeDirections(rates, params),
  };
}

const OPPORTUNITY_LINES = [
  '!!! Arbitrage Opportunity Detected !!!',
  '  - Action: BUY 1000 WETH on QuickSwap @ 1.0000 USDC',
  '  - Action: SELL 1000 WETH on SushiSwap @ 1.0200 USDC',
  '  - Est. Gross Proceeds: 1020.0000 USDC',
  '  - Cost: 1000.0000 USDC',
  '  - Simplified Gas Cost: -2.0000 USDC',
  '  - SIMULATED NET PROFIT: 18.0000 USDC',
];

describe('ReporterService', () => {
  const post = mockPost;
  let log: jest.SpyInstance;
  let debug: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    post.mockReset();
    log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    debug = jest
      .spyOn(Logger.prototype, 'debug')
      .mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    error = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('logs the opportunity banner', async () => {
    const reporter = new ReporterService(testSettings());

    await reporter.report(opportunityReport());

    expect(log).toHaveBeenCalledWith(`Cycle #1\n${OPPORTUNITY_LINES.join('\n')}`);
    expect(post).not.toHaveBeenCalled();
  });

  it('posts the opportunity to the webhook when one is configured', async () => {
    post.mockResolvedValue({ status: 204 });
    const reporter = new ReporterService(
      testSettings({ discordWebhookUrl: WEBHOOK }),
    );

    await reporter.report(opportunityReport());

    expect(post).toHaveBeenCalledTimes(1);
    const [url, body, config] = post.mock.calls[0];
    expect(url).toBe(WEBHOOK);
    expect(config).toEqual({ timeout: 10_000, signal: undefined });
    expect(body).toEqual({
      content: [
        ...OPPORTUNITY_LINES.map((line) => line.trim()),
        'Trade Data: `{"tokenIn":"0x00000000000000000000000000000000000000c3",' +
          '"tokenOut":"0x00000000000000000000000000000000000000d4",' +
          '"amountIn":"1000000000000000000000",' +
          '"buyRouter":"0x00000000000000000000000000000000000000a1",' +
          '"sellRouter":"0x00000000000000000000000000000000000000b2"}`',
      ].join('\n'),
    });
    expect(log).toHaveBeenCalledWith('Notification sent to Discord.');
  });

  it('logs a webhook failure without throwing', async () => {
    const failure = new Error('503');
    post.mockRejectedValue(failure);
    const reporter = new ReporterService(
      testSettings({ discordWebhookUrl: WEBHOOK }),
    );

    await expect(reporter.report(opportunityReport())).resolves.toBeUndefined();

    expect(error).toHaveBeenCalledWith(
      'Error sending notification to Discord',
      failure,
    );
  });

  it('summarises a cycle without opportunity on one line', async () => {
    const reporter = new ReporterService(testSettings());

    await reporter.report(noOpportunityReport());

    expect(log).toHaveBeenCalledWith(
      'Cycle #2: no opportunity [USDC per WETH: QuickSwap 1.0000, SushiSwap 1.0010; ' +
        'best QuickSwap -> SushiSwap: net -1.0000 USDC]',
    );
    expect(debug.mock.calls).toEqual([
      ['QuickSwap -> SushiSwap: net -1.0000 USDC'],
      ['SushiSwap -> QuickSwap: net -3.0000 USDC'],
    ]);
  });

  it('leaves directions off an empty pool out of the summary', async () => {
    const rates = [
      rated(QUICKSWAP, '1.00', params),
      rated(SUSHISWAP, '0', params),
    ];
    const reporter = new ReporterService(testSettings());

    await reporter.report({
      ...noOpportunityReport(),
      rates,
      directions: computeDirections(rates, params),
    });

    expect(log).toHaveBeenCalledWith(
      'Cycle #2: no opportunity [USDC per WETH: QuickSwap 1.0000, SushiSwap 0.0000]',
    );
  });

  it('names the best usable direction when another venue is empty', async () => {
    const rates = [
      rated(QUICKSWAP, '1.00', params),
      rated(SUSHISWAP, '0', params),
      rated({ ...SUSHISWAP, name: 'ApeSwap' }, '1.001', params),
    ];
    const reporter = new ReporterService(testSettings());

    await reporter.report({
      ...noOpportunityReport(),
      rates,
      directions: computeDirections(rates, params),
    });

    expect(log).toHaveBeenCalledWith(
      'Cycle #2: no opportunity [USDC per WETH: QuickSwap 1.0000, SushiSwap 0.0000, ' +
        'ApeSwap 1.0010; best QuickSwap -> ApeSwap: net -1.0000 USDC]',
    );
  });

  it('cancels a webhook delivery when the signal aborts', async () => {
    post.mockReturnValue(new Promise<unknown>(() => undefined));
    const reporter = new ReporterService(
      testSettings({ discordWebhookUrl: WEBHOOK }),
    );
    const controller = new AbortController();

    const delivery = reporter.report(opportunityReport(), controller.signal);
    controller.abort();

    await expect(delivery).resolves.toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      'Notification to Discord cancelled on shutdown',
    );
    expect(log).not.toHaveBeenCalledWith('Notification sent to Discord.');
  });

  it('warns about a failed cycle', async () => {
    const report: FailedCycleReport = {
      status: 'failed',
      cycle: 3,
      startedAt: at,
      finishedAt: at,
      reasons: [
        '[SushiSwap] network: timed out after 10000ms',
        '[QuickSwap] contract-reverted: call revert exception',
      ],
    };
    const reporter = new ReporterService(testSettings());

    await reporter.report(report);

    expect(warn).toHaveBeenCalledWith(
      'Cycle #3 skipped: [SushiSwap] network: timed out after 10000ms; ' +
        '[QuickSwap] contract-reverted: call revert exception',
    );
    expect(post).not.toHaveBeenCalled();
  });
});
