import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CycleAbortedError } from '../dex/errors';
import { ReporterService } from '../reporting/reporter.service';
import { ScannerService } from '../scanner/scanner.service';
import { CycleReport } from '../scanner/types';
import { SETTINGS, Settings } from '../settings/types';

export type SchedulerState =
  | 'idle'
  | 'fetching'
  | 'evaluating'
  | 'reporting'
  | 'stopped';

export interface SchedulerStatus {
  state: SchedulerState;
  pollIntervalMs: number;
  cyclesRun: number;
  cyclesFailed: number;
  opportunities: number;
  ticksSkipped: number;
  lastCycleAt: Date | null;
}

export const POLL_INTERVAL = 'dex-spread-poll';

@Injectable()
export class SchedulerService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(SchedulerService.name);
  private readonly abortController = new AbortController();
  private state: SchedulerState = 'idle';
  private inFlight: Promise<void> | null = null;
  private cycleSeq = 0;
  private cyclesRun = 0;
  private cyclesFailed = 0;
  private opportunities = 0;
  private ticksSkipped = 0;
  private lastCycleAt: Date | null = null;

  constructor(
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly scannerService: ScannerService,
    private readonly reporterService: ReporterService,
    @Inject(SETTINGS) private readonly settings: Settings,
  ) {}

  onApplicationBootstrap() {
    this.start();
  }

  /** Register the poll interval and run the first cycle right away. */
  start() {
    const { pollIntervalMs, exchanges, pair } = this.settings;
    const interval = setInterval(() => {
      void this.tick();
    }, pollIntervalMs);
    this.schedulerRegistry.addInterval(POLL_INTERVAL, interval);

    this.logger.log(
      `Watching ${pair.tokenIn.symbol}/${pair.tokenOut.symbol} on ${exchanges
        .map((e) => e.name)
        .join(', ')} every ${pollIntervalMs / 1000}s`,
    );
    void this.tick();
  }

  /** One scheduler tick. Never rejects. */
  tick(): Promise<void> {
    if (this.abortController.signal.aborted) return Promise.resolve();
    if (this.inFlight) {
      this.ticksSkipped++;
      this.logger.warn('Previous cycle still running, skipping tick');
      return this.inFlight;
    }
    const run = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  status(): SchedulerStatus {
    return {
      state: this.state,
      pollIntervalMs: this.settings.pollIntervalMs,
      cyclesRun: this.cyclesRun,
      cyclesFailed: this.cyclesFailed,
      opportunities: this.opportunities,
      ticksSkipped: this.ticksSkipped,
      lastCycleAt: this.lastCycleAt,
    };
  }

  async onApplicationShutdown(signal?: string) {
    this.logger.log(`Stopping scheduler${signal ? ` (${signal})` : ''}`);
    this.abortController.abort();
    this.state = 'stopped';
    if (this.schedulerRegistry.doesExist('interval', POLL_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(POLL_INTERVAL);
    }
    await this.inFlight;
  }

  private async runCycle(): Promise<void> {
    const { signal } = this.abortController;
    let report: CycleReport | undefined;
    try {
      report = await this.scannerService.runCycle({
        cycle: ++this.cycleSeq,
        signal,
        onStage: (stage) => {
          this.state = stage;
        },
      });
      if (signal.aborted) return;

      this.state = 'reporting';
      this.record(report);
      await this.reporterService.report(report, signal);
    } catch (error) {
      if (error instanceof CycleAbortedError) {
        this.logger.debug('Cycle dropped on shutdown');
        return;
      }
      if (!report) this.cyclesRun++;
      this.cyclesFailed++;
      this.logger.error(
        'Cycle failed unexpectedly',
        error instanceof Error ? error.stack : String(error),
      );
    } finally {
      if (this.state !== 'stopped') this.state = 'idle';
    }
  }

  private record(report: CycleReport) {
    this.cyclesRun++;
    this.lastCycleAt = report.finishedAt;
    if (report.status === 'failed') this.cyclesFailed++;
    if (report.status === 'opportunity') this.opportunities++;
  }
}
