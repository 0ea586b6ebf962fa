import { SchedulerRegistry } from '@nestjs/schedule';
import { DexService } from '../dex/dex.service';
import { ReporterService } from '../reporting/reporter.service';
import { ScannerService } from '../scanner/scanner.service';
import { FakeTransport, testSettings } from '../scanner/utils/fixtures';
import { SchedulerController } from './scheduler.controller';
import { SchedulerService } from './scheduler.service';

describe('SchedulerController', () => {
  it('reports the scheduler state and counters', () => {
    const settings = testSettings({ pollIntervalMs: 15_000 });
    const scheduler = new SchedulerService(
      new SchedulerRegistry(),
      new ScannerService(new DexService(settings, new FakeTransport()), settings),
      new ReporterService(settings),
      settings,
    );
    const controller = new SchedulerController(scheduler);

    expect(controller.status()).toEqual({
      state: 'idle',
      pollIntervalMs: 15_000,
      cyclesRun: 0,
      cyclesFailed: 0,
      opportunities: 0,
      ticksSkipped: 0,
      lastCycleAt: null,
    });
  });
});
