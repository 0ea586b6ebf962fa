import { Inject, Injectable, Logger } from '@nestjs/common';
import { CycleReport, OpportunityReport } from '../scanner/types';
import { SETTINGS, Settings } from '../settings/types';
import {
  formatDirection,
  formatFailure,
  formatNoOpportunity,
  formatOpportunity,
} from './utils/format';
import { sendNotify } from './utils/notify';

@Injectable()
export class ReporterService {
  private readonly logger = new Logger(ReporterService.name);

  constructor(@Inject(SETTINGS) private readonly settings: Settings) {}

  /** `signal` cancels a webhook delivery still in progress. */
  async report(report: CycleReport, signal?: AbortSignal): Promise<void> {
    switch (report.status) {
      case 'opportunity':
        return this.reportOpportunity(report, signal);
      case 'no-opportunity':
        this.logger.log(formatNoOpportunity(report, this.settings.pair));
        for (const direction of report.directions) {
          this.logger.debug(formatDirection(direction, this.settings.pair));
        }
        return;
      case 'failed':
        this.logger.warn(formatFailure(report));
        return;
    }
  }

  private async reportOpportunity(
    report: OpportunityReport,
    signal?: AbortSignal,
  ) {
    const lines = formatOpportunity(report.opportunity, this.settings.pair);
    this.logger.log(`Cycle #${report.cycle}\n${lines.join('\n')}`);

    const webhook = this.settings.discordWebhookUrl;
    if (!webhook) return;
    await sendNotify(
      webhook,
      {
        lines,
        data: {
          tokenIn: this.settings.pair.tokenIn.address,
          tokenOut: this.settings.pair.tokenOut.address,
          amountIn: this.settings.trade.amountIn,
          buyRouter: report.opportunity.buy.router,
          sellRouter: report.opportunity.sell.router,
        },
      },
      signal,
    );
  }
}
