import { Module } from '@nestjs/common';
import { ReportingModule } from '../reporting/reporting.module';
import { ScannerModule } from '../scanner/scanner.module';
import { SchedulerController } from './scheduler.controller';
import { SchedulerService } from './scheduler.service';

@Module({
  imports: [ScannerModule, ReportingModule],
  controllers: [SchedulerController],
  providers: [SchedulerService],
  exports: [SchedulerService],
})
export class SchedulerModule {}
