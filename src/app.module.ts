import { DynamicModule, Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { ReportingModule } from './reporting/reporting.module';
import { ScannerModule } from './scanner/scanner.module';
import { SchedulerModule } from './scheduler/scheduler.module';
import { SettingsModule } from './settings/settings.module';
import { Settings } from './settings/types';

@Module({})
export class AppModule {
  static register(settings: Settings): DynamicModule {
    return {
      module: AppModule,
      imports: [
        SettingsModule.forRoot(settings),
        ScheduleModule.forRoot(),
        ScannerModule,
        ReportingModule,
        SchedulerModule,
      ],
    };
  }
}
