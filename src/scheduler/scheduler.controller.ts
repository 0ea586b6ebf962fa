import { Controller, Get } from '@nestjs/common';
import { SchedulerService, SchedulerStatus } from './scheduler.service';

@Controller('scheduler')
export class SchedulerController {
  constructor(private readonly schedulerService: SchedulerService) {}

  @Get('status')
  status(): SchedulerStatus {
    return this.schedulerService.status();
  }
}
