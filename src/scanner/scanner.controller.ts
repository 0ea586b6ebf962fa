import { Controller, Get, UseInterceptors } from '@nestjs/common';
import { BigIntSerializerInterceptor } from '../interceptor/BigIntSerializerInterceptor';
import { ScannerService } from './scanner.service';

@Controller('scanner')
@UseInterceptors(BigIntSerializerInterceptor)
export class ScannerController {
  constructor(private readonly scannerService: ScannerService) {}

  /** Run one cycle on demand; nothing is reported to the sink. */
  @Get('check')
  async check() {
    return await this.scannerService.runCycle();
  }
}
