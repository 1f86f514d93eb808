import { Controller, Get } from '@nestjs/common';
import { SchedulerService } from './scheduler.service';
import { SchedulerStatus } from './scheduler.types';

@Controller('scheduler')
export class SchedulerController {
  constructor(private readonly scheduler: SchedulerService) {}

  /**
   * GET /api/scheduler/status
   */
  @Get('status')
  getStatus(): SchedulerStatus {
    return this.scheduler.status();
  }
}
