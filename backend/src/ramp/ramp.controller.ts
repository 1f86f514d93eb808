import { Controller, Get, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { IntensityRampService } from './intensity-ramp.service';
import { RampStatus } from './ramp.types';

@Controller('ramp')
export class RampController {
  private readonly logger = new Logger(RampController.name);

  constructor(private readonly ramp: IntensityRampService) {}

  /**
   * GET /api/ramp/status
   */
  @Get('status')
  getStatus(): RampStatus {
    return this.ramp.status();
  }

  /**
   * Stop the ramp and restore the baseline values; the engine keeps running
   * POST /api/ramp/stop
   */
  @Post('stop')
  @HttpCode(HttpStatus.OK)
  stop(): { success: boolean; status: RampStatus } {
    this.logger.log('Ramp stop requested');
    const stopped = this.ramp.stop();
    return { success: stopped, status: this.ramp.status() };
  }
}
