// Settings Controller - Schedule window and intensity ramp configuration
import { Body, Controller, Get, Put } from '@nestjs/common';
import { SettingsService } from './settings.service';
import { UpdateRampDto, UpdateScheduleDto } from './dto/settings.dto';

@Controller('settings')
export class SettingsController {
  constructor(private readonly settings: SettingsService) {}

  /**
   * GET /settings/schedule
   */
  @Get('schedule')
  getSchedule() {
    return { success: true, schedule: this.settings.getSchedule() };
  }

  /**
   * PUT /settings/schedule
   * Body: { enabled?, activeDays?, startTime?, endTime? }
   */
  @Put('schedule')
  updateSchedule(@Body() body: UpdateScheduleDto) {
    return { success: true, schedule: this.settings.updateSchedule(body) };
  }

  /**
   * GET /settings/ramp
   */
  @Get('ramp')
  getRamp() {
    return { success: true, ramp: this.settings.getRamp() };
  }

  /**
   * PUT /settings/ramp
   * Body: { enabled?, durationMinutes?, multiplier?, linkedParameters?, endOnComplete? }
   */
  @Put('ramp')
  updateRamp(@Body() body: UpdateRampDto) {
    return { success: true, ramp: this.settings.updateRamp(body) };
  }
}
