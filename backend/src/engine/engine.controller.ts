import {
  Body,
  ConflictException,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Post,
} from '@nestjs/common';
import { StartEngineDto } from './dto/start-engine.dto';
import { EngineService } from './engine.service';
import { EngineMode, EngineStatus } from './engine.types';

@Controller('engine')
export class EngineController {
  private readonly logger = new Logger(EngineController.name);

  constructor(private readonly engine: EngineService) {}

  /**
   * Start the engine, optionally playing a timeline
   * POST /api/engine/start
   */
  @Post('start')
  @HttpCode(HttpStatus.OK)
  start(@Body() body: StartEngineDto): { success: boolean; status: EngineStatus } {
    const mode: EngineMode = body.timelineId
      ? { kind: 'timeline', timelineId: body.timelineId }
      : { kind: 'default' };

    const result = this.engine.requestStart(mode, 'user');
    if (result.error === 'UnknownTimeline') {
      throw new NotFoundException(`Timeline ${body.timelineId} not found`);
    }
    if (!result.success) {
      throw new ConflictException(`Engine start rejected: ${result.error}`);
    }
    return { success: true, status: this.engine.status() };
  }

  /**
   * POST /api/engine/stop
   */
  @Post('stop')
  @HttpCode(HttpStatus.OK)
  stop(): { success: boolean; status: EngineStatus } {
    this.logger.log('Engine stop requested by user');
    const stopped = this.engine.requestStop('user');
    return { success: stopped, status: this.engine.status() };
  }

  /**
   * GET /api/engine/status
   */
  @Get('status')
  getStatus(): EngineStatus {
    return this.engine.status();
  }
}
