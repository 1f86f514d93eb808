import { Body, Controller, Get, HttpCode, HttpStatus, Logger, Post } from '@nestjs/common';
import { StopSessionDto } from './dto/stop-session.dto';
import { SessionEngineService } from './session-engine.service';
import { SessionStatus } from './session.types';

@Controller('session')
export class SessionController {
  private readonly logger = new Logger(SessionController.name);

  constructor(private readonly sessionEngine: SessionEngineService) {}

  /**
   * Current playback state
   * GET /api/session/status
   */
  @Get('status')
  getStatus(): SessionStatus {
    return this.sessionEngine.status();
  }

  /**
   * Stop the running session
   * POST /api/session/stop
   */
  @Post('stop')
  @HttpCode(HttpStatus.OK)
  stop(@Body() body: StopSessionDto): { success: boolean; status: SessionStatus } {
    const completed = body.completed === true;
    this.logger.log(`Stop requested (completed: ${completed})`);
    const stopped = this.sessionEngine.stopSession(completed);
    return { success: stopped, status: this.sessionEngine.status() };
  }
}
