// pulse-director/backend/src/app.controller.ts
import { Controller, Get } from '@nestjs/common';
import { AppGateway } from './common/app.gateway';
import { EngineService } from './engine/engine.service';

@Controller()
export class AppController {
  constructor(
    private readonly gateway: AppGateway,
    private readonly engine: EngineService,
  ) {}

  /**
   * Health check endpoint
   * GET /api (due to global prefix)
   */
  @Get()
  getHealth(): {
    status: string;
    message: string;
    engineRunning: boolean;
    websocket: { healthy: boolean; connections: number; uptime: number };
  } {
    return {
      status: 'ok',
      message: 'Pulse Director backend is running',
      engineRunning: this.engine.isRunning,
      websocket: this.gateway.getStatus(),
    };
  }
}
