// Common Module - Shared infrastructure and utilities
import { Global, Module } from '@nestjs/common';
import { AppGateway } from './app.gateway';
import { WebSocketService } from './websocket.service';
import { CLOCK, SystemClock } from './clock';

/**
 * CommonModule provides shared infrastructure used across the application.
 *
 * Marked @Global() so engine modules can inject the clock and WebSocketService
 * without importing it.
 */
@Global()
@Module({
  providers: [AppGateway, WebSocketService, { provide: CLOCK, useClass: SystemClock }],
  exports: [WebSocketService, AppGateway, CLOCK],
})
export class CommonModule {}
