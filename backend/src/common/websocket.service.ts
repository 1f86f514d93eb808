// WebSocket Service - Clean API for emitting WebSocket events
import { Injectable, Logger } from '@nestjs/common';
import { Server } from 'socket.io';
import { WebSocketEvent, WebSocketEventMap } from './websocket.types';

/**
 * WebSocketService provides a type-safe API for broadcasting engine events to
 * connected clients (control panels and the feature renderers).
 * Services never touch Socket.IO directly; AppGateway relays internal events here.
 */
@Injectable()
export class WebSocketService {
  private server: Server | null = null;
  private readonly logger = new Logger(WebSocketService.name);

  /**
   * Set the Socket.IO server instance
   * Called by AppGateway during initialization
   */
  setServer(server: Server): void {
    this.server = server;
    this.logger.log('WebSocket server instance registered');
  }

  getConnectionCount(): number {
    return this.server?.sockets.sockets.size ?? 0;
  }

  /**
   * Generic emit method with type safety
   */
  emit<K extends keyof WebSocketEventMap>(event: K, payload: WebSocketEventMap[K]): void {
    if (!this.server) {
      this.logger.debug(`Cannot emit ${event}: WebSocket server not initialized`);
      return;
    }

    try {
      this.server.emit(event, payload);
      this.logger.debug(`Emitted ${event} to ${this.getConnectionCount()} clients`);
    } catch (error) {
      this.logger.error(`Error emitting ${event}:`, error);
    }
  }

  /**
   * Session progress fires every second; log it at debug only
   */
  emitSessionProgress(payload: WebSocketEventMap[WebSocketEvent.SESSION_PROGRESS]): void {
    this.emit(WebSocketEvent.SESSION_PROGRESS, payload);
  }

  emitSessionCompleted(payload: WebSocketEventMap[WebSocketEvent.SESSION_COMPLETED]): void {
    this.logger.log(
      `Session ${payload.abandoned ? 'abandoned' : 'completed'}: timelineId=${payload.timelineId}, xp=${payload.xp}`,
    );
    this.emit(WebSocketEvent.SESSION_COMPLETED, payload);
  }

  emitEngineStopped(payload: WebSocketEventMap[WebSocketEvent.ENGINE_STOPPED]): void {
    this.logger.log(`Engine stopped: source=${payload.source}`);
    this.emit(WebSocketEvent.ENGINE_STOPPED, payload);
  }
}
