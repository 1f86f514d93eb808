// App Gateway - Core WebSocket Infrastructure
import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Logger, Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { WebSocketService } from './websocket.service';
import {
  EngineStartedPayload,
  EngineStoppedPayload,
  FeatureToggledPayload,
  InternalEvent,
  ParameterChangedPayload,
  RampCompletedPayload,
  RampProgressPayload,
  RampStartedPayload,
  RampStoppedPayload,
  SchedulerActionPayload,
  SessionCompletedPayload,
  SessionPhaseChangedPayload,
  SessionProgressPayload,
  SessionStartedPayload,
  SessionStoppedPayload,
  SettingsChangedPayload,
  WebSocketEvent,
} from './websocket.types';

/**
 * AppGateway owns the Socket.IO server and relays internal engine events to clients.
 *
 * Feature renderers subscribe to `feature-toggled` and `parameter-changed`;
 * control panels subscribe to the session, ramp and scheduler events.
 */
@Injectable()
@WebSocketGateway({
  cors: true,
  transports: ['websocket', 'polling'],
  pingTimeout: 60000,
  pingInterval: 25000,
})
export class AppGateway implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(AppGateway.name);
  private connectionCount = 0;

  constructor(private readonly websocketService: WebSocketService) {}

  afterInit(server: Server): void {
    this.websocketService.setServer(server);
    this.logger.log('AppGateway initialized');
  }

  handleConnection(client: Socket): void {
    this.connectionCount++;
    this.logger.log(`Client connected: ${client.id} | Total connections: ${this.connectionCount}`);

    client.emit('connected', {
      socketId: client.id,
      timestamp: new Date().toISOString(),
    });
  }

  handleDisconnect(client: Socket): void {
    this.connectionCount--;
    this.logger.log(`Client disconnected: ${client.id} | Total connections: ${this.connectionCount}`);
  }

  /**
   * Session events
   */
  @OnEvent(InternalEvent.SESSION_STARTED)
  handleSessionStarted(payload: SessionStartedPayload): void {
    this.websocketService.emit(WebSocketEvent.SESSION_STARTED, payload);
  }

  @OnEvent(InternalEvent.SESSION_PROGRESS)
  handleSessionProgress(payload: SessionProgressPayload): void {
    this.websocketService.emitSessionProgress(payload);
  }

  @OnEvent(InternalEvent.SESSION_PHASE_CHANGED)
  handleSessionPhaseChanged(payload: SessionPhaseChangedPayload): void {
    this.websocketService.emit(WebSocketEvent.SESSION_PHASE_CHANGED, payload);
  }

  @OnEvent(InternalEvent.SESSION_COMPLETED)
  handleSessionCompleted(payload: SessionCompletedPayload): void {
    this.websocketService.emitSessionCompleted(payload);
  }

  @OnEvent(InternalEvent.SESSION_STOPPED)
  handleSessionStopped(payload: SessionStoppedPayload): void {
    this.websocketService.emit(WebSocketEvent.SESSION_STOPPED, payload);
  }

  /**
   * Engine events
   */
  @OnEvent(InternalEvent.ENGINE_STARTED)
  handleEngineStarted(payload: EngineStartedPayload): void {
    this.websocketService.emit(WebSocketEvent.ENGINE_STARTED, payload);
  }

  @OnEvent(InternalEvent.ENGINE_STOPPED)
  handleEngineStopped(payload: EngineStoppedPayload): void {
    this.websocketService.emitEngineStopped(payload);
  }

  /**
   * Ramp events
   */
  @OnEvent(InternalEvent.RAMP_STARTED)
  handleRampStarted(payload: RampStartedPayload): void {
    this.websocketService.emit(WebSocketEvent.RAMP_STARTED, payload);
  }

  @OnEvent(InternalEvent.RAMP_PROGRESS)
  handleRampProgress(payload: RampProgressPayload): void {
    this.websocketService.emit(WebSocketEvent.RAMP_PROGRESS, payload);
  }

  @OnEvent(InternalEvent.RAMP_COMPLETED)
  handleRampCompleted(payload: RampCompletedPayload): void {
    this.websocketService.emit(WebSocketEvent.RAMP_COMPLETED, payload);
  }

  @OnEvent(InternalEvent.RAMP_STOPPED)
  handleRampStopped(payload: RampStoppedPayload): void {
    this.websocketService.emit(WebSocketEvent.RAMP_STOPPED, payload);
  }

  /**
   * Scheduler events
   */
  @OnEvent(InternalEvent.SCHEDULER_AUTO_START)
  handleSchedulerAutoStart(payload: SchedulerActionPayload): void {
    this.websocketService.emit(WebSocketEvent.SCHEDULER_AUTO_START, payload);
  }

  @OnEvent(InternalEvent.SCHEDULER_AUTO_STOP)
  handleSchedulerAutoStop(payload: SchedulerActionPayload): void {
    this.websocketService.emit(WebSocketEvent.SCHEDULER_AUTO_STOP, payload);
  }

  /**
   * Collaborator state for renderers
   */
  @OnEvent(InternalEvent.FEATURE_TOGGLED)
  handleFeatureToggled(payload: FeatureToggledPayload): void {
    this.websocketService.emit(WebSocketEvent.FEATURE_TOGGLED, payload);
  }

  @OnEvent(InternalEvent.PARAMETER_CHANGED)
  handleParameterChanged(payload: ParameterChangedPayload): void {
    this.websocketService.emit(WebSocketEvent.PARAMETER_CHANGED, payload);
  }

  @OnEvent(InternalEvent.SETTINGS_CHANGED)
  handleSettingsChanged(payload: SettingsChangedPayload): void {
    this.websocketService.emit(WebSocketEvent.SETTINGS_CHANGED, payload);
  }

  /**
   * Health Check Methods
   */
  getConnectionCount(): number {
    return this.server?.sockets.sockets.size ?? 0;
  }

  isHealthy(): boolean {
    return this.server !== null && this.server !== undefined;
  }

  getStatus(): { healthy: boolean; connections: number; uptime: number } {
    return {
      healthy: this.isHealthy(),
      connections: this.getConnectionCount(),
      uptime: process.uptime(),
    };
  }
}
