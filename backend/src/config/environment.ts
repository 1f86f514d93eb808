import { EnvironmentUtil } from './environment.util';

const port = EnvironmentUtil.readPositiveNumber('PORT', 3000);

export interface EngineTimings {
  /** Interval between session ticks; elapsed time is always read from the clock */
  sessionTickMs: number;
  schedulerTickMs: number;
  rampTickMs: number;
}

export const DEFAULT_ENGINE_TIMINGS: EngineTimings = {
  sessionTickMs: 1000,
  schedulerTickMs: 30000,
  rampTickMs: 2000,
};

export const environment = {
  production: EnvironmentUtil.isProduction(),
  port,
  apiPrefix: 'api',

  cors: {
    origins: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  },

  socket: {
    path: '/socket.io',
    credentials: true,
  },

  engine: {
    sessionTickMs: EnvironmentUtil.readPositiveNumber('SESSION_TICK_MS', DEFAULT_ENGINE_TIMINGS.sessionTickMs),
    schedulerTickMs: EnvironmentUtil.readPositiveNumber('SCHEDULER_TICK_MS', DEFAULT_ENGINE_TIMINGS.schedulerTickMs),
    rampTickMs: EnvironmentUtil.readPositiveNumber('RAMP_TICK_MS', DEFAULT_ENGINE_TIMINGS.rampTickMs),
  } satisfies EngineTimings,
};
