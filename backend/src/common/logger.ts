import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { LoggerService } from '@nestjs/common';

// Determine log directory based on platform
const getLogDirectory = (): string => {
  if (process.env.PULSE_LOG_DIR) {
    return process.env.PULSE_LOG_DIR;
  }

  const isDev = process.env.NODE_ENV === 'development';

  if (isDev) {
    // In development, log to project root
    return path.join(process.cwd(), 'logs');
  }

  const platform = process.platform;
  const homeDir = process.env.HOME || process.env.USERPROFILE || '.';

  if (platform === 'darwin') {
    // macOS: ~/Library/Logs/PulseDirector
    return path.join(homeDir, 'Library', 'Logs', 'PulseDirector');
  } else if (platform === 'win32') {
    // Windows: %APPDATA%/pulse-director/logs
    const appData = process.env.APPDATA || path.join(homeDir, 'AppData', 'Roaming');
    return path.join(appData, 'pulse-director', 'logs');
  }
  // Linux: ~/.config/pulse-director/logs
  return path.join(homeDir, '.config', 'pulse-director', 'logs');
};

const customFormat = winston.format.printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level.toUpperCase()}] ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

const createTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: 'HH:mm:ss' }),
        customFormat,
        winston.format.colorize({ all: true }),
      ),
    }),
  ];

  // File logging is skipped under test so specs never touch the filesystem
  if (process.env.NODE_ENV === 'test') {
    return transports;
  }

  const logDir = getLogDirectory();
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(logDir, 'engine.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'engine-error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      tailable: true,
    }),
  );

  return transports;
};

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    customFormat,
  ),
  transports: createTransports(),
  exitOnError: false,
});

const join = (args: unknown[]): string =>
  args
    .map((arg) => {
      if (arg instanceof Error) return arg.stack ?? arg.message;
      if (typeof arg === 'string') return arg;
      return JSON.stringify(arg);
    })
    .join(' ');

export const log = {
  info: (...args: unknown[]) => logger.info(join(args)),
  error: (...args: unknown[]) => logger.error(join(args)),
  warn: (...args: unknown[]) => logger.warn(join(args)),
  debug: (...args: unknown[]) => logger.debug(join(args)),
  verbose: (...args: unknown[]) => logger.verbose(join(args)),
};

/**
 * Routes Nest's scoped `Logger` output into the winston transports above.
 * Passed to `NestFactory.create` so every service logs to the same files.
 */
export class WinstonNestLogger implements LoggerService {
  log(message: unknown, ...optionalParams: unknown[]): void {
    logger.info(this.format(message, optionalParams));
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    logger.error(this.format(message, optionalParams));
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    logger.warn(this.format(message, optionalParams));
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    logger.debug(this.format(message, optionalParams));
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    logger.verbose(this.format(message, optionalParams));
  }

  // Nest passes the logger context as the last optional parameter
  private format(message: unknown, optionalParams: unknown[]): string {
    const params = [...optionalParams];
    const context = typeof params[params.length - 1] === 'string' ? params.pop() : undefined;
    const text = join([message, ...params]);
    return context ? `[${context}] ${text}` : text;
  }
}

