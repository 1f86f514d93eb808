import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ExpressAdapter, NestExpressApplication } from '@nestjs/platform-express';
import { IoAdapter } from '@nestjs/platform-socket.io';
import express from 'express';
import { Server, ServerOptions } from 'socket.io';
import { AppModule } from './app.module';
import { log, WinstonNestLogger } from './common/logger';
import { environment } from './config/environment';

class ExtendedIoAdapter extends IoAdapter {
  createIOServer(port: number, options?: ServerOptions): Server {
    return super.createIOServer(port, {
      ...options,
      path: environment.socket.path,
      cors: {
        origin: environment.cors.origins,
        methods: environment.cors.methods,
        credentials: environment.socket.credentials,
      },
    });
  }
}

const LOCAL_ORIGIN = /^http:\/\/(localhost|127\.0\.0\.1):\d+$/;

async function bootstrap(): Promise<void> {
  log.info('====================================');
  log.info('PULSE DIRECTOR STARTING');
  log.info('Process ID:', process.pid);
  log.info('Environment:', process.env.NODE_ENV || 'development');
  log.info('====================================');

  const app = await NestFactory.create<NestExpressApplication>(AppModule, new ExpressAdapter(express()), {
    logger: new WinstonNestLogger(),
    abortOnError: false,
  });

  app.enableCors({
    origin: (origin, callback) => {
      // No origin: curl and other non-browser clients
      if (!origin || LOCAL_ORIGIN.test(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'), false);
    },
    methods: environment.cors.methods.join(','),
    credentials: true,
    allowedHeaders: environment.cors.allowedHeaders.join(', '),
  });

  app.useWebSocketAdapter(new ExtendedIoAdapter(app));
  app.setGlobalPrefix(environment.apiPrefix);
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );

  // SIGINT/SIGTERM stop the engine, restoring ramp and session baselines
  app.enableShutdownHooks();

  await app.listen(environment.port);
  log.info('=== APPLICATION STARTED ===');
  log.info(`Server running on port ${environment.port}`);
  log.info(`API endpoint: http://localhost:${environment.port}/${environment.apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  log.error('=== BOOTSTRAP ERROR ===');
  log.error('Error during application startup:', error);
  process.exitCode = 1;
});
