// pulse-director/backend/src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { environment } from './config/environment';
import { SettingsModule } from './config/settings.module';
import { EngineModule } from './engine/engine.module';
import { FeaturesModule } from './features/features.module';
import { ParametersModule } from './parameters/parameters.module';
import { RampModule } from './ramp/ramp.module';
import { SchedulerModule } from './scheduler/scheduler.module';
import { SessionModule } from './session/session.module';
import { TimelineModule } from './timeline/timeline.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [() => environment],
    }),
    EventEmitterModule.forRoot({
      global: true,
    }),
    CommonModule,
    SettingsModule,
    FeaturesModule,
    ParametersModule,
    TimelineModule,
    SessionModule,
    RampModule,
    EngineModule,
    SchedulerModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
