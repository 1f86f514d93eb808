import { Module } from '@nestjs/common';
import { RampModule } from '../ramp/ramp.module';
import { SessionModule } from '../session/session.module';
import { TimelineModule } from '../timeline/timeline.module';
import { EngineController } from './engine.controller';
import { EngineService } from './engine.service';
import { ENGINE_CONTROL } from './engine.types';

@Module({
  imports: [SessionModule, RampModule, TimelineModule],
  controllers: [EngineController],
  providers: [EngineService, { provide: ENGINE_CONTROL, useExisting: EngineService }],
  exports: [EngineService, ENGINE_CONTROL],
})
export class EngineModule {}
