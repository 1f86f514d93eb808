import { Module } from '@nestjs/common';
import { FeaturesModule } from '../features/features.module';
import { SessionController } from './session.controller';
import { SessionEngineService } from './session-engine.service';

@Module({
  imports: [FeaturesModule],
  controllers: [SessionController],
  providers: [SessionEngineService],
  exports: [SessionEngineService],
})
export class SessionModule {}
