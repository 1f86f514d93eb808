import { Module } from '@nestjs/common';
import { ParametersModule } from '../parameters/parameters.module';
import { IntensityRampService } from './intensity-ramp.service';
import { RampController } from './ramp.controller';

@Module({
  imports: [ParametersModule],
  controllers: [RampController],
  providers: [IntensityRampService],
  exports: [IntensityRampService],
})
export class RampModule {}
