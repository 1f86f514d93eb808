import { Module } from '@nestjs/common';
import { ParameterStoreService } from './parameter-store.service';
import { ParametersController } from './parameters.controller';
import { PARAMETER_STORE } from './parameter.types';

@Module({
  controllers: [ParametersController],
  providers: [
    ParameterStoreService,
    { provide: PARAMETER_STORE, useExisting: ParameterStoreService },
  ],
  exports: [ParameterStoreService, PARAMETER_STORE],
})
export class ParametersModule {}
