// Features Module - exposes the Feature Gateway and registers the catalog features
import { Logger, Module, OnModuleInit } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { FeatureGatewayService } from './feature-gateway.service';
import { FEATURE_GATEWAY, FeatureHandler } from './feature.types';
import { FeatureCatalog, defaultFeatureCatalog } from './feature-catalog';
import { FeatureToggledPayload, InternalEvent } from '../common/websocket.types';

/**
 * Handler that hands each toggle to connected renderers through the event bus.
 * Rendering itself happens outside this process.
 */
export function createBroadcastHandler(eventEmitter: EventEmitter2): FeatureHandler {
  const emit = (featureId: string, enabled: boolean): void => {
    const payload: FeatureToggledPayload = {
      featureId,
      enabled,
      timestamp: new Date().toISOString(),
    };
    eventEmitter.emit(InternalEvent.FEATURE_TOGGLED, payload);
  };

  return {
    enable: (featureId) => emit(featureId, true),
    disable: (featureId) => emit(featureId, false),
  };
}

@Module({
  providers: [
    FeatureGatewayService,
    { provide: FEATURE_GATEWAY, useExisting: FeatureGatewayService },
    { provide: FeatureCatalog, useValue: defaultFeatureCatalog },
  ],
  exports: [FeatureGatewayService, FEATURE_GATEWAY, FeatureCatalog],
})
export class FeaturesModule implements OnModuleInit {
  private readonly logger = new Logger(FeaturesModule.name);

  constructor(
    private readonly gateway: FeatureGatewayService,
    private readonly catalog: FeatureCatalog,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  onModuleInit(): void {
    const handler = createBroadcastHandler(this.eventEmitter);
    for (const feature of this.catalog.all()) {
      this.gateway.register(feature.id, handler);
    }
    this.logger.log(`Registered ${this.catalog.all().length} features`);
  }
}
