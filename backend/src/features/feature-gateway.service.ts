// Feature Gateway - registered-capability map between the engine and feature implementations
import { Injectable, Logger } from '@nestjs/common';
import {
  FeatureGateway,
  FeatureHandler,
  FeatureId,
  UnknownFeatureError,
} from './feature.types';

@Injectable()
export class FeatureGatewayService implements FeatureGateway {
  private readonly logger = new Logger(FeatureGatewayService.name);
  private readonly handlers = new Map<FeatureId, FeatureHandler>();
  private readonly enabled = new Set<FeatureId>();

  register(featureId: FeatureId, handler: FeatureHandler): void {
    if (this.handlers.has(featureId)) {
      this.logger.warn(`Replacing handler for feature ${featureId}`);
    }
    this.handlers.set(featureId, handler);
  }

  unregister(featureId: FeatureId): boolean {
    this.enabled.delete(featureId);
    return this.handlers.delete(featureId);
  }

  registeredFeatures(): FeatureId[] {
    return Array.from(this.handlers.keys());
  }

  enabledFeatures(): FeatureId[] {
    return Array.from(this.enabled);
  }

  isEnabled(featureId: FeatureId): boolean {
    return this.enabled.has(featureId);
  }

  /**
   * Enable a feature. Already-enabled features are left alone.
   * State only changes once the handler succeeds.
   */
  enable(featureId: FeatureId): void {
    const handler = this.requireHandler(featureId);
    if (this.enabled.has(featureId)) return;

    handler.enable(featureId);
    this.enabled.add(featureId);
    this.logger.log(`Feature enabled: ${featureId}`);
  }

  disable(featureId: FeatureId): void {
    const handler = this.requireHandler(featureId);
    if (!this.enabled.has(featureId)) return;

    handler.disable(featureId);
    this.enabled.delete(featureId);
    this.logger.log(`Feature disabled: ${featureId}`);
  }

  private requireHandler(featureId: FeatureId): FeatureHandler {
    const handler = this.handlers.get(featureId);
    if (!handler) {
      throw new UnknownFeatureError(featureId);
    }
    return handler;
  }
}
