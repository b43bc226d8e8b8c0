import { Injectable, Inject } from '@nestjs/common';
import type {
  AcpConfig,
  DeliveryConfig,
  LifecycleConfig,
  ResolvedMandateConfig,
  VerificationConfig,
} from '../mandate.config';
import { MANDATE_CONFIG } from '../constants';

/**
 * Configuration Service
 *
 * Read access to the resolved module configuration
 */
@Injectable()
export class ConfigurationService {
  constructor(
    @Inject(MANDATE_CONFIG)
    private readonly config: ResolvedMandateConfig,
  ) {}

  /**
   * Get full configuration
   */
  getConfig(): ResolvedMandateConfig {
    return this.config;
  }

  getVerificationConfig(): VerificationConfig {
    return this.config.verification;
  }

  getLifecycleConfig(): LifecycleConfig {
    return this.config.lifecycle;
  }

  getDeliveryConfig(): DeliveryConfig {
    return this.config.delivery;
  }

  getAcpConfig(): AcpConfig {
    return this.config.acp;
  }

  /**
   * Tenants with an inbound ACP signing secret configured
   */
  getAcpTenants(): string[] {
    return Object.keys(this.config.acp.webhookSecrets).filter(
      (tenantId) => this.config.acp.webhookSecrets[tenantId].length > 0,
    );
  }

  isExpirySweepEnabled(): boolean {
    return this.config.lifecycle.enabled;
  }

  isDeliveryRetryEnabled(): boolean {
    return this.config.delivery.enabled;
  }

  /**
   * Check if debug mode is enabled
   */
  isDebugMode(): boolean {
    return this.config.debug;
  }

  /**
   * Get environment
   */
  getEnvironment(): string {
    return this.config.environment;
  }
}
