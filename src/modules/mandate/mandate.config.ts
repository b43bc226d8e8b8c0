import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import {
  StorageAdapter,
  EventDispatcher,
  EventHandler,
  IssuerRegistration,
  RemoteJwksOptions,
  WebhookEventType,
  DEFAULT_ALLOWED_ALGORITHMS,
  DEFAULT_INBOUND_CLAIM_LEASE_MS,
} from '../../core';
import type { TypeORMConfigOverrides } from '../../adapters/storage/typeorm';

/**
 * Where authorizations, deliveries and audit events live
 */
export interface StorageConfig {
  type: 'mock' | 'typeorm' | 'custom';
  options?: TypeORMConfigOverrides;
  adapter?: StorageAdapter;
}

export interface TruststoreConfig {
  /**
   * Issuers known up front (JWKS, shared secrets, trust relationships)
   */
  issuers: IssuerRegistration[];

  /**
   * Remote JWKS lookup for AP2 issuers; null disables it
   */
  remoteJwks: RemoteJwksOptions | null;

  cacheTtlMs: number;
  resolveTimeoutMs: number;
  maxEntries: number;
}

export interface VerificationConfig {
  allowedAlgorithms: string[];
  clockToleranceSeconds: number;
  verifyOnCreate: boolean;
  rejectExpiredOnCreate: boolean;
}

/**
 * Expiry sweep and retention purge
 */
export interface LifecycleConfig {
  enabled: boolean;
  sweepIntervalMs: number;
  jitterRatio: number;
  defaultRetentionDays: number;
  expirySweepBatchSize: number;
  purgeBatchSize: number;
}

/**
 * Outbound webhook retry scanning
 */
export interface DeliveryConfig {
  enabled: boolean;
  pollIntervalMs: number;
  jitterRatio: number;
  batchSize: number;
  claimLeaseMs: number;
  responseBodyLimit: number;
}

/**
 * Inbound ACP webhooks
 */
export interface AcpConfig {
  /**
   * Tenant id to the secrets its PSP signs with; first entry is current
   */
  webhookSecrets: Record<string, string[]>;

  /**
   * PSP ids accepted on inbound webhooks; empty accepts any
   */
  pspAllowlist: string[];

  claimLeaseMs: number;
}

export interface EventsConfig {
  dispatcher?: EventDispatcher;
  enableLogging: boolean;
  logLevel: 'verbose' | 'normal' | 'minimal';
  handlers: Array<{
    eventType: WebhookEventType;
    handler: EventHandler;
  }>;
}

/**
 * Mandate Module Configuration
 */
export interface MandateModuleConfig {
  storage: StorageConfig;
  truststore?: Partial<TruststoreConfig>;
  verification?: Partial<VerificationConfig>;
  lifecycle?: Partial<LifecycleConfig>;
  delivery?: Partial<DeliveryConfig>;
  acp?: Partial<AcpConfig>;
  events?: Partial<EventsConfig>;

  /**
   * Environment-specific settings
   */
  environment?: 'development' | 'staging' | 'production';
  debug?: boolean;
}

/**
 * Configuration with every default applied, as injected under MANDATE_CONFIG
 */
export interface ResolvedMandateConfig {
  storage: StorageConfig;
  truststore: TruststoreConfig;
  verification: VerificationConfig;
  lifecycle: LifecycleConfig;
  delivery: DeliveryConfig;
  acp: AcpConfig;
  events: EventsConfig;
  environment: 'development' | 'staging' | 'production';
  debug: boolean;
}

/**
 * Async configuration factory
 */
export interface MandateModuleAsyncConfig {
  imports?: ModuleMetadata['imports'];
  inject?: FactoryProvider['inject'];
  useFactory: FactoryProvider<
    MandateModuleConfig | Promise<MandateModuleConfig>
  >['useFactory'];
}

/**
 * Default configuration values
 */
export const defaultMandateConfig: Omit<ResolvedMandateConfig, 'storage'> = {
  truststore: {
    issuers: [],
    remoteJwks: { resolveDidWeb: true },
    cacheTtlMs: 5 * 60 * 1000,
    resolveTimeoutMs: 5000,
    maxEntries: 1000,
  },
  verification: {
    allowedAlgorithms: DEFAULT_ALLOWED_ALGORITHMS,
    clockToleranceSeconds: 0,
    verifyOnCreate: true,
    rejectExpiredOnCreate: false,
  },
  lifecycle: {
    enabled: true,
    sweepIntervalMs: 60_000,
    jitterRatio: 0.1,
    defaultRetentionDays: 90,
    expirySweepBatchSize: 500,
    purgeBatchSize: 500,
  },
  delivery: {
    enabled: true,
    pollIntervalMs: 10_000,
    jitterRatio: 0.1,
    batchSize: 50,
    claimLeaseMs: 120_000,
    responseBodyLimit: 1000,
  },
  acp: {
    webhookSecrets: {},
    pspAllowlist: [],
    claimLeaseMs: DEFAULT_INBOUND_CLAIM_LEASE_MS,
  },
  events: {
    enableLogging: true,
    logLevel: 'normal',
    handlers: [],
  },
  environment: 'development',
  debug: false,
};

/**
 * Apply defaults section by section
 */
export function resolveMandateConfig(config: MandateModuleConfig): ResolvedMandateConfig {
  return {
    storage: config.storage,
    truststore: { ...defaultMandateConfig.truststore, ...config.truststore },
    verification: { ...defaultMandateConfig.verification, ...config.verification },
    lifecycle: { ...defaultMandateConfig.lifecycle, ...config.lifecycle },
    delivery: { ...defaultMandateConfig.delivery, ...config.delivery },
    acp: { ...defaultMandateConfig.acp, ...config.acp },
    events: { ...defaultMandateConfig.events, ...config.events },
    environment: config.environment ?? defaultMandateConfig.environment,
    debug: config.debug ?? defaultMandateConfig.debug,
  };
}
