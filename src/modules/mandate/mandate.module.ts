import {
  DynamicModule,
  Global,
  Inject,
  Logger,
  Module,
  OnApplicationShutdown,
  Provider,
} from '@nestjs/common';
import {
  StorageAdapter,
  EventDispatcher,
  EventDispatcherImpl,
  LoggingEventHandler,
  AuthorizationStateMachine,
  CredentialNormalizer,
  CachingTruststore,
  StaticKeySource,
  RemoteJwksKeySource,
  KeySource,
  Truststore,
  TrustVerifier,
  AuditRecorder,
  StorageAuditRecorder,
  AlertService,
  WebhookDispatcher,
  FetchWebhookTransport,
  AuthorizationService,
  EvidenceService,
  WebhookSubscriptionService,
  InboundWebhookProcessor,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import { TypeORMStorageAdapter, createDataSource } from '../../adapters/storage/typeorm';
import {
  MandateModuleConfig,
  MandateModuleAsyncConfig,
  ResolvedMandateConfig,
  resolveMandateConfig,
} from './mandate.config';
import {
  MANDATE_CONFIG,
  STORAGE_ADAPTER,
  STATIC_KEY_SOURCE,
  TRUSTSTORE,
  TRUST_VERIFIER,
  CREDENTIAL_NORMALIZER,
  AUTHORIZATION_STATE_MACHINE,
  AUDIT_RECORDER,
  EVENT_DISPATCHER,
  ALERT_SERVICE,
  WEBHOOK_DISPATCHER,
  AUTHORIZATION_SERVICE,
  EVIDENCE_SERVICE,
  WEBHOOK_SUBSCRIPTION_SERVICE,
  INBOUND_WEBHOOK_PROCESSOR,
} from './constants';
import { AuthorizationController } from './controllers/authorization.controller';
import { WebhookSubscriptionController } from './controllers/webhook-subscription.controller';
import { AlertController } from './controllers/alert.controller';
import { AcpWebhookController } from './controllers/acp-webhook.controller';
import { HealthController } from './controllers/health.controller';
import { ConfigurationService } from './services/configuration.service';
import { DeliveryRetryProcessor } from './services/delivery-retry.processor';
import { LifecycleSweepProcessor } from './services/lifecycle-sweep.processor';

const EXPORTED_TOKENS = [
  MANDATE_CONFIG,
  STORAGE_ADAPTER,
  STATIC_KEY_SOURCE,
  EVENT_DISPATCHER,
  AUTHORIZATION_SERVICE,
  EVIDENCE_SERVICE,
  WEBHOOK_SUBSCRIPTION_SERVICE,
  ALERT_SERVICE,
  INBOUND_WEBHOOK_PROCESSOR,
  ConfigurationService,
];

const CONTROLLERS = [
  AuthorizationController,
  WebhookSubscriptionController,
  AlertController,
  AcpWebhookController,
  HealthController,
];

/**
 * Mandate Module - Main NestJS Module
 *
 * Wires storage, truststore, verification, lifecycle and webhook delivery
 * from one configuration object
 */
@Global()
@Module({})
export class MandateModule implements OnApplicationShutdown {
  private readonly logger = new Logger(MandateModule.name);

  constructor(@Inject(STORAGE_ADAPTER) private readonly storageAdapter: StorageAdapter) {}

  /**
   * Runs after the processors have stopped in onModuleDestroy
   */
  async onApplicationShutdown(): Promise<void> {
    if (this.storageAdapter.close) {
      await this.storageAdapter.close();
      this.logger.log('Storage connections closed');
    }
  }
  /**
   * Configure the module synchronously
   */
  static forRoot(config: MandateModuleConfig): DynamicModule {
    return {
      module: MandateModule,
      providers: [
        {
          provide: MANDATE_CONFIG,
          useValue: resolveMandateConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the module asynchronously
   */
  static forRootAsync(options: MandateModuleAsyncConfig): DynamicModule {
    return {
      module: MandateModule,
      imports: options.imports || [],
      providers: [
        {
          provide: MANDATE_CONFIG,
          useFactory: async (...args: unknown[]) =>
            resolveMandateConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers shared by both registration styles; all read MANDATE_CONFIG
   */
  private static createProviders(): Provider[] {
    return [
      {
        provide: STORAGE_ADAPTER,
        useFactory: async (config: ResolvedMandateConfig): Promise<StorageAdapter> => {
          switch (config.storage.type) {
            case 'mock':
              return new MockStorageAdapter();

            case 'typeorm': {
              const dataSource = createDataSource(config.storage.options);
              await dataSource.initialize();
              return new TypeORMStorageAdapter(dataSource);
            }

            case 'custom':
              if (!config.storage.adapter) {
                throw new Error('Custom storage adapter not provided');
              }
              return config.storage.adapter;

            default:
              throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
          }
        },
        inject: [MANDATE_CONFIG],
      },
      {
        provide: STATIC_KEY_SOURCE,
        useFactory: (config: ResolvedMandateConfig) =>
          new StaticKeySource(config.truststore.issuers),
        inject: [MANDATE_CONFIG],
      },
      {
        provide: TRUSTSTORE,
        useFactory: (config: ResolvedMandateConfig, staticSource: StaticKeySource): Truststore => {
          const sources: KeySource[] = [staticSource];
          if (config.truststore.remoteJwks) {
            sources.push(new RemoteJwksKeySource(config.truststore.remoteJwks));
          }
          return new CachingTruststore(sources, {
            cacheTtlMs: config.truststore.cacheTtlMs,
            resolveTimeoutMs: config.truststore.resolveTimeoutMs,
            maxEntries: config.truststore.maxEntries,
          });
        },
        inject: [MANDATE_CONFIG, STATIC_KEY_SOURCE],
      },
      {
        provide: TRUST_VERIFIER,
        useFactory: (config: ResolvedMandateConfig, truststore: Truststore) =>
          new TrustVerifier(truststore, {
            allowedAlgorithms: config.verification.allowedAlgorithms,
            clockToleranceSeconds: config.verification.clockToleranceSeconds,
          }),
        inject: [MANDATE_CONFIG, TRUSTSTORE],
      },
      {
        provide: CREDENTIAL_NORMALIZER,
        useClass: CredentialNormalizer,
      },
      {
        provide: AUTHORIZATION_STATE_MACHINE,
        useFactory: () => new AuthorizationStateMachine(),
      },
      {
        provide: AUDIT_RECORDER,
        useFactory: (storageAdapter: StorageAdapter): AuditRecorder =>
          new StorageAuditRecorder(storageAdapter),
        inject: [STORAGE_ADAPTER],
      },
      {
        provide: ALERT_SERVICE,
        useFactory: (storageAdapter: StorageAdapter) => new AlertService(storageAdapter),
        inject: [STORAGE_ADAPTER],
      },
      {
        provide: WEBHOOK_DISPATCHER,
        useFactory: (
          config: ResolvedMandateConfig,
          storageAdapter: StorageAdapter,
          alertService: AlertService,
        ) =>
          new WebhookDispatcher(storageAdapter, new FetchWebhookTransport(), alertService, {
            batchSize: config.delivery.batchSize,
            claimLeaseMs: config.delivery.claimLeaseMs,
            responseBodyLimit: config.delivery.responseBodyLimit,
          }),
        inject: [MANDATE_CONFIG, STORAGE_ADAPTER, ALERT_SERVICE],
      },
      {
        provide: EVENT_DISPATCHER,
        useFactory: (
          config: ResolvedMandateConfig,
          webhookDispatcher: WebhookDispatcher,
        ): EventDispatcher => {
          const dispatcher = config.events.dispatcher || new EventDispatcherImpl();

          // Add built-in handlers if enabled
          if (config.events.enableLogging) {
            const loggingHandler = new LoggingEventHandler(undefined, config.events.logLevel);
            dispatcher.onAll(loggingHandler.getHandler());
          }

          dispatcher.onAll(webhookDispatcher.getHandler());

          // Add custom handlers
          for (const { eventType, handler } of config.events.handlers) {
            dispatcher.on(eventType, handler);
          }

          return dispatcher;
        },
        inject: [MANDATE_CONFIG, WEBHOOK_DISPATCHER],
      },
      {
        provide: AUTHORIZATION_SERVICE,
        useFactory: (
          config: ResolvedMandateConfig,
          storageAdapter: StorageAdapter,
          normalizer: CredentialNormalizer,
          verifier: TrustVerifier,
          stateMachine: AuthorizationStateMachine,
          auditRecorder: AuditRecorder,
          eventDispatcher: EventDispatcher,
          alertService: AlertService,
        ) =>
          new AuthorizationService(
            storageAdapter,
            normalizer,
            verifier,
            stateMachine,
            auditRecorder,
            eventDispatcher,
            {
              verifyOnCreate: config.verification.verifyOnCreate,
              rejectExpiredOnCreate: config.verification.rejectExpiredOnCreate,
              defaultRetentionDays: config.lifecycle.defaultRetentionDays,
              expirySweepBatchSize: config.lifecycle.expirySweepBatchSize,
              purgeBatchSize: config.lifecycle.purgeBatchSize,
            },
            alertService,
          ),
        inject: [
          MANDATE_CONFIG,
          STORAGE_ADAPTER,
          CREDENTIAL_NORMALIZER,
          TRUST_VERIFIER,
          AUTHORIZATION_STATE_MACHINE,
          AUDIT_RECORDER,
          EVENT_DISPATCHER,
          ALERT_SERVICE,
        ],
      },
      {
        provide: EVIDENCE_SERVICE,
        useFactory: (storageAdapter: StorageAdapter, auditRecorder: AuditRecorder) =>
          new EvidenceService(storageAdapter, auditRecorder),
        inject: [STORAGE_ADAPTER, AUDIT_RECORDER],
      },
      {
        provide: WEBHOOK_SUBSCRIPTION_SERVICE,
        useFactory: (storageAdapter: StorageAdapter) =>
          new WebhookSubscriptionService(storageAdapter),
        inject: [STORAGE_ADAPTER],
      },
      {
        provide: INBOUND_WEBHOOK_PROCESSOR,
        useFactory: (
          config: ResolvedMandateConfig,
          storageAdapter: StorageAdapter,
          authorizationService: AuthorizationService,
        ) =>
          new InboundWebhookProcessor({
            storageAdapter,
            authorizationService,
            resolveSecrets: (tenantId) => config.acp.webhookSecrets[tenantId] ?? [],
            pspAllowlist: config.acp.pspAllowlist,
            claimLeaseMs: config.acp.claimLeaseMs,
          }),
        inject: [MANDATE_CONFIG, STORAGE_ADAPTER, AUTHORIZATION_SERVICE],
      },
      ConfigurationService,
      DeliveryRetryProcessor,
      LifecycleSweepProcessor,
    ];
  }
}
