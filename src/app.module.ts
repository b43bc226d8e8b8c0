import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MandateModule, MandateModuleConfig } from './modules';

/**
 * Parse `tenant:secret` pairs; a tenant may appear more than once while
 * rotating secrets, current secret first
 */
export function parseWebhookSecrets(value: string | undefined): Record<string, string[]> {
  const secrets: Record<string, string[]> = {};
  for (const entry of (value ?? '').split(',')) {
    const separator = entry.indexOf(':');
    if (separator <= 0) {
      continue;
    }
    const tenantId = entry.slice(0, separator).trim();
    const secret = entry.slice(separator + 1).trim();
    if (tenantId && secret) {
      (secrets[tenantId] ??= []).push(secret);
    }
  }
  return secrets;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function optionalNumber(config: ConfigService, key: string): number | undefined {
  const value = config.get<string>(key);
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${key} must be a number, got "${value}"`);
  }
  return parsed;
}

export function createMandateConfig(config: ConfigService): MandateModuleConfig {
  const storageType = config.get<string>('STORAGE_TYPE', 'mock');
  const cacheTtlMs = optionalNumber(config, 'TRUSTSTORE_CACHE_TTL_MS');
  const resolveTimeoutMs = optionalNumber(config, 'TRUSTSTORE_TIMEOUT_MS');
  const sweepIntervalMs = optionalNumber(config, 'EXPIRY_SWEEP_INTERVAL_MS');
  const defaultRetentionDays = optionalNumber(config, 'DEFAULT_RETENTION_DAYS');
  const pollIntervalMs = optionalNumber(config, 'DELIVERY_POLL_INTERVAL_MS');

  return {
    // DB_* connection settings are read by createTypeORMConfig
    storage: { type: storageType === 'typeorm' ? 'typeorm' : 'mock' },
    truststore: {
      ...(cacheTtlMs === undefined ? {} : { cacheTtlMs }),
      ...(resolveTimeoutMs === undefined ? {} : { resolveTimeoutMs }),
    },
    lifecycle: {
      ...(sweepIntervalMs === undefined ? {} : { sweepIntervalMs }),
      ...(defaultRetentionDays === undefined ? {} : { defaultRetentionDays }),
    },
    delivery: pollIntervalMs === undefined ? {} : { pollIntervalMs },
    acp: {
      webhookSecrets: parseWebhookSecrets(config.get<string>('ACP_WEBHOOK_SECRETS')),
      pspAllowlist: parseList(config.get<string>('ACP_PSP_ALLOWLIST')),
    },
    environment: config.get<string>('NODE_ENV') === 'production' ? 'production' : 'development',
    debug: config.get<string>('DEBUG') === 'true',
  };
}

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    MandateModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => createMandateConfig(config),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
