import { Logger } from '@nestjs/common';
import { LRUCache } from 'lru-cache';
import { Protocol } from '../domain/enums';
import { withTimeout } from '../utils';
import { KeyMaterial, KeySource, Truststore, TrustResolutionError } from './types';

export interface CachingTruststoreOptions {
  cacheTtlMs: number;
  resolveTimeoutMs: number;
  maxEntries?: number;
}

/**
 * Truststore over ordered key sources with a keyed, TTL-bounded cache.
 * Only successful lookups are cached. Lookups that time out or error raise
 * TrustResolutionError so the caller can fail closed.
 */
export class CachingTruststore implements Truststore {
  private readonly logger = new Logger(CachingTruststore.name);
  private readonly cache: LRUCache<string, KeyMaterial>;

  constructor(
    private readonly sources: KeySource[],
    private readonly options: CachingTruststoreOptions,
  ) {
    this.cache = new LRUCache<string, KeyMaterial>({
      max: options.maxEntries ?? 1000,
      ttl: options.cacheTtlMs,
    });
  }

  async resolveKey(issuer: string, protocol: Protocol): Promise<KeyMaterial | null> {
    const cacheKey = `${protocol}:${issuer}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    let material: KeyMaterial | null;
    try {
      material = await withTimeout(
        (signal) => this.lookup(issuer, protocol, signal),
        this.options.resolveTimeoutMs,
        () =>
          new TrustResolutionError(
            `Truststore lookup for ${issuer} timed out after ${this.options.resolveTimeoutMs}ms`,
            'timeout',
            issuer,
            protocol,
          ),
      );
    } catch (error) {
      if (error instanceof TrustResolutionError) {
        this.logger.warn(error.message);
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`Truststore lookup for ${issuer} failed: ${cause.message}`);
      throw new TrustResolutionError(
        `Truststore lookup for ${issuer} failed: ${cause.message}`,
        'unavailable',
        issuer,
        protocol,
        cause,
      );
    }

    if (material) {
      this.cache.set(cacheKey, material);
    }
    return material;
  }

  private async lookup(
    issuer: string,
    protocol: Protocol,
    signal: AbortSignal,
  ): Promise<KeyMaterial | null> {
    for (const source of this.sources) {
      if (!source.supports(protocol)) {
        continue;
      }
      const material = await source.fetchKeyMaterial(issuer, protocol, signal);
      if (material) {
        return material;
      }
    }
    return null;
  }

  getStatistics(): { cachedIssuers: number; sources: string[] } {
    return {
      cachedIssuers: this.cache.size,
      sources: this.sources.map((s) => s.name),
    };
  }
}
