import type { JWK } from 'jose';
import { Protocol, VerificationReason, VerificationStatus } from '../domain/enums';
import { JsonObject } from '../domain/models';

/**
 * Key material a truststore can hold for an issuer
 */
export type KeyMaterial =
  | {
      kind: 'jwks';
      keys: JWK[];
      revokedKeyIds?: string[];
    }
  | {
      kind: 'shared-secret';
      /**
       * Current secret first; older secrets stay valid during rotation
       */
      secrets: string[];
    }
  | {
      kind: 'trust-relationship';
      establishedAt: Date;
      note?: string;
    };

/**
 * Source of issuer key material (static registry, remote JWKS, ...)
 */
export interface KeySource {
  readonly name: string;

  supports(protocol: Protocol): boolean;

  /**
   * Resolve key material, or null when this source does not know the issuer
   */
  fetchKeyMaterial(
    issuer: string,
    protocol: Protocol,
    signal: AbortSignal,
  ): Promise<KeyMaterial | null>;
}

/**
 * Issuer key lookup consumed by the TrustVerifier
 */
export interface Truststore {
  resolveKey(issuer: string, protocol: Protocol): Promise<KeyMaterial | null>;
}

/**
 * Verdict returned by the TrustVerifier; failures are data, never exceptions
 */
export interface VerificationOutcome {
  status: VerificationStatus;
  reason: VerificationReason;
  details: JsonObject;
  verifiedAt: Date;
}

/**
 * Truststore lookup failed (timeout, network, malformed key set)
 */
export class TrustResolutionError extends Error {
  constructor(
    message: string,
    public readonly reason: 'timeout' | 'unavailable',
    public readonly issuer: string,
    public readonly protocol: Protocol,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'TrustResolutionError';
  }
}
