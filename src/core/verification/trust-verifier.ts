import { Logger } from '@nestjs/common';
import {
  createLocalJWKSet,
  decodeProtectedHeader,
  errors as joseErrors,
  jwtVerify,
} from 'jose';
import {
  Protocol,
  VerificationReason,
  VerificationStatus,
} from '../domain/enums';
import { JsonObject } from '../domain/models';
import { WebhookSigner } from '../delivery/webhook-signer';
import {
  AcpToken,
  Ap2Credential,
  AcpCredential,
  AuthorizationDraft,
} from '../normalizer/types';
import { Clock, canonicalJson, systemClock } from '../utils';
import {
  KeyMaterial,
  Truststore,
  TrustResolutionError,
  VerificationOutcome,
} from './types';

export interface TrustVerifierOptions {
  allowedAlgorithms: string[];
  clockToleranceSeconds: number;
  clock?: Clock;
}

export const DEFAULT_ALLOWED_ALGORITHMS = ['ES256', 'RS256', 'EdDSA'];

/**
 * Trust Verifier
 *
 * Resolves issuer keys and checks credential authenticity. Every path
 * returns an outcome; nothing here throws to the caller.
 */
export class TrustVerifier {
  private readonly logger = new Logger(TrustVerifier.name);
  private readonly clock: Clock;

  constructor(
    private readonly truststore: Truststore,
    private readonly options: TrustVerifierOptions = {
      allowedAlgorithms: DEFAULT_ALLOWED_ALGORITHMS,
      clockToleranceSeconds: 0,
    },
  ) {
    this.clock = options.clock ?? systemClock;
  }

  async verify(draft: AuthorizationDraft): Promise<VerificationOutcome> {
    const details: JsonObject = {
      issuer: draft.issuer,
      protocol: draft.protocol,
    };

    try {
      let material: KeyMaterial | null;
      try {
        material = await this.truststore.resolveKey(draft.issuer, draft.protocol);
      } catch (error) {
        if (error instanceof TrustResolutionError) {
          return this.fail(
            error.reason === 'timeout'
              ? VerificationReason.TRUSTSTORE_TIMEOUT
              : VerificationReason.TRUSTSTORE_UNAVAILABLE,
            { ...details, message: error.message },
          );
        }
        throw error;
      }

      if (!material) {
        return this.fail(VerificationReason.ISSUER_UNKNOWN, {
          ...details,
          message: `No trusted key material for issuer ${draft.issuer}`,
        });
      }

      const credential = draft.credential;
      switch (credential.protocol) {
        case Protocol.AP2:
          return await this.verifyAp2(credential, material, details);
        case Protocol.ACP:
          return this.verifyAcp(credential, material, details);
      }
    } catch (error) {
      this.logger.error(
        `Unexpected verification error for issuer ${draft.issuer}`,
        error instanceof Error ? error.stack : String(error),
      );
      return this.fail(VerificationReason.VERIFICATION_ERROR, {
        ...details,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // ==================== AP2 ====================

  private async verifyAp2(
    credential: Ap2Credential,
    material: KeyMaterial,
    details: JsonObject,
  ): Promise<VerificationOutcome> {
    if (material.kind !== 'jwks') {
      return this.fail(VerificationReason.KEY_TYPE_MISMATCH, {
        ...details,
        keyKind: material.kind,
      });
    }

    let kid: string | undefined;
    try {
      kid = decodeProtectedHeader(credential.jwt).kid;
    } catch (error) {
      return this.fail(VerificationReason.SIGNATURE_INVALID, {
        ...details,
        message: error instanceof Error ? error.message : String(error),
      });
    }

    const revoked = material.revokedKeyIds ?? [];
    if (kid && revoked.includes(kid)) {
      return this.fail(VerificationReason.KEY_REVOKED, { ...details, kid });
    }

    // A header without kid is matched against every key; revoked ones must not take part
    const liveKeys = material.keys.filter((key) => !(key.kid && revoked.includes(key.kid)));
    if (liveKeys.length === 0 && material.keys.length > 0) {
      return this.fail(VerificationReason.KEY_REVOKED, { ...details, kid: kid ?? null });
    }

    try {
      const { protectedHeader } = await jwtVerify(
        credential.jwt,
        createLocalJWKSet({ keys: liveKeys }),
        {
          algorithms: this.options.allowedAlgorithms,
          currentDate: this.clock(),
          clockTolerance: this.options.clockToleranceSeconds,
        },
      );
      return this.pass(VerificationReason.VERIFIED, {
        ...details,
        algorithm: protectedHeader.alg,
        kid: protectedHeader.kid ?? null,
        method: 'jwt_signature',
      });
    } catch (error) {
      return this.fail(mapJoseError(error), {
        ...details,
        kid: kid ?? null,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }

  // ==================== ACP ====================

  private verifyAcp(
    credential: AcpCredential,
    material: KeyMaterial,
    details: JsonObject,
  ): VerificationOutcome {
    const { token } = credential;
    let passReason = VerificationReason.VERIFIED;

    switch (material.kind) {
      case 'jwks':
        return this.fail(VerificationReason.KEY_TYPE_MISMATCH, {
          ...details,
          keyKind: material.kind,
        });

      case 'shared-secret':
        if (!token.signature) {
          return this.fail(VerificationReason.SIGNATURE_MISSING, details);
        }
        if (!WebhookSigner.verify(acpSigningPayload(token), token.signature, material.secrets)) {
          return this.fail(VerificationReason.SIGNATURE_INVALID, details);
        }
        break;

      case 'trust-relationship':
        passReason = VerificationReason.TRUSTED_RELATIONSHIP;
        break;
    }

    if (token.expiresAt.getTime() <= this.clock().getTime()) {
      return this.fail(VerificationReason.EXPIRED, {
        ...details,
        expiresAt: token.expiresAt.toISOString(),
      });
    }

    if (token.maxAmount.isZero()) {
      return this.fail(VerificationReason.INVALID_LIMIT, {
        ...details,
        maxAmount: token.maxAmount.toString(),
      });
    }

    const constrainedMerchant = token.constraints['merchant'];
    if (typeof constrainedMerchant === 'string' && constrainedMerchant !== token.merchantId) {
      return this.fail(VerificationReason.MERCHANT_MISMATCH, {
        ...details,
        merchantId: token.merchantId,
        constraintMerchant: constrainedMerchant,
      });
    }

    return this.pass(passReason, {
      ...details,
      method: material.kind === 'shared-secret' ? 'hmac_signature' : 'trust_relationship',
    });
  }

  private pass(reason: VerificationReason, details: JsonObject): VerificationOutcome {
    return {
      status: VerificationStatus.VERIFIED,
      reason,
      details,
      verifiedAt: this.clock(),
    };
  }

  private fail(reason: VerificationReason, details: JsonObject): VerificationOutcome {
    return {
      status: VerificationStatus.FAILED,
      reason,
      details,
      verifiedAt: this.clock(),
    };
  }
}

/**
 * Bytes an ACP issuer signs: the token without its signature, keys sorted
 */
export function acpSigningPayload(token: Pick<AcpToken, 'raw'>): string {
  const { signature: _signature, ...unsigned } = token.raw;
  return canonicalJson(unsigned);
}

function mapJoseError(error: unknown): VerificationReason {
  if (error instanceof joseErrors.JWTExpired) {
    return VerificationReason.EXPIRED;
  }
  if (error instanceof joseErrors.JWTClaimValidationFailed) {
    return error.claim === 'nbf' || error.claim === 'iat'
      ? VerificationReason.NOT_YET_VALID
      : VerificationReason.SIGNATURE_INVALID;
  }
  if (error instanceof joseErrors.JOSEAlgNotAllowed) {
    return VerificationReason.ALGORITHM_NOT_ALLOWED;
  }
  if (
    error instanceof joseErrors.JWKSNoMatchingKey ||
    error instanceof joseErrors.JWKSMultipleMatchingKeys
  ) {
    return VerificationReason.KEY_NOT_FOUND;
  }
  return VerificationReason.SIGNATURE_INVALID;
}
