import { decodeJwt } from 'jose';
import { Protocol, parseProtocol } from '../domain/enums';
import { JsonObject, isJsonObject } from '../domain/models';
import {
  Amount,
  AmountFormatError,
  parseCurrencyCode,
} from '../domain/value-objects/amount.vo';
import { parseCombinedLimit } from './amount-parsing';
import {
  AcpCredential,
  Ap2Credential,
  AuthorizationDraft,
  CredentialSubmission,
  MalformedCredentialError,
  ParsedCredential,
  UnsupportedProtocolError,
} from './types';

/**
 * Credential Normalizer
 *
 * Parses protocol-specific payloads into a canonical authorization draft.
 * This is the single place that branches on protocol shape; signatures are
 * left to the TrustVerifier.
 */
export class CredentialNormalizer {
  normalize(submission: CredentialSubmission): AuthorizationDraft {
    const credential = this.parse(submission.protocol, submission.payload);
    const createdBy = submission.createdBy ?? null;

    switch (credential.protocol) {
      case Protocol.AP2:
        return this.draftFromAp2(submission.tenantId, credential, createdBy);
      case Protocol.ACP:
        return this.draftFromAcp(submission.tenantId, credential, createdBy);
      default:
        return assertNever(credential);
    }
  }

  /**
   * Parse a payload into its protocol variant without building a draft
   */
  parse(protocolTag: string, payload: unknown): ParsedCredential {
    const protocol = parseProtocol(protocolTag);

    switch (protocol) {
      case Protocol.AP2:
        return this.parseAp2(payload);
      case Protocol.ACP:
        return this.parseAcp(payload);
      default:
        throw new UnsupportedProtocolError(
          `Unsupported protocol: ${protocolTag}`,
          protocolTag,
        );
    }
  }

  // ==================== AP2 ====================

  private parseAp2(payload: unknown): Ap2Credential {
    let jwt: unknown = payload;
    if (isJsonObject(payload)) {
      jwt = payload['vc_jwt'];
    }

    if (typeof jwt !== 'string' || jwt.trim().length === 0) {
      throw new MalformedCredentialError(
        'AP2 credential must be a JWT string or { vc_jwt }',
        Protocol.AP2,
        'vc_jwt',
      );
    }

    let claims: JsonObject;
    try {
      claims = { ...decodeJwt(jwt.trim()) };
    } catch (error) {
      throw new MalformedCredentialError(
        `AP2 credential is not a decodable JWT: ${error instanceof Error ? error.message : String(error)}`,
        Protocol.AP2,
        'vc_jwt',
      );
    }

    return { protocol: Protocol.AP2, jwt: jwt.trim(), claims };
  }

  private draftFromAp2(
    tenantId: string,
    credential: Ap2Credential,
    createdBy: string | null,
  ): AuthorizationDraft {
    const { claims } = credential;

    const issuer = firstString(claims, ['issuer_did', 'iss']);
    if (!issuer) {
      throw new MalformedCredentialError('AP2 credential has no issuer', Protocol.AP2, 'issuer_did');
    }

    const subject = firstString(claims, ['subject_did', 'sub']);
    if (!subject) {
      throw new MalformedCredentialError('AP2 credential has no subject', Protocol.AP2, 'subject_did');
    }

    const exp = claims['exp'];
    if (typeof exp !== 'number' || !Number.isFinite(exp)) {
      throw new MalformedCredentialError('AP2 credential has no exp claim', Protocol.AP2, 'exp');
    }

    const { amountLimit, currency } = this.ap2Limit(claims);

    return {
      tenantId,
      protocol: Protocol.AP2,
      issuer,
      subject,
      scope: ap2Scope(claims['scope']),
      amountLimit,
      currency,
      expiresAt: new Date(exp * 1000),
      rawPayload: { vc_jwt: credential.jwt },
      tokenId: null,
      createdBy,
      credential,
    };
  }

  private ap2Limit(claims: JsonObject): {
    amountLimit: Amount | null;
    currency: string | null;
  } {
    const raw = claims['amount_limit'];
    const separateCurrency = claims['currency'];

    try {
      let amountLimit: Amount | null = null;
      let currency: string | null = null;

      if (typeof raw === 'string') {
        const parsed = parseCombinedLimit(raw);
        amountLimit = parsed.amount;
        currency = parsed.currency;
      } else if (typeof raw === 'number') {
        amountLimit = Amount.parse(raw);
      } else if (raw !== undefined && raw !== null) {
        throw new AmountFormatError('amount_limit must be a string or number', String(raw));
      }

      if (currency === null && typeof separateCurrency === 'string') {
        currency = parseCurrencyCode(separateCurrency);
      }

      return { amountLimit, currency };
    } catch (error) {
      throw new MalformedCredentialError(
        error instanceof Error ? error.message : String(error),
        Protocol.AP2,
        'amount_limit',
      );
    }
  }

  // ==================== ACP ====================

  private parseAcp(payload: unknown): AcpCredential {
    if (!isJsonObject(payload)) {
      throw new MalformedCredentialError('ACP token must be a JSON object', Protocol.ACP);
    }

    const tokenId = requireString(payload, 'token_id');
    const pspId = requireString(payload, 'psp_id');
    const merchantId = requireString(payload, 'merchant_id');

    const rawAmount = payload['max_amount'];
    if (typeof rawAmount !== 'string' && typeof rawAmount !== 'number') {
      throw new MalformedCredentialError('ACP token has no max_amount', Protocol.ACP, 'max_amount');
    }

    let maxAmount: Amount;
    let currency: string;
    try {
      maxAmount = Amount.parse(rawAmount);
    } catch (error) {
      throw new MalformedCredentialError(
        error instanceof Error ? error.message : String(error),
        Protocol.ACP,
        'max_amount',
      );
    }
    try {
      currency = parseCurrencyCode(requireString(payload, 'currency'));
    } catch (error) {
      if (error instanceof MalformedCredentialError) throw error;
      throw new MalformedCredentialError(
        error instanceof Error ? error.message : String(error),
        Protocol.ACP,
        'currency',
      );
    }

    const expiresAtText = requireString(payload, 'expires_at');
    const expiresAt = new Date(expiresAtText);
    if (Number.isNaN(expiresAt.getTime())) {
      throw new MalformedCredentialError(
        `ACP expires_at is not a timestamp: ${expiresAtText}`,
        Protocol.ACP,
        'expires_at',
      );
    }

    const constraints = payload['constraints'] ?? {};
    if (!isJsonObject(constraints)) {
      throw new MalformedCredentialError('ACP constraints must be an object', Protocol.ACP, 'constraints');
    }

    const signature = payload['signature'];

    return {
      protocol: Protocol.ACP,
      token: {
        tokenId,
        pspId,
        merchantId,
        maxAmount,
        currency,
        expiresAt,
        constraints,
        signature: typeof signature === 'string' ? signature : null,
        raw: payload,
      },
    };
  }

  private draftFromAcp(
    tenantId: string,
    credential: AcpCredential,
    createdBy: string | null,
  ): AuthorizationDraft {
    const { token } = credential;
    return {
      tenantId,
      protocol: Protocol.ACP,
      issuer: token.pspId,
      subject: token.merchantId,
      scope: token.constraints,
      amountLimit: token.maxAmount,
      currency: token.currency,
      expiresAt: token.expiresAt,
      rawPayload: token.raw,
      tokenId: token.tokenId,
      createdBy,
      credential,
    };
  }
}

function ap2Scope(scope: unknown): JsonObject {
  if (isJsonObject(scope)) {
    return scope;
  }
  if (typeof scope === 'string') {
    return { scope };
  }
  return {};
}

function firstString(source: JsonObject, keys: string[]): string | null {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

function requireString(source: JsonObject, key: string): string {
  const value = source[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new MalformedCredentialError(`ACP token has no ${key}`, Protocol.ACP, key);
  }
  return value.trim();
}

function assertNever(value: never): never {
  throw new UnsupportedProtocolError(
    `Unhandled protocol variant: ${JSON.stringify(value)}`,
    String(value),
  );
}
