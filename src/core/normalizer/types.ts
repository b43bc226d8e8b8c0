import { Protocol } from '../domain/enums';
import { JsonObject } from '../domain/models';
import { Amount } from '../domain/value-objects/amount.vo';

/**
 * Raw submission from the boundary: protocol tag still unchecked
 */
export interface CredentialSubmission {
  protocol: string;
  tenantId: string;
  payload: unknown;
  createdBy?: string | null;
}

/**
 * Decoded AP2 verifiable credential (signature not yet checked)
 */
export interface Ap2Credential {
  protocol: Protocol.AP2;
  jwt: string;
  claims: JsonObject;
}

/**
 * Parsed ACP authorization token
 */
export interface AcpCredential {
  protocol: Protocol.ACP;
  token: AcpToken;
}

export interface AcpToken {
  tokenId: string;
  pspId: string;
  merchantId: string;
  maxAmount: Amount;
  currency: string;
  expiresAt: Date;
  constraints: JsonObject;
  signature: string | null;
  raw: JsonObject;
}

/**
 * Closed union over supported protocols; adding a protocol means adding a
 * variant here and a case in CredentialNormalizer.parse
 */
export type ParsedCredential = Ap2Credential | AcpCredential;

/**
 * Unpersisted canonical authorization
 */
export interface AuthorizationDraft {
  tenantId: string;
  protocol: Protocol;
  issuer: string;
  subject: string;
  scope: JsonObject;
  amountLimit: Amount | null;
  currency: string | null;
  expiresAt: Date;
  rawPayload: JsonObject;
  tokenId: string | null;
  createdBy: string | null;
  credential: ParsedCredential;
}

/**
 * Required field absent or structurally invalid
 */
export class MalformedCredentialError extends Error {
  constructor(
    message: string,
    public readonly protocol: Protocol | null = null,
    public readonly field: string | null = null,
  ) {
    super(message);
    this.name = 'MalformedCredentialError';
  }
}

/**
 * Protocol tag not recognized
 */
export class UnsupportedProtocolError extends Error {
  constructor(
    message: string,
    public readonly protocol: string,
  ) {
    super(message);
    this.name = 'UnsupportedProtocolError';
  }
}
