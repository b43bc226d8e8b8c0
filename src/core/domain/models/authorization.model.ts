import {
  AuthorizationStatus,
  Protocol,
  VerificationStatus,
  isLiveStatus,
  isTerminalStatus,
} from '../enums';
import { Amount } from '../value-objects/amount.vo';
import { JsonObject } from './json.types';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AuthorizationProps {
  id: string;
  tenantId: string;
  protocol: Protocol;
  issuer: string;
  subject: string;
  scope: JsonObject;
  amountLimit: Amount | null;
  currency: string | null;
  expiresAt: Date;
  status: AuthorizationStatus;
  rawPayload: JsonObject;
  tokenId: string | null;
  verificationStatus: VerificationStatus;
  verificationReason: string | null;
  verificationDetails: JsonObject;
  verifiedAt: Date | null;
  retentionDays: number;
  deletedAt: Date | null;
  revokedAt: Date | null;
  revokeReason: string | null;
  createdAt: Date;
  updatedAt: Date;
  createdBy: string | null;
}

/**
 * Fields a lifecycle or verification step may change.
 * protocol, tenantId and expiresAt are deliberately absent.
 */
export type AuthorizationChanges = Partial<
  Pick<
    AuthorizationProps,
    | 'status'
    | 'verificationStatus'
    | 'verificationReason'
    | 'verificationDetails'
    | 'verifiedAt'
    | 'retentionDays'
    | 'deletedAt'
    | 'revokedAt'
    | 'revokeReason'
  >
>;

/**
 * Authorization domain model - canonical, protocol-agnostic record of a
 * delegated-authority credential
 */
export class Authorization implements AuthorizationProps {
  readonly id: string;
  readonly tenantId: string;
  readonly protocol: Protocol;
  readonly issuer: string;
  readonly subject: string;
  readonly scope: JsonObject;
  readonly amountLimit: Amount | null;
  readonly currency: string | null;
  readonly expiresAt: Date;
  readonly status: AuthorizationStatus;
  readonly rawPayload: JsonObject;
  readonly tokenId: string | null;
  readonly verificationStatus: VerificationStatus;
  readonly verificationReason: string | null;
  readonly verificationDetails: JsonObject;
  readonly verifiedAt: Date | null;
  readonly retentionDays: number;
  readonly deletedAt: Date | null;
  readonly revokedAt: Date | null;
  readonly revokeReason: string | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly createdBy: string | null;

  constructor(props: AuthorizationProps) {
    this.id = props.id;
    this.tenantId = props.tenantId;
    this.protocol = props.protocol;
    this.issuer = props.issuer;
    this.subject = props.subject;
    this.scope = props.scope;
    this.amountLimit = props.amountLimit;
    this.currency = props.currency;
    this.expiresAt = props.expiresAt;
    this.status = props.status;
    this.rawPayload = props.rawPayload;
    this.tokenId = props.tokenId;
    this.verificationStatus = props.verificationStatus;
    this.verificationReason = props.verificationReason;
    this.verificationDetails = props.verificationDetails;
    this.verifiedAt = props.verifiedAt;
    this.retentionDays = props.retentionDays;
    this.deletedAt = props.deletedAt;
    this.revokedAt = props.revokedAt;
    this.revokeReason = props.revokeReason;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
    this.createdBy = props.createdBy;
  }

  isLive(): boolean {
    return isLiveStatus(this.status);
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.status);
  }

  isDeleted(): boolean {
    return this.deletedAt !== null;
  }

  /**
   * Expiry has been reached at the given instant (expires_at <= now)
   */
  isExpiredAt(now: Date): boolean {
    return this.expiresAt.getTime() <= now.getTime();
  }

  /**
   * Instant after which a soft-deleted record may be purged, or null if not deleted
   */
  purgeableAt(): Date | null {
    if (!this.deletedAt) {
      return null;
    }
    return new Date(this.deletedAt.getTime() + this.retentionDays * DAY_MS);
  }

  /**
   * Copy with changes applied and updatedAt refreshed
   */
  withChanges(changes: AuthorizationChanges, updatedAt: Date): Authorization {
    return new Authorization({ ...this.toProps(), ...changes, updatedAt });
  }

  toProps(): AuthorizationProps {
    return {
      id: this.id,
      tenantId: this.tenantId,
      protocol: this.protocol,
      issuer: this.issuer,
      subject: this.subject,
      scope: this.scope,
      amountLimit: this.amountLimit,
      currency: this.currency,
      expiresAt: this.expiresAt,
      status: this.status,
      rawPayload: this.rawPayload,
      tokenId: this.tokenId,
      verificationStatus: this.verificationStatus,
      verificationReason: this.verificationReason,
      verificationDetails: this.verificationDetails,
      verifiedAt: this.verifiedAt,
      retentionDays: this.retentionDays,
      deletedAt: this.deletedAt,
      revokedAt: this.revokedAt,
      revokeReason: this.revokeReason,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      createdBy: this.createdBy,
    };
  }

  /**
   * Wire representation used by the HTTP layer, outbound webhooks and evidence bundles
   */
  toPlainObject(): JsonObject {
    return {
      id: this.id,
      tenant_id: this.tenantId,
      protocol: this.protocol,
      issuer: this.issuer,
      subject: this.subject,
      scope: this.scope,
      amount_limit: this.amountLimit ? this.amountLimit.toString() : null,
      currency: this.currency,
      expires_at: this.expiresAt.toISOString(),
      status: this.status,
      token_id: this.tokenId,
      verification_status: this.verificationStatus,
      verification_reason: this.verificationReason,
      verification_details: this.verificationDetails,
      verified_at: this.verifiedAt ? this.verifiedAt.toISOString() : null,
      retention_days: this.retentionDays,
      deleted_at: this.deletedAt ? this.deletedAt.toISOString() : null,
      revoked_at: this.revokedAt ? this.revokedAt.toISOString() : null,
      revoke_reason: this.revokeReason,
      created_at: this.createdAt.toISOString(),
      updated_at: this.updatedAt.toISOString(),
      created_by: this.createdBy,
    };
  }
}
