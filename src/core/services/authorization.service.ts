import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  AuditEventType,
  AuthorizationStatus,
  TriggerType,
  VerificationReason,
  VerificationStatus,
  WebhookEventType,
} from '../domain/enums';
import { AuditEvent, Authorization, JsonObject } from '../domain/models';
import { Amount, parseCurrencyCode } from '../domain/value-objects/amount.vo';
import {
  AuthorizationFilter,
  AuthorizationMutation,
  EventDispatcher,
  MutationAuditEntry,
  PaginatedResult,
  Pagination,
  RequestContext,
  StorageAdapter,
} from '../interfaces';
import { CredentialNormalizer, CredentialSubmission } from '../normalizer';
import {
  AuthorizationStateMachine,
  ExpiredCredentialError,
} from '../state-machine';
import { Clock, systemClock } from '../utils';
import { TrustVerifier, VerificationOutcome } from '../verification';
import { AlertService } from './alert.service';
import { AuditRecorder } from './audit-recorder';
import { AuthorizationNotFoundError } from './errors';

export interface AuthorizationServiceOptions {
  /**
   * Run the TrustVerifier on create; otherwise records start PENDING
   */
  verifyOnCreate: boolean;

  /**
   * Refuse credentials already past expiry instead of storing them as EXPIRED
   */
  rejectExpiredOnCreate: boolean;

  defaultRetentionDays: number;
  expirySweepBatchSize: number;
  purgeBatchSize: number;
  clock?: Clock;
}

export const DEFAULT_AUTHORIZATION_SERVICE_OPTIONS: AuthorizationServiceOptions = {
  verifyOnCreate: true,
  rejectExpiredOnCreate: false,
  defaultRetentionDays: 90,
  expirySweepBatchSize: 500,
  purgeBatchSize: 500,
};

export interface RevokeOptions extends RequestContext {
  triggerType?: TriggerType.MANUAL | TriggerType.PROTOCOL_WEBHOOK;
  metadata?: JsonObject;
}

export interface UsageRecord {
  amount?: string | number | null;
  currency?: string | null;
  transactionId?: string | null;
  merchantId?: string | null;
  metadata?: JsonObject;
  source?: string;
}

export interface UsageResult {
  authorization: Authorization;
  auditEvent: AuditEvent;
  exceedsLimit: boolean;
}

export interface SoftDeleteOptions extends RequestContext {
  retentionDays?: number;
}

const SYSTEM_ACTOR = 'system';

const VERIFICATION_AUDIT: Record<VerificationStatus, { eventType: AuditEventType; label: string }> = {
  [VerificationStatus.VERIFIED]: { eventType: AuditEventType.VERIFIED, label: 'verified' },
  [VerificationStatus.FAILED]: {
    eventType: AuditEventType.VERIFICATION_FAILED,
    label: 'verification failed',
  },
  [VerificationStatus.PENDING]: {
    eventType: AuditEventType.VERIFICATION_PENDING,
    label: 'verification pending',
  },
};

/**
 * Authorization Service
 *
 * Primary interface for creating authorizations and driving their lifecycle.
 * Every mutation goes through StorageAdapter.mutateAuthorization so the row
 * lock, the change and its audit event commit together; events are emitted
 * only after that commit.
 */
export class AuthorizationService {
  private readonly logger = new Logger(AuthorizationService.name);
  private readonly clock: Clock;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly normalizer: CredentialNormalizer,
    private readonly verifier: TrustVerifier,
    private readonly stateMachine: AuthorizationStateMachine,
    private readonly auditRecorder: AuditRecorder,
    private readonly eventDispatcher?: EventDispatcher,
    private readonly options: AuthorizationServiceOptions = DEFAULT_AUTHORIZATION_SERVICE_OPTIONS,
    private readonly alertService?: AlertService,
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Normalize, verify and persist a credential
   */
  async create(
    submission: CredentialSubmission,
    requestContext: RequestContext = {},
  ): Promise<Authorization> {
    const draft = this.normalizer.normalize(submission);
    const now = this.clock();

    if (this.options.rejectExpiredOnCreate && draft.expiresAt.getTime() <= now.getTime()) {
      throw new ExpiredCredentialError(
        `Credential expired at ${draft.expiresAt.toISOString()}`,
        draft.expiresAt,
      );
    }

    const outcome: VerificationOutcome = this.options.verifyOnCreate
      ? await this.verifier.verify(draft)
      : {
          status: VerificationStatus.PENDING,
          reason: VerificationReason.VERIFICATION_SKIPPED,
          details: { issuer: draft.issuer, protocol: draft.protocol },
          verifiedAt: now,
        };

    const status = this.stateMachine.initialStatus(draft.protocol, draft.expiresAt, now);
    const actor = requestContext.actor ?? draft.createdBy ?? SYSTEM_ACTOR;

    const authorization = await this.storageAdapter.createAuthorization(
      {
        tenantId: draft.tenantId,
        protocol: draft.protocol,
        issuer: draft.issuer,
        subject: draft.subject,
        scope: draft.scope,
        amountLimit: draft.amountLimit,
        currency: draft.currency,
        expiresAt: draft.expiresAt,
        status,
        rawPayload: draft.rawPayload,
        tokenId: draft.tokenId,
        verificationStatus: outcome.status,
        verificationReason: outcome.reason,
        verificationDetails: outcome.details,
        verifiedAt: outcome.status === VerificationStatus.PENDING ? null : outcome.verifiedAt,
        retentionDays: this.options.defaultRetentionDays,
        createdBy: draft.createdBy,
      },
      {
        eventType: AuditEventType.CREATED,
        description: `${draft.protocol} authorization created from issuer ${draft.issuer}`,
        actor,
        eventData: {
          protocol: draft.protocol,
          issuer: draft.issuer,
          subject: draft.subject,
          status,
          tokenId: draft.tokenId,
        },
        ip: requestContext.ip ?? null,
        userAgent: requestContext.userAgent ?? null,
        createdAt: now,
      },
    );

    await this.recordVerification(authorization, outcome, actor, requestContext);
    await this.alertOnFailure(authorization, outcome);

    this.logger.log(
      `Created ${authorization.protocol} authorization ${authorization.id} (${authorization.status}, ${outcome.status}/${outcome.reason})`,
    );

    await this.emit(WebhookEventType.AUTHORIZATION_CREATED, authorization);
    if (outcome.status === VerificationStatus.VERIFIED) {
      await this.emit(WebhookEventType.AUTHORIZATION_VERIFIED, authorization);
    } else if (outcome.status === VerificationStatus.FAILED) {
      await this.emit(WebhookEventType.AUTHORIZATION_VERIFICATION_FAILED, authorization, {
        reason: outcome.reason,
      });
    }

    return authorization;
  }

  /**
   * Tenant-scoped lookup; soft-deleted records are hidden unless asked for
   */
  async get(
    tenantId: string,
    id: string,
    includeDeleted = false,
  ): Promise<Authorization | null> {
    return this.storageAdapter.findAuthorization({ id, tenantId, includeDeleted });
  }

  /**
   * Like get, but throws AuthorizationNotFoundError
   */
  async require(
    tenantId: string,
    id: string,
    includeDeleted = false,
  ): Promise<Authorization> {
    const authorization = await this.get(tenantId, id, includeDeleted);
    if (!authorization) {
      throw new AuthorizationNotFoundError(`Authorization not found: ${id}`, id);
    }
    return authorization;
  }

  async findByTokenId(tenantId: string, tokenId: string): Promise<Authorization | null> {
    return this.storageAdapter.findAuthorizationByTokenId(tenantId, tokenId);
  }

  async list(
    filter: AuthorizationFilter,
    pagination: Pagination = { page: 1, limit: 50 },
  ): Promise<PaginatedResult<Authorization>> {
    return this.storageAdapter.listAuthorizations(filter, pagination);
  }

  /**
   * Move a live or expired authorization to REVOKED.
   * A second revoke throws AlreadyRevokedError and leaves revokedAt untouched.
   */
  async revoke(
    tenantId: string,
    id: string,
    reason: string,
    options: RevokeOptions = {},
  ): Promise<Authorization> {
    const triggerType = options.triggerType ?? TriggerType.MANUAL;
    const now = this.clock();

    const result = await this.storageAdapter.mutateAuthorization(
      { id, tenantId },
      async (current) => {
        await this.stateMachine.assertTransition(
          current.id,
          current.status,
          AuthorizationStatus.REVOKED,
          {
            triggerType,
            reason,
            now,
            expiresAt: current.expiresAt,
            revokedAt: current.revokedAt,
            metadata: options.metadata,
          },
        );

        return {
          changes: {
            status: AuthorizationStatus.REVOKED,
            revokedAt: now,
            revokeReason: reason.trim(),
          },
          audit: {
            eventType: AuditEventType.REVOKED,
            description: `Authorization revoked: ${reason.trim()}`,
            actor: options.actor ?? SYSTEM_ACTOR,
            eventData: {
              ...(options.metadata ?? {}),
              fromStatus: current.status,
              toStatus: AuthorizationStatus.REVOKED,
              trigger: triggerType,
              reason: reason.trim(),
            },
            ip: options.ip ?? null,
            userAgent: options.userAgent ?? null,
            createdAt: now,
          },
        };
      },
    );

    this.logger.log(`Revoked authorization ${id} via ${triggerType}`);
    await this.emit(WebhookEventType.AUTHORIZATION_REVOKED, result.authorization, {
      reason: reason.trim(),
      trigger: triggerType,
    });

    return result.authorization;
  }

  /**
   * Expiry sweep: move live records past expiresAt to EXPIRED.
   * Each row is re-checked under its lock, so a second run is a no-op.
   * An aborted signal stops the sweep before the next row.
   */
  async expireDue(now: Date = this.clock(), signal?: AbortSignal): Promise<number> {
    const candidates = await this.storageAdapter.findExpirableAuthorizations(
      now,
      this.options.expirySweepBatchSize,
    );

    let expired = 0;
    for (const candidate of candidates) {
      if (signal?.aborted) {
        this.logger.warn(`Expiry sweep stopped after ${expired} of ${candidates.length} candidate(s)`);
        break;
      }
      try {
        const result = await this.storageAdapter.mutateAuthorization(
          { id: candidate.id, tenantId: candidate.tenantId },
          async (current) => {
            if (!current.isLive() || !current.isExpiredAt(now) || current.isDeleted()) {
              return null;
            }
            await this.stateMachine.assertTransition(
              current.id,
              current.status,
              AuthorizationStatus.EXPIRED,
              {
                triggerType: TriggerType.EXPIRY_SWEEP,
                expiresAt: current.expiresAt,
                now,
              },
            );
            return {
              changes: { status: AuthorizationStatus.EXPIRED },
              audit: {
                eventType: AuditEventType.EXPIRED,
                description: `Authorization expired at ${current.expiresAt.toISOString()}`,
                actor: SYSTEM_ACTOR,
                eventData: {
                  fromStatus: current.status,
                  toStatus: AuthorizationStatus.EXPIRED,
                  trigger: TriggerType.EXPIRY_SWEEP,
                  expiresAt: current.expiresAt.toISOString(),
                },
                createdAt: now,
              },
            };
          },
        );

        if (result.changed) {
          expired++;
          await this.emit(WebhookEventType.AUTHORIZATION_EXPIRED, result.authorization);
        }
      } catch (error) {
        this.logger.error(
          `Failed to expire authorization ${candidate.id}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }

    if (expired > 0) {
      this.logger.log(`Expiry sweep moved ${expired} authorization(s) to EXPIRED`);
    }
    return expired;
  }

  /**
   * Record a usage notification. Status never changes; the amount is
   * compared with the limit and the result kept in the audit event.
   */
  async recordUsage(
    tenantId: string,
    id: string,
    usage: UsageRecord,
    requestContext: RequestContext = {},
  ): Promise<UsageResult> {
    const authorization = await this.require(tenantId, id);
    const now = this.clock();

    const amount =
      usage.amount === undefined || usage.amount === null ? null : Amount.parse(usage.amount);
    const currency = usage.currency ? parseCurrencyCode(usage.currency) : null;
    const exceedsLimit =
      amount !== null &&
      authorization.amountLimit !== null &&
      amount.isGreaterThan(authorization.amountLimit);

    const eventData: JsonObject = {
      amount: amount ? amount.toString() : null,
      currency,
      transactionId: usage.transactionId ?? null,
      merchantId: usage.merchantId ?? null,
      metadata: usage.metadata ?? {},
      status: authorization.status,
      exceedsLimit,
      source: usage.source ?? 'api',
    };

    const auditEvent = await this.auditRecorder.record({
      authorizationId: authorization.id,
      tenantId: authorization.tenantId,
      eventType: AuditEventType.USED,
      description: amount
        ? `Authorization used for ${amount.toString()}${currency ? ` ${currency}` : ''}`
        : 'Authorization used',
      actor: requestContext.actor ?? SYSTEM_ACTOR,
      eventData,
      ip: requestContext.ip ?? null,
      userAgent: requestContext.userAgent ?? null,
      createdAt: now,
    });

    if (exceedsLimit) {
      this.logger.warn(
        `Usage on authorization ${authorization.id} exceeds its limit of ${authorization.amountLimit?.toString()}`,
      );
    }

    await this.emit(WebhookEventType.AUTHORIZATION_USED, authorization, { usage: eventData });

    return { authorization, auditEvent, exceedsLimit };
  }

  /**
   * Soft delete; deleting an already deleted record returns it unchanged
   */
  async softDelete(
    tenantId: string,
    id: string,
    options: SoftDeleteOptions = {},
  ): Promise<Authorization> {
    const now = this.clock();
    const retentionDays = options.retentionDays;

    const result = await this.storageAdapter.mutateAuthorization(
      { id, tenantId, includeDeleted: true },
      (current): AuthorizationMutation | null => {
        if (current.isDeleted()) {
          return null;
        }
        const effectiveRetention = retentionDays ?? current.retentionDays;
        return {
          changes: { deletedAt: now, retentionDays: effectiveRetention },
          audit: {
            eventType: AuditEventType.SOFT_DELETED,
            description: `Authorization soft-deleted, retained for ${effectiveRetention} day(s)`,
            actor: options.actor ?? SYSTEM_ACTOR,
            eventData: { retentionDays: effectiveRetention, status: current.status },
            ip: options.ip ?? null,
            userAgent: options.userAgent ?? null,
            createdAt: now,
          },
        };
      },
    );

    if (result.changed) {
      await this.emit(WebhookEventType.AUTHORIZATION_DELETED, result.authorization);
    }
    return result.authorization;
  }

  /**
   * Physically remove soft-deleted records past their retention window
   */
  async purgeDeleted(now: Date = this.clock(), signal?: AbortSignal): Promise<number> {
    const candidates = await this.storageAdapter.findPurgeableAuthorizations(
      now,
      this.options.purgeBatchSize,
    );

    let purged = 0;
    for (const candidate of candidates) {
      if (signal?.aborted) {
        this.logger.warn(`Purge stopped after ${purged} of ${candidates.length} candidate(s)`);
        break;
      }
      const audit: MutationAuditEntry = {
        eventType: AuditEventType.PURGED,
        description: `Authorization purged after ${candidate.retentionDays} day(s) of retention`,
        actor: SYSTEM_ACTOR,
        eventData: {
          deletedAt: candidate.deletedAt ? candidate.deletedAt.toISOString() : null,
          retentionDays: candidate.retentionDays,
        },
        createdAt: now,
      };

      try {
        if (
          await this.storageAdapter.purgeAuthorization(
            { id: candidate.id, tenantId: candidate.tenantId, includeDeleted: true },
            audit,
          )
        ) {
          purged++;
        }
      } catch (error) {
        this.logger.error(
          `Failed to purge authorization ${candidate.id}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }

    if (purged > 0) {
      this.logger.log(`Purged ${purged} authorization(s) past retention`);
    }
    return purged;
  }

  /**
   * Re-run trust verification on the stored raw payload
   */
  async reverify(
    tenantId: string,
    id: string,
    requestContext: RequestContext = {},
  ): Promise<Authorization> {
    const stored = await this.require(tenantId, id);
    const draft = this.normalizer.normalize({
      protocol: stored.protocol,
      tenantId: stored.tenantId,
      payload: stored.rawPayload,
      createdBy: stored.createdBy,
    });
    const outcome = await this.verifier.verify(draft);

    const result = await this.storageAdapter.mutateAuthorization(
      { id, tenantId },
      () => ({
        changes: {
          verificationStatus: outcome.status,
          verificationReason: outcome.reason,
          verificationDetails: outcome.details,
          verifiedAt: outcome.verifiedAt,
        },
        audit: this.verificationAudit(outcome, requestContext.actor ?? SYSTEM_ACTOR, requestContext),
      }),
    );
    await this.alertOnFailure(result.authorization, outcome);

    await this.emit(
      outcome.status === VerificationStatus.VERIFIED
        ? WebhookEventType.AUTHORIZATION_VERIFIED
        : WebhookEventType.AUTHORIZATION_VERIFICATION_FAILED,
      result.authorization,
      { reason: outcome.reason },
    );

    return result.authorization;
  }

  /**
   * Chronological audit trail; soft-deleted records stay readable
   */
  async getAuditTrail(tenantId: string, id: string): Promise<AuditEvent[]> {
    const authorization = await this.require(tenantId, id, true);
    return this.auditRecorder.trail(authorization.id);
  }

  private async recordVerification(
    authorization: Authorization,
    outcome: VerificationOutcome,
    actor: string,
    requestContext: RequestContext,
  ): Promise<void> {
    await this.auditRecorder.record({
      authorizationId: authorization.id,
      tenantId: authorization.tenantId,
      ...this.verificationAudit(outcome, actor, requestContext),
    });
  }

  private verificationAudit(
    outcome: VerificationOutcome,
    actor: string,
    requestContext: RequestContext,
  ): MutationAuditEntry {
    const { eventType, label } = VERIFICATION_AUDIT[outcome.status];
    const description = `Credential ${label} (${outcome.reason})`;

    return {
      eventType,
      description,
      actor,
      eventData: {
        status: outcome.status,
        reason: outcome.reason,
        details: outcome.details,
      },
      ip: requestContext.ip ?? null,
      userAgent: requestContext.userAgent ?? null,
      createdAt: outcome.verifiedAt,
    };
  }

  private async alertOnFailure(
    authorization: Authorization,
    outcome: VerificationOutcome,
  ): Promise<void> {
    if (!this.alertService || outcome.status !== VerificationStatus.FAILED) {
      return;
    }
    try {
      await this.alertService.raiseVerificationFailed(authorization, outcome);
    } catch (error) {
      // Authorization already committed
      this.logger.error(
        `Failed to raise verification alert for ${authorization.id}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  private async emit(
    eventType: WebhookEventType,
    authorization: Authorization,
    extra: JsonObject = {},
  ): Promise<void> {
    if (!this.eventDispatcher) {
      return;
    }
    await this.eventDispatcher.dispatch({
      eventId: uuidv4(),
      eventType,
      tenantId: authorization.tenantId,
      authorizationId: authorization.id,
      occurredAt: this.clock(),
      data: { ...authorization.toPlainObject(), ...extra },
    });
  }
}
