import { AuditEventType, Protocol } from '../domain/enums';
import { AuditEvent, Authorization, JsonObject, WebhookDelivery } from '../domain/models';
import { RequestContext, StorageAdapter } from '../interfaces';
import { Clock, systemClock } from '../utils';
import { AuditRecorder } from './audit-recorder';
import { AuthorizationNotFoundError } from './errors';

/**
 * Everything needed to reconstruct what was authorized, how it was checked,
 * what happened to it and who was told
 */
export interface EvidenceBundle {
  authorization: JsonObject;
  rawPayload: JsonObject;
  verification: JsonObject;
  auditTrail: JsonObject[];
  deliveries: JsonObject[];
  generatedAt: string;
  /**
   * File name to contents, ready to be archived
   */
  files: Record<string, string>;
}

const RULE = '='.repeat(80);
const DIVIDER = '-'.repeat(80);

export class EvidenceService {
  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly auditRecorder: AuditRecorder,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Build the bundle for an authorization (soft-deleted ones included while
   * retained) and record that it was exported
   */
  async export(
    tenantId: string,
    id: string,
    requestContext: RequestContext = {},
  ): Promise<EvidenceBundle> {
    const authorization = await this.storageAdapter.findAuthorization({
      id,
      tenantId,
      includeDeleted: true,
    });
    if (!authorization) {
      throw new AuthorizationNotFoundError(`Authorization not found: ${id}`, id);
    }

    const [auditTrail, deliveries] = await Promise.all([
      this.auditRecorder.trail(authorization.id),
      this.storageAdapter.listDeliveries({ tenantId, authorizationId: authorization.id }),
    ]);
    const generatedAt = this.clock();
    const verification = verificationSection(authorization);

    const bundle: EvidenceBundle = {
      authorization: authorization.toPlainObject(),
      rawPayload: authorization.rawPayload,
      verification,
      auditTrail: auditTrail.map((event) => event.toPlainObject()),
      deliveries: deliveries.map((delivery) => delivery.toPlainObject()),
      generatedAt: generatedAt.toISOString(),
      files: buildFiles(authorization, verification, auditTrail, deliveries, generatedAt),
    };

    await this.auditRecorder.record({
      authorizationId: authorization.id,
      tenantId: authorization.tenantId,
      eventType: AuditEventType.EVIDENCE_EXPORTED,
      description: 'Evidence bundle exported',
      actor: requestContext.actor ?? 'system',
      eventData: {
        files: Object.keys(bundle.files),
        auditEvents: auditTrail.length,
        deliveries: deliveries.length,
      },
      ip: requestContext.ip ?? null,
      userAgent: requestContext.userAgent ?? null,
      createdAt: generatedAt,
    });

    return bundle;
  }
}

function verificationSection(authorization: Authorization): JsonObject {
  return {
    verification_status: authorization.verificationStatus,
    verification_reason: authorization.verificationReason,
    verification_details: authorization.verificationDetails,
    verified_at: authorization.verifiedAt ? authorization.verifiedAt.toISOString() : null,
    current_status: authorization.status,
    revoked_at: authorization.revokedAt ? authorization.revokedAt.toISOString() : null,
    revoke_reason: authorization.revokeReason,
  };
}

function buildFiles(
  authorization: Authorization,
  verification: JsonObject,
  auditTrail: AuditEvent[],
  deliveries: WebhookDelivery[],
  generatedAt: Date,
): Record<string, string> {
  const files: Record<string, string> = {};

  switch (authorization.protocol) {
    case Protocol.AP2: {
      const jwt = authorization.rawPayload['vc_jwt'];
      files['vc_jwt.txt'] = typeof jwt === 'string' ? jwt : '';
      files['credential.json'] = pretty({
        vc_jwt: typeof jwt === 'string' ? jwt : null,
        issuer_did: authorization.issuer,
        subject_did: authorization.subject,
        scope: authorization.scope,
        amount_limit: authorization.amountLimit ? authorization.amountLimit.toString() : null,
        currency: authorization.currency,
        expires_at: authorization.expiresAt.toISOString(),
      });
      break;
    }
    case Protocol.ACP:
      files['token.json'] = pretty({
        token_id: authorization.tokenId,
        psp_id: authorization.issuer,
        merchant_id: authorization.subject,
        max_amount: authorization.amountLimit ? authorization.amountLimit.toString() : null,
        currency: authorization.currency,
        expires_at: authorization.expiresAt.toISOString(),
        constraints: authorization.scope,
        raw_payload: authorization.rawPayload,
      });
      break;
  }

  files['verification.json'] = pretty(verification);
  files['audit.json'] = pretty({
    authorization_id: authorization.id,
    protocol: authorization.protocol,
    token_id: authorization.tokenId,
    total_events: auditTrail.length,
    events: auditTrail.map((event) => event.toPlainObject()),
  });
  files['deliveries.json'] = pretty({
    authorization_id: authorization.id,
    total_deliveries: deliveries.length,
    deliveries: deliveries.map((delivery) => delivery.toPlainObject()),
  });
  files['summary.txt'] = summary(authorization, auditTrail, deliveries, generatedAt);

  return files;
}

function summary(
  authorization: Authorization,
  auditTrail: AuditEvent[],
  deliveries: WebhookDelivery[],
  generatedAt: Date,
): string {
  const isAp2 = authorization.protocol === Protocol.AP2;
  const lines = [
    RULE,
    `AUTHORIZATION EVIDENCE PACK - ${isAp2 ? 'AP2 (JWT-VC)' : 'ACP (DELEGATED TOKEN)'}`,
    RULE,
    '',
    'AUTHORIZATION DETAILS',
    DIVIDER,
    `Authorization ID:  ${authorization.id}`,
    `Protocol:          ${authorization.protocol}`,
    ...(isAp2
      ? [
          `Issuer DID:        ${authorization.issuer}`,
          `Subject DID:       ${authorization.subject}`,
        ]
      : [
          `Token ID:          ${authorization.tokenId ?? 'N/A'}`,
          `PSP ID:            ${authorization.issuer}`,
          `Merchant ID:       ${authorization.subject}`,
        ]),
    `Amount Limit:      ${authorization.amountLimit ? authorization.amountLimit.toString() : 'N/A'}`,
    `Currency:          ${authorization.currency ?? 'N/A'}`,
    `Expires At:        ${formatTimestamp(authorization.expiresAt)}`,
    `Current Status:    ${authorization.status}`,
    '',
    'VERIFICATION INFORMATION',
    DIVIDER,
    `Verification Status:  ${authorization.verificationStatus}`,
    `Verification Reason:  ${authorization.verificationReason ?? 'N/A'}`,
    `Verified At:          ${formatTimestamp(authorization.verifiedAt)}`,
    '',
  ];

  if (authorization.revokedAt) {
    lines.push(
      'REVOCATION INFORMATION',
      DIVIDER,
      `Revoked At:  ${formatTimestamp(authorization.revokedAt)}`,
      `Reason:      ${authorization.revokeReason ?? 'N/A'}`,
      '',
    );
  }

  lines.push('AUDIT TRAIL', DIVIDER, `Total Events:  ${auditTrail.length}`, '');
  auditTrail.forEach((event, index) => {
    lines.push(`${index + 1}. [${formatTimestamp(event.createdAt)}] ${event.eventType}`);
  });

  lines.push(
    '',
    'WEBHOOK DELIVERIES',
    DIVIDER,
    `Total Deliveries:  ${deliveries.length}`,
    `Delivered:         ${deliveries.filter((d) => d.isDelivered).length}`,
    `Failed:            ${deliveries.filter((d) => d.failedAt !== null).length}`,
    '',
    RULE,
    `Evidence pack generated: ${formatTimestamp(generatedAt)}`,
    RULE,
  );

  return lines.join('\n');
}

function formatTimestamp(value: Date | null): string {
  if (!value) {
    return 'N/A';
  }
  return `${value.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}
