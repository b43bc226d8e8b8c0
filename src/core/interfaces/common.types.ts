import {
  Authorization,
  AuthorizationChanges,
  JsonObject,
} from '../domain/models';
import {
  AlertSeverity,
  AlertType,
  AuditEventType,
  AuthorizationStatus,
  Protocol,
  VerificationStatus,
  WebhookEventType,
} from '../domain/enums';
import { Amount } from '../domain/value-objects/amount.vo';

/**
 * Common types used across adapters
 */

/**
 * Pagination parameters
 */
export interface Pagination {
  page: number;
  limit: number;
}

/**
 * Paginated result wrapper
 */
export interface PaginatedResult<T> {
  items: T[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

/**
 * Authorization lookup; every read is tenant-scoped
 */
export interface AuthorizationQuery {
  id: string;
  tenantId: string;
  includeDeleted?: boolean;
}

/**
 * Authorization filter options
 */
export interface AuthorizationFilter {
  tenantId: string;
  protocol?: Protocol;
  status?: AuthorizationStatus;
  verificationStatus?: VerificationStatus;
  issuer?: string;
  subject?: string;
  includeDeleted?: boolean;
}

/**
 * Create authorization DTO
 */
export interface CreateAuthorizationDto {
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
  createdBy: string | null;
}

/**
 * Create audit event DTO
 */
export interface CreateAuditEventDto {
  authorizationId: string;
  tenantId: string;
  eventType: AuditEventType;
  description: string;
  actor: string;
  eventData?: JsonObject;
  ip?: string | null;
  userAgent?: string | null;
  createdAt?: Date;
}

/**
 * Audit entry for a mutation whose authorization id is already known to the store
 */
export type MutationAuditEntry = Omit<CreateAuditEventDto, 'authorizationId' | 'tenantId'>;

/**
 * Outcome of a mutation planner: the changes to write and the audit row to
 * append in the same unit of work
 */
export interface AuthorizationMutation {
  changes: AuthorizationChanges;
  audit?: MutationAuditEntry;
}

/**
 * Decides a mutation from the locked current row.
 * Return null for a no-op; throw to abort without writing anything.
 */
export type AuthorizationMutationPlanner = (
  current: Authorization,
) => AuthorizationMutation | null | Promise<AuthorizationMutation | null>;

export interface AuthorizationMutationResult {
  authorization: Authorization;
  previous: Authorization;
  changed: boolean;
}

/**
 * Create webhook DTO
 */
export interface CreateWebhookDto {
  tenantId: string;
  name: string;
  url: string;
  events: WebhookEventType[];
  secret: string;
  isActive?: boolean;
  maxRetries?: number;
  retryDelaySeconds?: number;
  timeoutSeconds?: number;
}

export type UpdateWebhookDto = Partial<
  Omit<CreateWebhookDto, 'tenantId'>
>;

/**
 * Create webhook delivery DTO
 */
export interface CreateDeliveryDto {
  webhookId: string;
  tenantId: string;
  authorizationId: string | null;
  eventId: string;
  eventType: WebhookEventType;
  payload: JsonObject;
  nextRetryAt: Date;
  claimedUntil?: Date | null;
}

/**
 * Delivery filter options
 */
export interface DeliveryFilter {
  tenantId?: string;
  webhookId?: string;
  authorizationId?: string;
  eventId?: string;
  isDelivered?: boolean;
  failed?: boolean;
}

/**
 * Claim request for an inbound protocol webhook event
 */
export interface ClaimInboundEventDto {
  tenantId: string;
  eventId: string;
  eventType: string;
  tokenId: string | null;
  payload: JsonObject;
  receivedAt?: Date;
  /**
   * How long the claim holds before another delivery of the event may take it over
   */
  leaseMs: number;
}

/**
 * Create alert DTO
 */
export interface CreateAlertDto {
  tenantId: string;
  alertType: AlertType;
  severity: AlertSeverity;
  title: string;
  message: string;
  context?: JsonObject;
}

export interface AlertFilter {
  tenantId: string;
  alertType?: AlertType;
  unresolvedOnly?: boolean;
  unreadOnly?: boolean;
}

export interface AlertChanges {
  isRead?: boolean;
  isResolved?: boolean;
  resolvedAt?: Date | null;
}

/**
 * Request metadata carried into audit events
 */
export interface RequestContext {
  actor?: string;
  ip?: string | null;
  userAgent?: string | null;
}

/**
 * Aggregate counters for health reporting
 */
export interface StorageStatistics {
  authorizations: number;
  authorizationsByStatus: Record<string, number>;
  webhooks: number;
  pendingDeliveries: number;
  failedDeliveries: number;
  auditEvents: number;
  unresolvedAlerts: number;
}
