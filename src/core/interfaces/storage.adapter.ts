import {
  Alert,
  AuditEvent,
  Authorization,
  InboundEvent,
  Webhook,
  WebhookDelivery,
  DeliveryAttemptUpdate,
} from '../domain/models';
import { InboundEventStatus, WebhookEventType } from '../domain/enums';
import {
  Pagination,
  PaginatedResult,
  AuthorizationQuery,
  AuthorizationFilter,
  AuthorizationMutationPlanner,
  AuthorizationMutationResult,
  CreateAuthorizationDto,
  CreateAuditEventDto,
  MutationAuditEntry,
  CreateWebhookDto,
  UpdateWebhookDto,
  CreateDeliveryDto,
  DeliveryFilter,
  ClaimInboundEventDto,
  CreateAlertDto,
  AlertFilter,
  AlertChanges,
  StorageStatistics,
} from './common.types';

/**
 * Storage adapter interface - abstracts all database operations
 * Implementations must ensure ACID properties where specified
 */
export interface StorageAdapter {
  // ==================== Authorization Operations ====================

  /**
   * Insert an authorization together with its creation audit event
   * MUST be atomic - both succeed or both fail
   */
  createAuthorization(
    dto: CreateAuthorizationDto,
    auditEntry: MutationAuditEntry,
  ): Promise<Authorization>;

  /**
   * Find a single authorization within a tenant.
   * Soft-deleted rows are returned only with includeDeleted.
   */
  findAuthorization(query: AuthorizationQuery): Promise<Authorization | null>;

  /**
   * Find a live-or-not, non-deleted authorization by its protocol token id
   */
  findAuthorizationByTokenId(
    tenantId: string,
    tokenId: string,
  ): Promise<Authorization | null>;

  listAuthorizations(
    filter: AuthorizationFilter,
    pagination?: Pagination,
  ): Promise<PaginatedResult<Authorization>>;

  /**
   * Lock the row exclusively, let the planner decide, then write the changes
   * and the audit entry in one unit of work.
   * MUST serialize concurrent mutations of the same id.
   * Throws AuthorizationNotFoundError when the row does not exist.
   */
  mutateAuthorization(
    query: AuthorizationQuery,
    planner: AuthorizationMutationPlanner,
  ): Promise<AuthorizationMutationResult>;

  /**
   * Live, non-deleted authorizations across all tenants with expiresAt <= now
   */
  findExpirableAuthorizations(now: Date, limit: number): Promise<Authorization[]>;

  /**
   * Soft-deleted authorizations whose retention window has passed
   */
  findPurgeableAuthorizations(now: Date, limit: number): Promise<Authorization[]>;

  /**
   * Physically remove a soft-deleted authorization and append the purge audit
   * event. Returns false if the row was already gone or is no longer deleted.
   */
  purgeAuthorization(
    query: AuthorizationQuery,
    auditEntry: MutationAuditEntry,
  ): Promise<boolean>;

  // ==================== Audit Operations ====================

  /**
   * Append an audit event (never updated or deleted)
   */
  createAuditEvent(dto: CreateAuditEventDto): Promise<AuditEvent>;

  /**
   * Audit trail for an authorization in chronological order
   */
  getAuditEvents(authorizationId: string): Promise<AuditEvent[]>;

  // ==================== Webhook Operations ====================

  createWebhook(dto: CreateWebhookDto): Promise<Webhook>;

  updateWebhook(
    id: string,
    tenantId: string,
    dto: UpdateWebhookDto,
  ): Promise<Webhook>;

  /**
   * Find a webhook; without tenantId the lookup is unscoped (retry scheduler)
   */
  findWebhook(id: string, tenantId?: string): Promise<Webhook | null>;

  listWebhooks(tenantId: string): Promise<Webhook[]>;

  /**
   * Active webhooks of a tenant subscribed to the event type
   */
  findActiveWebhooks(
    tenantId: string,
    eventType: WebhookEventType,
  ): Promise<Webhook[]>;

  // ==================== Delivery Operations ====================

  createDelivery(dto: CreateDeliveryDto): Promise<WebhookDelivery>;

  listDeliveries(filter: DeliveryFilter): Promise<WebhookDelivery[]>;

  /**
   * Exclusively claim due deliveries by setting a lease on claimedUntil.
   * A delivery returned here is not returned to any other caller until the
   * lease expires or the attempt is recorded.
   */
  claimDueDeliveries(
    now: Date,
    limit: number,
    leaseMs: number,
  ): Promise<WebhookDelivery[]>;

  /**
   * Record the outcome of an attempt and release the claim. heldClaim is the
   * claimedUntil the caller was handed; when another worker has since taken
   * the delivery nothing is written and null is returned.
   */
  recordDeliveryAttempt(
    id: string,
    update: DeliveryAttemptUpdate,
    heldClaim: Date | null,
  ): Promise<WebhookDelivery | null>;

  // ==================== Inbound Event Operations ====================

  /**
   * Insert-if-absent on (tenantId, eventId). A FAILED record is re-claimed.
   * claimed=false means another call owns or already finished the event.
   */
  claimInboundEvent(
    dto: ClaimInboundEventDto,
  ): Promise<{ claimed: boolean; event: InboundEvent }>;

  completeInboundEvent(
    id: string,
    status: InboundEventStatus.PROCESSED | InboundEventStatus.FAILED,
    details: { authorizationId?: string | null; errorMessage?: string | null },
  ): Promise<InboundEvent>;

  findInboundEvent(tenantId: string, eventId: string): Promise<InboundEvent | null>;

  // ==================== Alert Operations ====================

  createAlert(dto: CreateAlertDto): Promise<Alert>;

  findAlert(id: string, tenantId: string): Promise<Alert | null>;

  listAlerts(filter: AlertFilter): Promise<Alert[]>;

  updateAlert(id: string, tenantId: string, changes: AlertChanges): Promise<Alert>;

  // ==================== Health ====================

  isHealthy(): Promise<boolean>;

  getStatistics(): Promise<StorageStatistics>;

  // ==================== Lifecycle ====================

  /**
   * Release connections; called once at application shutdown
   */
  close?(): Promise<void>;
}
