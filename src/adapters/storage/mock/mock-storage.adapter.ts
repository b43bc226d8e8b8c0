import { v4 as uuidv4 } from 'uuid';
import {
  StorageAdapter,
  Authorization,
  AuditEvent,
  Webhook,
  WebhookDelivery,
  DeliveryAttemptUpdate,
  InboundEvent,
  Alert,
  AuthorizationStatus,
  InboundEventStatus,
  WebhookEventType,
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
  AuthorizationNotFoundError,
  WebhookNotFoundError,
  AlertNotFoundError,
  Clock,
  systemClock,
} from '../../../core';

/**
 * Mock storage adapter for testing
 * Provides in-memory storage with deterministic behavior.
 * Row locks are modelled as a per-id promise chain so concurrent mutations
 * of one authorization run one at a time.
 */
export class MockStorageAdapter implements StorageAdapter {
  private authorizations: Map<string, Authorization> = new Map();
  private auditEvents: AuditEvent[] = [];
  private webhooks: Map<string, Webhook> = new Map();
  private deliveries: Map<string, WebhookDelivery> = new Map();
  private inboundEvents: Map<string, InboundEvent> = new Map();
  private alerts: Map<string, Alert> = new Map();

  // Indexes for efficient lookups
  private inboundEventsByKey: Map<string, string> = new Map();

  // Lock chains keyed by row id
  private locks: Map<string, Promise<void>> = new Map();

  private readonly options: Required<Omit<MockStorageOptions, 'clock'>>;
  private readonly clock: Clock;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      throwOnError: false,
      ...options,
    };
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Simulate network latency if configured, and fail when asked to
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs));
    }
    if (this.options.throwOnError) {
      throw new Error('Mock storage failure');
    }
  }

  /**
   * Run work exclusively for a key, after any earlier work on the same key
   */
  private async withLock<T>(key: string, work: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(work);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) {
        this.locks.delete(key);
      }
    }
  }

  // ==================== Authorization Operations ====================

  async createAuthorization(
    dto: CreateAuthorizationDto,
    auditEntry: MutationAuditEntry,
  ): Promise<Authorization> {
    await this.simulateLatency();

    const now = this.clock();
    const authorization = new Authorization({
      ...dto,
      id: uuidv4(),
      deletedAt: null,
      revokedAt: null,
      revokeReason: null,
      createdAt: now,
      updatedAt: now,
    });

    this.authorizations.set(authorization.id, authorization);
    this.appendAuditEvent({
      ...auditEntry,
      authorizationId: authorization.id,
      tenantId: authorization.tenantId,
    });

    return authorization;
  }

  async findAuthorization(query: AuthorizationQuery): Promise<Authorization | null> {
    await this.simulateLatency();
    return this.lookupAuthorization(query);
  }

  async findAuthorizationByTokenId(
    tenantId: string,
    tokenId: string,
  ): Promise<Authorization | null> {
    await this.simulateLatency();

    for (const authorization of this.authorizations.values()) {
      if (
        authorization.tenantId === tenantId &&
        authorization.tokenId === tokenId &&
        !authorization.isDeleted()
      ) {
        return authorization;
      }
    }
    return null;
  }

  async listAuthorizations(
    filter: AuthorizationFilter,
    pagination: Pagination = { page: 1, limit: 50 },
  ): Promise<PaginatedResult<Authorization>> {
    await this.simulateLatency();

    const matching = Array.from(this.authorizations.values())
      .filter(
        (a) =>
          a.tenantId === filter.tenantId &&
          (filter.includeDeleted || !a.isDeleted()) &&
          (!filter.protocol || a.protocol === filter.protocol) &&
          (!filter.status || a.status === filter.status) &&
          (!filter.verificationStatus || a.verificationStatus === filter.verificationStatus) &&
          (!filter.issuer || a.issuer === filter.issuer) &&
          (!filter.subject || a.subject === filter.subject),
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const start = (pagination.page - 1) * pagination.limit;
    return {
      items: matching.slice(start, start + pagination.limit),
      total: matching.length,
      page: pagination.page,
      limit: pagination.limit,
      totalPages: Math.ceil(matching.length / pagination.limit),
    };
  }

  async mutateAuthorization(
    query: AuthorizationQuery,
    planner: AuthorizationMutationPlanner,
  ): Promise<AuthorizationMutationResult> {
    return this.withLock(`authorization:${query.id}`, async () => {
      await this.simulateLatency();

      const current = this.lookupAuthorization(query);
      if (!current) {
        throw new AuthorizationNotFoundError(`Authorization not found: ${query.id}`, query.id);
      }

      // Nothing is written until the planner has returned
      const mutation = await planner(current);
      if (!mutation) {
        return { authorization: current, previous: current, changed: false };
      }

      const updated = current.withChanges(mutation.changes, this.clock());
      this.authorizations.set(updated.id, updated);
      if (mutation.audit) {
        this.appendAuditEvent({
          ...mutation.audit,
          authorizationId: updated.id,
          tenantId: updated.tenantId,
        });
      }

      return { authorization: updated, previous: current, changed: true };
    });
  }

  async findExpirableAuthorizations(now: Date, limit: number): Promise<Authorization[]> {
    await this.simulateLatency();

    return Array.from(this.authorizations.values())
      .filter((a) => a.isLive() && !a.isDeleted() && a.isExpiredAt(now))
      .sort((a, b) => a.expiresAt.getTime() - b.expiresAt.getTime())
      .slice(0, limit);
  }

  async findPurgeableAuthorizations(now: Date, limit: number): Promise<Authorization[]> {
    await this.simulateLatency();

    return Array.from(this.authorizations.values())
      .filter((a) => {
        const purgeableAt = a.purgeableAt();
        return purgeableAt !== null && purgeableAt.getTime() <= now.getTime();
      })
      .slice(0, limit);
  }

  async purgeAuthorization(
    query: AuthorizationQuery,
    auditEntry: MutationAuditEntry,
  ): Promise<boolean> {
    return this.withLock(`authorization:${query.id}`, async () => {
      await this.simulateLatency();

      const current = this.lookupAuthorization({ ...query, includeDeleted: true });
      if (!current || !current.isDeleted()) {
        return false;
      }

      this.authorizations.delete(current.id);
      this.appendAuditEvent({
        ...auditEntry,
        authorizationId: current.id,
        tenantId: current.tenantId,
      });
      return true;
    });
  }

  // ==================== Audit Operations ====================

  async createAuditEvent(dto: CreateAuditEventDto): Promise<AuditEvent> {
    await this.simulateLatency();
    return this.appendAuditEvent(dto);
  }

  async getAuditEvents(authorizationId: string): Promise<AuditEvent[]> {
    await this.simulateLatency();

    // Array.prototype.sort is stable, so equal timestamps keep insertion order
    return this.auditEvents
      .filter((event) => event.authorizationId === authorizationId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  // ==================== Webhook Operations ====================

  async createWebhook(dto: CreateWebhookDto): Promise<Webhook> {
    await this.simulateLatency();

    const now = this.clock();
    const webhook = new Webhook(
      uuidv4(),
      dto.tenantId,
      dto.name,
      dto.url,
      [...dto.events],
      dto.secret,
      dto.isActive ?? true,
      dto.maxRetries ?? 3,
      dto.retryDelaySeconds ?? 60,
      dto.timeoutSeconds ?? 30,
      now,
      now,
    );
    this.webhooks.set(webhook.id, webhook);
    return webhook;
  }

  async updateWebhook(id: string, tenantId: string, dto: UpdateWebhookDto): Promise<Webhook> {
    await this.simulateLatency();

    const current = this.webhooks.get(id);
    if (!current || current.tenantId !== tenantId) {
      throw new WebhookNotFoundError(`Webhook not found: ${id}`, id);
    }

    const updated = new Webhook(
      current.id,
      current.tenantId,
      dto.name ?? current.name,
      dto.url ?? current.url,
      dto.events ? [...dto.events] : current.events,
      dto.secret ?? current.secret,
      dto.isActive ?? current.isActive,
      dto.maxRetries ?? current.maxRetries,
      dto.retryDelaySeconds ?? current.retryDelaySeconds,
      dto.timeoutSeconds ?? current.timeoutSeconds,
      current.createdAt,
      this.clock(),
    );
    this.webhooks.set(id, updated);
    return updated;
  }

  async findWebhook(id: string, tenantId?: string): Promise<Webhook | null> {
    await this.simulateLatency();

    const webhook = this.webhooks.get(id);
    if (!webhook || (tenantId !== undefined && webhook.tenantId !== tenantId)) {
      return null;
    }
    return webhook;
  }

  async listWebhooks(tenantId: string): Promise<Webhook[]> {
    await this.simulateLatency();
    return Array.from(this.webhooks.values()).filter((w) => w.tenantId === tenantId);
  }

  async findActiveWebhooks(tenantId: string, eventType: WebhookEventType): Promise<Webhook[]> {
    await this.simulateLatency();
    return Array.from(this.webhooks.values()).filter(
      (w) => w.tenantId === tenantId && w.subscribesTo(eventType),
    );
  }

  // ==================== Delivery Operations ====================

  async createDelivery(dto: CreateDeliveryDto): Promise<WebhookDelivery> {
    await this.simulateLatency();

    const now = this.clock();
    const delivery = new WebhookDelivery({
      id: uuidv4(),
      webhookId: dto.webhookId,
      tenantId: dto.tenantId,
      authorizationId: dto.authorizationId,
      eventId: dto.eventId,
      eventType: dto.eventType,
      payload: dto.payload,
      statusCode: null,
      responseBody: null,
      attempts: 0,
      deliveredAt: null,
      failedAt: null,
      nextRetryAt: dto.nextRetryAt,
      isDelivered: false,
      claimedUntil: dto.claimedUntil ?? null,
      createdAt: now,
      updatedAt: now,
    });
    this.deliveries.set(delivery.id, delivery);
    return delivery;
  }

  async listDeliveries(filter: DeliveryFilter): Promise<WebhookDelivery[]> {
    await this.simulateLatency();

    return Array.from(this.deliveries.values()).filter(
      (d) =>
        (!filter.tenantId || d.tenantId === filter.tenantId) &&
        (!filter.webhookId || d.webhookId === filter.webhookId) &&
        (!filter.authorizationId || d.authorizationId === filter.authorizationId) &&
        (!filter.eventId || d.eventId === filter.eventId) &&
        (filter.isDelivered === undefined || d.isDelivered === filter.isDelivered) &&
        (filter.failed === undefined || (d.failedAt !== null) === filter.failed),
    );
  }

  async claimDueDeliveries(now: Date, limit: number, leaseMs: number): Promise<WebhookDelivery[]> {
    await this.simulateLatency();

    // Selection and lease happen without an await in between
    const due = Array.from(this.deliveries.values())
      .filter((d) => d.isDue(now))
      .sort((a, b) => (a.nextRetryAt?.getTime() ?? 0) - (b.nextRetryAt?.getTime() ?? 0))
      .slice(0, limit);

    const claimedUntil = new Date(now.getTime() + leaseMs);
    return due.map((delivery) => {
      const claimed = new WebhookDelivery({ ...delivery.toProps(), claimedUntil });
      this.deliveries.set(claimed.id, claimed);
      return claimed;
    });
  }

  async recordDeliveryAttempt(
    id: string,
    update: DeliveryAttemptUpdate,
    heldClaim: Date | null,
  ): Promise<WebhookDelivery | null> {
    await this.simulateLatency();

    const current = this.deliveries.get(id);
    if (!current) {
      throw new Error(`Delivery not found: ${id}`);
    }
    if (!current.isClaimHeld(heldClaim)) {
      return null;
    }

    const updated = new WebhookDelivery({
      ...current.toProps(),
      ...update,
      claimedUntil: null,
      updatedAt: this.clock(),
    });
    this.deliveries.set(id, updated);
    return updated;
  }

  // ==================== Inbound Event Operations ====================

  async claimInboundEvent(
    dto: ClaimInboundEventDto,
  ): Promise<{ claimed: boolean; event: InboundEvent }> {
    await this.simulateLatency();

    const key = `${dto.tenantId}:${dto.eventId}`;
    const existingId = this.inboundEventsByKey.get(key);
    const existing = existingId ? this.inboundEvents.get(existingId) : undefined;

    const now = dto.receivedAt ?? this.clock();
    if (existing && !existing.isClaimable(now)) {
      return { claimed: false, event: existing };
    }

    const event = new InboundEvent(
      existing?.id ?? uuidv4(),
      dto.tenantId,
      dto.eventId,
      dto.eventType,
      dto.tokenId,
      dto.payload,
      InboundEventStatus.PROCESSING,
      null,
      null,
      now,
      null,
      new Date(now.getTime() + dto.leaseMs),
    );
    this.inboundEvents.set(event.id, event);
    this.inboundEventsByKey.set(key, event.id);
    return { claimed: true, event };
  }

  async completeInboundEvent(
    id: string,
    status: InboundEventStatus.PROCESSED | InboundEventStatus.FAILED,
    details: { authorizationId?: string | null; errorMessage?: string | null },
  ): Promise<InboundEvent> {
    await this.simulateLatency();

    const current = this.inboundEvents.get(id);
    if (!current) {
      throw new Error(`Inbound event not found: ${id}`);
    }

    const updated = new InboundEvent(
      current.id,
      current.tenantId,
      current.eventId,
      current.eventType,
      current.tokenId,
      current.payload,
      status,
      details.authorizationId ?? current.authorizationId,
      details.errorMessage ?? null,
      current.receivedAt,
      this.clock(),
      null,
    );
    this.inboundEvents.set(id, updated);
    return updated;
  }

  async findInboundEvent(tenantId: string, eventId: string): Promise<InboundEvent | null> {
    await this.simulateLatency();

    const id = this.inboundEventsByKey.get(`${tenantId}:${eventId}`);
    return id ? this.inboundEvents.get(id) ?? null : null;
  }

  // ==================== Alert Operations ====================

  async createAlert(dto: CreateAlertDto): Promise<Alert> {
    await this.simulateLatency();

    const alert = new Alert(
      uuidv4(),
      dto.tenantId,
      dto.alertType,
      dto.severity,
      dto.title,
      dto.message,
      dto.context ?? {},
      false,
      false,
      null,
      this.clock(),
    );
    this.alerts.set(alert.id, alert);
    return alert;
  }

  async findAlert(id: string, tenantId: string): Promise<Alert | null> {
    await this.simulateLatency();

    const alert = this.alerts.get(id);
    return alert && alert.tenantId === tenantId ? alert : null;
  }

  async listAlerts(filter: AlertFilter): Promise<Alert[]> {
    await this.simulateLatency();

    return Array.from(this.alerts.values())
      .filter(
        (a) =>
          a.tenantId === filter.tenantId &&
          (!filter.alertType || a.alertType === filter.alertType) &&
          (!filter.unresolvedOnly || !a.isResolved) &&
          (!filter.unreadOnly || !a.isRead),
      )
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async updateAlert(id: string, tenantId: string, changes: AlertChanges): Promise<Alert> {
    await this.simulateLatency();

    const current = this.alerts.get(id);
    if (!current || current.tenantId !== tenantId) {
      throw new AlertNotFoundError(`Alert not found: ${id}`, id);
    }

    const updated = new Alert(
      current.id,
      current.tenantId,
      current.alertType,
      current.severity,
      current.title,
      current.message,
      current.context,
      changes.isRead ?? current.isRead,
      changes.isResolved ?? current.isResolved,
      changes.resolvedAt !== undefined ? changes.resolvedAt : current.resolvedAt,
      current.createdAt,
    );
    this.alerts.set(id, updated);
    return updated;
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    try {
      await this.simulateLatency();
      return true;
    } catch {
      return false;
    }
  }

  async getStatistics(): Promise<StorageStatistics> {
    await this.simulateLatency();

    const authorizationsByStatus: Record<string, number> = {};
    for (const status of Object.values(AuthorizationStatus)) {
      authorizationsByStatus[status] = 0;
    }
    for (const authorization of this.authorizations.values()) {
      authorizationsByStatus[authorization.status] += 1;
    }

    const deliveries = Array.from(this.deliveries.values());
    return {
      authorizations: this.authorizations.size,
      authorizationsByStatus,
      webhooks: this.webhooks.size,
      pendingDeliveries: deliveries.filter((d) => d.isPending()).length,
      failedDeliveries: deliveries.filter((d) => d.failedAt !== null).length,
      auditEvents: this.auditEvents.length,
      unresolvedAlerts: Array.from(this.alerts.values()).filter((a) => !a.isResolved).length,
    };
  }

  // ==================== Testing Utilities ====================

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.authorizations.clear();
    this.auditEvents = [];
    this.webhooks.clear();
    this.deliveries.clear();
    this.inboundEvents.clear();
    this.inboundEventsByKey.clear();
    this.alerts.clear();
    this.locks.clear();
  }

  /**
   * Get all data (for testing)
   */
  getAllData(): {
    authorizations: Authorization[];
    auditEvents: AuditEvent[];
    webhooks: Webhook[];
    deliveries: WebhookDelivery[];
    inboundEvents: InboundEvent[];
    alerts: Alert[];
  } {
    return {
      authorizations: Array.from(this.authorizations.values()),
      auditEvents: [...this.auditEvents],
      webhooks: Array.from(this.webhooks.values()),
      deliveries: Array.from(this.deliveries.values()),
      inboundEvents: Array.from(this.inboundEvents.values()),
      alerts: Array.from(this.alerts.values()),
    };
  }

  private lookupAuthorization(query: AuthorizationQuery): Authorization | null {
    const authorization = this.authorizations.get(query.id);
    if (
      !authorization ||
      authorization.tenantId !== query.tenantId ||
      (authorization.isDeleted() && !query.includeDeleted)
    ) {
      return null;
    }
    return authorization;
  }

  private appendAuditEvent(dto: CreateAuditEventDto): AuditEvent {
    const event = new AuditEvent(
      uuidv4(),
      dto.authorizationId,
      dto.tenantId,
      dto.eventType,
      dto.description,
      dto.actor,
      dto.eventData ?? {},
      dto.ip ?? null,
      dto.userAgent ?? null,
      dto.createdAt ?? this.clock(),
    );
    this.auditEvents.push(event);
    return event;
  }
}

/**
 * Mock storage configuration options
 */
export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;

  /**
   * Every operation rejects; isHealthy reports false
   */
  throwOnError?: boolean;

  clock?: Clock;
}
