import {
  DataSource,
  Repository,
  EntityManager,
  FindOptionsWhere,
  SelectQueryBuilder,
  In,
  IsNull,
  QueryFailedError,
} from 'typeorm';
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
  Amount,
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
import {
  AuthorizationEntity,
  AuditEventEntity,
  WebhookEntity,
  WebhookDeliveryEntity,
  InboundEventEntity,
  AlertEntity,
} from './entities';

const UNIQUE_VIOLATION = '23505';

/**
 * TypeORM implementation of StorageAdapter
 * Mutations lock the authorization row with SELECT ... FOR UPDATE and write
 * the change and its audit event in the same transaction.
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  private authorizationRepo: Repository<AuthorizationEntity>;
  private auditEventRepo: Repository<AuditEventEntity>;
  private webhookRepo: Repository<WebhookEntity>;
  private deliveryRepo: Repository<WebhookDeliveryEntity>;
  private inboundEventRepo: Repository<InboundEventEntity>;
  private alertRepo: Repository<AlertEntity>;

  constructor(
    private readonly dataSource: DataSource,
    private readonly clock: Clock = systemClock,
  ) {
    this.authorizationRepo = dataSource.getRepository(AuthorizationEntity);
    this.auditEventRepo = dataSource.getRepository(AuditEventEntity);
    this.webhookRepo = dataSource.getRepository(WebhookEntity);
    this.deliveryRepo = dataSource.getRepository(WebhookDeliveryEntity);
    this.inboundEventRepo = dataSource.getRepository(InboundEventEntity);
    this.alertRepo = dataSource.getRepository(AlertEntity);
  }

  // ==================== Authorization Operations ====================

  async createAuthorization(
    dto: CreateAuthorizationDto,
    auditEntry: MutationAuditEntry,
  ): Promise<Authorization> {
    return await this.withTransaction(async (manager) => {
      const now = this.clock();
      const entity = manager.create(AuthorizationEntity, {
        ...dto,
        amountLimit: dto.amountLimit ? dto.amountLimit.toString() : null,
        deletedAt: null,
        revokedAt: null,
        revokeReason: null,
        createdAt: now,
        updatedAt: now,
      });
      const saved = await manager.save(entity);

      await manager.save(
        this.createAuditEntity(manager, {
          ...auditEntry,
          authorizationId: saved.id,
          tenantId: saved.tenantId,
        }),
      );

      return this.mapAuthorizationEntityToDomain(saved);
    });
  }

  async findAuthorization(query: AuthorizationQuery): Promise<Authorization | null> {
    const entity = await this.authorizationRepo.findOne({
      where: this.authorizationWhere(query),
    });
    return entity ? this.mapAuthorizationEntityToDomain(entity) : null;
  }

  async findAuthorizationByTokenId(
    tenantId: string,
    tokenId: string,
  ): Promise<Authorization | null> {
    const entity = await this.authorizationRepo.findOne({
      where: { tenantId, tokenId, deletedAt: IsNull() },
      order: { createdAt: 'DESC' },
    });
    return entity ? this.mapAuthorizationEntityToDomain(entity) : null;
  }

  async listAuthorizations(
    filter: AuthorizationFilter,
    pagination: Pagination = { page: 1, limit: 50 },
  ): Promise<PaginatedResult<Authorization>> {
    const qb = this.authorizationRepo.createQueryBuilder('a');

    this.applyAuthorizationFilter(qb, filter);

    qb.orderBy('a.created_at', 'DESC')
      .skip((pagination.page - 1) * pagination.limit)
      .take(pagination.limit);

    const [entities, total] = await qb.getManyAndCount();

    return {
      items: entities.map((e) => this.mapAuthorizationEntityToDomain(e)),
      total,
      page: pagination.page,
      limit: pagination.limit,
      totalPages: Math.ceil(total / pagination.limit),
    };
  }

  async mutateAuthorization(
    query: AuthorizationQuery,
    planner: AuthorizationMutationPlanner,
  ): Promise<AuthorizationMutationResult> {
    return await this.withTransaction(async (manager) => {
      const entity = await manager.findOne(AuthorizationEntity, {
        where: this.authorizationWhere(query),
        lock: { mode: 'pessimistic_write' },
      });

      if (!entity) {
        throw new AuthorizationNotFoundError(`Authorization not found: ${query.id}`, query.id);
      }

      const current = this.mapAuthorizationEntityToDomain(entity);
      const mutation = await planner(current);
      if (!mutation) {
        return { authorization: current, previous: current, changed: false };
      }

      Object.assign(entity, mutation.changes, { updatedAt: this.clock() });
      const updated = await manager.save(entity);

      if (mutation.audit) {
        await manager.save(
          this.createAuditEntity(manager, {
            ...mutation.audit,
            authorizationId: updated.id,
            tenantId: updated.tenantId,
          }),
        );
      }

      return {
        authorization: this.mapAuthorizationEntityToDomain(updated),
        previous: current,
        changed: true,
      };
    });
  }

  async findExpirableAuthorizations(now: Date, limit: number): Promise<Authorization[]> {
    const entities = await this.authorizationRepo
      .createQueryBuilder('a')
      .where('a.status IN (:...statuses)', {
        statuses: [AuthorizationStatus.VALID, AuthorizationStatus.ACTIVE],
      })
      .andWhere('a.deleted_at IS NULL')
      .andWhere('a.expires_at <= :now', { now })
      .orderBy('a.expires_at', 'ASC')
      .limit(limit)
      .getMany();

    return entities.map((e) => this.mapAuthorizationEntityToDomain(e));
  }

  async findPurgeableAuthorizations(now: Date, limit: number): Promise<Authorization[]> {
    const entities = await this.authorizationRepo
      .createQueryBuilder('a')
      .where('a.deleted_at IS NOT NULL')
      .andWhere("a.deleted_at + (a.retention_days * INTERVAL '1 day') <= :now", { now })
      .orderBy('a.deleted_at', 'ASC')
      .limit(limit)
      .getMany();

    return entities.map((e) => this.mapAuthorizationEntityToDomain(e));
  }

  async purgeAuthorization(
    query: AuthorizationQuery,
    auditEntry: MutationAuditEntry,
  ): Promise<boolean> {
    return await this.withTransaction(async (manager) => {
      const entity = await manager.findOne(AuthorizationEntity, {
        where: { id: query.id, tenantId: query.tenantId },
        lock: { mode: 'pessimistic_write' },
      });

      if (!entity || entity.deletedAt === null) {
        return false;
      }

      await manager.delete(AuthorizationEntity, { id: entity.id });
      await manager.save(
        this.createAuditEntity(manager, {
          ...auditEntry,
          authorizationId: entity.id,
          tenantId: entity.tenantId,
        }),
      );
      return true;
    });
  }

  // ==================== Audit Operations ====================

  async createAuditEvent(dto: CreateAuditEventDto): Promise<AuditEvent> {
    const saved = await this.auditEventRepo.save(this.createAuditEntity(this.dataSource.manager, dto));
    return this.mapAuditEventEntityToDomain(saved);
  }

  async getAuditEvents(authorizationId: string): Promise<AuditEvent[]> {
    const entities = await this.auditEventRepo.find({
      where: { authorizationId },
      order: { createdAt: 'ASC' },
    });
    return entities.map((e) => this.mapAuditEventEntityToDomain(e));
  }

  // ==================== Webhook Operations ====================

  async createWebhook(dto: CreateWebhookDto): Promise<Webhook> {
    const entity = this.webhookRepo.create({
      ...dto,
      events: [...dto.events],
      isActive: dto.isActive ?? true,
    });
    const saved = await this.webhookRepo.save(entity);
    return this.mapWebhookEntityToDomain(saved);
  }

  async updateWebhook(id: string, tenantId: string, dto: UpdateWebhookDto): Promise<Webhook> {
    const entity = await this.webhookRepo.findOne({ where: { id, tenantId } });
    if (!entity) {
      throw new WebhookNotFoundError(`Webhook not found: ${id}`, id);
    }

    Object.assign(entity, dto);
    const saved = await this.webhookRepo.save(entity);
    return this.mapWebhookEntityToDomain(saved);
  }

  async findWebhook(id: string, tenantId?: string): Promise<Webhook | null> {
    const entity = await this.webhookRepo.findOne({
      where: tenantId === undefined ? { id } : { id, tenantId },
    });
    return entity ? this.mapWebhookEntityToDomain(entity) : null;
  }

  async listWebhooks(tenantId: string): Promise<Webhook[]> {
    const entities = await this.webhookRepo.find({
      where: { tenantId },
      order: { createdAt: 'ASC' },
    });
    return entities.map((e) => this.mapWebhookEntityToDomain(e));
  }

  async findActiveWebhooks(tenantId: string, eventType: WebhookEventType): Promise<Webhook[]> {
    const entities = await this.webhookRepo
      .createQueryBuilder('w')
      .where('w.tenant_id = :tenantId', { tenantId })
      .andWhere('w.is_active = true')
      .andWhere('w.events @> CAST(:events AS jsonb)', { events: JSON.stringify([eventType]) })
      .orderBy('w.created_at', 'ASC')
      .getMany();

    return entities.map((e) => this.mapWebhookEntityToDomain(e));
  }

  // ==================== Delivery Operations ====================

  async createDelivery(dto: CreateDeliveryDto): Promise<WebhookDelivery> {
    const entity = this.deliveryRepo.create({
      ...dto,
      claimedUntil: dto.claimedUntil ?? null,
      attempts: 0,
      isDelivered: false,
      statusCode: null,
      responseBody: null,
      deliveredAt: null,
      failedAt: null,
    });
    const saved = await this.deliveryRepo.save(entity);
    return this.mapDeliveryEntityToDomain(saved);
  }

  async listDeliveries(filter: DeliveryFilter): Promise<WebhookDelivery[]> {
    const qb = this.deliveryRepo.createQueryBuilder('d');

    if (filter.tenantId) {
      qb.andWhere('d.tenant_id = :tenantId', { tenantId: filter.tenantId });
    }
    if (filter.webhookId) {
      qb.andWhere('d.webhook_id = :webhookId', { webhookId: filter.webhookId });
    }
    if (filter.authorizationId) {
      qb.andWhere('d.authorization_id = :authorizationId', {
        authorizationId: filter.authorizationId,
      });
    }
    if (filter.eventId) {
      qb.andWhere('d.event_id = :eventId', { eventId: filter.eventId });
    }
    if (filter.isDelivered !== undefined) {
      qb.andWhere('d.is_delivered = :isDelivered', { isDelivered: filter.isDelivered });
    }
    if (filter.failed !== undefined) {
      qb.andWhere(filter.failed ? 'd.failed_at IS NOT NULL' : 'd.failed_at IS NULL');
    }

    qb.orderBy('d.created_at', 'ASC');

    const entities = await qb.getMany();
    return entities.map((e) => this.mapDeliveryEntityToDomain(e));
  }

  async claimDueDeliveries(now: Date, limit: number, leaseMs: number): Promise<WebhookDelivery[]> {
    return await this.withTransaction(async (manager) => {
      // SKIP LOCKED lets several schedulers claim disjoint batches
      const due = await manager
        .createQueryBuilder(WebhookDeliveryEntity, 'd')
        .where('d.is_delivered = false')
        .andWhere('d.failed_at IS NULL')
        .andWhere('d.next_retry_at <= :now', { now })
        .andWhere('(d.claimed_until IS NULL OR d.claimed_until <= :now)', { now })
        .orderBy('d.next_retry_at', 'ASC')
        .limit(limit)
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked')
        .getMany();

      if (due.length === 0) {
        return [];
      }

      const claimedUntil = new Date(now.getTime() + leaseMs);
      await manager.update(
        WebhookDeliveryEntity,
        { id: In(due.map((d) => d.id)) },
        { claimedUntil },
      );

      return due.map((entity) => this.mapDeliveryEntityToDomain({ ...entity, claimedUntil }));
    });
  }

  async recordDeliveryAttempt(
    id: string,
    update: DeliveryAttemptUpdate,
    heldClaim: Date | null,
  ): Promise<WebhookDelivery | null> {
    return await this.withTransaction(async (manager) => {
      const entity = await manager.findOne(WebhookDeliveryEntity, {
        where: { id },
        lock: { mode: 'pessimistic_write' },
      });
      if (!entity) {
        throw new Error(`Delivery not found: ${id}`);
      }
      if (!this.mapDeliveryEntityToDomain(entity).isClaimHeld(heldClaim)) {
        return null;
      }

      Object.assign(entity, update, { claimedUntil: null });
      const saved = await manager.save(entity);
      return this.mapDeliveryEntityToDomain(saved);
    });
  }

  // ==================== Inbound Event Operations ====================

  async claimInboundEvent(
    dto: ClaimInboundEventDto,
  ): Promise<{ claimed: boolean; event: InboundEvent }> {
    try {
      return await this.withTransaction(async (manager) => {
        const existing = await manager.findOne(InboundEventEntity, {
          where: { tenantId: dto.tenantId, eventId: dto.eventId },
          lock: { mode: 'pessimistic_write' },
        });

        const now = dto.receivedAt ?? this.clock();
        const current = existing ? this.mapInboundEventEntityToDomain(existing) : null;
        if (current && !current.isClaimable(now)) {
          return { claimed: false, event: current };
        }

        const entity = existing ?? manager.create(InboundEventEntity, { tenantId: dto.tenantId });
        Object.assign(entity, {
          eventId: dto.eventId,
          eventType: dto.eventType,
          tokenId: dto.tokenId,
          payload: dto.payload,
          status: InboundEventStatus.PROCESSING,
          authorizationId: null,
          errorMessage: null,
          receivedAt: now,
          processedAt: null,
          claimedUntil: new Date(now.getTime() + dto.leaseMs),
        });
        const saved = await manager.save(entity);
        return { claimed: true, event: this.mapInboundEventEntityToDomain(saved) };
      });
    } catch (error) {
      // A concurrent insert of the same (tenant, event) won the unique index
      if (!this.isUniqueViolation(error)) {
        throw error;
      }
      const winner = await this.inboundEventRepo.findOne({
        where: { tenantId: dto.tenantId, eventId: dto.eventId },
      });
      if (!winner) {
        throw error;
      }
      return { claimed: false, event: this.mapInboundEventEntityToDomain(winner) };
    }
  }

  async completeInboundEvent(
    id: string,
    status: InboundEventStatus.PROCESSED | InboundEventStatus.FAILED,
    details: { authorizationId?: string | null; errorMessage?: string | null },
  ): Promise<InboundEvent> {
    const entity = await this.inboundEventRepo.findOne({ where: { id } });
    if (!entity) {
      throw new Error(`Inbound event not found: ${id}`);
    }

    entity.status = status;
    entity.authorizationId = details.authorizationId ?? entity.authorizationId;
    entity.errorMessage = details.errorMessage ?? null;
    entity.processedAt = this.clock();
    entity.claimedUntil = null;

    const saved = await this.inboundEventRepo.save(entity);
    return this.mapInboundEventEntityToDomain(saved);
  }

  async findInboundEvent(tenantId: string, eventId: string): Promise<InboundEvent | null> {
    const entity = await this.inboundEventRepo.findOne({ where: { tenantId, eventId } });
    return entity ? this.mapInboundEventEntityToDomain(entity) : null;
  }

  // ==================== Alert Operations ====================

  async createAlert(dto: CreateAlertDto): Promise<Alert> {
    const entity = this.alertRepo.create({
      ...dto,
      context: dto.context ?? {},
      isRead: false,
      isResolved: false,
      resolvedAt: null,
    });
    const saved = await this.alertRepo.save(entity);
    return this.mapAlertEntityToDomain(saved);
  }

  async findAlert(id: string, tenantId: string): Promise<Alert | null> {
    const entity = await this.alertRepo.findOne({ where: { id, tenantId } });
    return entity ? this.mapAlertEntityToDomain(entity) : null;
  }

  async listAlerts(filter: AlertFilter): Promise<Alert[]> {
    const qb = this.alertRepo
      .createQueryBuilder('al')
      .where('al.tenant_id = :tenantId', { tenantId: filter.tenantId });

    if (filter.alertType) {
      qb.andWhere('al.alert_type = :alertType', { alertType: filter.alertType });
    }
    if (filter.unresolvedOnly) {
      qb.andWhere('al.is_resolved = false');
    }
    if (filter.unreadOnly) {
      qb.andWhere('al.is_read = false');
    }

    qb.orderBy('al.created_at', 'DESC');

    const entities = await qb.getMany();
    return entities.map((e) => this.mapAlertEntityToDomain(e));
  }

  async updateAlert(id: string, tenantId: string, changes: AlertChanges): Promise<Alert> {
    const entity = await this.alertRepo.findOne({ where: { id, tenantId } });
    if (!entity) {
      throw new AlertNotFoundError(`Alert not found: ${id}`, id);
    }

    Object.assign(entity, changes);
    const saved = await this.alertRepo.save(entity);
    return this.mapAlertEntityToDomain(saved);
  }

  // ==================== Transactions ====================

  async withTransaction<T>(callback: (manager: EntityManager) => Promise<T>): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  // ==================== Health ====================

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async getStatistics(): Promise<StorageStatistics> {
    const [
      authorizations,
      statusRows,
      webhooks,
      pendingDeliveries,
      failedDeliveries,
      auditEvents,
      unresolvedAlerts,
    ] = await Promise.all([
      this.authorizationRepo.count(),
      this.authorizationRepo
        .createQueryBuilder('a')
        .select('a.status', 'status')
        .addSelect('COUNT(*)', 'count')
        .groupBy('a.status')
        .getRawMany<{ status: string; count: string }>(),
      this.webhookRepo.count(),
      this.deliveryRepo.count({ where: { isDelivered: false, failedAt: IsNull() } }),
      this.deliveryRepo
        .createQueryBuilder('d')
        .where('d.failed_at IS NOT NULL')
        .getCount(),
      this.auditEventRepo.count(),
      this.alertRepo.count({ where: { isResolved: false } }),
    ]);

    const authorizationsByStatus: Record<string, number> = {};
    for (const status of Object.values(AuthorizationStatus)) {
      authorizationsByStatus[status] = 0;
    }
    for (const row of statusRows) {
      authorizationsByStatus[row.status] = parseInt(row.count, 10);
    }

    return {
      authorizations,
      authorizationsByStatus,
      webhooks,
      pendingDeliveries,
      failedDeliveries,
      auditEvents,
      unresolvedAlerts,
    };
  }

  // ==================== Lifecycle ====================

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  /**
   * Private Helper Methods
   */

  private authorizationWhere(query: AuthorizationQuery): FindOptionsWhere<AuthorizationEntity> {
    return query.includeDeleted
      ? { id: query.id, tenantId: query.tenantId }
      : { id: query.id, tenantId: query.tenantId, deletedAt: IsNull() };
  }

  private applyAuthorizationFilter(
    qb: SelectQueryBuilder<AuthorizationEntity>,
    filter: AuthorizationFilter,
  ): void {
    qb.where('a.tenant_id = :tenantId', { tenantId: filter.tenantId });

    if (!filter.includeDeleted) {
      qb.andWhere('a.deleted_at IS NULL');
    }
    if (filter.protocol) {
      qb.andWhere('a.protocol = :protocol', { protocol: filter.protocol });
    }
    if (filter.status) {
      qb.andWhere('a.status = :status', { status: filter.status });
    }
    if (filter.verificationStatus) {
      qb.andWhere('a.verification_status = :verificationStatus', {
        verificationStatus: filter.verificationStatus,
      });
    }
    if (filter.issuer) {
      qb.andWhere('a.issuer = :issuer', { issuer: filter.issuer });
    }
    if (filter.subject) {
      qb.andWhere('a.subject = :subject', { subject: filter.subject });
    }
  }

  private createAuditEntity(manager: EntityManager, dto: CreateAuditEventDto): AuditEventEntity {
    return manager.create(AuditEventEntity, {
      authorizationId: dto.authorizationId,
      tenantId: dto.tenantId,
      eventType: dto.eventType,
      description: dto.description,
      actor: dto.actor,
      eventData: dto.eventData ?? {},
      ip: dto.ip ?? null,
      userAgent: dto.userAgent ?? null,
      createdAt: dto.createdAt ?? this.clock(),
    });
  }

  private isUniqueViolation(error: unknown): boolean {
    return (
      error instanceof QueryFailedError &&
      'code' in error.driverError &&
      error.driverError.code === UNIQUE_VIOLATION
    );
  }

  /**
   * Private Mapping Methods
   */

  private mapAuthorizationEntityToDomain(entity: AuthorizationEntity): Authorization {
    return new Authorization({
      id: entity.id,
      tenantId: entity.tenantId,
      protocol: entity.protocol,
      issuer: entity.issuer,
      subject: entity.subject,
      scope: entity.scope,
      amountLimit: entity.amountLimit !== null ? Amount.parse(entity.amountLimit) : null,
      currency: entity.currency,
      expiresAt: entity.expiresAt,
      status: entity.status,
      rawPayload: entity.rawPayload,
      tokenId: entity.tokenId,
      verificationStatus: entity.verificationStatus,
      verificationReason: entity.verificationReason,
      verificationDetails: entity.verificationDetails,
      verifiedAt: entity.verifiedAt,
      retentionDays: entity.retentionDays,
      deletedAt: entity.deletedAt,
      revokedAt: entity.revokedAt,
      revokeReason: entity.revokeReason,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
      createdBy: entity.createdBy,
    });
  }

  private mapAuditEventEntityToDomain(entity: AuditEventEntity): AuditEvent {
    return new AuditEvent(
      entity.id,
      entity.authorizationId,
      entity.tenantId,
      entity.eventType,
      entity.description,
      entity.actor,
      entity.eventData,
      entity.ip,
      entity.userAgent,
      entity.createdAt,
    );
  }

  private mapWebhookEntityToDomain(entity: WebhookEntity): Webhook {
    return new Webhook(
      entity.id,
      entity.tenantId,
      entity.name,
      entity.url,
      entity.events,
      entity.secret,
      entity.isActive,
      entity.maxRetries,
      entity.retryDelaySeconds,
      entity.timeoutSeconds,
      entity.createdAt,
      entity.updatedAt,
    );
  }

  private mapDeliveryEntityToDomain(entity: WebhookDeliveryEntity): WebhookDelivery {
    return new WebhookDelivery({
      id: entity.id,
      webhookId: entity.webhookId,
      tenantId: entity.tenantId,
      authorizationId: entity.authorizationId,
      eventId: entity.eventId,
      eventType: entity.eventType,
      payload: entity.payload,
      statusCode: entity.statusCode,
      responseBody: entity.responseBody,
      attempts: entity.attempts,
      deliveredAt: entity.deliveredAt,
      failedAt: entity.failedAt,
      nextRetryAt: entity.nextRetryAt,
      isDelivered: entity.isDelivered,
      claimedUntil: entity.claimedUntil,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    });
  }

  private mapInboundEventEntityToDomain(entity: InboundEventEntity): InboundEvent {
    return new InboundEvent(
      entity.id,
      entity.tenantId,
      entity.eventId,
      entity.eventType,
      entity.tokenId,
      entity.payload,
      entity.status,
      entity.authorizationId,
      entity.errorMessage,
      entity.receivedAt,
      entity.processedAt,
      entity.claimedUntil,
    );
  }

  private mapAlertEntityToDomain(entity: AlertEntity): Alert {
    return new Alert(
      entity.id,
      entity.tenantId,
      entity.alertType,
      entity.severity,
      entity.title,
      entity.message,
      entity.context,
      entity.isRead,
      entity.isResolved,
      entity.resolvedAt,
      entity.createdAt,
    );
  }
}
