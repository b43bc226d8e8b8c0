import {
  DataSource,
  In,
  IsNull,
  QueryFailedError,
  QueryRunner,
  SelectQueryBuilder,
  UpdateResult,
} from 'typeorm';
import {
  AuditEventType,
  AuthorizationNotFoundError,
  AuthorizationStatus,
  InboundEventStatus,
  InboundEventType,
  Protocol,
  VerificationStatus,
  WebhookEventType,
} from '../../src/core';
import {
  AuthorizationEntity,
  InboundEventEntity,
  TypeORMStorageAdapter,
  WebhookDeliveryEntity,
  createDataSource,
} from '../../src/adapters/storage/typeorm';
import { MockStorageAdapter } from '../../src/adapters/storage/mock';
import { MandateModule } from '../../src/modules';

const TENANT = 'tenant-db';
const NOW = new Date('2026-01-01T00:00:00.000Z');
const LEASE_MS = 60_000;

function authorizationRow(): AuthorizationEntity {
  return Object.assign(new AuthorizationEntity(), {
    id: 'auth-1',
    tenantId: TENANT,
    protocol: Protocol.ACP,
    issuer: 'psp-test',
    subject: 'merchant-1',
    scope: { merchant_id: 'merchant-1' },
    amountLimit: null,
    currency: 'USD',
    expiresAt: new Date(NOW.getTime() + 60 * 60 * 1000),
    status: AuthorizationStatus.ACTIVE,
    rawPayload: { token_id: 'tok_db_001' },
    tokenId: 'tok_db_001',
    verificationStatus: VerificationStatus.VERIFIED,
    verificationReason: 'VERIFIED',
    verificationDetails: {},
    verifiedAt: NOW,
    retentionDays: 90,
    deletedAt: null,
    revokedAt: null,
    revokeReason: null,
    createdBy: 'api',
    createdAt: NOW,
    updatedAt: NOW,
  });
}

function deliveryRow(claimedUntil: Date | null): WebhookDeliveryEntity {
  return Object.assign(new WebhookDeliveryEntity(), {
    id: 'del-1',
    webhookId: 'hook-1',
    tenantId: TENANT,
    authorizationId: null,
    eventId: 'evt-db-1',
    eventType: WebhookEventType.AUTHORIZATION_USED,
    payload: {},
    statusCode: null,
    responseBody: null,
    attempts: 0,
    deliveredAt: null,
    failedAt: null,
    nextRetryAt: NOW,
    isDelivered: false,
    claimedUntil,
    createdAt: NOW,
    updatedAt: NOW,
  });
}

function inboundRow(status: InboundEventStatus, claimedUntil: Date | null): InboundEventEntity {
  return Object.assign(new InboundEventEntity(), {
    id: 'in-1',
    tenantId: TENANT,
    eventId: 'evt_db_001',
    eventType: InboundEventType.TOKEN_REVOKED,
    tokenId: 'tok_db_001',
    payload: {},
    status,
    authorizationId: null,
    errorMessage: null,
    receivedAt: NOW,
    processedAt: null,
    claimedUntil,
  });
}

const claim = {
  tenantId: TENANT,
  eventId: 'evt_db_001',
  eventType: InboundEventType.TOKEN_REVOKED,
  tokenId: 'tok_db_001',
  payload: {},
  leaseMs: LEASE_MS,
};

/**
 * Entity metadata and query builders are real; the driver never opens a
 * connection and every statement that would reach PostgreSQL is stubbed.
 */
describe('TypeORMStorageAdapter', () => {
  let dataSource: DataSource;
  let runner: QueryRunner;
  let adapter: TypeORMStorageAdapter;

  beforeEach(async () => {
    dataSource = createDataSource({ synchronize: false, logging: false });
    jest.spyOn(dataSource.driver, 'connect').mockResolvedValue(undefined);
    jest.spyOn(dataSource.driver, 'afterConnect').mockResolvedValue(undefined);
    await dataSource.initialize();

    runner = dataSource.createQueryRunner();
    jest.spyOn(dataSource, 'createQueryRunner').mockReturnValue(runner);
    jest.spyOn(runner, 'connect').mockResolvedValue(undefined);
    jest.spyOn(runner, 'startTransaction').mockResolvedValue(undefined);
    jest.spyOn(runner, 'commitTransaction').mockResolvedValue(undefined);
    jest.spyOn(runner, 'rollbackTransaction').mockResolvedValue(undefined);
    jest.spyOn(runner, 'release').mockResolvedValue(undefined);

    adapter = new TypeORMStorageAdapter(dataSource, () => NOW);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('mutateAuthorization', () => {
    it('should lock the live row and commit without writing when the planner declines', async () => {
      const findOne = jest.spyOn(runner.manager, 'findOne').mockResolvedValue(authorizationRow());
      const save = jest.spyOn(runner.manager, 'save');

      const result = await adapter.mutateAuthorization({ id: 'auth-1', tenantId: TENANT }, () => null);

      expect(findOne).toHaveBeenCalledWith(AuthorizationEntity, {
        where: { id: 'auth-1', tenantId: TENANT, deletedAt: IsNull() },
        lock: { mode: 'pessimistic_write' },
      });
      expect(result.changed).toBe(false);
      expect(save).not.toHaveBeenCalled();
      expect(runner.commitTransaction).toHaveBeenCalledTimes(1);
      expect(runner.release).toHaveBeenCalledTimes(1);
    });

    it('should save the change and its audit row in the same transaction', async () => {
      const row = authorizationRow();
      jest.spyOn(runner.manager, 'findOne').mockResolvedValue(row);
      const save = jest.spyOn(runner.manager, 'save').mockResolvedValue(row);

      const result = await adapter.mutateAuthorization({ id: 'auth-1', tenantId: TENANT }, () => ({
        changes: { status: AuthorizationStatus.REVOKED, revokedAt: NOW, revokeReason: 'Fraud' },
        audit: {
          eventType: AuditEventType.REVOKED,
          description: 'Authorization revoked',
          actor: 'ops',
          eventData: { reason: 'Fraud' },
        },
      }));

      expect(result.changed).toBe(true);
      expect(result.previous.status).toBe(AuthorizationStatus.ACTIVE);
      expect(result.authorization.status).toBe(AuthorizationStatus.REVOKED);
      expect(result.authorization.revokeReason).toBe('Fraud');
      expect(save).toHaveBeenCalledTimes(2);
      expect(save).toHaveBeenNthCalledWith(
        2,
        expect.objectContaining({
          authorizationId: 'auth-1',
          tenantId: TENANT,
          eventType: AuditEventType.REVOKED,
          actor: 'ops',
          createdAt: NOW,
        }),
      );
      expect(runner.commitTransaction).toHaveBeenCalledTimes(1);
    });

    it('should roll back and reject a mutation of an unknown authorization', async () => {
      jest.spyOn(runner.manager, 'findOne').mockResolvedValue(null);

      await expect(
        adapter.mutateAuthorization({ id: 'auth-missing', tenantId: TENANT }, () => null),
      ).rejects.toBeInstanceOf(AuthorizationNotFoundError);
      expect(runner.rollbackTransaction).toHaveBeenCalledTimes(1);
      expect(runner.commitTransaction).not.toHaveBeenCalled();
      expect(runner.release).toHaveBeenCalledTimes(1);
    });
  });

  describe('webhook deliveries', () => {
    it('should claim due deliveries with SKIP LOCKED and stamp the lease', async () => {
      const setLock = jest.spyOn(SelectQueryBuilder.prototype, 'setLock');
      const setOnLocked = jest.spyOn(SelectQueryBuilder.prototype, 'setOnLocked');
      jest.spyOn(SelectQueryBuilder.prototype, 'getMany').mockResolvedValue([deliveryRow(null)]);
      const update = jest.spyOn(runner.manager, 'update').mockResolvedValue(new UpdateResult());

      const claimed = await adapter.claimDueDeliveries(NOW, 10, LEASE_MS);

      const claimedUntil = new Date(NOW.getTime() + LEASE_MS);
      expect(setLock).toHaveBeenCalledWith('pessimistic_write');
      expect(setOnLocked).toHaveBeenCalledWith('skip_locked');
      expect(update).toHaveBeenCalledWith(
        WebhookDeliveryEntity,
        { id: In(['del-1']) },
        { claimedUntil },
      );
      expect(claimed).toHaveLength(1);
      expect(claimed[0].claimedUntil).toEqual(claimedUntil);
    });

    it('should not write an attempt once another scan holds the delivery', async () => {
      const takenOver = new Date(NOW.getTime() + 2 * LEASE_MS);
      jest.spyOn(runner.manager, 'findOne').mockResolvedValue(deliveryRow(takenOver));
      const save = jest.spyOn(runner.manager, 'save');

      const recorded = await adapter.recordDeliveryAttempt(
        'del-1',
        {
          attempts: 1,
          statusCode: 500,
          responseBody: 'boom',
          deliveredAt: null,
          failedAt: null,
          nextRetryAt: new Date(NOW.getTime() + 10_000),
          isDelivered: false,
        },
        new Date(NOW.getTime() + LEASE_MS),
      );

      expect(recorded).toBeNull();
      expect(save).not.toHaveBeenCalled();
    });
  });

  describe('inbound events', () => {
    it('should leave an event that is still leased to its owner', async () => {
      jest
        .spyOn(runner.manager, 'findOne')
        .mockResolvedValue(inboundRow(InboundEventStatus.PROCESSING, new Date(NOW.getTime() + 1)));
      const save = jest.spyOn(runner.manager, 'save');

      const result = await adapter.claimInboundEvent(claim);

      expect(result.claimed).toBe(false);
      expect(result.event.status).toBe(InboundEventStatus.PROCESSING);
      expect(save).not.toHaveBeenCalled();
    });

    it('should take over an event whose lease has lapsed', async () => {
      const row = inboundRow(InboundEventStatus.PROCESSING, NOW);
      jest.spyOn(runner.manager, 'findOne').mockResolvedValue(row);
      jest.spyOn(runner.manager, 'save').mockResolvedValue(row);

      const result = await adapter.claimInboundEvent(claim);

      expect(result.claimed).toBe(true);
      expect(result.event.id).toBe('in-1');
      expect(result.event.claimedUntil).toEqual(new Date(NOW.getTime() + LEASE_MS));
    });

    it('should report the concurrent winner when the insert hits the unique index', async () => {
      jest.spyOn(runner.manager, 'findOne').mockResolvedValue(null);
      jest
        .spyOn(runner.manager, 'save')
        .mockRejectedValue(
          new QueryFailedError(
            'INSERT INTO "inbound_events"',
            [],
            Object.assign(new Error('duplicate key value'), { code: '23505' }),
          ),
        );
      const winner = inboundRow(InboundEventStatus.PROCESSING, new Date(NOW.getTime() + LEASE_MS));
      jest.spyOn(dataSource.manager, 'findOne').mockResolvedValue(winner);

      const result = await adapter.claimInboundEvent(claim);

      expect(result.claimed).toBe(false);
      expect(result.event.id).toBe('in-1');
      expect(runner.rollbackTransaction).toHaveBeenCalledTimes(1);
    });

    it('should rethrow any other insert failure', async () => {
      jest.spyOn(runner.manager, 'findOne').mockResolvedValue(null);
      jest.spyOn(runner.manager, 'save').mockRejectedValue(new Error('connection reset'));

      await expect(adapter.claimInboundEvent(claim)).rejects.toThrow('connection reset');
    });
  });

  describe('lifecycle', () => {
    it('should destroy an initialized data source on close', async () => {
      const destroy = jest.spyOn(dataSource, 'destroy').mockResolvedValue(undefined);

      await adapter.close();

      expect(destroy).toHaveBeenCalledTimes(1);
    });

    it('should leave an uninitialized data source alone', async () => {
      jest.replaceProperty(dataSource, 'isInitialized', false);
      const destroy = jest.spyOn(dataSource, 'destroy');

      await adapter.close();

      expect(destroy).not.toHaveBeenCalled();
    });

    it('should close storage at application shutdown', async () => {
      const close = jest.spyOn(adapter, 'close').mockResolvedValue(undefined);

      await new MandateModule(adapter).onApplicationShutdown();
      await new MandateModule(new MockStorageAdapter()).onApplicationShutdown();

      expect(close).toHaveBeenCalledTimes(1);
    });
  });
});
