import {
  AlreadyRevokedError,
  AuditEventType,
  AuthorizationStatus,
  InboundEventStatus,
  InboundEventType,
  MockStorageAdapter,
  WebhookEventType,
} from '../../src/testing';
import { START, TENANT, TestClock, createTestEngine } from '../helpers/test-engine';

describe('MockStorageAdapter', () => {
  it('should serialize concurrent revocations of one authorization', async () => {
    const engine = createTestEngine();
    const { id } = await engine.authorizationService.create({
      protocol: 'acp',
      tenantId: TENANT,
      payload: engine.factory.acpToken({ secret: 'test-secret' }),
    });

    const results = await Promise.allSettled([
      engine.authorizationService.revoke(TENANT, id, 'First'),
      engine.authorizationService.revoke(TENANT, id, 'Second'),
    ]);

    expect(results[0].status).toBe('fulfilled');
    expect(results[1].status).toBe('rejected');
    if (results[1].status === 'rejected') {
      expect(results[1].reason).toBeInstanceOf(AlreadyRevokedError);
    }
    const trail = await engine.storage.getAuditEvents(id);
    expect(trail.filter((event) => event.eventType === AuditEventType.REVOKED)).toHaveLength(1);
    expect((await engine.authorizationService.require(TENANT, id)).revokeReason).toBe('First');
  });

  it('should claim an inbound event once unless it failed', async () => {
    const storage = new MockStorageAdapter();
    const claim = {
      tenantId: TENANT,
      eventId: 'evt_test_001',
      eventType: InboundEventType.TOKEN_USED,
      tokenId: 'tok_test_001',
      payload: {},
      leaseMs: 60_000,
    };

    const first = await storage.claimInboundEvent(claim);
    const second = await storage.claimInboundEvent(claim);
    await storage.completeInboundEvent(first.event.id, InboundEventStatus.FAILED, {
      errorMessage: 'token unknown',
    });
    const third = await storage.claimInboundEvent(claim);

    expect(first.claimed).toBe(true);
    expect(second.claimed).toBe(false);
    expect(second.event.status).toBe(InboundEventStatus.PROCESSING);
    expect(third.claimed).toBe(true);
    expect(third.event.id).toBe(first.event.id);
  });

  it('should take over an inbound event left processing once its lease lapses', async () => {
    const clock = new TestClock();
    const storage = new MockStorageAdapter({ clock: clock.now });
    const claim = {
      tenantId: TENANT,
      eventId: 'evt_test_002',
      eventType: InboundEventType.TOKEN_REVOKED,
      tokenId: 'tok_test_001',
      payload: {},
      leaseMs: 60_000,
    };

    const first = await storage.claimInboundEvent(claim);
    clock.advance(59_999);
    const withinLease = await storage.claimInboundEvent(claim);
    clock.advance(1);
    const afterLease = await storage.claimInboundEvent(claim);

    expect(first.event.claimedUntil).toEqual(new Date(START.getTime() + 60_000));
    expect(withinLease.claimed).toBe(false);
    expect(afterLease.claimed).toBe(true);
    expect(afterLease.event.id).toBe(first.event.id);
    expect(afterLease.event.claimedUntil).toEqual(new Date(START.getTime() + 120_000));
  });

  it('should lease claimed deliveries so a second scan skips them', async () => {
    const clock = new TestClock();
    const storage = new MockStorageAdapter({ clock: clock.now });
    const webhook = await storage.createWebhook({
      tenantId: TENANT,
      name: 'Hook',
      url: 'https://hooks.example.test',
      events: [WebhookEventType.AUTHORIZATION_USED],
      secret: 'test-secret',
    });
    await storage.createDelivery({
      webhookId: webhook.id,
      tenantId: TENANT,
      authorizationId: null,
      eventId: 'evt-1',
      eventType: WebhookEventType.AUTHORIZATION_USED,
      payload: {},
      nextRetryAt: START,
      claimedUntil: null,
    });

    const firstScan = await storage.claimDueDeliveries(clock.now(), 10, 60_000);
    const secondScan = await storage.claimDueDeliveries(clock.now(), 10, 60_000);
    clock.advance(60_000);
    const afterLease = await storage.claimDueDeliveries(clock.now(), 10, 60_000);

    expect(firstScan).toHaveLength(1);
    expect(firstScan[0].claimedUntil).toEqual(new Date(START.getTime() + 60_000));
    expect(secondScan).toEqual([]);
    expect(afterLease).toHaveLength(1);
  });

  it('should ignore an attempt recorded under a lease another scan has taken over', async () => {
    const { clock, storage } = createTestEngine();
    const webhook = await storage.createWebhook({
      tenantId: TENANT,
      name: 'Hook',
      url: 'https://hooks.example.test',
      events: [WebhookEventType.AUTHORIZATION_USED],
      secret: 'test-secret',
    });
    await storage.createDelivery({
      webhookId: webhook.id,
      tenantId: TENANT,
      authorizationId: null,
      eventId: 'evt-1',
      eventType: WebhookEventType.AUTHORIZATION_USED,
      payload: {},
      nextRetryAt: START,
      claimedUntil: null,
    });
    const failedAttempt = {
      attempts: 1,
      statusCode: 500,
      responseBody: 'boom',
      deliveredAt: null,
      failedAt: null,
      nextRetryAt: new Date(START.getTime() + 120_000),
      isDelivered: false,
    };

    const [stale] = await storage.claimDueDeliveries(clock.now(), 10, 60_000);
    clock.advance(60_000);
    const [current] = await storage.claimDueDeliveries(clock.now(), 10, 60_000);

    const ignored = await storage.recordDeliveryAttempt(stale.id, failedAttempt, stale.claimedUntil);
    const recorded = await storage.recordDeliveryAttempt(
      current.id,
      failedAttempt,
      current.claimedUntil,
    );

    expect(ignored).toBeNull();
    expect(recorded?.attempts).toBe(1);
    expect(recorded?.claimedUntil).toBeNull();
    expect(recorded?.statusCode).toBe(500);
  });

  it('should report statistics and reset on clear', async () => {
    const engine = createTestEngine();
    await engine.authorizationService.create({
      protocol: 'acp',
      tenantId: TENANT,
      payload: engine.factory.acpToken({ secret: 'test-secret' }),
    });

    expect(await engine.storage.getStatistics()).toEqual({
      authorizations: 1,
      authorizationsByStatus: {
        [AuthorizationStatus.VALID]: 0,
        [AuthorizationStatus.ACTIVE]: 1,
        [AuthorizationStatus.EXPIRED]: 0,
        [AuthorizationStatus.REVOKED]: 0,
      },
      webhooks: 0,
      pendingDeliveries: 0,
      failedDeliveries: 0,
      auditEvents: 2,
      unresolvedAlerts: 0,
    });

    engine.storage.clear();
    expect(engine.storage.getAllData().authorizations).toEqual([]);
  });

  it('should fail every call when configured to throw', async () => {
    const storage = new MockStorageAdapter({ throwOnError: true });

    await expect(storage.listWebhooks(TENANT)).rejects.toThrow('Mock storage failure');
    expect(await storage.isHealthy()).toBe(false);
  });
});
