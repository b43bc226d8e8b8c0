import {
  AuditEventType,
  AuthorizationStatus,
  DEFAULT_INBOUND_CLAIM_LEASE_MS,
  InboundEventStatus,
  InboundEventType,
  InboundPayloadError,
  InboundSignatureError,
  InboundWebhookProcessor,
  PspNotAllowedError,
  TriggerType,
  UnsupportedEventTypeError,
  WebhookSigner,
} from '../../src/testing';
import { ACP_SECRET, OTHER_TENANT, TENANT, TestEngine, createTestEngine } from '../helpers/test-engine';

describe('InboundWebhookProcessor', () => {
  let engine: TestEngine;
  let processor: InboundWebhookProcessor;

  function createProcessor(pspAllowlist: string[] = []): InboundWebhookProcessor {
    return new InboundWebhookProcessor({
      storageAdapter: engine.storage,
      authorizationService: engine.authorizationService,
      resolveSecrets: (tenantId) => (tenantId === TENANT ? [ACP_SECRET] : []),
      pspAllowlist,
      clock: engine.clock.now,
    });
  }

  async function createToken(tokenId = 'tok_test_001') {
    return engine.authorizationService.create({
      protocol: 'acp',
      tenantId: TENANT,
      payload: engine.factory.acpToken({ tokenId, secret: ACP_SECRET }),
    });
  }

  beforeEach(() => {
    engine = createTestEngine();
    processor = createProcessor();
  });

  describe('token.revoked', () => {
    it('should revoke the authorization on behalf of the PSP', async () => {
      const authorization = await createToken();
      const { body, headers } = engine.factory.inboundEvent({
        eventType: InboundEventType.TOKEN_REVOKED,
        data: { reason: 'Card reported stolen' },
        secret: ACP_SECRET,
      });

      const result = await processor.process(TENANT, body, headers);

      expect(result).toMatchObject({
        success: true,
        outcome: 'processed',
        eventId: 'evt_test_001',
        authorizationId: authorization.id,
        authorizationStatus: AuthorizationStatus.REVOKED,
      });
      const trail = await engine.storage.getAuditEvents(authorization.id);
      const revoked = trail[trail.length - 1];
      expect(revoked.eventType).toBe(AuditEventType.REVOKED);
      expect(revoked.actor).toBe('psp:psp-test');
      expect(revoked.eventData).toEqual({
        fromStatus: AuthorizationStatus.ACTIVE,
        toStatus: AuthorizationStatus.REVOKED,
        trigger: TriggerType.PROTOCOL_WEBHOOK,
        reason: 'Card reported stolen',
        eventId: 'evt_test_001',
        tokenId: 'tok_test_001',
        revokedBy: null,
      });
      const inbound = await engine.storage.findInboundEvent(TENANT, 'evt_test_001');
      expect(inbound?.status).toBe(InboundEventStatus.PROCESSED);
      expect(inbound?.authorizationId).toBe(authorization.id);
    });

    it('should acknowledge a redelivered event without acting twice', async () => {
      await createToken();
      const request = engine.factory.inboundEvent({
        eventType: InboundEventType.TOKEN_REVOKED,
        secret: ACP_SECRET,
      });

      await processor.process(TENANT, request.body, request.headers);
      const again = await processor.process(TENANT, request.body, request.headers);

      expect(again).toMatchObject({
        success: true,
        outcome: 'already_processed',
        eventId: 'evt_test_001',
        authorizationId: null,
      });
      expect(again.error).toBeUndefined();
    });

    it('should treat a revocation of a revoked token as a no-op', async () => {
      const authorization = await createToken();
      await engine.authorizationService.revoke(TENANT, authorization.id, 'Merchant closed');
      const { body, headers } = engine.factory.inboundEvent({
        eventId: 'evt_test_002',
        eventType: InboundEventType.TOKEN_REVOKED,
        secret: ACP_SECRET,
      });

      const result = await processor.process(TENANT, body, headers);

      expect(result.outcome).toBe('processed');
      expect(result.authorizationStatus).toBe(AuthorizationStatus.REVOKED);
      const trail = await engine.storage.getAuditEvents(authorization.id);
      expect(trail.filter((event) => event.eventType === AuditEventType.REVOKED)).toHaveLength(1);
      expect((await engine.authorizationService.require(TENANT, authorization.id)).revokeReason).toBe(
        'Merchant closed',
      );
    });

    it('should fall back to the default reason', async () => {
      const authorization = await createToken();
      const { body, headers } = engine.factory.inboundEvent({
        eventType: InboundEventType.TOKEN_REVOKED,
        data: { reason: '  ', revoked_by: 'risk-engine' },
        secret: ACP_SECRET,
      });

      await processor.process(TENANT, body, headers);

      const stored = await engine.authorizationService.require(TENANT, authorization.id);
      expect(stored.revokeReason).toBe('Revoked by PSP');
    });
  });

  describe('token.used', () => {
    it('should record usage and leave the status alone', async () => {
      const authorization = await createToken();
      const { body, headers } = engine.factory.inboundEvent({
        data: { amount: '25.00', currency: 'usd', transaction_id: 'txn-9' },
        secret: ACP_SECRET,
      });

      const result = await processor.process(TENANT, body, headers);

      expect(result.outcome).toBe('processed');
      expect(result.authorizationStatus).toBe(AuthorizationStatus.ACTIVE);
      const trail = await engine.storage.getAuditEvents(authorization.id);
      const used = trail[trail.length - 1];
      expect(used.eventType).toBe(AuditEventType.USED);
      expect(used.actor).toBe('psp:psp-test');
      expect(used.eventData).toEqual({
        amount: '25.00',
        currency: 'USD',
        transactionId: 'txn-9',
        merchantId: null,
        metadata: {},
        status: AuthorizationStatus.ACTIVE,
        exceedsLimit: false,
        source: 'acp_webhook',
      });
    });
  });

  describe('rejections before the event is claimed', () => {
    it('should reject an invalid signature', async () => {
      const { body, headers } = engine.factory.inboundEvent({ secret: 'wrong-secret' });

      const result = await processor.process(TENANT, body, headers);

      expect(result.success).toBe(false);
      expect(result.outcome).toBe('rejected');
      expect(result.error?.stage).toBe('signature-verification');
      expect(result.error?.cause).toBeInstanceOf(InboundSignatureError);
      expect(result.error?.cause?.message).toBe('Invalid X-ACP-Signature');
      expect(await engine.storage.findInboundEvent(TENANT, 'evt_test_001')).toBeNull();
    });

    it('should reject an unsigned request', async () => {
      const { body, headers } = engine.factory.inboundEvent();

      const result = await processor.process(TENANT, body, headers);

      expect(result.error?.cause?.message).toBe('Missing X-ACP-Signature header');
    });

    it('should reject tenants without a configured secret', async () => {
      const { body, headers } = engine.factory.inboundEvent({ secret: ACP_SECRET });

      const result = await processor.process(OTHER_TENANT, body, headers);

      expect(result.outcome).toBe('rejected');
      expect(result.error?.cause?.message).toBe('No webhook secret configured for tenant tenant-b');
    });

    it('should reject unsupported event types', async () => {
      const { body, headers } = engine.factory.inboundEvent({
        eventType: 'token.paused',
        secret: ACP_SECRET,
      });

      const result = await processor.process(TENANT, body, headers);

      expect(result.outcome).toBe('rejected');
      expect(result.error?.stage).toBe('parse');
      expect(result.error?.cause).toBeInstanceOf(UnsupportedEventTypeError);
    });

    it('should reject a body that is not JSON', async () => {
      const body = Buffer.from('not json');
      const headers = { 'X-ACP-Signature': WebhookSigner.signatureHeader(body, ACP_SECRET) };

      const result = await processor.process(TENANT, body, headers);

      expect(result.error?.cause).toBeInstanceOf(InboundPayloadError);
      expect(result.error?.cause?.message).toBe('Body is not valid JSON');
    });
  });

  describe('failures after the event is claimed', () => {
    it('should mark an unknown token as failed and accept the redelivery later', async () => {
      const request = engine.factory.inboundEvent({ tokenId: 'tok_late', secret: ACP_SECRET });

      const first = await processor.process(TENANT, request.body, request.headers);

      expect(first.outcome).toBe('failed');
      expect(first.error?.stage).toBe('resolve-authorization');
      const failed = await engine.storage.findInboundEvent(TENANT, 'evt_test_001');
      expect(failed?.status).toBe(InboundEventStatus.FAILED);
      expect(failed?.errorMessage).toBe('No ACP authorization for token tok_late');

      const authorization = await createToken('tok_late');
      const second = await processor.process(TENANT, request.body, request.headers);

      expect(second.outcome).toBe('processed');
      expect(second.authorizationId).toBe(authorization.id);
      expect((await engine.storage.findInboundEvent(TENANT, 'evt_test_001'))?.status).toBe(
        InboundEventStatus.PROCESSED,
      );
    });

    it('should take over an event left processing once its claim lease lapses', async () => {
      const authorization = await createToken();
      const stranded = {
        tenantId: TENANT,
        eventId: 'evt_test_001',
        eventType: InboundEventType.TOKEN_REVOKED,
        tokenId: 'tok_test_001',
        payload: {},
        leaseMs: DEFAULT_INBOUND_CLAIM_LEASE_MS,
      };
      await engine.storage.claimInboundEvent(stranded);
      const { body, headers } = engine.factory.inboundEvent({
        eventType: InboundEventType.TOKEN_REVOKED,
        secret: ACP_SECRET,
      });

      const withinLease = await processor.process(TENANT, body, headers);
      engine.clock.advance(DEFAULT_INBOUND_CLAIM_LEASE_MS);
      const afterLease = await processor.process(TENANT, body, headers);

      expect(withinLease.outcome).toBe('already_processed');
      expect(afterLease.outcome).toBe('processed');
      expect(afterLease.authorizationStatus).toBe(AuthorizationStatus.REVOKED);
      expect((await engine.authorizationService.require(TENANT, authorization.id)).status).toBe(
        AuthorizationStatus.REVOKED,
      );
      const inbound = await engine.storage.findInboundEvent(TENANT, 'evt_test_001');
      expect(inbound?.status).toBe(InboundEventStatus.PROCESSED);
      expect(inbound?.claimedUntil).toBeNull();
    });

    it('should refuse PSPs outside the allowlist', async () => {
      processor = createProcessor(['psp-other']);
      await createToken();
      const { body, headers } = engine.factory.inboundEvent({ secret: ACP_SECRET });

      const result = await processor.process(TENANT, body, headers);

      expect(result.outcome).toBe('failed');
      expect(result.error?.cause).toBeInstanceOf(PspNotAllowedError);
    });
  });

  it('should report its stages', () => {
    expect(createProcessor(['psp-test']).getStatistics()).toEqual({
      stages: ['signature-verification', 'parse', 'deduplication', 'resolve-authorization', 'lifecycle'],
      pspAllowlist: ['psp-test'],
    });
  });
});
