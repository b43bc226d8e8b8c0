import { AuditEventType, AuthorizationNotFoundError, WebhookEventType } from '../../src/testing';
import { OTHER_TENANT, TENANT, TestEngine, createTestEngine } from '../helpers/test-engine';

describe('EvidenceService', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createTestEngine();
  });

  async function createAcp() {
    return engine.authorizationService.create({
      protocol: 'acp',
      tenantId: TENANT,
      payload: engine.factory.acpToken({ secret: 'test-secret' }),
    });
  }

  it('should bundle an ACP authorization with its history', async () => {
    const { id } = await createAcp();
    await engine.authorizationService.revoke(TENANT, id, 'Customer request');

    const bundle = await engine.evidenceService.export(TENANT, id, { actor: 'auditor' });

    expect(Object.keys(bundle.files)).toEqual([
      'token.json',
      'verification.json',
      'audit.json',
      'deliveries.json',
      'summary.txt',
    ]);
    expect(bundle.generatedAt).toBe('2026-01-01T00:00:00.000Z');
    expect(bundle.auditTrail.map((event) => event['event_type'])).toEqual([
      AuditEventType.CREATED,
      AuditEventType.VERIFIED,
      AuditEventType.REVOKED,
    ]);
    expect(bundle.verification).toEqual({
      verification_status: 'VERIFIED',
      verification_reason: 'VERIFIED',
      verification_details: { issuer: 'psp-test', protocol: 'ACP', method: 'hmac_signature' },
      verified_at: '2026-01-01T00:00:00.000Z',
      current_status: 'REVOKED',
      revoked_at: '2026-01-01T00:00:00.000Z',
      revoke_reason: 'Customer request',
    });

    const token: unknown = JSON.parse(bundle.files['token.json']);
    expect(token).toMatchObject({
      token_id: 'tok_test_001',
      psp_id: 'psp-test',
      merchant_id: 'merchant-001',
      max_amount: '1000.00',
      currency: 'USD',
    });

    const summary = bundle.files['summary.txt'].split('\n');
    expect(summary).toContain('AUTHORIZATION EVIDENCE PACK - ACP (DELEGATED TOKEN)');
    expect(summary).toContain('Current Status:    REVOKED');
    expect(summary).toContain('REVOCATION INFORMATION');
    expect(summary).toContain('Reason:      Customer request');
    expect(summary).toContain('3. [2026-01-01 00:00:00 UTC] REVOKED');
  });

  it('should record the export in the audit trail', async () => {
    const { id } = await createAcp();

    await engine.evidenceService.export(TENANT, id, { actor: 'auditor' });

    const trail = await engine.storage.getAuditEvents(id);
    const exported = trail[trail.length - 1];
    expect(exported.eventType).toBe(AuditEventType.EVIDENCE_EXPORTED);
    expect(exported.actor).toBe('auditor');
    expect(exported.eventData).toEqual({
      files: ['token.json', 'verification.json', 'audit.json', 'deliveries.json', 'summary.txt'],
      auditEvents: 2,
      deliveries: 0,
    });
  });

  it('should include webhook deliveries for the authorization', async () => {
    await engine.storage.createWebhook({
      tenantId: TENANT,
      name: 'All events',
      url: 'https://hooks.example.test/all',
      events: [WebhookEventType.AUTHORIZATION_CREATED],
      secret: 'test-secret',
    });
    const { id } = await createAcp();

    const bundle = await engine.evidenceService.export(TENANT, id);

    expect(bundle.deliveries).toHaveLength(1);
    expect(bundle.files['summary.txt'].split('\n')).toContain('Delivered:         1');
  });

  it('should export soft-deleted records still in retention', async () => {
    const { id } = await createAcp();
    await engine.authorizationService.softDelete(TENANT, id);

    const bundle = await engine.evidenceService.export(TENANT, id);

    expect(bundle.authorization['deleted_at']).toBe('2026-01-01T00:00:00.000Z');
  });

  it('should not export another tenant record', async () => {
    const { id } = await createAcp();

    await expect(engine.evidenceService.export(OTHER_TENANT, id)).rejects.toBeInstanceOf(
      AuthorizationNotFoundError,
    );
  });
});
