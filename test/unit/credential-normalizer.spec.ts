import { JWTPayload, UnsecuredJWT } from 'jose';
import {
  CredentialNormalizer,
  MalformedCredentialError,
  Protocol,
  UnsupportedProtocolError,
} from '../../src';

const EXP = Math.floor(new Date('2026-02-01T00:00:00.000Z').getTime() / 1000);

function unsignedJwt(claims: JWTPayload): string {
  return new UnsecuredJWT(claims).encode();
}

function acpPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    token_id: 'tok_001',
    psp_id: 'psp-test',
    merchant_id: 'merchant-001',
    max_amount: '1000.00',
    currency: 'usd',
    expires_at: '2026-01-31T00:00:00.000Z',
    constraints: { merchant: 'merchant-001' },
    ...overrides,
  };
}

function malformedField(run: () => unknown): string | null {
  try {
    run();
  } catch (error) {
    if (error instanceof MalformedCredentialError) {
      return error.field;
    }
    throw error;
  }
  throw new Error('Expected MalformedCredentialError');
}

describe('CredentialNormalizer', () => {
  let normalizer: CredentialNormalizer;

  beforeEach(() => {
    normalizer = new CredentialNormalizer();
  });

  describe('AP2', () => {
    it('should normalize a credential JWT', () => {
      const jwt = unsignedJwt({
        issuer_did: 'did:web:issuer.test',
        subject_did: 'did:key:subject-1',
        amount_limit: '5000.00 USD',
        scope: 'purchase',
        exp: EXP,
      });

      const draft = normalizer.normalize({ protocol: 'ap2', tenantId: 'tenant-a', payload: jwt });

      expect(draft.protocol).toBe(Protocol.AP2);
      expect(draft.tenantId).toBe('tenant-a');
      expect(draft.issuer).toBe('did:web:issuer.test');
      expect(draft.subject).toBe('did:key:subject-1');
      expect(draft.amountLimit?.toString()).toBe('5000.00');
      expect(draft.currency).toBe('USD');
      expect(draft.scope).toEqual({ scope: 'purchase' });
      expect(draft.expiresAt.toISOString()).toBe('2026-02-01T00:00:00.000Z');
      expect(draft.rawPayload).toEqual({ vc_jwt: jwt });
      expect(draft.tokenId).toBeNull();
      expect(draft.createdBy).toBeNull();
    });

    it('should accept a { vc_jwt } wrapper and standard iss/sub claims', () => {
      const jwt = unsignedJwt({ iss: 'did:web:fallback.test', sub: 'did:key:s', exp: EXP });

      const draft = normalizer.normalize({
        protocol: 'AP2',
        tenantId: 'tenant-a',
        payload: { vc_jwt: jwt },
        createdBy: 'operator-1',
      });

      expect(draft.issuer).toBe('did:web:fallback.test');
      expect(draft.subject).toBe('did:key:s');
      expect(draft.amountLimit).toBeNull();
      expect(draft.currency).toBeNull();
      expect(draft.scope).toEqual({});
      expect(draft.createdBy).toBe('operator-1');
    });

    it('should take a numeric limit with a separate currency claim', () => {
      const jwt = unsignedJwt({
        issuer_did: 'did:web:issuer.test',
        subject_did: 'did:key:subject-1',
        amount_limit: 250,
        currency: 'eur',
        exp: EXP,
      });

      const draft = normalizer.normalize({ protocol: 'AP2', tenantId: 't', payload: jwt });

      expect(draft.amountLimit?.toString()).toBe('250.00');
      expect(draft.currency).toBe('EUR');
    });

    it('should reject a credential without exp', () => {
      const jwt = unsignedJwt({ issuer_did: 'did:web:issuer.test', subject_did: 'did:key:s' });

      expect(malformedField(() =>
        normalizer.normalize({ protocol: 'AP2', tenantId: 't', payload: jwt }),
      )).toBe('exp');
    });

    it('should reject a credential without an issuer', () => {
      const jwt = unsignedJwt({ subject_did: 'did:key:s', exp: EXP });

      expect(malformedField(() =>
        normalizer.normalize({ protocol: 'AP2', tenantId: 't', payload: jwt }),
      )).toBe('issuer_did');
    });

    it('should reject text that is not a JWT', () => {
      expect(malformedField(() =>
        normalizer.normalize({ protocol: 'AP2', tenantId: 't', payload: 'not-a-jwt' }),
      )).toBe('vc_jwt');
      expect(malformedField(() =>
        normalizer.normalize({ protocol: 'AP2', tenantId: 't', payload: { other: 1 } }),
      )).toBe('vc_jwt');
    });

    it('should report a bad limit against amount_limit', () => {
      const jwt = unsignedJwt({
        issuer_did: 'did:web:issuer.test',
        subject_did: 'did:key:s',
        amount_limit: '-10 USD',
        exp: EXP,
      });

      expect(malformedField(() =>
        normalizer.normalize({ protocol: 'AP2', tenantId: 't', payload: jwt }),
      )).toBe('amount_limit');
    });
  });

  describe('ACP', () => {
    it('should normalize a token', () => {
      const payload = acpPayload();

      const draft = normalizer.normalize({ protocol: 'acp', tenantId: 'tenant-a', payload });

      expect(draft.protocol).toBe(Protocol.ACP);
      expect(draft.issuer).toBe('psp-test');
      expect(draft.subject).toBe('merchant-001');
      expect(draft.tokenId).toBe('tok_001');
      expect(draft.amountLimit?.toString()).toBe('1000.00');
      expect(draft.currency).toBe('USD');
      expect(draft.scope).toEqual({ merchant: 'merchant-001' });
      expect(draft.expiresAt.toISOString()).toBe('2026-01-31T00:00:00.000Z');
      expect(draft.rawPayload).toBe(payload);
    });

    it('should keep the signature on the parsed token', () => {
      const parsed = normalizer.parse('ACP', acpPayload({ signature: 'abc123' }));

      expect(parsed.protocol).toBe(Protocol.ACP);
      if (parsed.protocol === Protocol.ACP) {
        expect(parsed.token.signature).toBe('abc123');
      }
    });

    it.each([
      ['token_id', { token_id: undefined }],
      ['psp_id', { psp_id: '' }],
      ['merchant_id', { merchant_id: 42 }],
      ['max_amount', { max_amount: undefined }],
      ['max_amount', { max_amount: '12.345' }],
      ['currency', { currency: 'dollars' }],
      ['expires_at', { expires_at: 'not-a-date' }],
      ['constraints', { constraints: ['merchant'] }],
    ])('should reject an invalid %s', (field, overrides) => {
      expect(malformedField(() =>
        normalizer.normalize({ protocol: 'ACP', tenantId: 't', payload: acpPayload(overrides) }),
      )).toBe(field);
    });

    it('should reject a payload that is not an object', () => {
      expect(() =>
        normalizer.normalize({ protocol: 'ACP', tenantId: 't', payload: 'token' }),
      ).toThrow('ACP token must be a JSON object');
    });
  });

  it('should reject unknown protocols', () => {
    expect(() => normalizer.normalize({ protocol: 'x402', tenantId: 't', payload: {} })).toThrow(
      UnsupportedProtocolError,
    );
    expect(() => normalizer.normalize({ protocol: 'x402', tenantId: 't', payload: {} })).toThrow(
      'Unsupported protocol: x402',
    );
  });
});
