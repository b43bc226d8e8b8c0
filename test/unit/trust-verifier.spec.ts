import { JWK, KeyLike, SignJWT, exportJWK, generateKeyPair } from 'jose';
import {
  AuthorizationDraft,
  CredentialFactory,
  CredentialNormalizer,
  DEFAULT_ALLOWED_ALGORITHMS,
  KeyMaterial,
  Protocol,
  StaticKeySource,
  Truststore,
  TrustResolutionError,
  TrustVerifier,
  VerificationReason,
  VerificationStatus,
} from '../../src/testing';

const NOW = new Date('2026-01-01T00:00:00.000Z');
const NOW_SECONDS = Math.floor(NOW.getTime() / 1000);
const ISSUER = 'did:web:issuer.test';

interface SigningKey {
  privateKey: KeyLike;
  jwk: JWK;
}

async function signingKey(kid: string): Promise<SigningKey> {
  const { privateKey, publicKey } = await generateKeyPair('ES256');
  return { privateKey, jwk: { ...(await exportJWK(publicKey)), kid, alg: 'ES256' } };
}

function truststoreOver(source: StaticKeySource): Truststore {
  return {
    resolveKey: (issuer, protocol) => source.fetchKeyMaterial(issuer, protocol),
  };
}

describe('TrustVerifier', () => {
  const normalizer = new CredentialNormalizer();
  const factory = new CredentialFactory(() => NOW);
  let keySource: StaticKeySource;
  let verifier: TrustVerifier;

  beforeEach(() => {
    keySource = new StaticKeySource();
    verifier = new TrustVerifier(truststoreOver(keySource), {
      allowedAlgorithms: DEFAULT_ALLOWED_ALGORITHMS,
      clockToleranceSeconds: 0,
      clock: () => NOW,
    });
  });

  describe('AP2', () => {
    let key: SigningKey;

    beforeAll(async () => {
      key = await signingKey('key-1');
    });

    beforeEach(() => {
      keySource.registerIssuer(ISSUER, Protocol.AP2, { kind: 'jwks', keys: [key.jwk] });
    });

    async function ap2Draft(
      options: { privateKey?: KeyLike; kid?: string | null; exp?: number; nbf?: number } = {},
    ): Promise<AuthorizationDraft> {
      let builder = new SignJWT({
        issuer_did: ISSUER,
        subject_did: 'did:key:subject-1',
        amount_limit: '500.00 USD',
      })
        .setProtectedHeader(
          options.kid === null ? { alg: 'ES256' } : { alg: 'ES256', kid: options.kid ?? 'key-1' },
        )
        .setExpirationTime(options.exp ?? NOW_SECONDS + 3600);
      if (options.nbf !== undefined) {
        builder = builder.setNotBefore(options.nbf);
      }
      const jwt = await builder.sign(options.privateKey ?? key.privateKey);
      return normalizer.normalize({ protocol: 'AP2', tenantId: 'tenant-a', payload: jwt });
    }

    it('should verify a credential signed by a trusted key', async () => {
      const outcome = await verifier.verify(await ap2Draft());

      expect(outcome).toEqual({
        status: VerificationStatus.VERIFIED,
        reason: VerificationReason.VERIFIED,
        details: {
          issuer: ISSUER,
          protocol: Protocol.AP2,
          algorithm: 'ES256',
          kid: 'key-1',
          method: 'jwt_signature',
        },
        verifiedAt: NOW,
      });
    });

    it('should reject a signature from a different key under the same kid', async () => {
      const impostor = await signingKey('key-1');

      const outcome = await verifier.verify(await ap2Draft({ privateKey: impostor.privateKey }));

      expect(outcome.status).toBe(VerificationStatus.FAILED);
      expect(outcome.reason).toBe(VerificationReason.SIGNATURE_INVALID);
    });

    it('should report an unknown kid', async () => {
      const outcome = await verifier.verify(await ap2Draft({ kid: 'key-9' }));

      expect(outcome.reason).toBe(VerificationReason.KEY_NOT_FOUND);
    });

    it('should refuse a revoked key', async () => {
      keySource.revokeKey(ISSUER, 'key-1');

      const outcome = await verifier.verify(await ap2Draft());

      expect(outcome.reason).toBe(VerificationReason.KEY_REVOKED);
      expect(outcome.details['kid']).toBe('key-1');
    });

    it('should refuse a revoked key when the header carries no kid', async () => {
      keySource.revokeKey(ISSUER, 'key-1');

      const outcome = await verifier.verify(await ap2Draft({ kid: null }));

      expect(outcome.status).toBe(VerificationStatus.FAILED);
      expect(outcome.reason).toBe(VerificationReason.KEY_REVOKED);
      expect(outcome.details['kid']).toBeNull();
    });

    it('should not match a kid-less header against a revoked key beside live ones', async () => {
      const other = await signingKey('key-2');
      keySource.registerIssuer(ISSUER, Protocol.AP2, { kind: 'jwks', keys: [key.jwk, other.jwk] });
      keySource.revokeKey(ISSUER, 'key-1');

      const outcome = await verifier.verify(await ap2Draft({ kid: null }));

      expect(outcome.status).toBe(VerificationStatus.FAILED);
      expect(outcome.reason).toBe(VerificationReason.SIGNATURE_INVALID);
    });

    it('should refuse algorithms outside the allow list', async () => {
      const rsaOnly = new TrustVerifier(truststoreOver(keySource), {
        allowedAlgorithms: ['RS256'],
        clockToleranceSeconds: 0,
        clock: () => NOW,
      });

      const outcome = await rsaOnly.verify(await ap2Draft());

      expect(outcome.reason).toBe(VerificationReason.ALGORITHM_NOT_ALLOWED);
    });

    it('should report an expired credential', async () => {
      const outcome = await verifier.verify(await ap2Draft({ exp: NOW_SECONDS - 60 }));

      expect(outcome.reason).toBe(VerificationReason.EXPIRED);
    });

    it('should report a credential that is not valid yet', async () => {
      const outcome = await verifier.verify(await ap2Draft({ nbf: NOW_SECONDS + 600 }));

      expect(outcome.reason).toBe(VerificationReason.NOT_YET_VALID);
    });

    it('should refuse an issuer registered with non-JWKS material', async () => {
      keySource.registerIssuer(ISSUER, Protocol.AP2, {
        kind: 'shared-secret',
        secrets: ['test-secret'],
      });

      const outcome = await verifier.verify(await ap2Draft());

      expect(outcome.reason).toBe(VerificationReason.KEY_TYPE_MISMATCH);
      expect(outcome.details['keyKind']).toBe('shared-secret');
    });
  });

  describe('truststore failures', () => {
    const draft = () =>
      normalizer.normalize({
        protocol: 'ACP',
        tenantId: 'tenant-a',
        payload: factory.acpToken({ secret: 'test-secret' }),
      });

    it('should fail an unknown issuer', async () => {
      const outcome = await verifier.verify(draft());

      expect(outcome.status).toBe(VerificationStatus.FAILED);
      expect(outcome.reason).toBe(VerificationReason.ISSUER_UNKNOWN);
      expect(outcome.details['message']).toBe('No trusted key material for issuer psp-test');
    });

    it.each([
      ['timeout' as const, VerificationReason.TRUSTSTORE_TIMEOUT],
      ['unavailable' as const, VerificationReason.TRUSTSTORE_UNAVAILABLE],
    ])('should fail closed when the lookup fails with %s', async (reason, expected) => {
      const failing: Truststore = {
        resolveKey: async (issuer, protocol) => {
          throw new TrustResolutionError('lookup failed', reason, issuer, protocol);
        },
      };
      const outcome = await new TrustVerifier(failing, {
        allowedAlgorithms: DEFAULT_ALLOWED_ALGORITHMS,
        clockToleranceSeconds: 0,
        clock: () => NOW,
      }).verify(draft());

      expect(outcome.status).toBe(VerificationStatus.FAILED);
      expect(outcome.reason).toBe(expected);
    });
  });

  describe('ACP', () => {
    function register(material: KeyMaterial): void {
      keySource.registerIssuer('psp-test', Protocol.ACP, material);
    }

    function acpDraft(payload: ReturnType<CredentialFactory['acpToken']>): AuthorizationDraft {
      return normalizer.normalize({ protocol: 'ACP', tenantId: 'tenant-a', payload });
    }

    it('should verify an HMAC-signed token', async () => {
      register({ kind: 'shared-secret', secrets: ['test-secret'] });

      const outcome = await verifier.verify(acpDraft(factory.acpToken({ secret: 'test-secret' })));

      expect(outcome.status).toBe(VerificationStatus.VERIFIED);
      expect(outcome.reason).toBe(VerificationReason.VERIFIED);
      expect(outcome.details).toEqual({
        issuer: 'psp-test',
        protocol: Protocol.ACP,
        method: 'hmac_signature',
      });
    });

    it('should accept a token signed with a previous secret during rotation', async () => {
      register({ kind: 'shared-secret', secrets: ['next-secret', 'test-secret'] });

      const outcome = await verifier.verify(acpDraft(factory.acpToken({ secret: 'test-secret' })));

      expect(outcome.status).toBe(VerificationStatus.VERIFIED);
    });

    it('should reject a token altered after signing', async () => {
      register({ kind: 'shared-secret', secrets: ['test-secret'] });
      const token = factory.acpToken({ secret: 'test-secret' });
      token['max_amount'] = '9000.00';

      const outcome = await verifier.verify(acpDraft(token));

      expect(outcome.reason).toBe(VerificationReason.SIGNATURE_INVALID);
    });

    it('should require a signature under a shared secret', async () => {
      register({ kind: 'shared-secret', secrets: ['test-secret'] });

      const outcome = await verifier.verify(acpDraft(factory.acpToken()));

      expect(outcome.reason).toBe(VerificationReason.SIGNATURE_MISSING);
    });

    it('should trust an established PSP relationship without a signature', async () => {
      register({ kind: 'trust-relationship', establishedAt: new Date('2025-06-01T00:00:00.000Z') });

      const outcome = await verifier.verify(acpDraft(factory.acpToken()));

      expect(outcome.status).toBe(VerificationStatus.VERIFIED);
      expect(outcome.reason).toBe(VerificationReason.TRUSTED_RELATIONSHIP);
      expect(outcome.details['method']).toBe('trust_relationship');
    });

    it('should refuse JWKS material for ACP issuers', async () => {
      register({ kind: 'jwks', keys: [] });

      const outcome = await verifier.verify(acpDraft(factory.acpToken()));

      expect(outcome.reason).toBe(VerificationReason.KEY_TYPE_MISMATCH);
    });

    it('should fail an expired token', async () => {
      register({ kind: 'shared-secret', secrets: ['test-secret'] });
      const token = factory.acpToken({
        secret: 'test-secret',
        expiresAt: new Date('2025-12-31T00:00:00.000Z'),
      });

      const outcome = await verifier.verify(acpDraft(token));

      expect(outcome.reason).toBe(VerificationReason.EXPIRED);
      expect(outcome.details['expiresAt']).toBe('2025-12-31T00:00:00.000Z');
    });

    it('should fail a zero spending limit', async () => {
      register({ kind: 'shared-secret', secrets: ['test-secret'] });

      const outcome = await verifier.verify(
        acpDraft(factory.acpToken({ secret: 'test-secret', maxAmount: '0.00' })),
      );

      expect(outcome.reason).toBe(VerificationReason.INVALID_LIMIT);
    });

    it('should fail when the merchant constraint names another merchant', async () => {
      register({ kind: 'shared-secret', secrets: ['test-secret'] });

      const outcome = await verifier.verify(
        acpDraft(
          factory.acpToken({ secret: 'test-secret', constraints: { merchant: 'merchant-999' } }),
        ),
      );

      expect(outcome.reason).toBe(VerificationReason.MERCHANT_MISMATCH);
      expect(outcome.details['constraintMerchant']).toBe('merchant-999');
    });
  });
});
