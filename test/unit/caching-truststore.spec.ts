import {
  CachingTruststore,
  KeyMaterial,
  KeySource,
  Protocol,
  RemoteJwksKeySource,
  StaticKeySource,
  TrustResolutionError,
} from '../../src';

const SHARED: KeyMaterial = { kind: 'shared-secret', secrets: ['test-secret'] };

class CountingSource implements KeySource {
  readonly name = 'counting';
  calls = 0;

  constructor(
    private readonly material: KeyMaterial | null,
    private readonly protocols: Protocol[] = [Protocol.AP2, Protocol.ACP],
  ) {}

  supports(protocol: Protocol): boolean {
    return this.protocols.includes(protocol);
  }

  async fetchKeyMaterial(): Promise<KeyMaterial | null> {
    this.calls += 1;
    return this.material;
  }
}

describe('CachingTruststore', () => {
  it('should cache resolved material per issuer and protocol', async () => {
    const source = new CountingSource(SHARED);
    const truststore = new CachingTruststore([source], { cacheTtlMs: 60_000, resolveTimeoutMs: 1000 });

    await truststore.resolveKey('psp-test', Protocol.ACP);
    const second = await truststore.resolveKey('psp-test', Protocol.ACP);
    await truststore.resolveKey('psp-test', Protocol.AP2);

    expect(second).toEqual(SHARED);
    expect(source.calls).toBe(2);
    expect(truststore.getStatistics()).toEqual({ cachedIssuers: 2, sources: ['counting'] });
  });

  it('should not cache a miss', async () => {
    const source = new CountingSource(null);
    const truststore = new CachingTruststore([source], { cacheTtlMs: 60_000, resolveTimeoutMs: 1000 });

    expect(await truststore.resolveKey('psp-unknown', Protocol.ACP)).toBeNull();
    expect(await truststore.resolveKey('psp-unknown', Protocol.ACP)).toBeNull();
    expect(source.calls).toBe(2);
  });

  it('should consult sources in order and skip unsupported protocols', async () => {
    const ap2Only = new CountingSource(SHARED, [Protocol.AP2]);
    const fallback = new StaticKeySource([
      { issuer: 'psp-test', protocol: Protocol.ACP, material: SHARED },
    ]);
    const truststore = new CachingTruststore([ap2Only, fallback], {
      cacheTtlMs: 60_000,
      resolveTimeoutMs: 1000,
    });

    const material = await truststore.resolveKey('psp-test', Protocol.ACP);

    expect(material).toEqual(SHARED);
    expect(ap2Only.calls).toBe(0);
  });

  it('should raise a timeout and abort the pending lookup', async () => {
    let aborted = false;
    const slow: KeySource = {
      name: 'slow',
      supports: () => true,
      fetchKeyMaterial: (_issuer, _protocol, signal) =>
        new Promise((resolve) => {
          signal.addEventListener('abort', () => {
            aborted = true;
            resolve(null);
          });
        }),
    };
    const truststore = new CachingTruststore([slow], { cacheTtlMs: 60_000, resolveTimeoutMs: 20 });

    const error = await truststore.resolveKey('did:web:slow.test', Protocol.AP2).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TrustResolutionError);
    expect(error).toMatchObject({
      reason: 'timeout',
      issuer: 'did:web:slow.test',
      message: 'Truststore lookup for did:web:slow.test timed out after 20ms',
    });
    expect(aborted).toBe(true);
  });

  it('should wrap source errors as unavailable', async () => {
    const broken: KeySource = {
      name: 'broken',
      supports: () => true,
      fetchKeyMaterial: async () => {
        throw new Error('connection refused');
      },
    };
    const truststore = new CachingTruststore([broken], { cacheTtlMs: 60_000, resolveTimeoutMs: 1000 });

    await expect(truststore.resolveKey('psp-test', Protocol.ACP)).rejects.toMatchObject({
      name: 'TrustResolutionError',
      reason: 'unavailable',
      message: 'Truststore lookup for psp-test failed: connection refused',
    });
  });
});

describe('StaticKeySource', () => {
  it('should register, list and remove issuers', async () => {
    const source = new StaticKeySource();
    source.registerIssuer('psp-test', Protocol.ACP, SHARED);

    expect(source.listIssuers()).toEqual([
      { issuer: 'psp-test', protocol: Protocol.ACP, material: SHARED },
    ]);
    expect(source.removeIssuer('psp-test', Protocol.ACP)).toBe(true);
    expect(await source.fetchKeyMaterial('psp-test', Protocol.ACP)).toBeNull();
  });

  it('should only revoke keys of JWKS issuers', async () => {
    const source = new StaticKeySource([
      { issuer: 'did:web:issuer.test', protocol: Protocol.AP2, material: { kind: 'jwks', keys: [] } },
    ]);

    expect(source.revokeKey('did:web:issuer.test', 'key-1')).toBe(true);
    expect(source.revokeKey('did:web:issuer.test', 'key-1')).toBe(true);
    expect(source.revokeKey('did:web:other.test', 'key-1')).toBe(false);
    expect(await source.fetchKeyMaterial('did:web:issuer.test', Protocol.AP2)).toEqual({
      kind: 'jwks',
      keys: [],
      revokedKeyIds: ['key-1'],
    });
  });
});

describe('RemoteJwksKeySource', () => {
  it('should resolve did:web issuers to their well-known JWKS', () => {
    const source = new RemoteJwksKeySource({ resolveDidWeb: true });

    expect(source.resolveUrl('did:web:issuer.test')).toBe('https://issuer.test/.well-known/jwks.json');
    expect(source.resolveUrl('did:web:issuer.test:tenants:a')).toBe(
      'https://issuer.test/tenants/a/.well-known/jwks.json',
    );
    expect(source.resolveUrl('did:key:abc')).toBeNull();
  });

  it('should prefer explicit issuer URLs and parse the key set', async () => {
    const requested: string[] = [];
    const fetchImpl: typeof fetch = async (input) => {
      requested.push(String(input));
      return new Response(JSON.stringify({ keys: [{ kty: 'EC', kid: 'key-1' }] }), { status: 200 });
    };
    const source = new RemoteJwksKeySource(
      { issuerUrls: { 'did:web:issuer.test': 'https://keys.test/jwks.json' }, resolveDidWeb: true },
      fetchImpl,
    );

    const material = await source.fetchKeyMaterial(
      'did:web:issuer.test',
      Protocol.AP2,
      new AbortController().signal,
    );

    expect(requested).toEqual(['https://keys.test/jwks.json']);
    expect(material).toEqual({ kind: 'jwks', keys: [{ kty: 'EC', kid: 'key-1' }] });
  });

  it('should treat 404 as unknown and other failures as errors', async () => {
    const statuses = [404, 503];
    const fetchImpl: typeof fetch = async () => new Response('', { status: statuses.shift() ?? 500 });
    const source = new RemoteJwksKeySource({ resolveDidWeb: true }, fetchImpl);
    const signal = new AbortController().signal;

    expect(await source.fetchKeyMaterial('did:web:issuer.test', Protocol.AP2, signal)).toBeNull();
    await expect(
      source.fetchKeyMaterial('did:web:issuer.test', Protocol.AP2, signal),
    ).rejects.toThrow('JWKS endpoint https://issuer.test/.well-known/jwks.json returned 503');
  });
});
