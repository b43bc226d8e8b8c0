import type { JWK } from 'jose';
import { Protocol } from '../domain/enums';
import { isJsonObject } from '../domain/models';
import { KeyMaterial, KeySource } from './types';

export interface RemoteJwksOptions {
  /**
   * Explicit issuer → JWKS URL mapping
   */
  issuerUrls?: Record<string, string>;

  /**
   * Derive https://<domain>/.well-known/jwks.json for did:web issuers
   */
  resolveDidWeb?: boolean;
}

/**
 * Fetches AP2 issuer key sets over HTTP
 */
export class RemoteJwksKeySource implements KeySource {
  readonly name = 'remote-jwks';

  constructor(
    private readonly options: RemoteJwksOptions = {},
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  supports(protocol: Protocol): boolean {
    return protocol === Protocol.AP2;
  }

  async fetchKeyMaterial(
    issuer: string,
    _protocol: Protocol,
    signal: AbortSignal,
  ): Promise<KeyMaterial | null> {
    const url = this.resolveUrl(issuer);
    if (!url) {
      return null;
    }

    const response = await this.fetchImpl(url, {
      signal,
      headers: { Accept: 'application/json' },
    });

    if (response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new Error(`JWKS endpoint ${url} returned ${response.status}`);
    }

    const body: unknown = await response.json();
    return { kind: 'jwks', keys: parseKeySet(body, url) };
  }

  resolveUrl(issuer: string): string | null {
    const explicit = this.options.issuerUrls?.[issuer];
    if (explicit) {
      return explicit;
    }
    if (this.options.resolveDidWeb && issuer.startsWith('did:web:')) {
      const domainPath = issuer
        .slice('did:web:'.length)
        .split(':')
        .map(decodeURIComponent)
        .join('/');
      return `https://${domainPath}/.well-known/jwks.json`;
    }
    return null;
  }
}

function parseKeySet(body: unknown, url: string): JWK[] {
  if (!isJsonObject(body) || !Array.isArray(body['keys'])) {
    throw new Error(`JWKS from ${url} has no keys array`);
  }

  const keys: JWK[] = [];
  for (const candidate of body['keys']) {
    if (!isJsonObject(candidate) || typeof candidate['kty'] !== 'string') {
      throw new Error(`JWKS from ${url} contains a key without kty`);
    }
    keys.push({ ...candidate, kty: candidate['kty'] });
  }

  if (keys.length === 0) {
    throw new Error(`JWKS from ${url} is empty`);
  }
  return keys;
}
