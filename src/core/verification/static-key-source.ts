import { Protocol } from '../domain/enums';
import { KeyMaterial, KeySource } from './types';

export interface IssuerRegistration {
  issuer: string;
  protocol: Protocol;
  material: KeyMaterial;
}

/**
 * In-memory issuer registry, seeded from module configuration
 */
export class StaticKeySource implements KeySource {
  readonly name = 'static';
  private readonly entries = new Map<string, IssuerRegistration>();

  constructor(registrations: IssuerRegistration[] = []) {
    for (const registration of registrations) {
      this.registerIssuer(registration.issuer, registration.protocol, registration.material);
    }
  }

  supports(): boolean {
    return true;
  }

  async fetchKeyMaterial(issuer: string, protocol: Protocol): Promise<KeyMaterial | null> {
    return this.entries.get(this.key(issuer, protocol))?.material ?? null;
  }

  registerIssuer(issuer: string, protocol: Protocol, material: KeyMaterial): void {
    this.entries.set(this.key(issuer, protocol), { issuer, protocol, material });
  }

  removeIssuer(issuer: string, protocol: Protocol): boolean {
    return this.entries.delete(this.key(issuer, protocol));
  }

  /**
   * Mark a JWK as revoked; signatures made with it stop verifying
   */
  revokeKey(issuer: string, kid: string): boolean {
    const entry = this.entries.get(this.key(issuer, Protocol.AP2));
    if (!entry || entry.material.kind !== 'jwks') {
      return false;
    }
    const revoked = new Set(entry.material.revokedKeyIds ?? []);
    revoked.add(kid);
    this.entries.set(this.key(issuer, Protocol.AP2), {
      ...entry,
      material: { ...entry.material, revokedKeyIds: [...revoked] },
    });
    return true;
  }

  listIssuers(): IssuerRegistration[] {
    return [...this.entries.values()];
  }

  private key(issuer: string, protocol: Protocol): string {
    return `${protocol}:${issuer}`;
  }
}
