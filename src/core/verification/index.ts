export * from './types';
export { CachingTruststore, CachingTruststoreOptions } from './caching-truststore';
export { StaticKeySource, IssuerRegistration } from './static-key-source';
export { RemoteJwksKeySource, RemoteJwksOptions } from './remote-jwks-key-source';
export {
  TrustVerifier,
  TrustVerifierOptions,
  DEFAULT_ALLOWED_ALGORITHMS,
  acpSigningPayload,
} from './trust-verifier';
