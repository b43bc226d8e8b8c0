export * from './types';
export * from './amount-parsing';
export { CredentialNormalizer } from './credential-normalizer';
