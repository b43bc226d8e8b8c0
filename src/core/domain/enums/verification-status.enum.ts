/**
 * Trust verifier verdict, independent of lifecycle status
 */
export enum VerificationStatus {
  VERIFIED = 'VERIFIED',
  FAILED = 'FAILED',
  PENDING = 'PENDING',
}

/**
 * Machine-readable reasons attached to a verification outcome
 */
export enum VerificationReason {
  VERIFIED = 'VERIFIED',
  TRUSTED_RELATIONSHIP = 'TRUSTED_RELATIONSHIP',
  VERIFICATION_SKIPPED = 'VERIFICATION_SKIPPED',

  // Truststore
  ISSUER_UNKNOWN = 'ISSUER_UNKNOWN',
  TRUSTSTORE_UNAVAILABLE = 'TRUSTSTORE_UNAVAILABLE',
  TRUSTSTORE_TIMEOUT = 'TRUSTSTORE_TIMEOUT',
  KEY_TYPE_MISMATCH = 'KEY_TYPE_MISMATCH',
  KEY_NOT_FOUND = 'KEY_NOT_FOUND',
  KEY_REVOKED = 'KEY_REVOKED',

  // Signature
  ALGORITHM_NOT_ALLOWED = 'ALGORITHM_NOT_ALLOWED',
  SIGNATURE_INVALID = 'SIGNATURE_INVALID',
  SIGNATURE_MISSING = 'SIGNATURE_MISSING',

  // Claims
  EXPIRED = 'EXPIRED',
  NOT_YET_VALID = 'NOT_YET_VALID',
  INVALID_LIMIT = 'INVALID_LIMIT',
  MERCHANT_MISMATCH = 'MERCHANT_MISMATCH',

  VERIFICATION_ERROR = 'VERIFICATION_ERROR',
}
