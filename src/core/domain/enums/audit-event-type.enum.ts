/**
 * Audit event types for tracking authorization history
 */
export enum AuditEventType {
  CREATED = 'CREATED',
  VERIFIED = 'VERIFIED',
  VERIFICATION_FAILED = 'VERIFICATION_FAILED',
  VERIFICATION_PENDING = 'VERIFICATION_PENDING',
  EXPIRED = 'EXPIRED',
  REVOKED = 'REVOKED',
  USED = 'USED',
  SOFT_DELETED = 'SOFT_DELETED',
  PURGED = 'PURGED',
  EVIDENCE_EXPORTED = 'EVIDENCE_EXPORTED',
}
