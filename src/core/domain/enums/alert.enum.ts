/**
 * Operator-facing alert categories
 */
export enum AlertType {
  WEBHOOK_DELIVERY_FAILED = 'WEBHOOK_DELIVERY_FAILED',
  TRUSTSTORE_UNAVAILABLE = 'TRUSTSTORE_UNAVAILABLE',
  VERIFICATION_FAILED = 'VERIFICATION_FAILED',
}

export enum AlertSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}
