/**
 * Outbound event types webhooks can subscribe to
 */
export enum WebhookEventType {
  AUTHORIZATION_CREATED = 'authorization.created',
  AUTHORIZATION_VERIFIED = 'authorization.verified',
  AUTHORIZATION_VERIFICATION_FAILED = 'authorization.verification_failed',
  AUTHORIZATION_EXPIRED = 'authorization.expired',
  AUTHORIZATION_REVOKED = 'authorization.revoked',
  AUTHORIZATION_USED = 'authorization.used',
  AUTHORIZATION_DELETED = 'authorization.deleted',
}

const KNOWN_EVENT_TYPES = new Set<string>(Object.values(WebhookEventType));

/**
 * Type guard for subscription event lists coming from the outside
 */
export function isWebhookEventType(value: string): value is WebhookEventType {
  return KNOWN_EVENT_TYPES.has(value);
}
