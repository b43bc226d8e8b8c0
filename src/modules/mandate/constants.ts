/**
 * Injection tokens for the mandate module
 */

export const MANDATE_CONFIG = Symbol('MANDATE_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const STATIC_KEY_SOURCE = Symbol('STATIC_KEY_SOURCE');
export const TRUSTSTORE = Symbol('TRUSTSTORE');
export const TRUST_VERIFIER = Symbol('TRUST_VERIFIER');
export const CREDENTIAL_NORMALIZER = Symbol('CREDENTIAL_NORMALIZER');
export const AUTHORIZATION_STATE_MACHINE = Symbol('AUTHORIZATION_STATE_MACHINE');
export const AUDIT_RECORDER = Symbol('AUDIT_RECORDER');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const ALERT_SERVICE = Symbol('ALERT_SERVICE');
export const WEBHOOK_DISPATCHER = Symbol('WEBHOOK_DISPATCHER');
export const AUTHORIZATION_SERVICE = Symbol('AUTHORIZATION_SERVICE');
export const EVIDENCE_SERVICE = Symbol('EVIDENCE_SERVICE');
export const WEBHOOK_SUBSCRIPTION_SERVICE = Symbol('WEBHOOK_SUBSCRIPTION_SERVICE');
export const INBOUND_WEBHOOK_PROCESSOR = Symbol('INBOUND_WEBHOOK_PROCESSOR');

/**
 * Header carrying the caller's tenant; authenticated upstream
 */
export const TENANT_HEADER = 'x-tenant-id';
