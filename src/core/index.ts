/**
 * Mandate engine core - protocol-agnostic authorization verification and lifecycle
 * Database and transport agnostic
 */

// Domain models
export * from './domain/models';
export * from './domain/enums';
export * from './domain/value-objects/amount.vo';

// Interfaces and contracts
export * from './interfaces';

// Utilities
export * from './utils';

// Credential normalization and trust verification
export * from './normalizer';
export * from './verification';

// State machine
export * from './state-machine';

// Core services
export * from './services';

// Webhook delivery
export * from './delivery';

// Background scheduling
export * from './scheduling';

// Inbound protocol webhook pipeline
export * from './pipeline';

// Event system
export * from './events';
