/**
 * Mandate Engine
 *
 * Protocol-agnostic verification and lifecycle tracking for AP2 and ACP
 * payment authorizations, with signed outbound webhooks.
 */

// Core domain, verification, lifecycle and delivery
export * from './core';

// Storage adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';

// NestJS module, controllers and tokens
export * from './modules';

// Swagger decorators for custom controllers
export * from './_shared/swagger';
