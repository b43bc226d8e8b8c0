/**
 * Centralized Swagger decorators for the HTTP API
 *
 * These decorators provide consistent API documentation across all controllers
 * while keeping the controllers clean and focused on business logic.
 */

export * from './authorization.decorators';
export * from './webhook.decorators';
export * from './alert.decorators';
export * from './health.decorators';
