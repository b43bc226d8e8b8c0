/**
 * Centralized DTOs for the HTTP API
 *
 * These DTOs provide input validation and Swagger documentation
 * for all API endpoints.
 */

export * from './authorization.dto';
export * from './webhook-subscription.dto';
export * from './alert.dto';
