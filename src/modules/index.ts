/**
 * NestJS integration for the mandate engine
 */

export * from './mandate';
