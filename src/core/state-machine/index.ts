/**
 * Authorization lifecycle state machine
 */

export * from './authorization-state-machine';
export * from './types';
export * from './transition-rules';
export * from './guards';
export * from './validator';
