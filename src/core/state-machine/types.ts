import { AuthorizationStatus, TriggerType } from '../domain/enums';

/**
 * State transition definition
 */
export interface StateTransition {
  from: AuthorizationStatus;
  to: AuthorizationStatus;
  triggers: TriggerType[];
  conditions?: TransitionCondition[];
  guards?: TransitionGuard[];
  metadata?: Record<string, unknown>;
}

/**
 * Transition condition - must be met for transition to be valid
 */
export interface TransitionCondition {
  name: string;
  evaluate: (context: TransitionContext) => boolean | Promise<boolean>;
  errorMessage?: string;
}

/**
 * Transition guard - can block transition with reason
 */
export interface TransitionGuard {
  name: string;
  check: (context: TransitionContext) => GuardResult | Promise<GuardResult>;
}

/**
 * Guard result
 */
export interface GuardResult {
  allowed: boolean;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Context for evaluating transitions
 */
export interface TransitionContext {
  currentStatus: AuthorizationStatus;
  targetStatus: AuthorizationStatus;
  triggerType: TriggerType;
  expiresAt?: Date;
  now?: Date;
  reason?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Transition result
 */
export interface TransitionResult {
  success: boolean;
  fromStatus: AuthorizationStatus;
  toStatus: AuthorizationStatus;
  reason?: string;
  guardFailures?: string[];
  conditionFailures?: string[];
  metadata?: Record<string, unknown>;
}

/**
 * State machine configuration
 */
export interface StateMachineConfig {
  transitions: StateTransition[];
  strictMode?: boolean; // If true, only explicitly defined transitions are allowed
}

/**
 * Revocation attempted on an already revoked authorization
 */
export class AlreadyRevokedError extends Error {
  constructor(
    message: string,
    public readonly authorizationId: string,
    public readonly revokedAt: Date | null,
  ) {
    super(message);
    this.name = 'AlreadyRevokedError';
  }
}

/**
 * Transition rejected by the rules table, a guard or a condition
 */
export class InvalidTransitionError extends Error {
  constructor(
    message: string,
    public readonly fromStatus: AuthorizationStatus,
    public readonly toStatus: AuthorizationStatus,
    public readonly result?: TransitionResult,
  ) {
    super(message);
    this.name = 'InvalidTransitionError';
  }
}

/**
 * Creation refused because the credential is already past expiry.
 * Only raised when rejectExpiredOnCreate is enabled.
 */
export class ExpiredCredentialError extends Error {
  constructor(
    message: string,
    public readonly expiresAt: Date,
  ) {
    super(message);
    this.name = 'ExpiredCredentialError';
  }
}
