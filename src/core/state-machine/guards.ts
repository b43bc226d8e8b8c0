import {
  TransitionGuard,
  TransitionCondition,
  GuardResult,
  TransitionContext,
} from './types';
import { AuthorizationStatus } from '../domain/enums';

/**
 * Guard: revocation needs a non-empty reason
 */
export const RequireRevokeReasonGuard: TransitionGuard = {
  name: 'RequireRevokeReason',
  check: (context: TransitionContext): GuardResult => {
    if (
      context.targetStatus === AuthorizationStatus.REVOKED &&
      !context.reason?.trim()
    ) {
      return {
        allowed: false,
        reason: 'A reason is required to revoke an authorization',
      };
    }
    return { allowed: true };
  },
};

/**
 * Condition: expires_at <= now
 */
export const ExpiryReachedCondition: TransitionCondition = {
  name: 'ExpiryReached',
  evaluate: (context: TransitionContext): boolean => {
    if (!context.expiresAt || !context.now) {
      return false;
    }
    return context.expiresAt.getTime() <= context.now.getTime();
  },
  errorMessage: 'Authorization has not reached its expiry',
};
