import { AuthorizationStatus, TriggerType } from '../domain/enums';
import { StateTransition } from './types';
import { ExpiryReachedCondition, RequireRevokeReasonGuard } from './guards';

/**
 * Authorization lifecycle transition rules
 *
 * Key principles:
 * - REVOKED is terminal
 * - EXPIRED can still be revoked
 * - Usage and soft delete never change status
 */
export const TRANSITION_RULES: StateTransition[] = [
  // ============ Expiry ============

  {
    from: AuthorizationStatus.VALID,
    to: AuthorizationStatus.EXPIRED,
    triggers: [TriggerType.EXPIRY_SWEEP],
    conditions: [ExpiryReachedCondition],
    metadata: { description: 'AP2 credential reached expires_at' },
  },
  {
    from: AuthorizationStatus.ACTIVE,
    to: AuthorizationStatus.EXPIRED,
    triggers: [TriggerType.EXPIRY_SWEEP],
    conditions: [ExpiryReachedCondition],
    metadata: { description: 'ACP token reached expires_at' },
  },

  // ============ Revocation ============

  {
    from: AuthorizationStatus.VALID,
    to: AuthorizationStatus.REVOKED,
    triggers: [TriggerType.MANUAL, TriggerType.PROTOCOL_WEBHOOK],
    guards: [RequireRevokeReasonGuard],
    metadata: { description: 'Live credential revoked', terminal: true },
  },
  {
    from: AuthorizationStatus.ACTIVE,
    to: AuthorizationStatus.REVOKED,
    triggers: [TriggerType.MANUAL, TriggerType.PROTOCOL_WEBHOOK],
    guards: [RequireRevokeReasonGuard],
    metadata: { description: 'Live token revoked', terminal: true },
  },
  {
    from: AuthorizationStatus.EXPIRED,
    to: AuthorizationStatus.REVOKED,
    triggers: [TriggerType.MANUAL, TriggerType.PROTOCOL_WEBHOOK],
    guards: [RequireRevokeReasonGuard],
    metadata: {
      description: 'Expired credential revoked',
      terminal: true,
      note: 'Only REVOKED is terminal, so an expired record may still be revoked',
    },
  },
];

/**
 * Get terminal states (no further transitions possible)
 */
export function getTerminalStates(): AuthorizationStatus[] {
  return [AuthorizationStatus.REVOKED];
}

/**
 * Check if a status is terminal
 */
export function isTerminalState(status: AuthorizationStatus): boolean {
  return getTerminalStates().includes(status);
}
