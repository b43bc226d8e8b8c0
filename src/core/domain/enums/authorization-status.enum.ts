import { Protocol } from './protocol.enum';

/**
 * Authorization lifecycle states
 * State machine enforced - transitions validated by AuthorizationStateMachine
 */
export enum AuthorizationStatus {
  /**
   * Live AP2 credential
   */
  VALID = 'VALID',

  /**
   * Live ACP token
   */
  ACTIVE = 'ACTIVE',

  /**
   * Expiry reached; may still be revoked
   */
  EXPIRED = 'EXPIRED',

  /**
   * Revoked (terminal state)
   */
  REVOKED = 'REVOKED',
}

/**
 * Helper to determine if a status is terminal (no further transitions possible)
 */
export function isTerminalStatus(status: AuthorizationStatus): boolean {
  return status === AuthorizationStatus.REVOKED;
}

/**
 * Helper to determine if a status counts as live
 */
export function isLiveStatus(status: AuthorizationStatus): boolean {
  return (
    status === AuthorizationStatus.VALID ||
    status === AuthorizationStatus.ACTIVE
  );
}

/**
 * Live status in the protocol's own vocabulary
 */
export function liveStatusFor(protocol: Protocol): AuthorizationStatus {
  return protocol === Protocol.AP2
    ? AuthorizationStatus.VALID
    : AuthorizationStatus.ACTIVE;
}
