/**
 * How a state transition was triggered
 * Used in audit events to track transition source
 */
export enum TriggerType {
  /**
   * Initial status assignment on creation
   */
  CREATE = 'create',

  /**
   * Periodic expiry sweep
   */
  EXPIRY_SWEEP = 'expiry_sweep',

  /**
   * Explicit API or operator action
   */
  MANUAL = 'manual',

  /**
   * Inbound protocol webhook (e.g. ACP token.revoked)
   */
  PROTOCOL_WEBHOOK = 'protocol_webhook',
}
