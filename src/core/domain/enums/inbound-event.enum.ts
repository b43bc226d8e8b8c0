/**
 * Event types accepted on the inbound ACP webhook
 */
export enum InboundEventType {
  TOKEN_USED = 'token.used',
  TOKEN_REVOKED = 'token.revoked',
}

export function parseInboundEventType(value: string): InboundEventType | null {
  switch (value) {
    case InboundEventType.TOKEN_USED:
      return InboundEventType.TOKEN_USED;
    case InboundEventType.TOKEN_REVOKED:
      return InboundEventType.TOKEN_REVOKED;
    default:
      return null;
  }
}

/**
 * Processing state of a claimed inbound event
 */
export enum InboundEventStatus {
  /**
   * Claimed by a processor, not yet finished
   */
  PROCESSING = 'processing',

  /**
   * Lifecycle effect applied
   */
  PROCESSED = 'processed',

  /**
   * Processing failed after the claim; may be re-claimed by a redelivery
   */
  FAILED = 'failed',
}
