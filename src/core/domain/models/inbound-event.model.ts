import { InboundEventStatus } from '../enums';
import { JsonObject } from './json.types';

/**
 * InboundEvent domain model - dedupe and processing record for a protocol
 * webhook, unique per (tenantId, eventId)
 */
export class InboundEvent {
  constructor(
    public readonly id: string,
    public readonly tenantId: string,
    public readonly eventId: string,
    public readonly eventType: string,
    public readonly tokenId: string | null,
    public readonly payload: JsonObject,
    public readonly status: InboundEventStatus,
    public readonly authorizationId: string | null = null,
    public readonly errorMessage: string | null = null,
    public readonly receivedAt: Date = new Date(),
    public readonly processedAt: Date | null = null,
    public readonly claimedUntil: Date | null = null,
  ) {}

  isSettled(): boolean {
    return this.status === InboundEventStatus.PROCESSED;
  }

  /**
   * A failed event, or one whose processing lease has lapsed, may be claimed again
   */
  isClaimable(now: Date): boolean {
    if (this.status === InboundEventStatus.FAILED) {
      return true;
    }
    return (
      this.status === InboundEventStatus.PROCESSING &&
      (this.claimedUntil === null || this.claimedUntil.getTime() <= now.getTime())
    );
  }
}
