import { StorageAdapter } from '../../interfaces';
import {
  DuplicateEventError,
  InboundWebhookContext,
  PipelineStage,
  StageResult,
} from '../types';

/**
 * Stage 3: Deduplication
 * Claims (tenantId, eventId) under a lease; an event already processing or
 * processed stops the pipeline without error. A FAILED event, or one whose
 * lease lapsed mid-processing, is claimed again.
 */
export class DeduplicationStage implements PipelineStage {
  name = 'deduplication';

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly claimLeaseMs: number,
  ) {}

  async execute(context: InboundWebhookContext): Promise<StageResult> {
    const event = context.event;
    if (!event) {
      throw new Error('Deduplication requires a parsed event');
    }

    const { claimed, event: record } = await this.storageAdapter.claimInboundEvent({
      tenantId: context.tenantId,
      eventId: event.eventId,
      eventType: event.eventType,
      tokenId: event.tokenId,
      payload: event.payload,
      receivedAt: context.receivedAt,
      leaseMs: this.claimLeaseMs,
    });

    if (!claimed) {
      return {
        success: true,
        context,
        shouldContinue: false,
        error: new DuplicateEventError(
          `Event ${event.eventId} already ${record.status}`,
          event.eventId,
          record.id,
        ),
        metadata: {
          isDuplicate: true,
          existingStatus: record.status,
          authorizationId: record.authorizationId,
        },
      };
    }

    context.inboundEvent = record;
    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { isDuplicate: false },
    };
  }
}
