import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { InboundEventStatus } from '../domain/enums';
import { StorageAdapter } from '../interfaces';
import { AuthorizationService } from '../services/authorization.service';
import { Clock, systemClock } from '../utils';
import {
  DuplicateEventError,
  InboundProcessingResult,
  InboundWebhookContext,
  PipelineError,
  PipelineStage,
  TenantSecretResolver,
} from './types';
import { SignatureVerificationStage } from './stages/signature-verification.stage';
import { ParseStage } from './stages/parse.stage';
import { DeduplicationStage } from './stages/deduplication.stage';
import { ResolveAuthorizationStage } from './stages/resolve-authorization.stage';
import { LifecycleStage } from './stages/lifecycle.stage';

export interface InboundPipelineConfig {
  storageAdapter: StorageAdapter;
  authorizationService: AuthorizationService;
  resolveSecrets: TenantSecretResolver;
  pspAllowlist?: string[];
  /**
   * Lease on a claimed event; a worker that dies mid-event frees it once this lapses
   */
  claimLeaseMs?: number;
  clock?: Clock;
}

export const DEFAULT_INBOUND_CLAIM_LEASE_MS = 5 * 60 * 1000;

/**
 * InboundWebhookProcessor runs protocol webhooks through the pipeline
 *
 * Pipeline stages:
 * 1. Signature verification - X-ACP-Signature over the raw body
 * 2. Parse - validate the event body
 * 3. Deduplication - claim (tenant, event_id)
 * 4. Resolve authorization - token lookup and PSP allowlist
 * 5. Lifecycle - revoke or record usage
 */
export class InboundWebhookProcessor {
  private readonly logger = new Logger(InboundWebhookProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly clock: Clock;

  constructor(private readonly config: InboundPipelineConfig) {
    this.clock = config.clock ?? systemClock;
    this.stages = [
      new SignatureVerificationStage(config.resolveSecrets),
      new ParseStage(),
      new DeduplicationStage(
        config.storageAdapter,
        config.claimLeaseMs ?? DEFAULT_INBOUND_CLAIM_LEASE_MS,
      ),
      new ResolveAuthorizationStage(config.storageAdapter, config.pspAllowlist ?? []),
      new LifecycleStage(config.authorizationService),
    ];
  }

  /**
   * Process an inbound webhook. Failures are reported in the result, never thrown.
   */
  async process(
    tenantId: string,
    rawBody: Buffer,
    headers: Record<string, string | string[] | undefined>,
  ): Promise<InboundProcessingResult> {
    const context: InboundWebhookContext = {
      tenantId,
      rawBody,
      headers: this.normalizeHeaders(headers),
      receivedAt: this.clock(),
      processingId: uuidv4(),
      metadata: {},
    };
    const stageDurations: Record<string, number> = {};

    try {
      const duplicate = await this.executePipeline(context, stageDurations);

      if (duplicate) {
        this.logger.log(`Event ${duplicate.eventId} for tenant ${tenantId} already processed`);
        return {
          success: true,
          outcome: 'already_processed',
          eventId: duplicate.eventId,
          authorizationId: null,
          authorizationStatus: null,
          stageDurations,
        };
      }

      if (context.inboundEvent) {
        await this.config.storageAdapter.completeInboundEvent(
          context.inboundEvent.id,
          InboundEventStatus.PROCESSED,
          { authorizationId: context.authorization?.id ?? null },
        );
      }

      this.logger.log(
        `Processed ${context.event?.eventType} ${context.event?.eventId} for authorization ${context.authorization?.id}`,
      );

      return {
        success: true,
        outcome: 'processed',
        eventId: context.event?.eventId ?? null,
        authorizationId: context.authorization?.id ?? null,
        authorizationStatus: context.authorization?.status ?? null,
        stageDurations,
      };
    } catch (error) {
      const pipelineError =
        error instanceof PipelineError
          ? error
          : new PipelineError(
              `Pipeline failed: ${error instanceof Error ? error.message : String(error)}`,
              'pipeline',
              context,
              error instanceof Error ? error : undefined,
            );

      const claimed = context.inboundEvent !== undefined;
      if (context.inboundEvent) {
        await this.markFailed(context.inboundEvent.id, pipelineError);
      }

      this.logger.warn(
        `Inbound webhook for tenant ${tenantId} ${claimed ? 'failed' : 'rejected'} at ${pipelineError.stage}: ${pipelineError.cause?.message ?? pipelineError.message}`,
      );

      return {
        success: false,
        outcome: claimed ? 'failed' : 'rejected',
        eventId: context.event?.eventId ?? null,
        authorizationId: context.authorization?.id ?? null,
        authorizationStatus: context.authorization?.status ?? null,
        error: pipelineError,
        stageDurations,
      };
    }
  }

  getStatistics(): { stages: string[]; pspAllowlist: string[] } {
    return {
      stages: this.stages.map((s) => s.name),
      pspAllowlist: [...(this.config.pspAllowlist ?? [])],
    };
  }

  /**
   * Execute the stages sequentially; returns the duplicate marker when the
   * event had already been claimed
   */
  private async executePipeline(
    context: InboundWebhookContext,
    stageDurations: Record<string, number>,
  ): Promise<DuplicateEventError | null> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        stageDurations[stage.name] = Date.now() - stageStartTime;

        if (result.error instanceof DuplicateEventError) {
          return result.error;
        }
        if (!result.success && result.error) {
          throw result.error;
        }
        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        stageDurations[stage.name] = Date.now() - stageStartTime;

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }
    }
    return null;
  }

  private async markFailed(inboundEventId: string, error: PipelineError): Promise<void> {
    try {
      await this.config.storageAdapter.completeInboundEvent(
        inboundEventId,
        InboundEventStatus.FAILED,
        { errorMessage: error.cause?.message ?? error.message },
      );
    } catch (markError) {
      this.logger.error(
        `Failed to mark inbound event ${inboundEventId} as failed`,
        markError instanceof Error ? markError.stack : String(markError),
      );
    }
  }

  /**
   * Normalize headers to lowercase keys
   */
  private normalizeHeaders(
    headers: Record<string, string | string[] | undefined>,
  ): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (value === undefined) {
        continue;
      }
      normalized[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
    }
    return normalized;
  }
}
