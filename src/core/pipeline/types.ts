import { AuthorizationStatus, InboundEventType } from '../domain/enums';
import { Authorization, InboundEvent, JsonObject } from '../domain/models';

/**
 * Inbound protocol webhook context passed through the pipeline
 */
export interface InboundWebhookContext {
  // Raw input
  tenantId: string;
  rawBody: Buffer;
  headers: Record<string, string>;
  receivedAt: Date;

  // Processing metadata
  processingId: string;

  // Parsed event
  event?: InboundWebhookEvent;

  // Dedupe claim; set once the event is owned by this call
  inboundEvent?: InboundEvent;

  // Target authorization, refreshed after the lifecycle stage
  authorization?: Authorization;

  metadata: JsonObject;
}

/**
 * Validated inbound event body
 */
export interface InboundWebhookEvent {
  eventId: string;
  eventType: InboundEventType;
  timestamp: Date;
  tokenId: string;
  data: JsonObject;
  payload: JsonObject;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  success: boolean;
  context: InboundWebhookContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: JsonObject;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: InboundWebhookContext): Promise<StageResult>;
}

/**
 * Secrets a tenant's PSP signs inbound webhooks with; empty when unconfigured
 */
export type TenantSecretResolver = (tenantId: string) => string[];

export type InboundOutcome = 'processed' | 'already_processed' | 'rejected' | 'failed';

/**
 * Processing result returned by the pipeline
 */
export interface InboundProcessingResult {
  success: boolean;
  outcome: InboundOutcome;
  eventId: string | null;
  authorizationId: string | null;
  authorizationStatus: AuthorizationStatus | null;
  error?: PipelineError;
  stageDurations: Record<string, number>;
}

/**
 * Pipeline error with the failing stage and the domain error as cause
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly context: InboundWebhookContext,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Missing or invalid X-ACP-Signature
 */
export class InboundSignatureError extends Error {
  constructor(
    message: string,
    public readonly tenantId: string,
  ) {
    super(message);
    this.name = 'InboundSignatureError';
  }
}

/**
 * Body is not a valid inbound event
 */
export class InboundPayloadError extends Error {
  constructor(
    message: string,
    public readonly field: string | null = null,
  ) {
    super(message);
    this.name = 'InboundPayloadError';
  }
}

export class UnsupportedEventTypeError extends Error {
  constructor(
    message: string,
    public readonly eventType: string,
  ) {
    super(message);
    this.name = 'UnsupportedEventTypeError';
  }
}

/**
 * The token's PSP is not on the configured allowlist
 */
export class PspNotAllowedError extends Error {
  constructor(
    message: string,
    public readonly pspId: string,
    public readonly allowlist: string[],
  ) {
    super(message);
    this.name = 'PspNotAllowedError';
  }
}

/**
 * Event already claimed by an earlier delivery; reported as success
 */
export class DuplicateEventError extends Error {
  constructor(
    message: string,
    public readonly eventId: string,
    public readonly existingEventId: string,
  ) {
    super(message);
    this.name = 'DuplicateEventError';
  }
}
