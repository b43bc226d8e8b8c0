import { WebhookEventType } from '../domain/enums';

/**
 * Outbound HTTP request for one delivery attempt
 */
export interface WebhookRequest {
  url: string;
  body: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

/**
 * Transport-level response; a thrown error means no response was received
 */
export interface WebhookResponse {
  statusCode: number;
  body: string;
}

/**
 * Sends a signed delivery. Implementations must honour timeoutMs.
 */
export interface WebhookTransport {
  send(request: WebhookRequest): Promise<WebhookResponse>;
}

/**
 * Outbound wire payload
 */
export interface WebhookPayload {
  event_id: string;
  event_type: WebhookEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

export interface WebhookDispatcherOptions {
  /**
   * Deliveries claimed per retry scan
   */
  batchSize: number;

  /**
   * How long a claim stays exclusive before another worker may take it
   */
  claimLeaseMs: number;

  /**
   * response_body is truncated to this many characters
   */
  responseBodyLimit: number;
}

export const DEFAULT_DISPATCHER_OPTIONS: WebhookDispatcherOptions = {
  batchSize: 50,
  claimLeaseMs: 120_000,
  responseBodyLimit: 1000,
};

/**
 * Outcome of a single attempt
 */
export type AttemptOutcome =
  | 'delivered'
  | 'retry_scheduled'
  | 'exhausted'
  | 'cancelled'
  | 'claim_lost';

/**
 * A delivery ran out of retries; surfaced as an Alert, never to the caller
 */
export class DeliveryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly deliveryId: string,
    public readonly webhookId: string,
    public readonly tenantId: string,
    public readonly eventType: WebhookEventType,
    public readonly attempts: number,
    public readonly lastStatusCode: number | null,
  ) {
    super(message);
    this.name = 'DeliveryExhaustedError';
  }
}

/**
 * Delivery attempt ended without an HTTP response
 */
export class DeliveryTransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly timedOut: boolean,
  ) {
    super(message);
    this.name = 'DeliveryTransportError';
  }
}
