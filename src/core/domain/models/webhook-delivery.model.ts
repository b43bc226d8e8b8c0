import { WebhookEventType } from '../enums';
import { JsonObject } from './json.types';

export interface WebhookDeliveryProps {
  id: string;
  webhookId: string;
  tenantId: string;
  authorizationId: string | null;
  eventId: string;
  eventType: WebhookEventType;
  payload: JsonObject;
  statusCode: number | null;
  responseBody: string | null;
  attempts: number;
  deliveredAt: Date | null;
  failedAt: Date | null;
  nextRetryAt: Date | null;
  isDelivered: boolean;
  claimedUntil: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Result of a single attempt, applied atomically to the delivery row
 */
export type DeliveryAttemptUpdate = Pick<
  WebhookDeliveryProps,
  | 'attempts'
  | 'statusCode'
  | 'responseBody'
  | 'deliveredAt'
  | 'failedAt'
  | 'nextRetryAt'
  | 'isDelivered'
>;

/**
 * WebhookDelivery domain model - the delivery audit trail; never deleted
 */
export class WebhookDelivery implements WebhookDeliveryProps {
  readonly id: string;
  readonly webhookId: string;
  readonly tenantId: string;
  readonly authorizationId: string | null;
  readonly eventId: string;
  readonly eventType: WebhookEventType;
  readonly payload: JsonObject;
  readonly statusCode: number | null;
  readonly responseBody: string | null;
  readonly attempts: number;
  readonly deliveredAt: Date | null;
  readonly failedAt: Date | null;
  readonly nextRetryAt: Date | null;
  readonly isDelivered: boolean;
  readonly claimedUntil: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;

  constructor(props: WebhookDeliveryProps) {
    this.id = props.id;
    this.webhookId = props.webhookId;
    this.tenantId = props.tenantId;
    this.authorizationId = props.authorizationId;
    this.eventId = props.eventId;
    this.eventType = props.eventType;
    this.payload = props.payload;
    this.statusCode = props.statusCode;
    this.responseBody = props.responseBody;
    this.attempts = props.attempts;
    this.deliveredAt = props.deliveredAt;
    this.failedAt = props.failedAt;
    this.nextRetryAt = props.nextRetryAt;
    this.isDelivered = props.isDelivered;
    this.claimedUntil = props.claimedUntil;
    this.createdAt = props.createdAt;
    this.updatedAt = props.updatedAt;
  }

  /**
   * Still owed an attempt: neither delivered nor given up on
   */
  isPending(): boolean {
    return !this.isDelivered && this.failedAt === null;
  }

  isDue(now: Date): boolean {
    return (
      this.isPending() &&
      this.nextRetryAt !== null &&
      this.nextRetryAt.getTime() <= now.getTime() &&
      (this.claimedUntil === null || this.claimedUntil.getTime() <= now.getTime())
    );
  }

  /**
   * The lease a worker was handed is still the current one
   */
  isClaimHeld(claimedUntil: Date | null): boolean {
    return (this.claimedUntil?.getTime() ?? null) === (claimedUntil?.getTime() ?? null);
  }

  toProps(): WebhookDeliveryProps {
    return {
      id: this.id,
      webhookId: this.webhookId,
      tenantId: this.tenantId,
      authorizationId: this.authorizationId,
      eventId: this.eventId,
      eventType: this.eventType,
      payload: this.payload,
      statusCode: this.statusCode,
      responseBody: this.responseBody,
      attempts: this.attempts,
      deliveredAt: this.deliveredAt,
      failedAt: this.failedAt,
      nextRetryAt: this.nextRetryAt,
      isDelivered: this.isDelivered,
      claimedUntil: this.claimedUntil,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  toPlainObject(): JsonObject {
    return {
      id: this.id,
      webhook_id: this.webhookId,
      authorization_id: this.authorizationId,
      event_id: this.eventId,
      event_type: this.eventType,
      payload: this.payload,
      status_code: this.statusCode,
      response_body: this.responseBody,
      attempts: this.attempts,
      delivered_at: this.deliveredAt ? this.deliveredAt.toISOString() : null,
      failed_at: this.failedAt ? this.failedAt.toISOString() : null,
      next_retry_at: this.nextRetryAt ? this.nextRetryAt.toISOString() : null,
      is_delivered: this.isDelivered,
      created_at: this.createdAt.toISOString(),
    };
  }
}
