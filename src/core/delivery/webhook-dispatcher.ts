import { Logger } from '@nestjs/common';
import { Webhook, WebhookDelivery, DeliveryAttemptUpdate } from '../domain/models';
import { EventHandler, LifecycleEvent, StorageAdapter } from '../interfaces';
import { AlertService } from '../services/alert.service';
import { Clock, canonicalJson, systemClock } from '../utils';
import {
  AttemptOutcome,
  DEFAULT_DISPATCHER_OPTIONS,
  DeliveryExhaustedError,
  WebhookDispatcherOptions,
  WebhookPayload,
  WebhookTransport,
} from './types';
import { WebhookSigner } from './webhook-signer';

/**
 * Webhook Dispatcher
 *
 * Fans committed lifecycle events out to subscribed webhooks, signs every
 * body with the subscription secret and retries with exponential backoff.
 * Exhausted deliveries become alerts; nothing is thrown back to the emitter.
 */
export class WebhookDispatcher {
  private readonly logger = new Logger(WebhookDispatcher.name);
  private readonly options: WebhookDispatcherOptions;
  private readonly clock: Clock;

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly transport: WebhookTransport,
    private readonly alertService: AlertService,
    options: Partial<WebhookDispatcherOptions> = {},
    clock: Clock = systemClock,
  ) {
    this.options = { ...DEFAULT_DISPATCHER_OPTIONS, ...options };
    this.clock = clock;
  }

  /**
   * Handler to register on the event dispatcher
   */
  getHandler(): EventHandler {
    return async (event: LifecycleEvent) => {
      await this.publish(event);
    };
  }

  /**
   * Create one delivery per matching webhook and make the first attempt.
   * Every delivery of the event shares its eventId.
   */
  async publish(event: LifecycleEvent): Promise<WebhookDelivery[]> {
    const webhooks = await this.storageAdapter.findActiveWebhooks(event.tenantId, event.eventType);
    if (webhooks.length === 0) {
      return [];
    }

    const payload: WebhookPayload = {
      event_id: event.eventId,
      event_type: event.eventType,
      timestamp: event.occurredAt.toISOString(),
      data: event.data,
    };
    const now = this.clock();

    const deliveries = await Promise.all(
      webhooks.map((webhook) =>
        this.storageAdapter.createDelivery({
          webhookId: webhook.id,
          tenantId: event.tenantId,
          authorizationId: event.authorizationId,
          eventId: event.eventId,
          eventType: event.eventType,
          payload: { ...payload },
          nextRetryAt: now,
          claimedUntil: new Date(now.getTime() + this.options.claimLeaseMs),
        }),
      ),
    );

    const results = await Promise.allSettled(
      deliveries.map((delivery, index) => this.attemptWith(delivery, webhooks[index])),
    );

    return results.map((result, index) => {
      if (result.status === 'fulfilled') {
        return result.value.delivery;
      }
      this.logger.error(
        `Delivery ${deliveries[index].id} could not be recorded`,
        result.reason instanceof Error ? result.reason.stack : String(result.reason),
      );
      return deliveries[index];
    });
  }

  /**
   * Claim due deliveries and attempt them concurrently
   */
  async processDueRetries(signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) {
      return 0;
    }

    const claimed = await this.storageAdapter.claimDueDeliveries(
      this.clock(),
      this.options.batchSize,
      this.options.claimLeaseMs,
    );
    if (claimed.length === 0) {
      return 0;
    }

    this.logger.debug(`Retrying ${claimed.length} webhook deliveries`);

    const results = await Promise.allSettled(claimed.map((delivery) => this.attempt(delivery)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(
          `Retry of delivery ${claimed[index].id} failed`,
          result.reason instanceof Error ? result.reason.stack : String(result.reason),
        );
      }
    });

    return claimed.length;
  }

  /**
   * Attempt a claimed delivery, resolving its webhook at attempt time.
   * A webhook that is gone or inactive cancels the delivery.
   */
  async attempt(
    delivery: WebhookDelivery,
  ): Promise<{ delivery: WebhookDelivery; outcome: AttemptOutcome }> {
    const webhook = await this.storageAdapter.findWebhook(delivery.webhookId);
    if (!webhook || !webhook.isActive) {
      this.logger.warn(`Cancelling delivery ${delivery.id}: webhook ${delivery.webhookId} is inactive or deleted`);
      const cancelled = await this.record(delivery, {
        attempts: delivery.attempts,
        statusCode: delivery.statusCode,
        responseBody: 'Webhook inactive or deleted',
        deliveredAt: null,
        failedAt: this.clock(),
        nextRetryAt: null,
        isDelivered: false,
      });
      if (!cancelled) {
        return { delivery, outcome: 'claim_lost' };
      }
      return { delivery: cancelled, outcome: 'cancelled' };
    }
    return this.attemptWith(delivery, webhook);
  }

  private async attemptWith(
    delivery: WebhookDelivery,
    webhook: Webhook,
  ): Promise<{ delivery: WebhookDelivery; outcome: AttemptOutcome }> {
    const body = canonicalJson(delivery.payload);
    const sentAt = this.clock();
    const attempts = delivery.attempts + 1;

    let statusCode: number | null = null;
    let responseBody: string;

    try {
      const response = await this.transport.send({
        url: webhook.url,
        body,
        headers: {
          'Content-Type': 'application/json',
          'X-Webhook-Signature': WebhookSigner.signatureHeader(body, webhook.secret),
          'X-Webhook-Event': delivery.eventType,
          'X-Webhook-Id': delivery.eventId,
          'X-Webhook-Timestamp': String(Math.floor(sentAt.getTime() / 1000)),
        },
        timeoutMs: webhook.timeoutSeconds * 1000,
      });
      statusCode = response.statusCode;
      responseBody = response.body;
    } catch (error) {
      responseBody = error instanceof Error ? error.message : String(error);
    }

    const finishedAt = this.clock();
    const truncatedBody = responseBody.slice(0, this.options.responseBodyLimit);

    if (statusCode !== null && statusCode >= 200 && statusCode < 300) {
      const delivered = await this.record(delivery, {
        attempts,
        statusCode,
        responseBody: truncatedBody,
        deliveredAt: finishedAt,
        failedAt: null,
        nextRetryAt: null,
        isDelivered: true,
      });
      if (!delivered) {
        return { delivery, outcome: 'claim_lost' };
      }
      this.logger.log(`Delivered ${delivery.eventType} to ${webhook.url} (attempt ${attempts})`);
      return { delivery: delivered, outcome: 'delivered' };
    }

    const failure: Omit<DeliveryAttemptUpdate, 'failedAt' | 'nextRetryAt'> = {
      attempts,
      statusCode,
      responseBody: truncatedBody,
      deliveredAt: null,
      isDelivered: false,
    };

    if (attempts < webhook.maxRetries) {
      const delayMs = webhook.retryDelayMs(attempts);
      const scheduled = await this.record(delivery, {
        ...failure,
        failedAt: null,
        nextRetryAt: new Date(finishedAt.getTime() + delayMs),
      });
      if (!scheduled) {
        return { delivery, outcome: 'claim_lost' };
      }
      this.logger.warn(
        `Delivery to ${webhook.url} failed (${statusCode ?? responseBody}), retry ${attempts + 1}/${webhook.maxRetries} in ${delayMs / 1000}s`,
      );
      return { delivery: scheduled, outcome: 'retry_scheduled' };
    }

    const exhausted = await this.record(delivery, {
      ...failure,
      failedAt: finishedAt,
      nextRetryAt: null,
    });
    if (!exhausted) {
      return { delivery, outcome: 'claim_lost' };
    }

    const error = new DeliveryExhaustedError(
      `Delivery of ${delivery.eventType} to ${webhook.url} failed after ${attempts} attempt(s)`,
      delivery.id,
      webhook.id,
      delivery.tenantId,
      delivery.eventType,
      attempts,
      statusCode,
    );
    this.logger.error(error.message);

    try {
      await this.alertService.raiseDeliveryExhausted(error);
    } catch (alertError) {
      this.logger.error(
        `Failed to raise alert for delivery ${delivery.id}`,
        alertError instanceof Error ? alertError.stack : String(alertError),
      );
    }

    return { delivery: exhausted, outcome: 'exhausted' };
  }

  private async record(
    delivery: WebhookDelivery,
    update: DeliveryAttemptUpdate,
  ): Promise<WebhookDelivery | null> {
    const recorded = await this.storageAdapter.recordDeliveryAttempt(
      delivery.id,
      update,
      delivery.claimedUntil,
    );
    if (!recorded) {
      this.logger.warn(
        `Discarding attempt ${update.attempts} of delivery ${delivery.id}: claim taken by another worker`,
      );
    }
    return recorded;
  }
}
