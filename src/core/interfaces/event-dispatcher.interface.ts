import { WebhookEventType } from '../domain/enums';
import { JsonObject } from '../domain/models';

/**
 * Lifecycle event emitted after a change has been committed
 */
export interface LifecycleEvent {
  /**
   * Stable, unique per logical event; shared by every outbound delivery
   */
  eventId: string;
  eventType: WebhookEventType;
  tenantId: string;
  authorizationId: string | null;
  occurredAt: Date;
  data: JsonObject;
}

/**
 * Event handler function signature
 */
export type EventHandler = (event: LifecycleEvent) => Promise<void> | void;

/**
 * Subscription handle returned on registration
 */
export interface EventSubscription {
  id: string;
  unsubscribe(): void;
}

/**
 * Dispatch summary; handler failures are isolated and reported here
 */
export interface DispatchSummary {
  eventId: string;
  eventType: WebhookEventType;
  totalHandlers: number;
  failures: Array<{ handler: string; error: Error }>;
}

/**
 * Event dispatcher interface - handles event emission to registered handlers
 */
export interface EventDispatcher {
  on(eventType: WebhookEventType, handler: EventHandler): EventSubscription;

  onAll(handler: EventHandler): EventSubscription;

  off(eventType: WebhookEventType, handler: EventHandler): void;

  dispatch(event: LifecycleEvent): Promise<DispatchSummary>;
}
