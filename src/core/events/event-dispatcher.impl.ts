import { Logger } from '@nestjs/common';
import { WebhookEventType } from '../domain/enums';
import {
  DispatchSummary,
  EventDispatcher,
  EventHandler,
  EventSubscription,
  LifecycleEvent,
} from '../interfaces';

/**
 * Default implementation of the EventDispatcher
 *
 * Supports multiple handlers per event type with error isolation:
 * a failing handler is logged and reported, never rethrown to the emitter.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<WebhookEventType, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  /**
   * Register an event handler for a specific event type
   */
  on(eventType: WebhookEventType, handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    const existing = this.handlers.get(eventType);
    if (existing) {
      existing.add(handler);
    } else {
      this.handlers.set(eventType, new Set([handler]));
    }

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  /**
   * Register a handler for all event types
   */
  onAll(handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;
    this.globalHandlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  /**
   * Remove an event handler
   */
  off(eventType: WebhookEventType, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  /**
   * Dispatch an event to all registered handlers and wait for them to settle
   */
  async dispatch(event: LifecycleEvent): Promise<DispatchSummary> {
    const specificHandlers = this.handlers.get(event.eventType) ?? new Set<EventHandler>();
    const allHandlers = [...specificHandlers, ...this.globalHandlers];

    const results = await Promise.allSettled(
      allHandlers.map(async (handler) => handler(event)),
    );

    const failures: DispatchSummary['failures'] = [];
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failures.push({
          handler: allHandlers[index].name || 'anonymous',
          error:
            result.reason instanceof Error
              ? result.reason
              : new Error(String(result.reason)),
        });
      }
    });

    if (failures.length > 0) {
      this.logger.error(
        `Event dispatch errors for ${event.eventType} (${event.eventId}): ${failures
          .map((f) => `${f.handler}: ${f.error.message}`)
          .join('; ')}`,
      );
    }

    return {
      eventId: event.eventId,
      eventType: event.eventType,
      totalHandlers: allHandlers.length,
      failures,
    };
  }
}
