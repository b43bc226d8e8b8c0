import { WebhookEventType } from '../enums';

/**
 * Webhook domain model - a tenant's subscription to outbound lifecycle events
 */
export class Webhook {
  constructor(
    public readonly id: string,
    public readonly tenantId: string,
    public readonly name: string,
    public readonly url: string,
    public readonly events: WebhookEventType[],
    public readonly secret: string,
    public readonly isActive: boolean = true,
    public readonly maxRetries: number = 3,
    public readonly retryDelaySeconds: number = 60,
    public readonly timeoutSeconds: number = 30,
    public readonly createdAt: Date = new Date(),
    public readonly updatedAt: Date = new Date(),
  ) {}

  subscribesTo(eventType: WebhookEventType): boolean {
    return this.isActive && this.events.includes(eventType);
  }

  /**
   * Backoff before the next attempt once `attempts` attempts have been made
   */
  retryDelayMs(attempts: number): number {
    return this.retryDelaySeconds * 1000 * 2 ** Math.max(attempts - 1, 0);
  }

  /**
   * Secret is never exposed on the wire
   */
  toPlainObject(): Record<string, unknown> {
    return {
      id: this.id,
      tenant_id: this.tenantId,
      name: this.name,
      url: this.url,
      events: [...this.events],
      is_active: this.isActive,
      max_retries: this.maxRetries,
      retry_delay_seconds: this.retryDelaySeconds,
      timeout_seconds: this.timeoutSeconds,
      created_at: this.createdAt.toISOString(),
      updated_at: this.updatedAt.toISOString(),
    };
  }
}
