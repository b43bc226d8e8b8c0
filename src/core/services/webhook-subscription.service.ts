import { Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import { WebhookEventType, isWebhookEventType } from '../domain/enums';
import { Webhook, WebhookDelivery } from '../domain/models';
import { CreateWebhookDto, DeliveryFilter, StorageAdapter, UpdateWebhookDto } from '../interfaces';
import { WebhookNotFoundError, WebhookValidationError } from './errors';

export type RegisterWebhookInput = Omit<CreateWebhookDto, 'secret' | 'events'> & {
  events: string[];
  secret?: string;
};

export type UpdateWebhookInput = Omit<UpdateWebhookDto, 'events'> & {
  events?: string[];
};

const BOUNDS = {
  maxRetries: { min: 1, max: 10 },
  retryDelaySeconds: { min: 1, max: 3600 },
  timeoutSeconds: { min: 1, max: 60 },
} as const;

const BOUNDED_FIELDS = ['maxRetries', 'retryDelaySeconds', 'timeoutSeconds'] as const;

/**
 * Tenant-managed outbound webhook subscriptions
 */
export class WebhookSubscriptionService {
  private readonly logger = new Logger(WebhookSubscriptionService.name);

  constructor(private readonly storageAdapter: StorageAdapter) {}

  /**
   * Register a subscription; a signing secret is generated when none is given
   */
  async register(input: RegisterWebhookInput): Promise<Webhook> {
    const name = input.name.trim();
    if (!name) {
      throw new WebhookValidationError('Webhook name is required', 'name');
    }
    validateUrl(input.url);
    validateBounds(input);

    const webhook = await this.storageAdapter.createWebhook({
      ...input,
      name,
      events: validateEvents(input.events),
      secret: input.secret ?? generateSecret(),
    });

    this.logger.log(`Registered webhook ${webhook.id} for tenant ${webhook.tenantId} -> ${webhook.url}`);
    return webhook;
  }

  async update(tenantId: string, id: string, input: UpdateWebhookInput): Promise<Webhook> {
    await this.get(tenantId, id);

    if (input.url !== undefined) {
      validateUrl(input.url);
    }
    if (input.name !== undefined && !input.name.trim()) {
      throw new WebhookValidationError('Webhook name is required', 'name');
    }
    validateBounds(input);

    const { events, ...rest } = input;
    return this.storageAdapter.updateWebhook(id, tenantId, {
      ...rest,
      ...(events !== undefined ? { events: validateEvents(events) } : {}),
    });
  }

  /**
   * Deactivate instead of deleting; the delivery history stays attached
   */
  async deactivate(tenantId: string, id: string): Promise<Webhook> {
    await this.get(tenantId, id);
    const webhook = await this.storageAdapter.updateWebhook(id, tenantId, { isActive: false });
    this.logger.log(`Deactivated webhook ${id}`);
    return webhook;
  }

  async get(tenantId: string, id: string): Promise<Webhook> {
    const webhook = await this.storageAdapter.findWebhook(id, tenantId);
    if (!webhook) {
      throw new WebhookNotFoundError(`Webhook not found: ${id}`, id);
    }
    return webhook;
  }

  async list(tenantId: string): Promise<Webhook[]> {
    return this.storageAdapter.listWebhooks(tenantId);
  }

  async listDeliveries(
    tenantId: string,
    id: string,
    filter: Omit<DeliveryFilter, 'tenantId' | 'webhookId'> = {},
  ): Promise<WebhookDelivery[]> {
    await this.get(tenantId, id);
    return this.storageAdapter.listDeliveries({ ...filter, tenantId, webhookId: id });
  }
}

function validateUrl(url: string): void {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new WebhookValidationError(`Invalid webhook URL: ${url}`, 'url');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new WebhookValidationError(`Webhook URL must use http or https: ${url}`, 'url');
  }
}

function validateEvents(events: string[]): WebhookEventType[] {
  if (events.length === 0) {
    throw new WebhookValidationError('At least one event type is required', 'events');
  }
  const valid: WebhookEventType[] = [];
  for (const event of events) {
    if (!isWebhookEventType(event)) {
      throw new WebhookValidationError(`Unknown event type: ${event}`, 'events');
    }
    if (!valid.includes(event)) {
      valid.push(event);
    }
  }
  return valid;
}

function validateBounds(
  input: Partial<Record<keyof typeof BOUNDS, number>>,
): void {
  for (const field of BOUNDED_FIELDS) {
    const value = input[field];
    if (value === undefined) {
      continue;
    }
    const { min, max } = BOUNDS[field];
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new WebhookValidationError(`${field} must be an integer between ${min} and ${max}`, field);
    }
  }
}

function generateSecret(): string {
  return `whsec_${randomBytes(24).toString('hex')}`;
}
