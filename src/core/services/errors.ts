/**
 * No authorization with this id in the tenant (or it was soft-deleted)
 */
export class AuthorizationNotFoundError extends Error {
  constructor(
    message: string,
    public readonly authorizationId?: string,
    public readonly tokenId?: string,
  ) {
    super(message);
    this.name = 'AuthorizationNotFoundError';
  }
}

export class WebhookNotFoundError extends Error {
  constructor(
    message: string,
    public readonly webhookId: string,
  ) {
    super(message);
    this.name = 'WebhookNotFoundError';
  }
}

export class AlertNotFoundError extends Error {
  constructor(
    message: string,
    public readonly alertId: string,
  ) {
    super(message);
    this.name = 'AlertNotFoundError';
  }
}

/**
 * Subscription settings outside accepted bounds
 */
export class WebhookValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'WebhookValidationError';
  }
}
