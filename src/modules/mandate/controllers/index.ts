export * from './authorization.controller';
export * from './webhook-subscription.controller';
export * from './alert.controller';
export * from './acp-webhook.controller';
export * from './health.controller';
