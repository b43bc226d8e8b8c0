export * from './errors';
export * from './audit-recorder';
export * from './authorization.service';
export * from './alert.service';
export * from './evidence.service';
export * from './webhook-subscription.service';
