export * from './json.types';
export * from './authorization.model';
export * from './webhook.model';
export * from './webhook-delivery.model';
export * from './audit-event.model';
export * from './alert.model';
export * from './inbound-event.model';
