export * from './protocol.enum';
export * from './authorization-status.enum';
export * from './verification-status.enum';
export * from './trigger-type.enum';
export * from './audit-event-type.enum';
export * from './webhook-event-type.enum';
export * from './inbound-event.enum';
export * from './alert.enum';
