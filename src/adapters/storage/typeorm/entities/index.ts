export { AuthorizationEntity } from './authorization.entity';
export { AuditEventEntity } from './audit-event.entity';
export { WebhookEntity } from './webhook.entity';
export { WebhookDeliveryEntity } from './webhook-delivery.entity';
export { InboundEventEntity } from './inbound-event.entity';
export { AlertEntity } from './alert.entity';

import { AuthorizationEntity } from './authorization.entity';
import { AuditEventEntity } from './audit-event.entity';
import { WebhookEntity } from './webhook.entity';
import { WebhookDeliveryEntity } from './webhook-delivery.entity';
import { InboundEventEntity } from './inbound-event.entity';
import { AlertEntity } from './alert.entity';

export const MANDATE_ENTITIES = [
  AuthorizationEntity,
  AuditEventEntity,
  WebhookEntity,
  WebhookDeliveryEntity,
  InboundEventEntity,
  AlertEntity,
];
