import { AuditEventType } from '../enums';
import { JsonObject } from './json.types';

/**
 * AuditEvent domain model - append-only record of every verification
 * decision and lifecycle transition
 */
export class AuditEvent {
  constructor(
    public readonly id: string,
    public readonly authorizationId: string,
    public readonly tenantId: string,
    public readonly eventType: AuditEventType,
    public readonly description: string,
    public readonly actor: string,
    public readonly eventData: JsonObject = {},
    public readonly ip: string | null = null,
    public readonly userAgent: string | null = null,
    public readonly createdAt: Date = new Date(),
  ) {}

  toPlainObject(): JsonObject {
    return {
      id: this.id,
      authorization_id: this.authorizationId,
      event_type: this.eventType,
      description: this.description,
      actor: this.actor,
      ip: this.ip,
      user_agent: this.userAgent,
      event_data: this.eventData,
      created_at: this.createdAt.toISOString(),
    };
  }
}
