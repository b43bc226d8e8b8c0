import { AlertSeverity, AlertType } from '../enums';
import { JsonObject } from './json.types';

/**
 * Alert domain model - operator-visible notice of a condition the engine
 * could not resolve on its own
 */
export class Alert {
  constructor(
    public readonly id: string,
    public readonly tenantId: string,
    public readonly alertType: AlertType,
    public readonly severity: AlertSeverity,
    public readonly title: string,
    public readonly message: string,
    public readonly context: JsonObject = {},
    public readonly isRead: boolean = false,
    public readonly isResolved: boolean = false,
    public readonly resolvedAt: Date | null = null,
    public readonly createdAt: Date = new Date(),
  ) {}

  toPlainObject(): JsonObject {
    return {
      id: this.id,
      alert_type: this.alertType,
      severity: this.severity,
      title: this.title,
      message: this.message,
      context: this.context,
      is_read: this.isRead,
      is_resolved: this.isResolved,
      resolved_at: this.resolvedAt ? this.resolvedAt.toISOString() : null,
      created_at: this.createdAt.toISOString(),
    };
  }
}
