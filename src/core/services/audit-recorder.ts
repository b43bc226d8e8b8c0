import { Logger } from '@nestjs/common';
import { AuditEvent } from '../domain/models';
import { CreateAuditEventDto, StorageAdapter } from '../interfaces';

/**
 * Append-only audit log consumed by the lifecycle and delivery code
 */
export interface AuditRecorder {
  record(entry: CreateAuditEventDto): Promise<AuditEvent>;
  trail(authorizationId: string): Promise<AuditEvent[]>;
}

/**
 * Audit recorder writing through the storage adapter.
 * A failed write is logged and rethrown; events are never dropped silently.
 */
export class StorageAuditRecorder implements AuditRecorder {
  private readonly logger = new Logger(StorageAuditRecorder.name);

  constructor(private readonly storageAdapter: StorageAdapter) {}

  async record(entry: CreateAuditEventDto): Promise<AuditEvent> {
    try {
      return await this.storageAdapter.createAuditEvent(entry);
    } catch (error) {
      this.logger.error(
        `Failed to record ${entry.eventType} audit event for authorization ${entry.authorizationId}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw error;
    }
  }

  async trail(authorizationId: string): Promise<AuditEvent[]> {
    return this.storageAdapter.getAuditEvents(authorizationId);
  }
}
