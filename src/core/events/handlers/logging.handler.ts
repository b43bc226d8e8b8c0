import { Logger } from '@nestjs/common';
import { EventHandler, LifecycleEvent } from '../../interfaces';

/**
 * Logging event handler
 * Logs lifecycle events for debugging and monitoring
 */
export class LoggingEventHandler {
  constructor(
    private readonly logger: Pick<Logger, 'log' | 'error'> = new Logger('LifecycleEvents'),
    private readonly logLevel: 'verbose' | 'normal' | 'minimal' = 'normal',
  ) {}

  /**
   * Create the event handler function
   */
  getHandler(): EventHandler {
    return (event: LifecycleEvent) => {
      try {
        this.logger.log(
          `${event.eventType} ${JSON.stringify(this.prepareLogData(event))}`,
        );
      } catch (error) {
        this.logger.error(
          `Failed to log event ${event.eventType}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    };
  }

  /**
   * Prepare log data based on log level
   */
  private prepareLogData(event: LifecycleEvent): Record<string, unknown> {
    switch (this.logLevel) {
      case 'verbose':
        return {
          eventId: event.eventId,
          tenantId: event.tenantId,
          authorizationId: event.authorizationId,
          occurredAt: event.occurredAt.toISOString(),
          data: event.data,
        };

      case 'minimal':
        return { authorizationId: event.authorizationId };

      case 'normal':
      default:
        return {
          eventId: event.eventId,
          tenantId: event.tenantId,
          authorizationId: event.authorizationId,
          status: event.data['status'],
        };
    }
  }
}
