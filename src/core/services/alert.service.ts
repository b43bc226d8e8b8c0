import { Logger } from '@nestjs/common';
import { AlertSeverity, AlertType, VerificationReason } from '../domain/enums';
import { Alert, Authorization } from '../domain/models';
import { AlertFilter, CreateAlertDto, StorageAdapter } from '../interfaces';
import { DeliveryExhaustedError } from '../delivery/types';
import { VerificationOutcome } from '../verification/types';
import { Clock, systemClock } from '../utils';
import { AlertNotFoundError } from './errors';

/**
 * Operator alerts for conditions the engine cannot resolve itself
 */
export class AlertService {
  private readonly logger = new Logger(AlertService.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly clock: Clock = systemClock,
  ) {}

  async raise(dto: CreateAlertDto): Promise<Alert> {
    const alert = await this.storageAdapter.createAlert(dto);
    this.logger.warn(`[${alert.severity}] ${alert.alertType} for tenant ${alert.tenantId}: ${alert.title}`);
    return alert;
  }

  async raiseDeliveryExhausted(error: DeliveryExhaustedError): Promise<Alert> {
    return this.raise({
      tenantId: error.tenantId,
      alertType: AlertType.WEBHOOK_DELIVERY_FAILED,
      severity: AlertSeverity.ERROR,
      title: `Webhook delivery failed after ${error.attempts} attempt(s)`,
      message: error.message,
      context: {
        deliveryId: error.deliveryId,
        webhookId: error.webhookId,
        eventType: error.eventType,
        attempts: error.attempts,
        lastStatusCode: error.lastStatusCode,
      },
    });
  }

  /**
   * Truststore outages page as TRUSTSTORE_UNAVAILABLE; any other failed
   * verification is a VERIFICATION_FAILED warning
   */
  async raiseVerificationFailed(
    authorization: Authorization,
    outcome: VerificationOutcome,
  ): Promise<Alert> {
    const detail = outcome.details['message'];
    const message = typeof detail === 'string' ? detail : `Verification failed: ${outcome.reason}`;
    const context = {
      authorizationId: authorization.id,
      protocol: authorization.protocol,
      issuer: authorization.issuer,
      reason: outcome.reason,
    };

    if (
      outcome.reason === VerificationReason.TRUSTSTORE_UNAVAILABLE ||
      outcome.reason === VerificationReason.TRUSTSTORE_TIMEOUT
    ) {
      return this.raise({
        tenantId: authorization.tenantId,
        alertType: AlertType.TRUSTSTORE_UNAVAILABLE,
        severity: AlertSeverity.CRITICAL,
        title: `Truststore unavailable for issuer ${authorization.issuer}`,
        message,
        context,
      });
    }

    return this.raise({
      tenantId: authorization.tenantId,
      alertType: AlertType.VERIFICATION_FAILED,
      severity: AlertSeverity.WARNING,
      title: `Verification failed for ${authorization.protocol} authorization ${authorization.id}`,
      message,
      context,
    });
  }

  async list(filter: AlertFilter): Promise<Alert[]> {
    return this.storageAdapter.listAlerts(filter);
  }

  async markRead(tenantId: string, id: string): Promise<Alert> {
    await this.requireAlert(tenantId, id);
    return this.storageAdapter.updateAlert(id, tenantId, { isRead: true });
  }

  async resolve(tenantId: string, id: string): Promise<Alert> {
    const alert = await this.requireAlert(tenantId, id);
    if (alert.isResolved) {
      return alert;
    }
    return this.storageAdapter.updateAlert(id, tenantId, {
      isRead: true,
      isResolved: true,
      resolvedAt: this.clock(),
    });
  }

  private async requireAlert(tenantId: string, id: string): Promise<Alert> {
    const alert = await this.storageAdapter.findAlert(id, tenantId);
    if (!alert) {
      throw new AlertNotFoundError(`Alert not found: ${id}`, id);
    }
    return alert;
  }
}
