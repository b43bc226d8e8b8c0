import { Injectable, Inject, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { ScheduledTask, WebhookDispatcher } from '../../../core';
import type { ResolvedMandateConfig } from '../mandate.config';
import { MANDATE_CONFIG, WEBHOOK_DISPATCHER } from '../constants';

/**
 * Delivery Retry Processor
 *
 * Periodically claims due webhook deliveries and attempts them again
 */
@Injectable()
export class DeliveryRetryProcessor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DeliveryRetryProcessor.name);
  private readonly task: ScheduledTask;

  constructor(
    @Inject(WEBHOOK_DISPATCHER)
    private readonly webhookDispatcher: WebhookDispatcher,
    @Inject(MANDATE_CONFIG)
    private readonly config: ResolvedMandateConfig,
  ) {
    this.task = new ScheduledTask((signal) => this.webhookDispatcher.processDueRetries(signal), {
      name: 'delivery-retry',
      intervalMs: config.delivery.pollIntervalMs,
      jitterRatio: config.delivery.jitterRatio,
      runOnStart: true,
    });
  }

  onModuleInit(): void {
    if (this.config.delivery.enabled) {
      this.logger.log(
        `Starting delivery retry processor (interval: ${this.config.delivery.pollIntervalMs}ms)`,
      );
      this.task.start();
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.task.isRunning) {
      await this.task.stop();
      this.logger.log('Stopped delivery retry processor');
    }
  }

  /**
   * Run one retry scan now; returns the number of deliveries attempted
   */
  async runOnce(): Promise<number> {
    return this.webhookDispatcher.processDueRetries();
  }
}
