import { Injectable, Inject, Logger, OnModuleInit, OnModuleDestroy } from '@nestjs/common';
import { AuthorizationService, ScheduledTask } from '../../../core';
import type { ResolvedMandateConfig } from '../mandate.config';
import { AUTHORIZATION_SERVICE, MANDATE_CONFIG } from '../constants';

export interface SweepResult {
  expired: number;
  purged: number;
}

/**
 * Lifecycle Sweep Processor
 *
 * Expires live authorizations past their expiry, then purges soft-deleted
 * ones whose retention window has closed
 */
@Injectable()
export class LifecycleSweepProcessor implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LifecycleSweepProcessor.name);
  private readonly task: ScheduledTask;

  constructor(
    @Inject(AUTHORIZATION_SERVICE)
    private readonly authorizationService: AuthorizationService,
    @Inject(MANDATE_CONFIG)
    private readonly config: ResolvedMandateConfig,
  ) {
    this.task = new ScheduledTask((signal) => this.sweep(signal), {
      name: 'lifecycle-sweep',
      intervalMs: config.lifecycle.sweepIntervalMs,
      jitterRatio: config.lifecycle.jitterRatio,
      runOnStart: true,
    });
  }

  onModuleInit(): void {
    if (this.config.lifecycle.enabled) {
      this.logger.log(
        `Starting lifecycle sweep (interval: ${this.config.lifecycle.sweepIntervalMs}ms)`,
      );
      this.task.start();
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.task.isRunning) {
      await this.task.stop();
      this.logger.log('Stopped lifecycle sweep');
    }
  }

  async runOnce(): Promise<SweepResult> {
    return this.sweep(new AbortController().signal);
  }

  private async sweep(signal: AbortSignal): Promise<SweepResult> {
    const expired = await this.authorizationService.expireDue(undefined, signal);
    if (signal.aborted) {
      return { expired, purged: 0 };
    }
    const purged = await this.authorizationService.purgeDeleted(undefined, signal);
    return { expired, purged };
  }
}
