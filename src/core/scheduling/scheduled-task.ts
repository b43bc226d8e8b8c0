import { Logger } from '@nestjs/common';

export interface ScheduledTaskOptions {
  name: string;
  intervalMs: number;

  /**
   * Each delay is intervalMs * (1 ± jitterRatio)
   */
  jitterRatio?: number;

  /**
   * Run once immediately on start instead of waiting a full interval
   */
  runOnStart?: boolean;

  random?: () => number;
}

export type ScheduledWork = (signal: AbortSignal) => Promise<unknown>;

/**
 * Cancellable, jittered polling loop built on a setTimeout chain.
 * Runs never overlap: the next delay starts after the previous run settles.
 */
export class ScheduledTask {
  private readonly logger: Logger;
  private controller?: AbortController;
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<void>;

  constructor(
    private readonly work: ScheduledWork,
    private readonly options: ScheduledTaskOptions,
  ) {
    this.logger = new Logger(`ScheduledTask:${options.name}`);
  }

  get isRunning(): boolean {
    return this.controller !== undefined && !this.controller.signal.aborted;
  }

  start(): void {
    if (this.isRunning) {
      return;
    }
    this.controller = new AbortController();
    this.logger.log(`Starting (interval: ${this.options.intervalMs}ms)`);
    this.schedule(this.options.runOnStart ? 0 : this.nextDelay());
  }

  /**
   * Abort the current run, stop scheduling and wait for the run to settle
   */
  async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }
    this.controller.abort();
    this.controller = undefined;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
    this.logger.log('Stopped');
  }

  /**
   * Run the work once outside the schedule; errors propagate to the caller
   */
  async runOnce(signal: AbortSignal = new AbortController().signal): Promise<void> {
    await this.work(signal);
  }

  /**
   * Next delay with jitter applied
   */
  nextDelay(): number {
    const ratio = this.options.jitterRatio ?? 0;
    const random = this.options.random ?? Math.random;
    const factor = 1 + ratio * (random() * 2 - 1);
    return Math.max(0, Math.round(this.options.intervalMs * factor));
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    const controller = this.controller;
    if (!controller || controller.signal.aborted) {
      return;
    }
    try {
      await this.work(controller.signal);
    } catch (error) {
      this.logger.error(
        `Run failed: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
    if (this.controller === controller && !controller.signal.aborted) {
      this.schedule(this.nextDelay());
    }
  }
}
