/**
 * JobScheduler - fixed-interval runner for background jobs
 *
 * A tick that arrives while the previous run is still going is skipped.
 * Errors are logged and never stop the schedule.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../../core/errors.js';

export interface ScheduledJob {
  name: string;
  run(): Promise<unknown>;
}

export interface JobSchedulerOptions {
  /** Run once immediately on start (default: true) */
  runOnStart?: boolean;
  /** Let the process exit while only this timer is pending (default: false) */
  unref?: boolean;
}

export class JobScheduler {
  private readonly log: Logger;
  private readonly runOnStart: boolean;
  private readonly unref: boolean;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;
  private skipped = 0;

  constructor(
    private readonly job: ScheduledJob,
    private readonly intervalMs: number,
    logger: Logger,
    options: JobSchedulerOptions = {}
  ) {
    this.log = logger.child({ component: 'JobScheduler', job: job.name });
    this.runOnStart = options.runOnStart ?? true;
    this.unref = options.unref ?? false;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.intervalMs);
    if (this.unref) {
      this.timer.unref();
    }
    this.log.info({ intervalMs: this.intervalMs }, 'Job scheduled');

    if (this.runOnStart) {
      this.tick();
    }
  }

  /** Clears the timer and waits for an in-flight run */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running;
    }
    this.log.info({ skipped: this.skipped }, 'Job stopped');
  }

  isRunning(): boolean {
    return this.running !== null;
  }

  getSkippedCount(): number {
    return this.skipped;
  }

  private tick(): void {
    if (this.running) {
      this.skipped++;
      this.log.debug('Previous run still in progress; tick skipped');
      return;
    }
    const run = this.execute();
    this.running = run;
    void run.then(() => {
      if (this.running === run) this.running = null;
    });
  }

  private async execute(): Promise<void> {
    try {
      await this.job.run();
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, 'Scheduled job failed');
    }
  }
}
