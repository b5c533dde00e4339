import * as cron from 'node-cron';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { finishCronCheckIn, startCronCheckIn } from '../utils/sentry.js';

/**
 * Cron-driven runner for the daily multi-model scrape
 *
 * Cron schedule format:
 * ┌────────────── minute (0-59)
 * │ ┌──────────── hour (0-23)
 * │ │ ┌────────── day of month (1-31)
 * │ │ │ ┌──────── month (1-12)
 * │ │ │ │ ┌────── day of week (0-7, 0 and 7 are Sunday)
 * │ │ │ │ │
 * * * * * *
 */

export interface SchedulerConfig {
  /** Cron expression (default: '0 8 * * *' = 8 AM daily) */
  schedule?: string;
  /** Run once immediately on start */
  runOnStart?: boolean;
  /** Sentry Crons monitor slug */
  monitorSlug?: string;
}

export type ScheduledJob = () => Promise<void>;

export class JobScheduler {
  private task: cron.ScheduledTask | null = null;
  private isRunning = false;
  private readonly config: Required<SchedulerConfig>;

  constructor(
    private readonly job: ScheduledJob,
    config: SchedulerConfig = {}
  ) {
    this.config = {
      schedule: config.schedule || '0 8 * * *',
      runOnStart: config.runOnStart ?? false,
      monitorSlug: config.monitorSlug || 'multi-model-scrape',
    };
  }

  async start(): Promise<void> {
    if (this.task) {
      logger.warn('Scheduler is already running');
      return;
    }

    if (!cron.validate(this.config.schedule)) {
      throw new Error(`Invalid cron expression: ${this.config.schedule}`);
    }

    this.task = cron.schedule(this.config.schedule, async () => {
      if (this.isRunning) {
        logger.warn('Previous job still running, skipping this execution');
        return;
      }

      try {
        await this.executeJob('scheduled');
      } catch (error) {
        // Already logged and reported; the next tick still runs
        logger.debug('Scheduled execution ended with error', { error: errorMessage(error) });
      }
    });

    logger.info('Job scheduler started', {
      schedule: this.config.schedule,
      runOnStart: this.config.runOnStart,
    });

    if (this.config.runOnStart) {
      logger.info('Running job immediately on startup');
      try {
        await this.runNow();
      } catch (error) {
        logger.debug('Startup execution ended with error', { error: errorMessage(error) });
      }
    }
  }

  stop(): void {
    if (this.task) {
      logger.info('Stopping job scheduler');
      this.task.stop();
      this.task = null;
    }
  }

  /**
   * Run the job outside of the schedule; a no-op while a run is in progress
   */
  async runNow(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Job is already running');
      return;
    }

    await this.executeJob('manual');
  }

  isSchedulerRunning(): boolean {
    return this.task !== null;
  }

  isJobRunning(): boolean {
    return this.isRunning;
  }

  private async executeJob(trigger: 'scheduled' | 'manual'): Promise<void> {
    const checkInId = startCronCheckIn({
      monitorSlug: this.config.monitorSlug,
      schedule: this.config.schedule,
      maxRuntimeMinutes: 180,
      checkinMarginMinutes: 10,
    });

    this.isRunning = true;
    try {
      logger.info(`Job execution triggered (${trigger})`);
      await this.job();
      finishCronCheckIn(checkInId, this.config.monitorSlug, 'ok');
      logger.info(`Job completed successfully (${trigger})`);
    } catch (error) {
      finishCronCheckIn(checkInId, this.config.monitorSlug, 'error');
      logger.error(`Job failed (${trigger})`, { error: errorMessage(error) });
      throw error;
    } finally {
      this.isRunning = false;
    }
  }
}
