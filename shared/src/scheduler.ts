/**
 * Job scheduler for plugin services
 */

import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { createLogger } from './logger.js';
import { describeError } from './result.js';

const logger = createLogger('scheduler');

export type JobTrigger =
  | { type: 'cron'; expression: string }
  | { type: 'interval'; everyMs: number };

export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

export interface ScheduledJobInfo {
  id: string;
  name: string;
  trigger: JobTrigger;
  lastRunAt?: string;
}

interface JobHandle extends ScheduledJobInfo {
  stop(): void;
}

export interface JobSchedulerOptions {
  timezone?: string;
}

export function isValidCron(expression: string): boolean {
  return expression.trim().split(/\s+/).length === 5 && cron.validate(expression.trim());
}

export class JobScheduler {
  private jobs = new Map<string, JobHandle>();
  private timezone?: string;

  constructor(options: JobSchedulerOptions = {}) {
    this.timezone = options.timezone ?? process.env.TZ;
  }

  private wrap(job: ScheduledJobInfo, run: () => Promise<void>): () => void {
    return () => {
      job.lastRunAt = new Date().toISOString();
      logger.debug('Running job', { id: job.id });
      run().catch((error: unknown) => {
        logger.error('Job failed', {
          id: job.id,
          error: describeError(error),
        });
      });
    };
  }

  /**
   * Registers a recurring job, replacing any job with the same id.
   * Returns false when the trigger is invalid and nothing was scheduled.
   */
  schedule(id: string, name: string, trigger: JobTrigger, run: () => Promise<void>): boolean {
    this.cancel(id);

    const job: JobHandle = { id, name, trigger, stop: () => undefined };

    if (trigger.type === 'cron') {
      if (!isValidCron(trigger.expression)) {
        logger.error('Invalid cron expression, job not scheduled', { id, expression: trigger.expression });
        return false;
      }

      const task: ScheduledTask = cron.schedule(trigger.expression.trim(), this.wrap(job, run), {
        scheduled: true,
        timezone: this.timezone,
      });
      job.stop = () => task.stop();
    } else {
      if (!Number.isFinite(trigger.everyMs) || trigger.everyMs <= 0) {
        logger.error('Invalid interval, job not scheduled', { id, everyMs: trigger.everyMs });
        return false;
      }

      const timer = setInterval(this.wrap(job, run), trigger.everyMs);
      job.stop = () => clearInterval(timer);
    }

    this.jobs.set(id, job);
    logger.info('Job scheduled', { id, name, trigger });
    return true;
  }

  /** Runs a job once after `delayMs`. */
  runOnce(id: string, delayMs: number, run: () => Promise<void>): void {
    this.cancel(id);

    const job: JobHandle = { id, name: id, trigger: { type: 'interval', everyMs: delayMs }, stop: () => undefined };
    const execute = this.wrap(job, run);
    const timer = setTimeout(() => {
      this.jobs.delete(id);
      execute();
    }, delayMs);

    job.stop = () => clearTimeout(timer);
    this.jobs.set(id, job);
  }

  /** Stops the job with this id and every job whose id starts with `${id}:`. */
  cancel(id: string): void {
    for (const [jobId, job] of this.jobs) {
      if (jobId === id || jobId.startsWith(`${id}:`)) {
        job.stop();
        this.jobs.delete(jobId);
      }
    }
  }

  list(): ScheduledJobInfo[] {
    return Array.from(this.jobs.values(), ({ id, name, trigger, lastRunAt }) => ({ id, name, trigger, lastRunAt }));
  }

  stopAll(): void {
    for (const job of this.jobs.values()) {
      job.stop();
    }
    this.jobs.clear();
  }
}
