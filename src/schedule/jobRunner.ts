import cron from 'node-cron';

import { ConfigurationError } from '../errors';
import type { Logger } from '../logger';

export interface JobOptions {
  timezone: string;
  name: string;
}

export interface ScheduledJob {
  stop(): void;
}

/** Time-based job facility the scheduler registers its triggers with. */
export interface JobRunner {
  schedule(expression: string, task: () => Promise<void>, options: JobOptions): ScheduledJob;
}

export const createCronJobRunner = (logger: Logger): JobRunner => {
  return {
    schedule(expression, task, options) {
      if (!cron.validate(expression)) {
        throw new ConfigurationError(`Invalid cron expression "${expression}" for job ${options.name}`);
      }

      return cron.schedule(
        expression,
        () => {
          task().catch((error: unknown) => {
            logger.error(`Job ${options.name} failed:`, error);
          });
        },
        { scheduled: true, timezone: options.timezone, name: options.name }
      );
    },
  };
};
