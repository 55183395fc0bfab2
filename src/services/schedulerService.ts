import type { Logger } from '../logger';
import { JobRunner, ScheduledJob } from '../schedule/jobRunner';
import {
  ScheduledTrigger,
  SkippedEvent,
  buildReminderTriggers,
  dailyDigestTrigger,
  nextFireTime,
  toCronExpression,
} from '../schedule/triggers';
import { formatZoned } from '../time/zoned';
import { DataService } from './dataService';
import { NotifierService } from './notifierService';

export interface SchedulePass {
  timeZone: string;
  triggers: ScheduledTrigger[];
  skipped: SkippedEvent[];
}

/**
 * Registers the daily digest and one weekly reminder per event with the job
 * runner. Events are read once, at start; the jobs live until `stop()`.
 */
export class SchedulerService {
  private dataService: DataService;
  private notifier: NotifierService;
  private runner: JobRunner;
  private timeZone: string;
  private logger: Logger;
  private jobs: ScheduledJob[] = [];

  constructor(
    dataService: DataService,
    notifier: NotifierService,
    runner: JobRunner,
    timeZone: string,
    logger: Logger
  ) {
    this.dataService = dataService;
    this.notifier = notifier;
    this.runner = runner;
    this.timeZone = timeZone;
    this.logger = logger;
  }

  async start(now: Date = new Date()): Promise<SchedulePass> {
    const { events } = await this.dataService.load();
    const { triggers, skipped } = buildReminderTriggers(events);

    for (const { event, reason } of skipped) {
      this.logger.warn(`Failed to schedule reminder for event ${JSON.stringify(event)}: ${reason}`);
    }

    const all = [dailyDigestTrigger(), ...triggers];
    for (const trigger of all) {
      this.register(trigger, now);
    }

    return { timeZone: this.timeZone, triggers: all, skipped };
  }

  stop(): void {
    for (const job of this.jobs) job.stop();
    this.jobs = [];
  }

  private register(trigger: ScheduledTrigger, now: Date): void {
    const expression = toCronExpression(trigger);
    let task: () => Promise<void>;
    if (trigger.kind === 'daily') {
      task = async () => {
        await this.notifier.sendDailyDigest();
      };
    } else {
      const event = trigger.payload;
      task = async () => {
        await this.notifier.sendEventReminder(event);
      };
    }

    this.jobs.push(this.runner.schedule(expression, task, { timezone: this.timeZone, name: trigger.name }));

    const next = formatZoned(nextFireTime(trigger, this.timeZone, now), this.timeZone);
    this.logger.info(`Scheduled ${trigger.name} (${expression}, ${this.timeZone}), next run ${next}`);
  }
}

export const createSchedulerService = (
  dataService: DataService,
  notifier: NotifierService,
  runner: JobRunner,
  timeZone: string,
  logger: Logger
): SchedulerService => {
  return new SchedulerService(dataService, notifier, runner, timeZone, logger);
};
