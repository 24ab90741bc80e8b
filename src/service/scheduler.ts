import cron from 'node-cron';
import { createLogger } from '../utils/logger.js';

const log = createLogger('scheduler');

interface ScheduledJob {
  name: string;
  schedule: string;
  task: cron.ScheduledTask;
}

export class Scheduler {
  private jobs: ScheduledJob[] = [];

  constructor(private timezone: string) {}

  registerJob(name: string, cronExpression: string, handler: () => void | Promise<void>): void {
    if (!cron.validate(cronExpression)) {
      throw new Error(`Invalid cron expression for ${name}: ${cronExpression}`);
    }

    const wrappedHandler = async () => {
      try {
        log.debug({ job: name }, 'Running scheduled job');
        await handler();
      } catch (err) {
        log.error({ job: name, err }, 'Scheduled job failed');
      }
    };

    const task = cron.schedule(cronExpression, wrappedHandler, {
      scheduled: true,
      timezone: this.timezone,
    });

    this.jobs.push({ name, schedule: cronExpression, task });
    log.info({ name, schedule: cronExpression, timezone: this.timezone }, 'Job registered');
  }

  start(): void {
    // Jobs auto-start on register via scheduled: true
    log.info({ jobCount: this.jobs.length }, 'Scheduler running');
  }

  stop(): void {
    for (const job of this.jobs) {
      job.task.stop();
    }
    log.info({ jobCount: this.jobs.length }, 'All scheduled jobs stopped');
    this.jobs = [];
  }
}

/** Convert a minute interval to an every-day cron expression: "* /N * * * *" */
export function minutesToCron(minutes: number): string {
  return `*/${minutes} * * * *`;
}

/** Convert a local time string like "08:45" to a cron expression on weekdays. */
export function timeToCron(time: string, daysOfWeek = '1-5'): string {
  const [hours, mins] = time.split(':').map(Number);
  return `${mins} ${hours} * * ${daysOfWeek}`;
}
