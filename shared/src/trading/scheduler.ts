import cron from 'node-cron';
import { createLogger } from '../logger.js';

const logger = createLogger('scheduler');

export interface ScheduledJob {
  stop(): void;
}

// Drives recurring work; tests inject a manual implementation
export interface Scheduler {
  every(intervalSeconds: number, task: () => Promise<void>): ScheduledJob;
}

/**
 * Cron expression firing every `intervalSeconds`. Whole minutes use the
 * five-field form, anything else the six-field form with a seconds column.
 * Cron steps restart at each minute, hour and day, so only steps dividing
 * 60 (seconds, minutes) or 24 (hours) give evenly spaced runs.
 */
export function toCronExpression(intervalSeconds: number): string {
  if (!Number.isInteger(intervalSeconds) || intervalSeconds < 1) {
    throw new Error(`Invalid interval: ${intervalSeconds}s`);
  }

  if (intervalSeconds % 3600 === 0 && 24 % (intervalSeconds / 3600) === 0) {
    const hours = intervalSeconds / 3600;
    return hours === 1 ? '0 * * * *' : `0 */${hours} * * *`;
  }

  if (intervalSeconds % 60 === 0 && intervalSeconds < 3600 && 60 % (intervalSeconds / 60) === 0) {
    const minutes = intervalSeconds / 60;
    return minutes === 1 ? '* * * * *' : `*/${minutes} * * * *`;
  }

  if (intervalSeconds < 60 && 60 % intervalSeconds === 0) {
    return `*/${intervalSeconds} * * * * *`;
  }

  throw new Error(`Interval ${intervalSeconds}s cannot be expressed as a cron schedule`);
}

export function isSchedulableInterval(intervalSeconds: number): boolean {
  try {
    toCronExpression(intervalSeconds);
    return true;
  } catch {
    return false;
  }
}

export const cronScheduler: Scheduler = {
  every(intervalSeconds, task) {
    const job = cron.schedule(toCronExpression(intervalSeconds), () => {
      task().catch(error => logger.error('Scheduled task failed', error));
    });
    return { stop: () => job.stop() };
  },
};
