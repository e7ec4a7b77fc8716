import cron, { type ScheduledTask } from 'node-cron';
import { intervalToCron } from '../lib/cron.js';
import { createChildLogger } from '../lib/logger.js';
import type { CycleRunner } from './cycle-runner.js';

const log = createChildLogger('scheduler');

export interface ScheduleOptions {
  intervalMinutes: number;
  timezone: string;
  runOnStartup: boolean;
}

/**
 * Register the review reply cron job.
 * Call this once during application startup.
 */
export function registerJobs(runner: CycleRunner, options: ScheduleOptions): ScheduledTask[] {
  const expression = intervalToCron(options.intervalMinutes);
  if (!expression) {
    throw new Error(`Cannot schedule a ${options.intervalMinutes} minute interval with cron`);
  }

  const task = cron.schedule(
    expression,
    async () => {
      // Overlapping ticks are turned away by the runner
      const result = runner.trigger('scheduled');
      if (result.accepted) {
        await result.done;
      }
    },
    { timezone: options.timezone },
  );

  if (options.runOnStartup) {
    runner.trigger('startup');
  }

  log.info(
    { expression, timezone: options.timezone, runOnStartup: options.runOnStartup },
    `Cron job registered: review-reply (every ${options.intervalMinutes}min)`,
  );

  return [task];
}
