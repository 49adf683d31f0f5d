import { createLogger } from '../utils/logger.js';
import type { Services } from '../services/index.js';

const logger = createLogger('scheduler');

interface RunningJob {
  name: string;
  stop: () => Promise<void> | void;
}

const runningJobs: RunningJob[] = [];

/** Starts the polling loop and the daily digest cron. */
export function startScheduler(services: Services): void {
  if (runningJobs.length > 0) {
    logger.warn('Scheduler already started');
    return;
  }

  services.monitor.start();
  runningJobs.push({ name: 'monitor', stop: () => services.monitor.stop() });

  services.digest.start();
  runningJobs.push({ name: 'digest', stop: () => services.digest.stop() });

  logger.info('Scheduler started', { jobs: runningJobs.map((j) => j.name) });
}

/** Stops jobs in reverse start order. The monitor finishes its current thread first. */
export async function stopScheduler(): Promise<void> {
  while (runningJobs.length > 0) {
    const job = runningJobs.pop();
    if (!job) break;
    try {
      await job.stop();
    } catch (error) {
      logger.error('Failed to stop job', { job: job.name, error });
    }
  }
  logger.info('Scheduler stopped');
}
