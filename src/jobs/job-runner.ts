import type { Core } from '../core.js';
import { CycleInProgressError, errorMessage } from '../utils/errors.js';
import logger from '../utils/logger.js';

// ============================================
// Job Definitions
// ============================================

interface Job {
  name: string;
  intervalMs: number;
  enabled: boolean;
  handler: () => Promise<void>;
  lastRun?: Date;
  running: boolean;
}

export interface JobOptions {
  learningEnabled: boolean;
  learningIntervalMs: number;
  /** Delay before the first run of every job */
  startDelayMs?: number;
}

let jobs: Job[] = [];
let timers: NodeJS.Timeout[] = [];
let startDelayMs = 5000;

/**
 * Build the job table for a core. Replaces any previous table.
 */
export function configureJobs(core: Core, options: JobOptions): void {
  jobs = [
    {
      name: 'learningCycle',
      intervalMs: options.learningIntervalMs, // Daily by default
      enabled: options.learningEnabled,
      running: false,
      handler: () => runLearningCycle(core),
    },
    {
      name: 'budgetMonitor',
      intervalMs: 15 * 60 * 1000, // Every 15 minutes
      enabled: true,
      running: false,
      handler: () => monitorBudget(core),
    },
  ];
  startDelayMs = options.startDelayMs ?? 5000;
}

// ============================================
// Job Handlers
// ============================================

async function runLearningCycle(core: Core): Promise<void> {
  try {
    const summary = await core.learning.runCycle();
    logger.info('Scheduled learning cycle finished', {
      policyVersion: summary.policyVersion,
      applied: summary.applied,
      exploration: summary.exploration,
    });
  } catch (error) {
    if (error instanceof CycleInProgressError) {
      logger.warn('Learning cycle already running (manual trigger), skipping scheduled run');
      return;
    }
    throw error;
  }
}

async function monitorBudget(core: Core): Promise<void> {
  const status = core.calibrator.status();
  const meta = {
    directive: status.directive,
    spentMonth: Number(status.spentMonth.toFixed(4)),
    spentToday: Number(status.spentToday.toFixed(4)),
    pacingTarget: Number(status.pacingTarget.toFixed(4)),
    projectedUtilization: Number(status.projectedUtilization.toFixed(3)),
  };
  if (status.directive === 'normal') {
    logger.debug('Budget status', meta);
  } else {
    logger.warn('Budget throttle active', meta);
  }
}

// ============================================
// Runner
// ============================================

async function runJob(job: Job): Promise<void> {
  if (job.running) {
    logger.warn(`Job ${job.name} is already running, skipping`);
    return;
  }

  job.running = true;
  const startTime = Date.now();

  try {
    await job.handler();
    job.lastRun = new Date();
    logger.debug(`Job ${job.name} completed`, {
      durationMs: Date.now() - startTime
    });
  } catch (error) {
    logger.error(`Job ${job.name} failed`, {
      error: errorMessage(error),
      durationMs: Date.now() - startTime
    });
  } finally {
    job.running = false;
  }
}

/**
 * Start all background jobs
 */
export function startJobs(): void {
  logger.info('Starting background jobs');

  for (const job of jobs) {
    if (!job.enabled) {
      logger.info(`Job ${job.name} is disabled, skipping`);
      continue;
    }

    // First run shortly after startup
    timers.push(setTimeout(() => void runJob(job), startDelayMs));

    // Schedule recurring runs
    timers.push(setInterval(() => void runJob(job), job.intervalMs));

    logger.info(`Scheduled job ${job.name}`, {
      intervalMs: job.intervalMs,
      intervalHuman: formatInterval(job.intervalMs)
    });
  }
}

/**
 * Stop all background jobs
 */
export function stopJobs(): void {
  logger.info('Stopping background jobs');

  for (const timer of timers) {
    clearTimeout(timer);
  }
  timers = [];
}

/**
 * Get job status
 */
export function getJobStatus(): Array<{
  name: string;
  enabled: boolean;
  running: boolean;
  lastRun?: Date;
  intervalMs: number;
}> {
  return jobs.map(job => ({
    name: job.name,
    enabled: job.enabled,
    running: job.running,
    lastRun: job.lastRun,
    intervalMs: job.intervalMs,
  }));
}

/**
 * Manually trigger a job
 */
export async function triggerJob(jobName: string): Promise<boolean> {
  const job = jobs.find(j => j.name === jobName);
  if (!job) return false;

  await runJob(job);
  return true;
}

/**
 * Format interval for logging
 */
function formatInterval(ms: number): string {
  if (ms < 60000) return `${ms / 1000}s`;
  if (ms < 3600000) return `${ms / 60000}m`;
  if (ms < 86400000) return `${ms / 3600000}h`;
  return `${ms / 86400000}d`;
}
