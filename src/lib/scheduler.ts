/**
 * Scheduler Module
 * Runs the predictive monitoring cycle on a cron schedule (MONITOR_SCHEDULE).
 * One cycle at a time; a cycle past its timeout, or a stop request, is
 * cancelled cooperatively: in-flight instances finish, no new ones start.
 */

import cron, { type ScheduledTask } from 'node-cron';
import { loadMonitorConfig } from '@/lib/threshold-config';
import { runPredictiveMonitoringCycle } from '@/lib/monitor-runtime';

let initialized = false;
let monitorTask: ScheduledTask | null = null;
let activeRun: Promise<void> | null = null;
let activeController: AbortController | null = null;
let activeSchedule: string | null = null;
let lastRunAt: string | null = null;
let lastStatusCode: number | null = null;

async function executeCycle(timeoutMs: number): Promise<void> {
  const controller = new AbortController();
  activeController = controller;
  const timeoutId = setTimeout(() => {
    console.warn(`[Scheduler] Monitoring cycle exceeded ${timeoutMs}ms, cancelling remaining instances`);
    controller.abort();
  }, timeoutMs);
  const startTime = Date.now();

  try {
    const response = await runPredictiveMonitoringCycle(controller.signal);
    lastStatusCode = response.statusCode;
    const duration = Date.now() - startTime;
    if (response.statusCode === 200) {
      console.info(
        `[Scheduler] Monitoring cycle completed: ${response.body.instancesChecked ?? 0} checked, ${response.body.predictionsFound ?? 0} predictions (${duration}ms)`
      );
    } else {
      console.error(`[Scheduler] Monitoring cycle failed: ${response.body.error} (${duration}ms)`);
    }
  } finally {
    clearTimeout(timeoutId);
    lastRunAt = new Date().toISOString();
    activeController = null;
  }
}

/**
 * Run one scheduled tick, unless a cycle is already in progress
 */
export function runScheduledCycle(timeoutMs: number): Promise<void> {
  if (activeRun) {
    console.warn('[Scheduler] Previous monitoring cycle still running, skipping tick');
    return Promise.resolve();
  }
  const run = executeCycle(timeoutMs).finally(() => {
    activeRun = null;
  });
  activeRun = run;
  return run;
}

/**
 * Initialize the cron job. Idempotent; throws on an invalid MONITOR_SCHEDULE.
 */
export function initializeScheduler(): void {
  if (initialized) {
    console.info('[Scheduler] Already initialized, skipping');
    return;
  }

  const config = loadMonitorConfig();
  if (!cron.validate(config.schedule)) {
    throw new Error(`Invalid MONITOR_SCHEDULE: "${config.schedule}"`);
  }

  monitorTask = cron.schedule(config.schedule, () => {
    runScheduledCycle(config.cycleTimeoutMs).catch((error: unknown) => {
      const msg = error instanceof Error ? error.message : 'Unknown error';
      console.error('[Scheduler] Monitoring cycle error:', msg);
    });
  });

  activeSchedule = config.schedule;
  initialized = true;
  console.info(`[Scheduler] Initialized, monitoring: ${config.schedule} (timeout ${config.cycleTimeoutMs}ms)`);
}

/**
 * Stop the cron job and cancel a running cycle.
 * Resolves once the in-flight cycle (if any) has settled.
 */
export async function stopScheduler(): Promise<void> {
  if (monitorTask) {
    monitorTask.stop();
    monitorTask = null;
  }
  activeSchedule = null;
  initialized = false;

  const running = activeRun;
  if (activeController) {
    activeController.abort();
  }
  if (running) {
    console.info('[Scheduler] Waiting for in-flight monitoring cycle to finish');
    try {
      await running;
    } catch (error) {
      const msg = error instanceof Error ? error.message : 'Unknown error';
      console.error('[Scheduler] In-flight monitoring cycle failed during stop:', msg);
    }
  }
  console.info('[Scheduler] Stopped');
}

/**
 * Get scheduler status.
 */
export function getSchedulerStatus(): {
  initialized: boolean;
  schedule: string | null;
  monitorTaskRunning: boolean;
  lastRunAt: string | null;
  lastStatusCode: number | null;
} {
  return {
    initialized,
    schedule: activeSchedule,
    monitorTaskRunning: activeRun !== null,
    lastRunAt,
    lastStatusCode,
  };
}
