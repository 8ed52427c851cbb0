#!/usr/bin/env tsx

/**
 * Predictive Monitor
 *
 * Usage:
 *   tsx scripts/predictive-monitor.ts          # run on MONITOR_SCHEDULE until SIGINT/SIGTERM
 *   tsx scripts/predictive-monitor.ts --once   # run a single cycle and exit
 */

import { runPredictiveMonitoringCycle } from '@/lib/monitor-runtime';
import { initializeScheduler, stopScheduler } from '@/lib/scheduler';
import { resetStore } from '@/lib/redis-store';

async function runOnce(): Promise<number> {
  const controller = new AbortController();
  const onSignal = () => {
    console.warn('[PredictiveMonitor] Cancellation requested, finishing in-flight instances');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const response = await runPredictiveMonitoringCycle(controller.signal);
  console.log(JSON.stringify(response, null, 2));
  await resetStore();
  return response.statusCode === 200 ? 0 : 1;
}

function runScheduled(): void {
  initializeScheduler();

  const shutdown = () => {
    console.warn('[PredictiveMonitor] Shutting down, waiting for the running cycle');
    stopScheduler()
      .then(() => resetStore())
      .catch((error: unknown) => {
        console.error('[PredictiveMonitor] Shutdown failed:', error instanceof Error ? error.message : error);
      })
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

if (process.argv.includes('--once')) {
  runOnce()
    .then((code) => process.exit(code))
    .catch((error: unknown) => {
      console.error('[PredictiveMonitor] Unexpected error:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
} else {
  runScheduled();
}
