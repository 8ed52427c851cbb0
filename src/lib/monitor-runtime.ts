/**
 * Monitor Runtime
 * Wires the AWS-backed collaborators into a monitoring cycle and exposes a
 * handler-style entry point for schedulers and scripts.
 */

import type { MonitorConfig } from '@/types/thresholds';
import type { MonitoringCycleSummary } from '@/types/monitoring';
import { loadMonitorConfig } from '@/lib/threshold-config';
import { CloudWatchMetricSource, type MetricSource } from '@/lib/metric-source';
import { MetricAnalyzer } from '@/lib/metric-analyzer';
import { AnomalyScorer } from '@/lib/anomaly-scorer';
import { Ec2FleetEnumerator, type FleetEnumerator } from '@/lib/fleet-enumerator';
import { StorePredictionSink } from '@/lib/prediction-store';
import { getStore } from '@/lib/redis-store';
import { runMonitoringCycle, type MonitoringCycleDeps } from '@/lib/monitoring-cycle';

export interface MonitorRuntime {
  config: MonitorConfig;
  deps: MonitoringCycleDeps;
}

export interface MonitorRuntimeOverrides {
  source?: MetricSource;
  fleet?: FleetEnumerator;
}

/**
 * Build the collaborators for one cycle from configuration
 */
export function createMonitorRuntime(
  config: MonitorConfig,
  overrides: MonitorRuntimeOverrides = {}
): MonitorRuntime {
  const store = getStore();
  const source = overrides.source ?? new CloudWatchMetricSource({ region: config.awsRegion });
  const fleet = overrides.fleet ?? new Ec2FleetEnumerator({
    region: config.awsRegion,
    tagKey: config.tagKey,
    tagValues: config.tagValues,
    store,
  });

  return {
    config,
    deps: {
      fleet,
      analyzer: new MetricAnalyzer(source, {
        thresholds: config.thresholds,
        lookbackHours: config.lookbackHours,
      }),
      scorer: new AnomalyScorer(config.thresholds),
      sink: new StorePredictionSink({ ttlDays: config.predictionTtlDays, store }),
      history: store,
    },
  };
}

export interface CycleResponse {
  statusCode: 200 | 500;
  body: {
    message?: string;
    instancesChecked?: number;
    predictionsFound?: number;
    highConfidenceCount?: number;
    failed?: number;
    cancelled?: boolean;
    error?: string;
  };
}

/**
 * Run one cycle with configuration loaded fresh from the environment.
 * Never throws: fatal errors are reported as a 500 response.
 */
export async function runPredictiveMonitoringCycle(
  signal?: AbortSignal,
  overrides: MonitorRuntimeOverrides = {}
): Promise<CycleResponse> {
  const startedAt = new Date();
  try {
    const { config, deps } = createMonitorRuntime(loadMonitorConfig(), overrides);
    const result = await runMonitoringCycle(deps, { concurrency: config.concurrency, signal });

    return {
      statusCode: 200,
      body: {
        message: result.instancesChecked === 0 ? 'No instances to monitor' : 'Monitoring cycle completed',
        instancesChecked: result.instancesChecked,
        predictionsFound: result.predictionsFound,
        highConfidenceCount: result.highConfidenceCount,
        failed: result.failed,
        cancelled: result.cancelled,
      },
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error('[MonitorRuntime] Fatal error in predictive monitoring:', message);

    const summary: MonitoringCycleSummary = {
      startedAt: startedAt.toISOString(),
      durationMs: Date.now() - startedAt.getTime(),
      instancesChecked: 0,
      predictionsFound: 0,
      highConfidenceCount: 0,
      skipped: 0,
      failed: 0,
      cancelled: false,
      error: message,
    };
    await getStore().pushCycleSummary(summary).catch((err: unknown) => {
      console.error('[MonitorRuntime] Failed to record failed cycle:', err instanceof Error ? err.message : err);
    });

    return { statusCode: 500, body: { error: message } };
  }
}
