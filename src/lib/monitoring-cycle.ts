/**
 * Monitoring Cycle
 * One pass over the monitored fleet:
 *   enumerate → filter (disabled / quarantined) → analyze → score → forward
 *
 * Each instance yields a Result-style outcome; a failing instance is logged
 * and the cycle moves on. Only a fleet enumeration failure aborts the cycle.
 */

import type { Prediction } from '@/types/prediction';
import type { MonitoringCycleSummary } from '@/types/monitoring';
import type { IStateStore } from '@/types/redis';
import type { MetricAnalyzer } from '@/lib/metric-analyzer';
import type { AnomalyScorer } from '@/lib/anomaly-scorer';
import type { PredictionSink } from '@/lib/prediction-store';
import { shouldMonitorInstance, type FleetEnumerator } from '@/lib/fleet-enumerator';

// ============================================================
// Errors
// ============================================================

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Failure of one instance's analyze-then-score sequence
 */
export class AnalysisError extends Error {
  readonly instanceId: string;

  constructor(instanceId: string, stage: string, cause: unknown) {
    super(`${stage} failed for ${instanceId}: ${describeError(cause)}`, { cause });
    this.name = 'AnalysisError';
    this.instanceId = instanceId;
  }
}

/**
 * The fleet could not be listed; the cycle cannot run
 */
export class FleetEnumerationError extends Error {
  constructor(cause: unknown) {
    super(`Failed to enumerate monitored instances: ${describeError(cause)}`, { cause });
    this.name = 'FleetEnumerationError';
  }
}

// ============================================================
// Types
// ============================================================

export type InstanceOutcome =
  | { ok: true; instanceId: string; status: 'scored'; prediction: Prediction; emitted: boolean }
  | { ok: true; instanceId: string; status: 'skipped'; reason: string }
  | { ok: false; instanceId: string; error: AnalysisError };

export interface MonitoringCycleResult extends MonitoringCycleSummary {
  /** Predictions forwarded to the sink */
  predictions: Prediction[];
  outcomes: InstanceOutcome[];
}

export interface MonitoringCycleDeps {
  fleet: FleetEnumerator;
  analyzer: Pick<MetricAnalyzer, 'analyzeAllMetrics'>;
  scorer: Pick<AnomalyScorer, 'scoreAnomalies'>;
  sink: PredictionSink;
  /** Receives the cycle summary, when set */
  history?: Pick<IStateStore, 'pushCycleSummary'>;
}

export interface MonitoringCycleOptions {
  /** Instances analyzed in parallel (default 1; non-finite values fall back to 1) */
  concurrency?: number;
  /** Stops new instances from starting; in-flight ones finish */
  signal?: AbortSignal;
}

/**
 * Medium and high confidence predictions are acted upon
 */
export function isActionablePrediction(prediction: Prediction): boolean {
  return prediction.confidence === 'high' || prediction.confidence === 'medium';
}

// ============================================================
// Per-Instance Processing
// ============================================================

async function processInstance(instanceId: string, deps: MonitoringCycleDeps): Promise<InstanceOutcome> {
  let stage = 'Configuration lookup';
  try {
    const config = await deps.fleet.getInstanceConfig(instanceId);
    if (!shouldMonitorInstance(config)) {
      console.info(`[MonitoringCycle] Skipping ${instanceId} - monitoring disabled or quarantined`);
      return { ok: true, instanceId, status: 'skipped', reason: 'monitoring disabled or quarantined' };
    }

    stage = 'Metric analysis';
    console.info(`[MonitoringCycle] Analyzing metrics for ${instanceId}`);
    const resultSet = await deps.analyzer.analyzeAllMetrics(instanceId);

    stage = 'Scoring';
    const prediction = deps.scorer.scoreAnomalies(resultSet);

    if (!isActionablePrediction(prediction)) {
      console.info(`[MonitoringCycle] No significant prediction for ${instanceId}`, {
        instanceId,
        score: prediction.score,
      });
      return { ok: true, instanceId, status: 'scored', prediction, emitted: false };
    }

    stage = 'Prediction recording';
    await deps.sink.recordPrediction(prediction);
    console.warn(`[MonitoringCycle] Prediction detected for ${instanceId}`, {
      instanceId,
      confidence: prediction.confidence,
      failureType: prediction.failureType,
      score: prediction.score,
    });
    return { ok: true, instanceId, status: 'scored', prediction, emitted: true };
  } catch (error) {
    const failure = new AnalysisError(instanceId, stage, error);
    console.error('[MonitoringCycle] Instance processing failed:', {
      instanceId,
      stage,
      error: describeError(error),
    });
    return { ok: false, instanceId, error: failure };
  }
}

// ============================================================
// Cycle
// ============================================================

/**
 * Run one monitoring pass over the fleet.
 * Rejects with FleetEnumerationError only; per-instance failures are reported in `outcomes`.
 */
export async function runMonitoringCycle(
  deps: MonitoringCycleDeps,
  options: MonitoringCycleOptions = {}
): Promise<MonitoringCycleResult> {
  const startedAt = new Date();
  console.info('[MonitoringCycle] Starting predictive monitoring cycle');

  let instanceIds: string[];
  try {
    instanceIds = await deps.fleet.listInstanceIds();
  } catch (error) {
    const failure = new FleetEnumerationError(error);
    console.error('[MonitoringCycle] Fatal:', failure.message);
    throw failure;
  }

  if (instanceIds.length === 0) {
    console.info('[MonitoringCycle] No instances found for monitoring');
  }

  const outcomes: InstanceOutcome[] = [];
  const queue = [...instanceIds];
  const requested =
    options.concurrency !== undefined && Number.isFinite(options.concurrency) ? Math.floor(options.concurrency) : 1;
  const concurrency = Math.max(1, Math.min(requested, queue.length));

  const worker = async (): Promise<void> => {
    while (queue.length > 0) {
      if (options.signal?.aborted) return;
      const instanceId = queue.shift();
      if (instanceId === undefined) return;
      outcomes.push(await processInstance(instanceId, deps));
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  const cancelled = outcomes.length < instanceIds.length;
  if (cancelled) {
    console.warn(`[MonitoringCycle] Cancelled with ${instanceIds.length - outcomes.length} instance(s) not started`);
  }

  const predictions: Prediction[] = [];
  let skipped = 0;
  let failed = 0;
  for (const outcome of outcomes) {
    if (!outcome.ok) failed++;
    else if (outcome.status === 'skipped') skipped++;
    else if (outcome.emitted) predictions.push(outcome.prediction);
  }

  const highConfidenceCount = predictions.filter(p => p.confidence === 'high').length;
  if (highConfidenceCount > 0) {
    console.warn(`[MonitoringCycle] Found ${highConfidenceCount} high-confidence predictions`, {
      count: highConfidenceCount,
    });
  }

  const summary: MonitoringCycleSummary = {
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
    instancesChecked: instanceIds.length,
    predictionsFound: predictions.length,
    highConfidenceCount,
    skipped,
    failed,
    cancelled,
  };

  if (deps.history) {
    try {
      await deps.history.pushCycleSummary(summary);
    } catch (error) {
      console.error('[MonitoringCycle] Failed to record cycle summary:', describeError(error));
    }
  }

  console.info(
    `[MonitoringCycle] Cycle completed: ${summary.instancesChecked} checked, ${summary.predictionsFound} predictions, ${failed} failed (${summary.durationMs}ms)`
  );

  return { ...summary, predictions, outcomes };
}
