/**
 * Anomaly Scorer
 * Aggregates per-metric verdicts into one failure score, then derives
 * confidence, failure window, failure type and contributing factors.
 *
 * Pure function of the result set and the two confidence thresholds;
 * only `timestamp` differs between calls with the same input.
 */

import {
  METRIC_NAMES,
  type ConfidenceLevel,
  type FailureType,
  type MetricResultSet,
  type MetricVerdict,
  type PredictedWindow,
  type Prediction,
  type PredictionFactor,
  type Severity,
} from '@/types/prediction';
import type { ConfidenceThresholds } from '@/types/thresholds';
import { DEFAULT_THRESHOLDS } from '@/lib/threshold-config';

// ============================================================================
// Configuration
// ============================================================================

export const SEVERITY_BASE_SCORES: Record<Severity, number> = {
  critical: 0.8,
  warning: 0.4,
  none: 0,
};

/** Applied to any non-stable trend */
const TREND_MULTIPLIER = 1.2;

/** Status checks are the most reliable sign of an imminent failure */
const STATUS_CHECK_WEIGHT = 1.5;

/**
 * Weights for the top-ranked scores. Scores past the third are dropped so
 * that many weak signals cannot outweigh one dominant signal.
 */
const TOP_TWO_WEIGHTS = [0.6, 0.4] as const;
const TOP_THREE_WEIGHTS = [0.5, 0.3, 0.2] as const;

const FAILURE_WINDOWS: Record<ConfidenceLevel, PredictedWindow> = {
  high: '24 hours',
  medium: '24-72 hours',
  low: '72+ hours',
};

// ============================================================================
// Scorer
// ============================================================================

export class AnomalyScorer {
  private readonly highConfidenceThreshold: number;
  private readonly mediumConfidenceThreshold: number;
  private readonly clock: () => Date;

  constructor(
    thresholds: ConfidenceThresholds = DEFAULT_THRESHOLDS,
    clock: () => Date = () => new Date()
  ) {
    this.highConfidenceThreshold = thresholds.highConfidenceThreshold;
    this.mediumConfidenceThreshold = thresholds.mediumConfidenceThreshold;
    this.clock = clock;
  }

  /**
   * Score a single verdict: critical 0.8, warning 0.4, ×1.2 when trending, capped at 1
   */
  calculateSeverityScore(verdict: MetricVerdict): number {
    if (!verdict.detected) return 0;

    let score = SEVERITY_BASE_SCORES[verdict.severity];
    if (verdict.trend === 'increasing' || verdict.trend === 'decreasing') {
      score *= TREND_MULTIPLIER;
    }
    return Math.min(score, 1);
  }

  /**
   * Combine the scores of every detected signal.
   * One score stands alone; otherwise the top two or three are weighted. Result is in [0, 1].
   */
  calculateAggregateScore(resultSet: MetricResultSet): number {
    const scores: number[] = [];
    for (const name of METRIC_NAMES) {
      const verdict = resultSet.metrics[name];
      if (!verdict.detected) continue;

      const score = this.calculateSeverityScore(verdict);
      scores.push(name === 'status_check_failures' ? score * STATUS_CHECK_WEIGHT : score);
    }

    if (scores.length === 0) return 0;

    const top = [...scores].sort((a, b) => b - a).slice(0, 3);
    let aggregate: number;
    if (top.length === 1) {
      aggregate = top[0];
    } else if (top.length === 2) {
      aggregate = top[0] * TOP_TWO_WEIGHTS[0] + top[1] * TOP_TWO_WEIGHTS[1];
    } else {
      aggregate = top[0] * TOP_THREE_WEIGHTS[0] + top[1] * TOP_THREE_WEIGHTS[1] + top[2] * TOP_THREE_WEIGHTS[2];
    }
    // Status check weighting can push past 1
    return Math.min(aggregate, 1);
  }

  determineConfidenceLevel(score: number): ConfidenceLevel {
    if (score >= this.highConfidenceThreshold) return 'high';
    if (score >= this.mediumConfidenceThreshold) return 'medium';
    return 'low';
  }

  predictFailureWindow(confidence: ConfidenceLevel): PredictedWindow {
    return FAILURE_WINDOWS[confidence];
  }

  /**
   * Priority order: status checks, then CPU steal / I/O wait.
   * Everything else (saturation, credit balance only, nothing detected) is a performance risk.
   */
  classifyFailureType(resultSet: MetricResultSet): FailureType {
    const { metrics } = resultSet;

    if (metrics.status_check_failures.detected) return 'Imminent Failure';
    if (metrics.cpu_steal.detected || metrics.iowait.detected) return 'Potential Hardware Issue';
    // Memory/disk saturation and the catch-all share a label
    return 'Performance Risk';
  }

  /**
   * Detected signals, in metric order
   */
  extractPredictionFactors(resultSet: MetricResultSet): PredictionFactor[] {
    const factors: PredictionFactor[] = [];
    for (const metric of METRIC_NAMES) {
      const verdict = resultSet.metrics[metric];
      if (!verdict.detected) continue;

      factors.push({
        metric,
        severity: verdict.severity,
        trend: verdict.trend,
        currentValue: verdict.currentValue,
        details: verdict,
      });
    }
    return factors;
  }

  scoreAnomalies(resultSet: MetricResultSet): Prediction {
    const score = this.calculateAggregateScore(resultSet);
    const confidence = this.determineConfidenceLevel(score);

    return {
      instanceId: resultSet.instanceId,
      timestamp: this.clock().toISOString(),
      score,
      confidence,
      predictedWindow: this.predictFailureWindow(confidence),
      failureType: this.classifyFailureType(resultSet),
      factors: this.extractPredictionFactors(resultSet),
      metricResults: resultSet,
    };
  }
}
