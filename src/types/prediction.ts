/**
 * Failure Prediction Types
 * Per-metric verdicts, result sets and the scored prediction record
 */

// ============================================================================
// Metric Identity
// ============================================================================

/**
 * Tracked signals, in the order they are analyzed, scored and reported
 */
export const METRIC_NAMES = [
  'cpu_steal',
  'iowait',
  'memory_saturation',
  'disk_usage',
  'cpu_credit_balance',
  'status_check_failures',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** Ordinal signal state: none < warning < critical */
export type Severity = 'none' | 'warning' | 'critical';

/** Direction of the recent value relative to the longer-window baseline */
export type Trend = 'stable' | 'increasing' | 'decreasing' | 'unknown';

/** CloudWatch statistic used to reduce each hourly bucket */
export type MetricStatistic = 'Average' | 'Maximum' | 'Minimum' | 'Sum' | 'SampleCount';

// ============================================================================
// Series
// ============================================================================

/**
 * One hourly bucket of a metric series
 */
export interface MetricSample {
  /** ISO 8601 bucket start */
  timestamp: string;
  value: number;
}

// ============================================================================
// Verdicts
// ============================================================================

/**
 * Analysis result for one signal.
 * `detected` is true exactly when `severity` is not 'none'.
 */
export interface MetricVerdict {
  detected: boolean;
  severity: Severity;
  trend: Trend;

  /** Mean of the most recent 24 buckets (or all buckets when fewer) */
  currentValue?: number;

  /** Full-window mean */
  averageValue?: number;

  maxValue?: number;

  /** Smallest bucket in the window (CPU credit balance) */
  minValue?: number;

  /** Sample variance of the window (I/O wait proxy) */
  variance?: number;

  /** Variance exceeded half the window mean (I/O wait proxy) */
  hasSpikes?: boolean;

  /** Status check failures counted in the window */
  failureCount?: number;
}

export type MetricVerdicts = Record<MetricName, MetricVerdict>;

/**
 * All verdicts for one instance in one analysis cycle
 */
export interface MetricResultSet {
  instanceId: string;
  /** ISO 8601 timestamp of the analysis */
  timestamp: string;
  metrics: MetricVerdicts;
}

// ============================================================================
// Prediction
// ============================================================================

export type ConfidenceLevel = 'high' | 'medium' | 'low';

export type FailureType = 'Imminent Failure' | 'Potential Hardware Issue' | 'Performance Risk';

export type PredictedWindow = '24 hours' | '24-72 hours' | '72+ hours';

/**
 * One detected signal cited as evidence for a prediction
 */
export interface PredictionFactor {
  metric: MetricName;
  severity: Severity;
  trend: Trend;
  currentValue?: number;
  /** Full verdict, kept for audit */
  details: MetricVerdict;
}

/**
 * Scored failure prediction for one instance
 */
export interface Prediction {
  instanceId: string;
  /** ISO 8601 timestamp when the score was computed */
  timestamp: string;
  /** Aggregate score in [0, 1] */
  score: number;
  confidence: ConfidenceLevel;
  predictedWindow: PredictedWindow;
  failureType: FailureType;
  /** Detected signals in metric order */
  factors: PredictionFactor[];
  metricResults: MetricResultSet;
}

/**
 * Prediction as persisted, with a retention marker
 */
export interface PredictionRecord extends Prediction {
  /** Expiry in epoch seconds */
  expiresAt: number;
}
