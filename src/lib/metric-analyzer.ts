/**
 * Metric Analyzer
 * Turns each signal's hourly history into a per-metric verdict
 * (severity, trend, representative value).
 *
 * A source failure degrades only the affected metric to unknown/none;
 * the remaining signals are still analyzed.
 */

import type { MetricResultSet, MetricSample, MetricStatistic, MetricVerdict, MetricName, Trend, Severity } from '@/types/prediction';
import type { ThresholdSet } from '@/types/thresholds';
import type { MetricSource } from '@/lib/metric-source';
import { DEFAULT_LOOKBACK_HOURS } from '@/lib/threshold-config';
import { buildVerdict, createMetricResultSet, noDataVerdict } from '@/lib/metric-verdict';

// ============================================================================
// Configuration
// ============================================================================

/** Buckets averaged into the representative "current" value */
const RECENT_WINDOW = 24;

/** Recent/baseline ratio beyond which a trend is reported */
const CPU_STEAL_TREND_RATIO = 1.2;
const IOWAIT_TREND_RATIO = 1.3;
const CPU_CREDIT_TREND_RATIO = 1.25;

/** I/O wait spikes: sample variance above this fraction of the mean */
const IOWAIT_SPIKE_VARIANCE_FACTOR = 0.5;

interface SeriesSource {
  namespace: string;
  metricName: string;
  statistic: MetricStatistic;
}

/**
 * CloudWatch series backing each time-series signal.
 * iowait reads CPUUtilization: true I/O wait needs agent telemetry that is
 * not collected yet, and its thresholds are calibrated against this proxy.
 */
export const METRIC_SERIES: Record<Exclude<MetricName, 'status_check_failures'>, SeriesSource> = {
  cpu_steal: { namespace: 'AWS/EC2', metricName: 'CPUStealTime', statistic: 'Average' },
  iowait: { namespace: 'AWS/EC2', metricName: 'CPUUtilization', statistic: 'Average' },
  memory_saturation: { namespace: 'CWAgent', metricName: 'mem_used_percent', statistic: 'Average' },
  disk_usage: { namespace: 'CWAgent', metricName: 'disk_used_percent', statistic: 'Average' },
  cpu_credit_balance: { namespace: 'AWS/EC2', metricName: 'CPUCreditBalance', statistic: 'Average' },
};

// ============================================================================
// Statistics
// ============================================================================

export function calculateMean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample variance (n - 1 denominator); 0 for fewer than two values
 */
export function calculateSampleVariance(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = calculateMean(values);
  const squaredDiffs = values.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0);
  return squaredDiffs / (values.length - 1);
}

/**
 * Mean of the most recent 24 buckets, or of all buckets when fewer exist
 */
export function recentMean(values: number[]): number {
  return values.length >= RECENT_WINDOW ? calculateMean(values.slice(-RECENT_WINDOW)) : calculateMean(values);
}

/**
 * Compare a recent value with its baseline using a symmetric ratio band
 */
export function classifyRatioTrend(recent: number, baseline: number, ratio: number): Trend {
  if (recent > baseline * ratio) return 'increasing';
  if (recent < baseline / ratio) return 'decreasing';
  return 'stable';
}

/**
 * Single-step trend: last bucket against the one before it
 */
export function classifyStepTrend(values: number[]): Trend {
  if (values.length >= 2 && values[values.length - 1] > values[values.length - 2]) {
    return 'increasing';
  }
  return 'stable';
}

function severityFor(value: number, warning: number, critical: number): Severity {
  if (value >= critical) return 'critical';
  if (value >= warning) return 'warning';
  return 'none';
}

// ============================================================================
// Analyzer
// ============================================================================

export interface MetricAnalyzerOptions {
  thresholds: ThresholdSet;
  lookbackHours?: number;
}

export class MetricAnalyzer {
  private readonly source: MetricSource;
  private readonly thresholds: ThresholdSet;
  private readonly lookbackHours: number;

  constructor(source: MetricSource, options: MetricAnalyzerOptions) {
    this.source = source;
    this.thresholds = options.thresholds;
    this.lookbackHours = options.lookbackHours ?? DEFAULT_LOOKBACK_HOURS;
  }

  /**
   * Fetch the values of one signal; null when the source failed
   */
  private async fetchValues(
    instanceId: string,
    metric: Exclude<MetricName, 'status_check_failures'>
  ): Promise<number[] | null> {
    const series = METRIC_SERIES[metric];
    let samples: MetricSample[];
    try {
      samples = await this.source.getSeries({
        instanceId,
        metricName: series.metricName,
        namespace: series.namespace,
        lookbackHours: this.lookbackHours,
        statistic: series.statistic,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[MetricAnalyzer] Failed to fetch metric series:', {
        instanceId,
        metric,
        source: `${series.namespace}/${series.metricName}`,
        error: message,
      });
      return null;
    }
    return samples.map(s => s.value);
  }

  async analyzeCpuSteal(instanceId: string): Promise<MetricVerdict> {
    const values = await this.fetchValues(instanceId, 'cpu_steal');
    if (!values || values.length === 0) return noDataVerdict();

    const average = calculateMean(values);
    const recent = recentMean(values);
    const { cpuStealWarning, cpuStealCritical } = this.thresholds;

    return buildVerdict(
      severityFor(recent, cpuStealWarning, cpuStealCritical),
      classifyRatioTrend(recent, average, CPU_STEAL_TREND_RATIO),
      { currentValue: recent, averageValue: average, maxValue: Math.max(...values) }
    );
  }

  /**
   * I/O wait proxy. A high level alone is not enough: the window must also
   * be spiky (variance above half the mean) for either tier to fire.
   */
  async analyzeIowait(instanceId: string): Promise<MetricVerdict> {
    const values = await this.fetchValues(instanceId, 'iowait');
    // Variance needs at least two buckets
    if (!values || values.length < 2) return noDataVerdict();

    const variance = calculateSampleVariance(values);
    const average = calculateMean(values);
    const recent = recentMean(values);
    const hasSpikes = variance > average * IOWAIT_SPIKE_VARIANCE_FACTOR;
    const { iowaitWarning, iowaitCritical } = this.thresholds;

    const severity: Severity = hasSpikes ? severityFor(recent, iowaitWarning, iowaitCritical) : 'none';

    return buildVerdict(severity, classifyRatioTrend(recent, average, IOWAIT_TREND_RATIO), {
      currentValue: recent,
      averageValue: average,
      variance,
      hasSpikes,
    });
  }

  async analyzeMemorySaturation(instanceId: string): Promise<MetricVerdict> {
    const values = await this.fetchValues(instanceId, 'memory_saturation');
    if (!values || values.length === 0) return noDataVerdict();

    const recent = recentMean(values);
    const { memorySaturationWarning, memorySaturationCritical } = this.thresholds;

    return buildVerdict(
      severityFor(recent, memorySaturationWarning, memorySaturationCritical),
      classifyStepTrend(values),
      { currentValue: recent, maxValue: Math.max(...values) }
    );
  }

  async analyzeDiskUsage(instanceId: string): Promise<MetricVerdict> {
    const values = await this.fetchValues(instanceId, 'disk_usage');
    if (!values || values.length === 0) return noDataVerdict();

    const recent = recentMean(values);
    const { diskUsageWarning, diskUsageCritical } = this.thresholds;

    return buildVerdict(
      severityFor(recent, diskUsageWarning, diskUsageCritical),
      classifyStepTrend(values),
      { currentValue: recent, maxValue: Math.max(...values) }
    );
  }

  /**
   * Burstable-instance credits. Driven by the window minimum, warning tier only.
   */
  async analyzeCpuCreditBalance(instanceId: string): Promise<MetricVerdict> {
    const values = await this.fetchValues(instanceId, 'cpu_credit_balance');
    if (!values || values.length === 0) return noDataVerdict();

    const average = calculateMean(values);
    const recent = recentMean(values);
    const minValue = Math.min(...values);
    const severity: Severity = minValue < this.thresholds.cpuCreditBalanceWarning ? 'warning' : 'none';

    return buildVerdict(severity, classifyRatioTrend(recent, average, CPU_CREDIT_TREND_RATIO), {
      currentValue: recent,
      averageValue: average,
      minValue,
    });
  }

  /**
   * Status check failures arrive as instance events rather than metric
   * history. Until that feed is wired in, this signal is never detected.
   */
  async analyzeStatusCheckFailures(_instanceId: string): Promise<MetricVerdict> {
    return buildVerdict('none', 'unknown', { failureCount: 0 });
  }

  /**
   * Run every signal analysis for one instance
   */
  async analyzeAllMetrics(instanceId: string): Promise<MetricResultSet> {
    const [cpuSteal, iowait, memory, disk, credit, statusChecks] = await Promise.all([
      this.analyzeCpuSteal(instanceId),
      this.analyzeIowait(instanceId),
      this.analyzeMemorySaturation(instanceId),
      this.analyzeDiskUsage(instanceId),
      this.analyzeCpuCreditBalance(instanceId),
      this.analyzeStatusCheckFailures(instanceId),
    ]);

    return createMetricResultSet(instanceId, {
      cpu_steal: cpuSteal,
      iowait,
      memory_saturation: memory,
      disk_usage: disk,
      cpu_credit_balance: credit,
      status_check_failures: statusChecks,
    });
  }
}
