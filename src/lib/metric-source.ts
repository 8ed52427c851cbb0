/**
 * Metric Source Adapter
 * Fetches hourly-bucketed metric history for one instance.
 *
 * CloudWatchMetricSource (production) / InMemoryMetricSource (local runs, tests)
 */

import { CloudWatchClient, GetMetricStatisticsCommand, type Datapoint } from '@aws-sdk/client-cloudwatch';
import type { MetricSample, MetricStatistic } from '@/types/prediction';

/** Bucket width in seconds */
export const METRIC_PERIOD_SECONDS = 3600;

export interface MetricQuery {
  instanceId: string;
  /** CloudWatch metric name, e.g. CPUCreditBalance */
  metricName: string;
  /** CloudWatch namespace, e.g. AWS/EC2 or CWAgent */
  namespace: string;
  lookbackHours: number;
  statistic: MetricStatistic;
}

/**
 * Source of metric history.
 * Returns samples oldest→newest, one per bucket, with missing buckets omitted.
 * Resolves to an empty array when the window has no data; rejects on transport errors.
 */
export interface MetricSource {
  getSeries(query: MetricQuery): Promise<MetricSample[]>;
}

// ============================================================
// CloudWatch
// ============================================================

export interface CloudWatchMetricSourceOptions {
  client?: Pick<CloudWatchClient, 'send'>;
  region?: string;
  /** End of the query window (defaults to the current time) */
  now?: () => Date;
}

export class CloudWatchMetricSource implements MetricSource {
  private client: Pick<CloudWatchClient, 'send'>;
  private now: () => Date;

  constructor(options: CloudWatchMetricSourceOptions = {}) {
    this.client = options.client ?? new CloudWatchClient({ region: options.region });
    this.now = options.now ?? (() => new Date());
  }

  async getSeries(query: MetricQuery): Promise<MetricSample[]> {
    const endTime = this.now();
    const startTime = new Date(endTime.getTime() - query.lookbackHours * 3600 * 1000);

    const response = await this.client.send(
      new GetMetricStatisticsCommand({
        Namespace: query.namespace,
        MetricName: query.metricName,
        Dimensions: [{ Name: 'InstanceId', Value: query.instanceId }],
        StartTime: startTime,
        EndTime: endTime,
        Period: METRIC_PERIOD_SECONDS,
        Statistics: [query.statistic],
      })
    );

    return toSamples(response.Datapoints ?? [], query.statistic);
  }
}

/**
 * Sort datapoints by bucket and keep those carrying the requested statistic
 */
export function toSamples(datapoints: Datapoint[], statistic: MetricStatistic): MetricSample[] {
  const samples: MetricSample[] = [];
  for (const dp of datapoints) {
    const value = dp[statistic];
    if (dp.Timestamp === undefined || value === undefined) continue;
    samples.push({ timestamp: dp.Timestamp.toISOString(), value });
  }
  return samples.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

// ============================================================
// In-Memory
// ============================================================

function seriesKey(instanceId: string, namespace: string, metricName: string, statistic: MetricStatistic): string {
  return `${instanceId}|${namespace}|${metricName}|${statistic}`;
}

export class InMemoryMetricSource implements MetricSource {
  private series = new Map<string, MetricSample[]>();
  private now: () => Date;

  /** `now` ends the query window, as for CloudWatchMetricSource */
  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  setSeries(
    instanceId: string,
    namespace: string,
    metricName: string,
    samples: MetricSample[],
    statistic: MetricStatistic = 'Average'
  ): void {
    const ordered = [...samples].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
    this.series.set(seriesKey(instanceId, namespace, metricName, statistic), ordered);
  }

  /**
   * Store plain values as consecutive hourly buckets ending at `end`
   */
  setValues(
    instanceId: string,
    namespace: string,
    metricName: string,
    values: number[],
    end: Date = new Date()
  ): void {
    const endMs = end.getTime();
    const samples = values.map((value, i) => ({
      timestamp: new Date(endMs - (values.length - i) * METRIC_PERIOD_SECONDS * 1000).toISOString(),
      value,
    }));
    this.setSeries(instanceId, namespace, metricName, samples);
  }

  clear(): void {
    this.series.clear();
  }

  async getSeries(query: MetricQuery): Promise<MetricSample[]> {
    const samples = this.series.get(
      seriesKey(query.instanceId, query.namespace, query.metricName, query.statistic)
    );
    if (!samples) return [];

    const endMs = this.now().getTime();
    const startMs = endMs - query.lookbackHours * 3600 * 1000;
    return samples.filter((s) => {
      const t = Date.parse(s.timestamp);
      return t >= startMs && t <= endMs;
    });
  }
}
