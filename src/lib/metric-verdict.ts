/**
 * Metric Verdict Construction
 * Single place where verdicts and result sets are built, so that
 * `detected` always mirrors `severity` and result sets only carry known metrics.
 */

import {
  METRIC_NAMES,
  type MetricName,
  type MetricResultSet,
  type MetricVerdict,
  type MetricVerdicts,
  type Severity,
  type Trend,
} from '@/types/prediction';

export class UnknownMetricError extends Error {
  readonly metric: string;

  constructor(metric: string) {
    super(`Unknown metric "${metric}" (expected one of: ${METRIC_NAMES.join(', ')})`);
    this.name = 'UnknownMetricError';
    this.metric = metric;
  }
}

export function isMetricName(value: string): value is MetricName {
  return (METRIC_NAMES as readonly string[]).includes(value);
}

type VerdictDetails = Omit<MetricVerdict, 'detected' | 'severity' | 'trend'>;

/**
 * Build a verdict; `detected` is derived from severity
 */
export function buildVerdict(severity: Severity, trend: Trend, details: VerdictDetails = {}): MetricVerdict {
  return {
    detected: severity !== 'none',
    severity,
    trend,
    ...details,
  };
}

/**
 * Verdict for a signal without usable data. Absence of data is never anomalous.
 */
export function noDataVerdict(): MetricVerdict {
  return buildVerdict('none', 'unknown');
}

/**
 * Assemble a result set from named verdicts.
 * Unknown names throw UnknownMetricError; missing names get the no-data verdict.
 */
export function createMetricResultSet(
  instanceId: string,
  verdicts: Partial<Record<string, MetricVerdict>>,
  timestamp: string = new Date().toISOString()
): MetricResultSet {
  for (const name of Object.keys(verdicts)) {
    if (!isMetricName(name)) throw new UnknownMetricError(name);
  }

  const pick = (name: MetricName): MetricVerdict => {
    const verdict = verdicts[name];
    return verdict ? buildVerdict(verdict.severity, verdict.trend, stripHeader(verdict)) : noDataVerdict();
  };

  const metrics: MetricVerdicts = {
    cpu_steal: pick('cpu_steal'),
    iowait: pick('iowait'),
    memory_saturation: pick('memory_saturation'),
    disk_usage: pick('disk_usage'),
    cpu_credit_balance: pick('cpu_credit_balance'),
    status_check_failures: pick('status_check_failures'),
  };

  return { instanceId, timestamp, metrics };
}

function stripHeader(verdict: MetricVerdict): VerdictDetails {
  const { detected: _detected, severity: _severity, trend: _trend, ...details } = verdict;
  return details;
}
