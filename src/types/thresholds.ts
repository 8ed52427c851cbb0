/**
 * Threshold Configuration Types
 */

/**
 * Warning/critical bounds per metric plus the two confidence cutoffs.
 * Critical bounds are expected to be >= their warning bounds, and
 * `highConfidenceThreshold` > `mediumConfidenceThreshold`.
 */
export interface ThresholdSet {
  /** CPU steal percentage */
  cpuStealWarning: number;
  cpuStealCritical: number;

  /** I/O wait proxy (CPU utilization percentage) */
  iowaitWarning: number;
  iowaitCritical: number;

  /** Memory used percentage */
  memorySaturationWarning: number;
  memorySaturationCritical: number;

  /** Disk used percentage */
  diskUsageWarning: number;
  diskUsageCritical: number;

  /** Burst credits; there is no critical tier */
  cpuCreditBalanceWarning: number;

  highConfidenceThreshold: number;
  mediumConfidenceThreshold: number;
}

export type ConfidenceThresholds = Pick<ThresholdSet, 'highConfidenceThreshold' | 'mediumConfidenceThreshold'>;

/**
 * Process-wide monitoring configuration, loaded at cycle start
 */
export interface MonitorConfig {
  thresholds: ThresholdSet;
  /** Hours of history fetched per metric */
  lookbackHours: number;
  awsRegion?: string;
  redisUrl?: string;
  /** EC2 tag that opts an instance into monitoring */
  tagKey: string;
  tagValues: string[];
  /** Retention of stored predictions */
  predictionTtlDays: number;
  /** Instances analyzed in parallel */
  concurrency: number;
  /** node-cron expression for the periodic cycle */
  schedule: string;
  cycleTimeoutMs: number;
}
