/**
 * Threshold Configuration
 * Environment-derived thresholds and runtime settings for the predictive monitor.
 * Values are read once at cycle start; a malformed value falls back to its default.
 */

import type { MonitorConfig, ThresholdSet } from '@/types/thresholds';

type Env = Record<string, string | undefined>;

// ============================================================
// Defaults
// ============================================================

export const DEFAULT_THRESHOLDS: Readonly<ThresholdSet> = Object.freeze({
  cpuStealWarning: 5.0,
  cpuStealCritical: 10.0,
  iowaitWarning: 20.0,
  iowaitCritical: 40.0,
  memorySaturationWarning: 85.0,
  memorySaturationCritical: 95.0,
  diskUsageWarning: 80.0,
  diskUsageCritical: 90.0,
  cpuCreditBalanceWarning: 100.0,
  highConfidenceThreshold: 0.8,
  mediumConfidenceThreshold: 0.6,
});

/** 7 days */
export const DEFAULT_LOOKBACK_HOURS = 168;

const DEFAULT_TAG_KEY = 'AutoRecovery';
const DEFAULT_TAG_VALUES = ['enabled', 'true'];
const DEFAULT_PREDICTION_TTL_DAYS = 30;
const DEFAULT_CONCURRENCY = 4;
const DEFAULT_SCHEDULE = '*/15 * * * *';
const DEFAULT_CYCLE_TIMEOUT_MS = 10 * 60 * 1000;

/** Env variable → ThresholdSet field */
const THRESHOLD_ENV_KEYS: Record<keyof ThresholdSet, string> = {
  cpuStealWarning: 'CPU_STEAL_WARNING',
  cpuStealCritical: 'CPU_STEAL_CRITICAL',
  iowaitWarning: 'IOWAIT_WARNING',
  iowaitCritical: 'IOWAIT_CRITICAL',
  memorySaturationWarning: 'MEMORY_SATURATION_WARNING',
  memorySaturationCritical: 'MEMORY_SATURATION_CRITICAL',
  diskUsageWarning: 'DISK_USAGE_WARNING',
  diskUsageCritical: 'DISK_USAGE_CRITICAL',
  cpuCreditBalanceWarning: 'CPU_CREDIT_BALANCE_WARNING',
  highConfidenceThreshold: 'HIGH_CONFIDENCE_THRESHOLD',
  mediumConfidenceThreshold: 'MEDIUM_CONFIDENCE_THRESHOLD',
};

// ============================================================
// Parsing
// ============================================================

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    console.warn(`[Config] Invalid ${name}="${raw}", using default ${fallback}`);
    return fallback;
  }
  return parsed;
}

function readPositiveInt(env: Env, name: string, fallback: number): number {
  const value = readNumber(env, name, fallback);
  if (!Number.isInteger(value) || value <= 0) {
    console.warn(`[Config] ${name} must be a positive integer, using default ${fallback}`);
    return fallback;
  }
  return value;
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (!raw) return [...fallback];
  const items = raw.split(',').map(v => v.trim()).filter(v => v.length > 0);
  return items.length > 0 ? items : [...fallback];
}

/**
 * Load the threshold set from environment variables
 */
export function loadThresholds(env: Env = process.env): ThresholdSet {
  const read = (field: keyof ThresholdSet): number =>
    readNumber(env, THRESHOLD_ENV_KEYS[field], DEFAULT_THRESHOLDS[field]);

  const thresholds: ThresholdSet = {
    cpuStealWarning: read('cpuStealWarning'),
    cpuStealCritical: read('cpuStealCritical'),
    iowaitWarning: read('iowaitWarning'),
    iowaitCritical: read('iowaitCritical'),
    memorySaturationWarning: read('memorySaturationWarning'),
    memorySaturationCritical: read('memorySaturationCritical'),
    diskUsageWarning: read('diskUsageWarning'),
    diskUsageCritical: read('diskUsageCritical'),
    cpuCreditBalanceWarning: read('cpuCreditBalanceWarning'),
    highConfidenceThreshold: read('highConfidenceThreshold'),
    mediumConfidenceThreshold: read('mediumConfidenceThreshold'),
  };

  // Ordering is the caller's responsibility; surface it without correcting it
  if (thresholds.highConfidenceThreshold <= thresholds.mediumConfidenceThreshold) {
    console.warn(
      `[Config] HIGH_CONFIDENCE_THRESHOLD (${thresholds.highConfidenceThreshold}) should exceed MEDIUM_CONFIDENCE_THRESHOLD (${thresholds.mediumConfidenceThreshold})`
    );
  }

  return thresholds;
}

/**
 * Load the full monitor configuration from environment variables
 */
export function loadMonitorConfig(env: Env = process.env): MonitorConfig {
  return {
    thresholds: loadThresholds(env),
    lookbackHours: readPositiveInt(env, 'PREDICTION_LOOKBACK_HOURS', DEFAULT_LOOKBACK_HOURS),
    awsRegion: env.AWS_REGION || undefined,
    redisUrl: env.REDIS_URL || undefined,
    tagKey: env.MONITOR_TAG_KEY || DEFAULT_TAG_KEY,
    tagValues: readList(env, 'MONITOR_TAG_VALUES', DEFAULT_TAG_VALUES),
    predictionTtlDays: readPositiveInt(env, 'PREDICTION_TTL_DAYS', DEFAULT_PREDICTION_TTL_DAYS),
    concurrency: readPositiveInt(env, 'MONITOR_CONCURRENCY', DEFAULT_CONCURRENCY),
    schedule: env.MONITOR_SCHEDULE || DEFAULT_SCHEDULE,
    cycleTimeoutMs: readPositiveInt(env, 'MONITOR_CYCLE_TIMEOUT_MS', DEFAULT_CYCLE_TIMEOUT_MS),
  };
}
