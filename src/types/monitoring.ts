/**
 * Monitoring Cycle Types
 */

/**
 * Per-instance monitoring settings (stored alongside predictions)
 */
export interface InstanceConfig {
  instanceId: string;
  /** false disables analysis for the instance */
  monitoringEnabled: boolean;
  /** Quarantined instances are left alone until released */
  quarantine: boolean;
  /** Application health URL, if the instance exposes one */
  healthEndpoint?: string;
  notes?: string;
  /** ISO 8601 timestamp of the last update */
  updatedAt: string;
}

/**
 * Condensed cycle result kept in history
 */
export interface MonitoringCycleSummary {
  startedAt: string;
  durationMs: number;
  instancesChecked: number;
  predictionsFound: number;
  highConfidenceCount: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
  error?: string;
}
