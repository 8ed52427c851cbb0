/**
 * State Store Types
 * Strategy Pattern interface for Redis / InMemory dual implementation
 */

import type { PredictionRecord } from './prediction';
import type { InstanceConfig, MonitoringCycleSummary } from './monitoring';

// ============================================================
// Store Interface
// ============================================================

/**
 * Unified state store interface
 * Implemented by RedisStateStore (production) and InMemoryStateStore (development)
 */
export interface IStateStore {
  // --- Prediction Events (per instance, newest first) ---
  addPredictionRecord(record: PredictionRecord): Promise<void>;
  getPredictionRecords(instanceId: string, limit?: number): Promise<PredictionRecord[]>;

  // --- Instance Configuration ---
  getInstanceConfig(instanceId: string): Promise<InstanceConfig | null>;
  updateInstanceConfig(
    instanceId: string,
    updates: Partial<Omit<InstanceConfig, 'instanceId' | 'updatedAt'>>
  ): Promise<InstanceConfig>;

  // --- Monitoring Cycle History ---
  pushCycleSummary(summary: MonitoringCycleSummary): Promise<void>;
  getCycleHistory(limit?: number): Promise<MonitoringCycleSummary[]>;

  // --- Connection Management ---
  disconnect(): Promise<void>;
}

// ============================================================
// Configuration
// ============================================================

/**
 * Redis connection configuration
 */
export interface RedisConfig {
  /** Redis connection URL (e.g., redis://localhost:6379) */
  url: string;
  /** Key prefix for all predictor keys */
  keyPrefix: string;
  /** Connection timeout in milliseconds */
  connectTimeout: number;
  /** Maximum retry attempts */
  maxRetries: number;
}

export const DEFAULT_REDIS_CONFIG: Omit<RedisConfig, 'url'> = {
  keyPrefix: 'hfp:',
  connectTimeout: 5000,
  maxRetries: 3,
};
