/**
 * Redis State Store Module
 * Dual implementation: RedisStateStore (production) / InMemoryStateStore (development)
 * Selected based on REDIS_URL environment variable
 */

import Redis from 'ioredis';
import { type IStateStore, type RedisConfig, DEFAULT_REDIS_CONFIG } from '@/types/redis';
import type { PredictionRecord } from '@/types/prediction';
import type { InstanceConfig, MonitoringCycleSummary } from '@/types/monitoring';

// ============================================================
// Constants
// ============================================================

const PREDICTION_MAX_PER_INSTANCE = 100;
const PREDICTION_DEFAULT_LIMIT = 10;
const CYCLE_HISTORY_MAX = 500;
const CYCLE_HISTORY_DEFAULT_LIMIT = 50;

// Redis key names (appended to keyPrefix)
const KEYS = {
  predictions: (instanceId: string) => `predictions:${instanceId}`,
  instanceConfig: (instanceId: string) => `instance:config:${instanceId}`,
  cycleHistory: 'cycle:history',
} as const;

type InstanceConfigUpdate = Partial<Omit<InstanceConfig, 'instanceId' | 'updatedAt'>>;

function defaultInstanceConfig(instanceId: string): InstanceConfig {
  return {
    instanceId,
    monitoringEnabled: true,
    quarantine: false,
    updatedAt: new Date().toISOString(),
  };
}

function mergeInstanceConfig(base: InstanceConfig, updates: InstanceConfigUpdate): InstanceConfig {
  const merged: InstanceConfig = { ...base, updatedAt: new Date().toISOString() };
  if (updates.monitoringEnabled !== undefined) merged.monitoringEnabled = updates.monitoringEnabled;
  if (updates.quarantine !== undefined) merged.quarantine = updates.quarantine;
  if (updates.healthEndpoint !== undefined) merged.healthEndpoint = updates.healthEndpoint;
  if (updates.notes !== undefined) merged.notes = updates.notes;
  return merged;
}

// ============================================================
// RedisStateStore Implementation
// ============================================================

export class RedisStateStore implements IStateStore {
  private client: Redis;
  private prefix: string;

  constructor(config: RedisConfig, client?: Redis) {
    this.prefix = config.keyPrefix;
    this.client = client ?? new Redis(config.url, {
      connectTimeout: config.connectTimeout,
      maxRetriesPerRequest: config.maxRetries,
      retryStrategy(times: number) {
        if (times > config.maxRetries) return null;
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });

    this.client.on('connect', () => {
      console.info('[State Store] Redis connected');
    });

    this.client.on('error', (err: Error) => {
      console.error('[State Store] Redis error:', err.message);
    });

    if (!client) {
      this.client.connect().catch((err: Error) => {
        console.error('[State Store] Initial connection failed:', err.message);
      });
    }
  }

  private key(name: string): string {
    return `${this.prefix}${name}`;
  }

  // --- Prediction Events ---

  async addPredictionRecord(record: PredictionRecord): Promise<void> {
    const key = this.key(KEYS.predictions(record.instanceId));
    await this.client.lpush(key, JSON.stringify(record));
    await this.client.ltrim(key, 0, PREDICTION_MAX_PER_INSTANCE - 1);
    // The newest record's expiry governs the list
    await this.client.expireat(key, record.expiresAt);
  }

  async getPredictionRecords(instanceId: string, limit: number = PREDICTION_DEFAULT_LIMIT): Promise<PredictionRecord[]> {
    const items = await this.client.lrange(this.key(KEYS.predictions(instanceId)), 0, limit - 1);
    const nowSec = Math.floor(Date.now() / 1000);
    const records: PredictionRecord[] = [];
    for (const item of items) {
      try {
        const record = JSON.parse(item) as PredictionRecord;
        if (record.expiresAt > nowSec) records.push(record);
      } catch {
        console.warn(`[State Store] Skipping malformed prediction record for ${instanceId}`);
      }
    }
    return records;
  }

  // --- Instance Configuration ---

  async getInstanceConfig(instanceId: string): Promise<InstanceConfig | null> {
    const data = await this.client.hgetall(this.key(KEYS.instanceConfig(instanceId)));
    if (!data || Object.keys(data).length === 0) return null;

    return {
      instanceId,
      monitoringEnabled: data.monitoringEnabled !== 'false',
      quarantine: data.quarantine === 'true',
      healthEndpoint: data.healthEndpoint || undefined,
      notes: data.notes || undefined,
      updatedAt: data.updatedAt || new Date(0).toISOString(),
    };
  }

  async updateInstanceConfig(instanceId: string, updates: InstanceConfigUpdate): Promise<InstanceConfig> {
    const current = (await this.getInstanceConfig(instanceId)) ?? defaultInstanceConfig(instanceId);
    const merged = mergeInstanceConfig(current, updates);

    const fields: Record<string, string> = {
      monitoringEnabled: String(merged.monitoringEnabled),
      quarantine: String(merged.quarantine),
      updatedAt: merged.updatedAt,
    };
    if (merged.healthEndpoint) fields.healthEndpoint = merged.healthEndpoint;
    if (merged.notes) fields.notes = merged.notes;

    await this.client.hset(this.key(KEYS.instanceConfig(instanceId)), fields);
    return merged;
  }

  // --- Monitoring Cycle History ---

  async pushCycleSummary(summary: MonitoringCycleSummary): Promise<void> {
    const key = this.key(KEYS.cycleHistory);
    await this.client.lpush(key, JSON.stringify(summary));
    await this.client.ltrim(key, 0, CYCLE_HISTORY_MAX - 1);
  }

  async getCycleHistory(limit: number = CYCLE_HISTORY_DEFAULT_LIMIT): Promise<MonitoringCycleSummary[]> {
    const items = await this.client.lrange(this.key(KEYS.cycleHistory), 0, limit - 1);
    return items.map((item) => JSON.parse(item) as MonitoringCycleSummary);
  }

  // --- Connection Management ---

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}

// ============================================================
// InMemoryStateStore Implementation
// ============================================================

export class InMemoryStateStore implements IStateStore {
  private predictions: Map<string, PredictionRecord[]> = new Map();
  private instanceConfigs: Map<string, InstanceConfig> = new Map();
  private cycleHistory: MonitoringCycleSummary[] = [];

  // --- Prediction Events ---

  async addPredictionRecord(record: PredictionRecord): Promise<void> {
    const list = this.predictions.get(record.instanceId) ?? [];
    list.unshift(record);
    if (list.length > PREDICTION_MAX_PER_INSTANCE) {
      list.length = PREDICTION_MAX_PER_INSTANCE;
    }
    this.predictions.set(record.instanceId, list);
  }

  async getPredictionRecords(instanceId: string, limit: number = PREDICTION_DEFAULT_LIMIT): Promise<PredictionRecord[]> {
    const nowSec = Math.floor(Date.now() / 1000);
    const live = (this.predictions.get(instanceId) ?? []).filter(r => r.expiresAt > nowSec);
    return live.slice(0, limit);
  }

  // --- Instance Configuration ---

  async getInstanceConfig(instanceId: string): Promise<InstanceConfig | null> {
    const config = this.instanceConfigs.get(instanceId);
    return config ? { ...config } : null;
  }

  async updateInstanceConfig(instanceId: string, updates: InstanceConfigUpdate): Promise<InstanceConfig> {
    const current = this.instanceConfigs.get(instanceId) ?? defaultInstanceConfig(instanceId);
    const merged = mergeInstanceConfig(current, updates);
    this.instanceConfigs.set(instanceId, merged);
    return { ...merged };
  }

  // --- Monitoring Cycle History ---

  async pushCycleSummary(summary: MonitoringCycleSummary): Promise<void> {
    this.cycleHistory.unshift(summary);
    if (this.cycleHistory.length > CYCLE_HISTORY_MAX) {
      this.cycleHistory.length = CYCLE_HISTORY_MAX;
    }
  }

  async getCycleHistory(limit: number = CYCLE_HISTORY_DEFAULT_LIMIT): Promise<MonitoringCycleSummary[]> {
    return this.cycleHistory.slice(0, limit);
  }

  // --- Connection Management ---

  async disconnect(): Promise<void> {
    // No-op for in-memory
  }
}

// ============================================================
// Factory: Store Singleton
// ============================================================

let storeInstance: IStateStore | null = null;

/**
 * Get the state store singleton
 * Uses Redis if REDIS_URL is set, otherwise falls back to InMemory
 */
export function getStore(): IStateStore {
  if (storeInstance) return storeInstance;

  const redisUrl = process.env.REDIS_URL;

  if (redisUrl) {
    console.info('[State Store] Using Redis:', redisUrl.replace(/\/\/.*@/, '//<credentials>@'));
    storeInstance = new RedisStateStore({
      url: redisUrl,
      ...DEFAULT_REDIS_CONFIG,
    });
  } else {
    console.info('[State Store] Using InMemory (set REDIS_URL for persistence)');
    storeInstance = new InMemoryStateStore();
  }

  return storeInstance;
}

/**
 * Reset store singleton (for testing)
 */
export async function resetStore(): Promise<void> {
  if (storeInstance) {
    await storeInstance.disconnect();
    storeInstance = null;
  }
}
