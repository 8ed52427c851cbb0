/**
 * Unit tests for redis-store module (InMemoryStateStore)
 * Tests prediction records, instance configuration and cycle history
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemoryStateStore, getStore, resetStore } from '@/lib/redis-store';
import { createMetricResultSet } from '@/lib/metric-verdict';
import type { PredictionRecord } from '@/types/prediction';
import type { MonitoringCycleSummary } from '@/types/monitoring';

/**
 * Helper: Create mock prediction record
 */
function createRecord(overrides?: Partial<PredictionRecord>): PredictionRecord {
  const instanceId = overrides?.instanceId ?? 'i-0test0000000005';
  return {
    instanceId,
    timestamp: new Date().toISOString(),
    score: 0.8,
    confidence: 'high',
    predictedWindow: '24 hours',
    failureType: 'Potential Hardware Issue',
    factors: [],
    metricResults: createMetricResultSet(instanceId, {}),
    expiresAt: Math.floor(Date.now() / 1000) + 3600,
    ...overrides,
  };
}

/**
 * Helper: Create mock cycle summary
 */
function createSummary(overrides?: Partial<MonitoringCycleSummary>): MonitoringCycleSummary {
  return {
    startedAt: new Date().toISOString(),
    durationMs: 1200,
    instancesChecked: 3,
    predictionsFound: 1,
    highConfidenceCount: 0,
    skipped: 1,
    failed: 0,
    cancelled: false,
    ...overrides,
  };
}

describe('InMemoryStateStore', () => {
  let store: InMemoryStateStore;

  beforeEach(() => {
    store = new InMemoryStateStore();
  });

  // ============================================================
  // Prediction Records
  // ============================================================

  describe('Prediction Records', () => {
    it('should return records newest first', async () => {
      await store.addPredictionRecord(createRecord({ score: 0.6 }));
      await store.addPredictionRecord(createRecord({ score: 0.7 }));

      const records = await store.getPredictionRecords('i-0test0000000005');

      expect(records.map(r => r.score)).toEqual([0.7, 0.6]);
    });

    it('should apply the default limit of 10', async () => {
      for (let i = 0; i < 15; i++) {
        await store.addPredictionRecord(createRecord({ score: i / 100 }));
      }

      const records = await store.getPredictionRecords('i-0test0000000005');

      expect(records).toHaveLength(10);
      expect(records[0].score).toBe(0.14);
    });

    it('should cap stored records at 100 per instance', async () => {
      for (let i = 0; i < 105; i++) {
        await store.addPredictionRecord(createRecord());
      }

      expect(await store.getPredictionRecords('i-0test0000000005', 500)).toHaveLength(100);
    });

    it('should hide expired records', async () => {
      await store.addPredictionRecord(createRecord({ expiresAt: Math.floor(Date.now() / 1000) - 1 }));
      await store.addPredictionRecord(createRecord({ score: 0.9 }));

      const records = await store.getPredictionRecords('i-0test0000000005');

      expect(records).toHaveLength(1);
      expect(records[0].score).toBe(0.9);
    });

    it('should keep instances separate', async () => {
      await store.addPredictionRecord(createRecord({ instanceId: 'i-a' }));
      await store.addPredictionRecord(createRecord({ instanceId: 'i-b' }));

      expect(await store.getPredictionRecords('i-a')).toHaveLength(1);
      expect(await store.getPredictionRecords('i-c')).toEqual([]);
    });
  });

  // ============================================================
  // Instance Configuration
  // ============================================================

  describe('Instance Configuration', () => {
    it('should return null for an unconfigured instance', async () => {
      expect(await store.getInstanceConfig('i-unknown')).toBeNull();
    });

    it('should create a configuration with defaults on first update', async () => {
      const config = await store.updateInstanceConfig('i-a', { quarantine: true });

      expect(config.instanceId).toBe('i-a');
      expect(config.monitoringEnabled).toBe(true);
      expect(config.quarantine).toBe(true);
      expect(typeof config.updatedAt).toBe('string');
    });

    it('should merge partial updates', async () => {
      await store.updateInstanceConfig('i-a', { monitoringEnabled: false, notes: 'maintenance' });
      await store.updateInstanceConfig('i-a', { healthEndpoint: 'http://10.0.0.5/health' });

      const config = await store.getInstanceConfig('i-a');

      expect(config).toMatchObject({
        instanceId: 'i-a',
        monitoringEnabled: false,
        quarantine: false,
        notes: 'maintenance',
        healthEndpoint: 'http://10.0.0.5/health',
      });
    });

    it('should return copies, not internal state', async () => {
      await store.updateInstanceConfig('i-a', { quarantine: false });

      const config = await store.getInstanceConfig('i-a');
      if (config) config.quarantine = true;

      expect((await store.getInstanceConfig('i-a'))?.quarantine).toBe(false);
    });
  });

  // ============================================================
  // Cycle History
  // ============================================================

  describe('Cycle History', () => {
    it('should return summaries newest first', async () => {
      await store.pushCycleSummary(createSummary({ instancesChecked: 1 }));
      await store.pushCycleSummary(createSummary({ instancesChecked: 2 }));

      const history = await store.getCycleHistory();

      expect(history.map(h => h.instancesChecked)).toEqual([2, 1]);
    });

    it('should respect the limit', async () => {
      for (let i = 0; i < 5; i++) {
        await store.pushCycleSummary(createSummary({ instancesChecked: i }));
      }

      const history = await store.getCycleHistory(2);

      expect(history.map(h => h.instancesChecked)).toEqual([4, 3]);
    });
  });

  describe('Connection Management', () => {
    it('should disconnect without error', async () => {
      await expect(store.disconnect()).resolves.toBeUndefined();
    });
  });
});

describe('getStore', () => {
  const originalRedisUrl = process.env.REDIS_URL;

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
    delete process.env.REDIS_URL;
    await resetStore();
  });

  afterEach(async () => {
    await resetStore();
    if (originalRedisUrl !== undefined) process.env.REDIS_URL = originalRedisUrl;
    vi.restoreAllMocks();
  });

  it('should fall back to the in-memory store without REDIS_URL', () => {
    expect(getStore()).toBeInstanceOf(InMemoryStateStore);
  });

  it('should return the same instance until reset', async () => {
    const first = getStore();
    expect(getStore()).toBe(first);

    await resetStore();
    expect(getStore()).not.toBe(first);
  });
});
