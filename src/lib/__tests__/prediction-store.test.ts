/**
 * Unit tests for the prediction sink
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { StorePredictionSink, computeExpiry, getRecentPredictions } from '@/lib/prediction-store';
import { InMemoryStateStore, getStore, resetStore } from '@/lib/redis-store';
import { createMetricResultSet } from '@/lib/metric-verdict';
import type { Prediction } from '@/types/prediction';

function createPrediction(overrides?: Partial<Prediction>): Prediction {
  const instanceId = overrides?.instanceId ?? 'i-0test0000000006';
  return {
    instanceId,
    timestamp: new Date().toISOString(),
    score: 0.64,
    confidence: 'medium',
    predictedWindow: '24-72 hours',
    failureType: 'Performance Risk',
    factors: [],
    metricResults: createMetricResultSet(instanceId, {}),
    ...overrides,
  };
}

describe('prediction-store', () => {
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

  describe('computeExpiry', () => {
    it('should add the TTL in days to the epoch seconds', () => {
      const from = new Date('2026-03-01T00:00:00.500Z');

      expect(computeExpiry(from, 30)).toBe(Math.floor(from.getTime() / 1000) + 30 * 86400);
      expect(computeExpiry(from, 1)).toBe(1772323200 + 86400);
    });
  });

  describe('StorePredictionSink', () => {
    it('should persist a record whose expiry follows the prediction timestamp', async () => {
      const store = new InMemoryStateStore();
      const sink = new StorePredictionSink({ ttlDays: 7, store });
      const prediction = createPrediction();

      const record = await sink.recordPrediction(prediction);

      expect(record.expiresAt).toBe(computeExpiry(new Date(prediction.timestamp), 7));
      expect(await store.getPredictionRecords(prediction.instanceId)).toEqual([record]);
    });

    it('should default to a 30 day TTL', async () => {
      const store = new InMemoryStateStore();
      const sink = new StorePredictionSink({ store });
      const prediction = createPrediction();

      const record = await sink.recordPrediction(prediction);

      expect(record.expiresAt).toBe(computeExpiry(new Date(prediction.timestamp), 30));
    });

    it('should propagate store failures', async () => {
      const store = new InMemoryStateStore();
      vi.spyOn(store, 'addPredictionRecord').mockRejectedValue(new Error('store unavailable'));
      const sink = new StorePredictionSink({ store });

      await expect(sink.recordPrediction(createPrediction())).rejects.toThrow('store unavailable');
    });
  });

  describe('getRecentPredictions', () => {
    it('should read from the shared store', async () => {
      const sink = new StorePredictionSink();
      await sink.recordPrediction(createPrediction({ score: 0.7 }));
      await sink.recordPrediction(createPrediction({ score: 0.9, confidence: 'high' }));

      const records = await getRecentPredictions('i-0test0000000006', 1);

      expect(records).toHaveLength(1);
      expect(records[0].score).toBe(0.9);
      expect(getStore()).toBeInstanceOf(InMemoryStateStore);
    });
  });
});
