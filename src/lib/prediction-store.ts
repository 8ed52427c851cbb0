/**
 * Prediction Event Store
 * Sink for qualifying predictions, backed by the state store
 */

import type { Prediction, PredictionRecord } from '@/types/prediction';
import type { IStateStore } from '@/types/redis';
import { getStore } from '@/lib/redis-store';

const DEFAULT_TTL_DAYS = 30;

/**
 * Receives predictions that cleared the confidence gate
 */
export interface PredictionSink {
  recordPrediction(prediction: Prediction): Promise<PredictionRecord>;
}

/**
 * Expiry marker in epoch seconds
 */
export function computeExpiry(from: Date, ttlDays: number): number {
  return Math.floor(from.getTime() / 1000) + ttlDays * 24 * 60 * 60;
}

export class StorePredictionSink implements PredictionSink {
  private readonly ttlDays: number;
  private readonly store: () => IStateStore;

  constructor(options: { ttlDays?: number; store?: IStateStore } = {}) {
    this.ttlDays = options.ttlDays ?? DEFAULT_TTL_DAYS;
    const injected = options.store;
    this.store = injected ? () => injected : getStore;
  }

  async recordPrediction(prediction: Prediction): Promise<PredictionRecord> {
    const record: PredictionRecord = {
      ...prediction,
      expiresAt: computeExpiry(new Date(prediction.timestamp), this.ttlDays),
    };

    await this.store().addPredictionRecord(record);
    console.info(`[PredictionStore] Saved prediction for ${prediction.instanceId}`, {
      instanceId: prediction.instanceId,
      confidence: prediction.confidence,
      score: prediction.score,
    });

    return record;
  }
}

/**
 * Recent unexpired predictions for one instance, newest first
 */
export async function getRecentPredictions(instanceId: string, limit?: number): Promise<PredictionRecord[]> {
  return getStore().getPredictionRecords(instanceId, limit);
}
