import type { FastifyBaseLogger } from "fastify";

import type {
  DailyStatsRowV1,
  LetterFrequencyRowV1,
  PredictionRecordV1,
  StatsResponseV1,
} from "@glovesign/contracts";

import type { DatabaseConfig } from "../config";
import { PgPredictionStore } from "./pg_store";

/**
 * Durable side of the service. Implementations own their connection
 * lifecycle: a missing connection is reported through ensureConnected()
 * and never by crashing.
 */
export interface PredictionStore {
  /** Creates the pool if needed; false when the database is unreachable. */
  ensureConnected(): Promise<boolean>;
  /** false when there is no pool to write to (nothing was written). */
  insertPrediction(record: PredictionRecordV1): Promise<boolean>;
  querySummary(): Promise<StatsResponseV1>;
  queryDailyStats(limit: number): Promise<DailyStatsRowV1[]>;
  queryLetterFrequency(): Promise<LetterFrequencyRowV1[]>;
  close(): Promise<void>;
}

export function makeStoreFromConfig(cfg: DatabaseConfig, log: FastifyBaseLogger): PredictionStore {
  return new PgPredictionStore(cfg, log);
}
