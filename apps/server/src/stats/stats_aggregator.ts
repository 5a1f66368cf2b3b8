import type { DailyStatsRowV1, LetterFrequencyRowV1, StatsResponseV1 } from "@glovesign/contracts";

import { InternalError, ServiceUnavailableError, errorMessage } from "../errors";
import type { PredictionStore } from "../store/index";

/**
 * Read-only aggregates over the prediction log, recomputed on every call.
 * Nothing is cached here.
 */
export class StatsAggregator {
  constructor(private readonly store: PredictionStore) {}

  summary(): Promise<StatsResponseV1> {
    return this.run("Stats", () => this.store.querySummary());
  }

  daily(limit: number): Promise<DailyStatsRowV1[]> {
    return this.run("Daily stats", () => this.store.queryDailyStats(limit));
  }

  letters(): Promise<LetterFrequencyRowV1[]> {
    return this.run("Letter stats", () => this.store.queryLetterFrequency());
  }

  private async run<T>(label: string, query: () => Promise<T>): Promise<T> {
    if (!(await this.store.ensureConnected())) {
      throw new ServiceUnavailableError("DATABASE_UNAVAILABLE", "Database not available");
    }
    try {
      return await query();
    } catch (err) {
      throw new InternalError(`${label} failed: ${errorMessage(err)}`);
    }
  }
}
