// Shared fakes for server tests. Nothing here opens a socket or a database.

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type {
  DailyStatsRowV1,
  LetterFrequencyRowV1,
  PredictionRecordV1,
  StatsResponseV1,
} from "@glovesign/contracts";

import { createLogger } from "../logger";
import type { PredictionStore } from "../store/index";
import type { PredictionRecordSink } from "../store/prediction_sink";

export const silentLog = createLogger("silent");

// One reading per channel; flex0_mean = 512.3 and flex3_mean = 890.2.
export const SAMPLE = [512.3, 678.1, 345.9, 890.2, 234.5];

function stump(feature: number, threshold: number, left: number[], right: number[]) {
  return {
    children_left: [1, -1, -1],
    children_right: [2, -1, -1],
    feature: [feature, -2, -2],
    threshold: [threshold, -2, -2],
    value: [left.map((v, i) => v + right[i]), left, right],
  };
}

// For SAMPLE: {A: 0, B: 0.125, C: 0.875}.
export function forestArtifact(): object {
  return {
    kind: "random_forest",
    classes: ["A", "B", "C"],
    n_features: 25,
    trees: [stump(0, 500, [3, 1, 0], [0, 1, 3]), stump(15, 600, [2, 2, 0], [0, 0, 4])],
  };
}

// Every feature of SAMPLE is closer to 0 than to 1000 on balance, so "A".
export function centroidArtifact(): object {
  return {
    kind: "nearest_centroid",
    classes: ["A", "B"],
    centroids: [new Array<number>(25).fill(0), new Array<number>(25).fill(1000)],
  };
}

export class TempDir {
  readonly dir: string;

  constructor(prefix: string) {
    this.dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  }

  write(name: string, body: object | string): string {
    const p = path.join(this.dir, name);
    fs.writeFileSync(p, typeof body === "string" ? body : JSON.stringify(body), "utf8");
    return p;
  }

  remove(): void {
    fs.rmSync(this.dir, { recursive: true, force: true });
  }
}

export class RecordingSink implements PredictionRecordSink {
  readonly records: PredictionRecordV1[] = [];

  append(record: PredictionRecordV1): void {
    this.records.push(record);
  }
}

export const EMPTY_SUMMARY: StatsResponseV1 = {
  total_predictions: 0,
  last_24h_avg_confidence: 0,
  last_1h_avg_processing_ms: 0,
  top_letters_24h: [],
};

/**
 * In-memory PredictionStore. Flip `connected` or `failWith` to simulate
 * outages; `hang` makes inserts never settle (a dead connection).
 */
export class FakeStore implements PredictionStore {
  connected = true;
  failWith: Error | null = null;
  hang = false;
  closed = false;
  readonly inserted: PredictionRecordV1[] = [];
  summary: StatsResponseV1 = EMPTY_SUMMARY;
  daily: DailyStatsRowV1[] = [];
  letters: LetterFrequencyRowV1[] = [];
  dailyLimits: number[] = [];

  async ensureConnected(): Promise<boolean> {
    return this.connected;
  }

  async insertPrediction(record: PredictionRecordV1): Promise<boolean> {
    if (this.hang) return new Promise<boolean>(() => {});
    if (this.failWith) throw this.failWith;
    if (!this.connected) return false;
    this.inserted.push(record);
    return true;
  }

  async querySummary(): Promise<StatsResponseV1> {
    if (this.failWith) throw this.failWith;
    return this.summary;
  }

  async queryDailyStats(limit: number): Promise<DailyStatsRowV1[]> {
    if (this.failWith) throw this.failWith;
    this.dailyLimits.push(limit);
    return this.daily.slice(0, limit);
  }

  async queryLetterFrequency(): Promise<LetterFrequencyRowV1[]> {
    if (this.failWith) throw this.failWith;
    return this.letters;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
