import { Pool } from "pg";
import type { FastifyBaseLogger } from "fastify";

import type {
  DailyStatsRowV1,
  LetterCountV1,
  LetterFrequencyRowV1,
  PredictionRecordV1,
  StatsResponseV1,
} from "@glovesign/contracts";

import type { DatabaseConfig } from "../config";
import type { PredictionStore } from "./index";

export type SqlRow = Record<string, unknown>;

/** The slice of pg.Pool the store uses. */
export interface SqlClient {
  query(text: string, values?: ReadonlyArray<unknown>): Promise<{ rows: SqlRow[] }>;
  end(): Promise<void>;
}

export type SqlClientFactory = (cfg: DatabaseConfig, log: FastifyBaseLogger) => SqlClient;

export function createPgClient(cfg: DatabaseConfig, log: FastifyBaseLogger): SqlClient {
  const bounds = {
    min: cfg.poolMin,
    max: cfg.poolMax,
    connectionTimeoutMillis: cfg.connectTimeoutMs,
    // A stuck connection must not hold a write (and shutdown) forever.
    query_timeout: cfg.queryTimeoutMs,
    statement_timeout: cfg.queryTimeoutMs,
  };
  const pool = cfg.connectionString
    ? new Pool({ ...bounds, connectionString: cfg.connectionString })
    : new Pool({ ...bounds, host: cfg.host, port: cfg.port, database: cfg.database, user: cfg.user, password: cfg.password });

  // An idle client dropping must not take the process down.
  pool.on("error", (err) => log.warn({ err }, "Idle database client error"));

  return {
    async query(text, values) {
      const r = await pool.query(text, values ? [...values] : []);
      return { rows: r.rows };
    },
    end: () => pool.end(),
  };
}

// pg returns bigint/numeric as strings and AVG over no rows as null.
function num(v: unknown): number {
  if (typeof v === "number") return Number.isFinite(v) ? v : 0;
  if (typeof v === "string" && v.trim().length) {
    const n = Number(v);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

function str(v: unknown): string {
  return typeof v === "string" ? v : String(v ?? "");
}

const insertPredictionSql = `
  INSERT INTO predictions (letter, confidence, sensor_data, device_id, processing_time_ms, predicted_at)
  VALUES ($1, $2, $3, $4, $5, NOW())
`;

const countSql = `SELECT COUNT(*) AS total FROM predictions`;

const avgConfidence24hSql = `
  SELECT AVG(confidence) AS avg
  FROM predictions
  WHERE predicted_at > NOW() - INTERVAL '24 hours'
`;

const avgProcessing1hSql = `
  SELECT AVG(processing_time_ms) AS avg
  FROM predictions
  WHERE predicted_at > NOW() - INTERVAL '1 hour'
`;

const topLetters24hSql = `
  SELECT letter, COUNT(*) AS count
  FROM predictions
  WHERE predicted_at > NOW() - INTERVAL '24 hours'
  GROUP BY letter
  ORDER BY count DESC
  LIMIT 10
`;

const dailyStatsSql = `
  SELECT to_char(date, 'YYYY-MM-DD') AS date, total_predictions, avg_confidence, avg_processing_time_ms, unique_devices
  FROM daily_stats
  ORDER BY date DESC
  LIMIT $1
`;

const letterFrequencySql = `
  SELECT letter, count, avg_confidence, min_confidence, max_confidence
  FROM letter_frequency
  ORDER BY count DESC, letter ASC
`;

/**
 * Postgres-backed prediction log (docker/postgres/init/001_predictions.sql).
 *
 * The pool is created lazily and verified with a ping. A failed attempt leaves
 * the store without a pool; the next call tries again. Concurrent callers
 * share one in-flight attempt.
 */
export class PgPredictionStore implements PredictionStore {
  private client: SqlClient | null = null;
  private connecting: Promise<SqlClient | null> | null = null;
  private closed = false;

  constructor(
    private readonly cfg: DatabaseConfig,
    private readonly log: FastifyBaseLogger,
    private readonly createClient: SqlClientFactory = createPgClient
  ) {}

  async ensureConnected(): Promise<boolean> {
    return (await this.acquire()) !== null;
  }

  async insertPrediction(record: PredictionRecordV1): Promise<boolean> {
    const client = await this.acquire();
    if (!client) return false;
    await client.query(insertPredictionSql, [
      record.letter,
      record.confidence,
      record.sensor_data,
      record.device_id,
      record.processing_time_ms,
    ]);
    return true;
  }

  async querySummary(): Promise<StatsResponseV1> {
    const client = await this.requireClient();
    const [total, conf, proc, top] = await Promise.all([
      client.query(countSql),
      client.query(avgConfidence24hSql),
      client.query(avgProcessing1hSql),
      client.query(topLetters24hSql),
    ]);

    const top_letters_24h: LetterCountV1[] = top.rows.map((row) => ({ letter: str(row.letter), count: num(row.count) }));
    return {
      total_predictions: num(total.rows[0]?.total),
      last_24h_avg_confidence: num(conf.rows[0]?.avg),
      last_1h_avg_processing_ms: num(proc.rows[0]?.avg),
      top_letters_24h,
    };
  }

  async queryDailyStats(limit: number): Promise<DailyStatsRowV1[]> {
    const client = await this.requireClient();
    const r = await client.query(dailyStatsSql, [limit]);
    return r.rows.map((row) => ({
      date: str(row.date),
      total_predictions: num(row.total_predictions),
      avg_confidence: num(row.avg_confidence),
      avg_processing_time_ms: num(row.avg_processing_time_ms),
      unique_devices: num(row.unique_devices),
    }));
  }

  async queryLetterFrequency(): Promise<LetterFrequencyRowV1[]> {
    const client = await this.requireClient();
    const r = await client.query(letterFrequencySql);
    return r.rows.map((row) => ({
      letter: str(row.letter),
      count: num(row.count),
      avg_confidence: num(row.avg_confidence),
      min_confidence: num(row.min_confidence),
      max_confidence: num(row.max_confidence),
    }));
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.connecting) await this.connecting;
    const client = this.client;
    this.client = null;
    if (client) {
      await client.end();
      this.log.info("Database pool closed");
    }
  }

  private async requireClient(): Promise<SqlClient> {
    const client = await this.acquire();
    if (!client) throw new Error("database not connected");
    return client;
  }

  private acquire(): Promise<SqlClient | null> {
    if (this.closed) return Promise.resolve(null);
    if (this.client) return Promise.resolve(this.client);
    if (!this.connecting) {
      this.connecting = this.connect().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async connect(): Promise<SqlClient | null> {
    let client: SqlClient;
    try {
      client = this.createClient(this.cfg, this.log);
    } catch (err) {
      this.log.error({ err }, "Database pool creation failed");
      return null;
    }

    try {
      const r = await client.query("select 1 as ok");
      if (!r.rows.length) throw new Error("pg ping failed");
    } catch (err) {
      this.log.error({ err }, "Database connection failed");
      await client.end().catch((endErr: unknown) => this.log.debug({ err: endErr }, "Pool end after failed ping"));
      return null;
    }

    if (this.closed) {
      await client.end().catch((endErr: unknown) => this.log.debug({ err: endErr }, "Pool end after close"));
      return null;
    }
    this.client = client;
    this.log.info({ pool_min: this.cfg.poolMin, pool_max: this.cfg.poolMax }, "Database pool created");
    return client;
  }
}
