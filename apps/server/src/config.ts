import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { z } from "zod";

export function loadDotEnvFile(fp: string, env: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    // Strip surrounding quotes if present
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (env[key] == null) env[key] = val;
  }
}

export function loadEnv(): void {
  // Repo root .env first, then the package-local one.
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const repoRoot = path.resolve(__dirname, "..", "..", "..");
  loadDotEnvFile(path.join(repoRoot, ".env"));
  loadDotEnvFile(path.join(__dirname, "..", ".env"));
}

const LogLevelZ = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const EnvZ = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    HOST: z.string().min(1).default("0.0.0.0"),
    LOG_LEVEL: LogLevelZ.default("info"),

    MODEL_PATH: z.string().min(1).default("/models/rf_asl_15letters.json"),
    MODEL_FALLBACK_PATHS: z.string().default("/models/rf_asl_calibrated.json,./models/rf_asl_15letters.json"),

    DATABASE_URL: z.string().min(1).optional(),
    POSTGRES_HOST: z.string().min(1).default("postgres"),
    POSTGRES_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    POSTGRES_DB: z.string().min(1).default("asl_predictions"),
    POSTGRES_USER: z.string().min(1).default("asl_user"),
    POSTGRES_PASSWORD: z.string().default("asl_password"),
    DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
    DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
    DB_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(2000),
    DB_QUERY_TIMEOUT_MS: z.coerce.number().int().min(100).default(5000),
    SHUTDOWN_DRAIN_TIMEOUT_MS: z.coerce.number().int().min(0).default(2000),

    DEFAULT_DEVICE_ID: z.string().min(1).max(100).default("desktop-app"),
  })
  .refine((e) => e.DB_POOL_MIN <= e.DB_POOL_MAX, {
    message: "DB_POOL_MIN must not exceed DB_POOL_MAX",
    path: ["DB_POOL_MIN"],
  });

export type LogLevel = z.infer<typeof LogLevelZ>;

export type DatabaseConfig = {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  poolMin: number;
  poolMax: number;
  connectTimeoutMs: number;
  queryTimeoutMs: number;
};

export type ServerConfig = {
  port: number;
  host: string;
  logLevel: LogLevel;
  // MODEL_PATH first, then the fallbacks, in search order.
  modelPaths: string[];
  database: DatabaseConfig;
  defaultDeviceId: string;
  // Upper bound on waiting for pending prediction writes at shutdown.
  shutdownDrainTimeoutMs: number;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function splitCsv(v: string): string[] {
  return v.split(",").map((s) => s.trim()).filter(Boolean);
}

function uniq<T>(xs: T[]): T[] {
  return Array.from(new Set(xs));
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  // Empty values count as unset.
  const present: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (typeof v === "string" && v.trim().length > 0) present[k] = v.trim();
  }

  const parsed = EnvZ.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    modelPaths: uniq([e.MODEL_PATH, ...splitCsv(e.MODEL_FALLBACK_PATHS)]),
    database: {
      connectionString: e.DATABASE_URL,
      host: e.POSTGRES_HOST,
      port: e.POSTGRES_PORT,
      database: e.POSTGRES_DB,
      user: e.POSTGRES_USER,
      password: e.POSTGRES_PASSWORD,
      poolMin: e.DB_POOL_MIN,
      poolMax: e.DB_POOL_MAX,
      connectTimeoutMs: e.DB_CONNECT_TIMEOUT_MS,
      queryTimeoutMs: e.DB_QUERY_TIMEOUT_MS,
    },
    defaultDeviceId: e.DEFAULT_DEVICE_ID,
    shutdownDrainTimeoutMs: e.SHUTDOWN_DRAIN_TIMEOUT_MS,
  };
}
