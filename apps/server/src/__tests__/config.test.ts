import { after, test } from "node:test";
import assert from "node:assert/strict";

import { ConfigError, loadDotEnvFile, loadServerConfig } from "../config";
import { TempDir } from "./helpers";

const tmp = new TempDir("glovesign-config-");
after(() => tmp.remove());

test("defaults", () => {
  const cfg = loadServerConfig({});
  assert.equal(cfg.port, 8000);
  assert.equal(cfg.host, "0.0.0.0");
  assert.equal(cfg.logLevel, "info");
  assert.deepEqual(cfg.modelPaths, [
    "/models/rf_asl_15letters.json",
    "/models/rf_asl_calibrated.json",
    "./models/rf_asl_15letters.json",
  ]);
  assert.deepEqual(cfg.database, {
    connectionString: undefined,
    host: "postgres",
    port: 5432,
    database: "asl_predictions",
    user: "asl_user",
    password: "asl_password",
    poolMin: 2,
    poolMax: 10,
    connectTimeoutMs: 2000,
    queryTimeoutMs: 5000,
  });
  assert.equal(cfg.defaultDeviceId, "desktop-app");
  assert.equal(cfg.shutdownDrainTimeoutMs, 2000);
});

test("overrides are coerced and empty values ignored", () => {
  const cfg = loadServerConfig({
    PORT: "9100",
    LOG_LEVEL: "debug",
    MODEL_PATH: "./m.json",
    MODEL_FALLBACK_PATHS: " ./a.json , ,./m.json ",
    POSTGRES_HOST: "",
    DATABASE_URL: "postgres://u:p@localhost:5432/db",
    DB_POOL_MIN: "1",
    DB_POOL_MAX: "4",
    DB_QUERY_TIMEOUT_MS: "750",
    SHUTDOWN_DRAIN_TIMEOUT_MS: "0",
  });
  assert.equal(cfg.port, 9100);
  assert.equal(cfg.logLevel, "debug");
  assert.deepEqual(cfg.modelPaths, ["./m.json", "./a.json"]);
  assert.equal(cfg.database.host, "postgres");
  assert.equal(cfg.database.connectionString, "postgres://u:p@localhost:5432/db");
  assert.equal(cfg.database.poolMin, 1);
  assert.equal(cfg.database.poolMax, 4);
  assert.equal(cfg.database.queryTimeoutMs, 750);
  assert.equal(cfg.shutdownDrainTimeoutMs, 0);
});

test("invalid values raise ConfigError naming the variable", () => {
  assert.throws(() => loadServerConfig({ PORT: "eighty" }), (err: unknown) => {
    assert.ok(err instanceof ConfigError);
    assert.ok(err.message.startsWith("invalid configuration: PORT:"), err.message);
    return true;
  });
  assert.throws(() => loadServerConfig({ LOG_LEVEL: "loud" }), ConfigError);
  assert.throws(
    () => loadServerConfig({ DB_POOL_MIN: "8", DB_POOL_MAX: "4" }),
    /DB_POOL_MIN: DB_POOL_MIN must not exceed DB_POOL_MAX/
  );
});

test("dotenv file fills unset keys only", () => {
  const fp = tmp.write(".env", ["# comment", "PORT=9000", 'HOST="127.0.0.1"', "not a pair", "LOG_LEVEL='warn'"].join("\n"));
  const env: NodeJS.ProcessEnv = { PORT: "7000" };
  loadDotEnvFile(fp, env);
  assert.deepEqual(env, { PORT: "7000", HOST: "127.0.0.1", LOG_LEVEL: "warn" });
});

test("missing dotenv file is a no-op", () => {
  const env: NodeJS.ProcessEnv = {};
  loadDotEnvFile(`${tmp.dir}/absent.env`, env);
  assert.deepEqual(env, {});
});
