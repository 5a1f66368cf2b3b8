#!/usr/bin/env node
/**
 * Smoke client for a running inference service.
 *
 * Usage:
 *   npm run client -- --url http://localhost:8000
 *   npm run client -- --url http://localhost:8000 --load 50
 *
 * Responses are checked against the @glovesign/contracts schemas; a mismatch
 * counts as a failure.
 */

import { HealthResponseV1Schema, PredictionResponseV1Schema, StatsResponseV1Schema } from "@glovesign/contracts";

/* -------------------- CLI utils -------------------- */

function arg(name: string, fallback: string | null = null): string | null {
  const i = process.argv.indexOf(name);
  if (i === -1) return fallback;
  const v = process.argv[i + 1];
  return v == null ? fallback : String(v);
}

function flag(name: string): boolean {
  return process.argv.includes(name);
}

function die(msg: string): never {
  console.error(msg);
  process.exit(1);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/* -------------------- samples -------------------- */

// Arbitrary readings on a 0..1023 scale; they exercise the pipeline, not accuracy.
const SAMPLES: Record<string, number[]> = {
  open: [120.5, 110.2, 98.7, 104.9, 131.0],
  half: [481.3, 502.6, 509.8, 494.1, 468.7],
  fist: [879.4, 901.2, 911.5, 903.3, 598.6],
};

function windowOf(sample: number[], rows: number): number[][] {
  const out: number[][] = [];
  for (let i = 0; i < rows; i++) out.push(sample.map((v, c) => v + ((i + c) % 3) - 1));
  return out;
}

/* -------------------- http -------------------- */

async function call(base: string, method: "GET" | "POST", route: string, body?: unknown): Promise<unknown> {
  const res = await fetch(`${base}${route}`, {
    method,
    headers: body === undefined ? undefined : { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
    signal: AbortSignal.timeout(5000),
  });
  const text = await res.text();
  if (!res.ok) throw new Error(`${method} ${route} -> ${res.status} ${text}`);
  return JSON.parse(text);
}

async function checkHealth(base: string): Promise<boolean> {
  try {
    const h = HealthResponseV1Schema.parse(await call(base, "GET", "/health"));
    console.log(`health: ${h.status} model=${h.model_name ?? "-"} db=${h.database_connected} uptime=${h.uptime_seconds.toFixed(1)}s`);
    return h.model_loaded;
  } catch (err) {
    console.error(`health failed: ${errorMessage(err)}`);
    return false;
  }
}

async function checkPredict(base: string, name: string, flex_sensors: number[] | number[][]): Promise<boolean> {
  try {
    const started = performance.now();
    const p = PredictionResponseV1Schema.parse(
      await call(base, "POST", "/predict", { flex_sensors, device_id: "smoke-client" })
    );
    const rtt = performance.now() - started;
    const top = Object.entries(p.all_probabilities)
      .sort((a, b) => b[1] - a[1])
      .slice(0, 3)
      .map(([letter, prob]) => `${letter}=${(prob * 100).toFixed(1)}%`)
      .join(" ");
    console.log(
      `predict[${name}]: ${p.letter} conf=${(p.confidence * 100).toFixed(1)}% server=${p.processing_time_ms.toFixed(2)}ms rtt=${rtt.toFixed(1)}ms top: ${top}`
    );
    return true;
  } catch (err) {
    console.error(`predict[${name}] failed: ${errorMessage(err)}`);
    return false;
  }
}

async function checkStats(base: string): Promise<boolean> {
  try {
    const s = StatsResponseV1Schema.parse(await call(base, "GET", "/stats"));
    const top = s.top_letters_24h.slice(0, 5).map((l) => `${l.letter}:${l.count}`).join(" ");
    console.log(
      `stats: total=${s.total_predictions} conf24h=${(s.last_24h_avg_confidence * 100).toFixed(1)}% proc1h=${s.last_1h_avg_processing_ms.toFixed(2)}ms top: ${top || "-"}`
    );
    return true;
  } catch (err) {
    // 503 here only means the database is down; predictions still work.
    console.error(`stats failed: ${errorMessage(err)}`);
    return false;
  }
}

async function loadTest(base: string, n: number): Promise<void> {
  const names = Object.keys(SAMPLES);
  const latencies: number[] = [];
  for (let i = 0; i < n; i++) {
    const sample = SAMPLES[names[i % names.length]];
    const started = performance.now();
    try {
      await call(base, "POST", "/predict", { flex_sensors: sample, device_id: "load-test" });
      latencies.push(performance.now() - started);
    } catch (err) {
      console.error(`request ${i + 1} failed: ${errorMessage(err)}`);
    }
  }
  if (!latencies.length) die("no request succeeded");

  const avg = latencies.reduce((a, b) => a + b, 0) / latencies.length;
  console.log(
    `load: ${latencies.length}/${n} ok avg=${avg.toFixed(2)}ms min=${Math.min(...latencies).toFixed(2)}ms max=${Math.max(...latencies).toFixed(2)}ms (${(1000 / avg).toFixed(1)} req/s)`
  );
}

/* -------------------- main -------------------- */

async function main(): Promise<void> {
  if (flag("--help")) {
    console.log("usage: predict_client [--url http://localhost:8000] [--load N]");
    return;
  }

  const base = (arg("--url", process.env.API_URL ?? "http://localhost:8000") ?? "").replace(/\/+$/, "");
  const loadN = arg("--load");

  if (!(await checkHealth(base))) die("service has no model loaded (or is unreachable)");

  if (loadN != null) {
    const n = Number(loadN);
    if (!Number.isInteger(n) || n < 1) die(`invalid --load ${loadN}`);
    await loadTest(base, n);
    return;
  }

  let ok = true;
  for (const [name, sample] of Object.entries(SAMPLES)) {
    ok = (await checkPredict(base, name, sample)) && ok;
    ok = (await checkPredict(base, `${name}x10`, windowOf(sample, 10))) && ok;
  }
  ok = (await checkStats(base)) && ok;

  if (!ok) die("some checks failed");
  console.log("all checks passed");
}

main().catch((err: unknown) => die(errorMessage(err)));
