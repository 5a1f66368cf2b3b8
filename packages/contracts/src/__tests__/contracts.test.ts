import { test } from "node:test";
import assert from "node:assert/strict";

import {
  DailyStatsQueryV1Schema,
  ErrorBodyV1Schema,
  HealthResponseV1Schema,
  PredictRequestV1Schema,
  PredictionRecordV1Schema,
} from "../index";

test("predict request accepts a single sample and a window", () => {
  const single = PredictRequestV1Schema.parse({ flex_sensors: [512.3, 678.1, 345.9, 890.2, 234.5] });
  assert.deepEqual(single.flex_sensors, [512.3, 678.1, 345.9, 890.2, 234.5]);
  assert.equal(single.device_id, undefined);

  const window = PredictRequestV1Schema.parse({
    flex_sensors: [[1, 2, 3, 4, 5], [6, 7, 8, 9, 10]],
    timestamp: 1700000000.5,
    device_id: "glove-001",
  });
  assert.equal(window.device_id, "glove-001");
  assert.equal(window.timestamp, 1700000000.5);
});

test("predict request rejects non-numeric readings and a missing payload", () => {
  assert.equal(PredictRequestV1Schema.safeParse({ flex_sensors: ["512", 1, 2, 3, 4] }).success, false);
  assert.equal(PredictRequestV1Schema.safeParse({ device_id: "glove-001" }).success, false);
  assert.equal(PredictRequestV1Schema.safeParse({ flex_sensors: [[1, 2, 3, 4, 5], 6] }).success, false);
});

test("prediction record requires exactly 25 features", () => {
  const base = { letter: "A", confidence: 0.9, device_id: "glove-001", processing_time_ms: 1.2 };
  assert.equal(PredictionRecordV1Schema.safeParse({ ...base, sensor_data: new Array(25).fill(0) }).success, true);
  assert.equal(PredictionRecordV1Schema.safeParse({ ...base, sensor_data: new Array(5).fill(0) }).success, false);
});

test("health response allows nulls while no model is loaded", () => {
  const r = HealthResponseV1Schema.safeParse({
    status: "degraded",
    model_loaded: false,
    model_name: null,
    model_loaded_at: null,
    database_connected: false,
    uptime_seconds: 3.5,
  });
  assert.equal(r.success, true);
});

test("daily stats limit defaults to 30 and is coerced from the query string", () => {
  assert.equal(DailyStatsQueryV1Schema.parse({}).limit, 30);
  assert.equal(DailyStatsQueryV1Schema.parse({ limit: "7" }).limit, 7);
  assert.equal(DailyStatsQueryV1Schema.safeParse({ limit: "0" }).success, false);
});

test("error body only carries known codes", () => {
  assert.equal(ErrorBodyV1Schema.safeParse({ ok: false, error: "INVALID_INPUT", detail: "x" }).success, true);
  assert.equal(ErrorBodyV1Schema.safeParse({ ok: false, error: "TEAPOT", detail: "x" }).success, false);
});
