import { after, test } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";

import { extractFeatures, normalizeWindow } from "@glovesign/sensor-features";

import { ModelHolder } from "../model/model_holder";
import { resolveModelPath } from "../model/model_path";
import { SAMPLE, TempDir, centroidArtifact, forestArtifact, silentLog } from "./helpers";

const tmp = new TempDir("glovesign-model-");
after(() => tmp.remove());

const features = extractFeatures(normalizeWindow(SAMPLE));

test("empty holder", () => {
  const h = new ModelHolder(silentLog);
  assert.equal(h.isLoaded(), false);
  assert.equal(h.current(), null);
  assert.throws(() => h.predict(features), /model not loaded/);
});

test("load publishes a frozen snapshot named after the file", async () => {
  const h = new ModelHolder(silentLog);
  const p = tmp.write("rf_demo.json", forestArtifact());
  const outcome = await h.load(p);
  assert.equal(outcome.status, "LOADED");

  const snap = h.current();
  assert.ok(snap);
  assert.equal(snap.name, "rf_demo");
  assert.equal(snap.path, p);
  assert.ok(snap.artifactRef.startsWith("sha256:"));
  assert.ok(Object.isFrozen(snap));

  assert.equal(h.predict(features), "C");
  assert.deepEqual(h.probabilities(features), { A: 0, B: 0.125, C: 0.875 });
});

test("label-only model has no probabilities", async () => {
  const h = new ModelHolder(silentLog);
  await h.load(tmp.write("nc_demo.json", centroidArtifact()));
  assert.equal(h.predict(features), "A");
  assert.equal(h.probabilities(features), null);
});

test("failed reload keeps the serving snapshot", async () => {
  const h = new ModelHolder(silentLog);
  await h.load(tmp.write("rf_keep.json", forestArtifact()));
  const before = h.current();

  const bad = await h.load(tmp.write("broken.json", "{not json"));
  assert.equal(bad.status, "INVALID");
  assert.equal(bad.status === "INVALID" && bad.error_code, "ARTIFACT_JSON_INVALID");

  const missing = await h.load(path.join(tmp.dir, "gone.json"));
  assert.equal(missing.status, "MISSING");

  assert.equal(h.current(), before);
});

test("successful reload swaps the snapshot; old readers keep theirs", async () => {
  const h = new ModelHolder(silentLog);
  await h.load(tmp.write("rf_v1.json", forestArtifact()));
  const held = h.current();

  await h.load(tmp.write("nc_v2.json", centroidArtifact()));
  assert.equal(h.current()?.name, "nc_v2");
  assert.equal(held?.name, "rf_v1");
  assert.equal(held?.classifier.capability, "probabilities");
});

test("a throwing loader is reported as INVALID", async () => {
  const h = new ModelHolder(silentLog, async () => {
    throw new Error("disk on fire");
  });
  const outcome = await h.load("/anywhere.json");
  assert.deepEqual(outcome, {
    status: "INVALID",
    artifact_ref: "UNREADABLE",
    error_code: "ARTIFACT_LOAD_FAILED",
    message: "disk on fire",
  });
  assert.equal(h.isLoaded(), false);
});

test("resolveModelPath takes the first existing file", () => {
  tmp.write("second.json", "{}");
  tmp.write("third.json", "{}");
  assert.equal(
    resolveModelPath(["missing.json", "second.json", "third.json"], tmp.dir),
    path.join(tmp.dir, "second.json")
  );
  // Directories do not count.
  assert.equal(resolveModelPath([".", "missing.json"], tmp.dir), null);
  assert.equal(resolveModelPath([], tmp.dir), null);
});
