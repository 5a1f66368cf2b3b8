import path from "node:path";

import type { FastifyBaseLogger } from "fastify";

import { loadClassifierFile, probabilityMap } from "@glovesign/classifier";
import type { Classifier, ClassifierLoadResult } from "@glovesign/classifier";
import type { FeatureVector } from "@glovesign/sensor-features";

import { errorMessage } from "../errors";

/** Everything a prediction needs from one model version. Never mutated after creation. */
export type ModelSnapshot = Readonly<{
  name: string;
  path: string;
  artifactRef: string;
  loadedAt: Date;
  classifier: Classifier;
}>;

export type ModelLoadOutcome =
  | { status: "LOADED"; snapshot: ModelSnapshot }
  | Exclude<ClassifierLoadResult, { status: "LOADED" }>;

export type ClassifierFileLoader = (filePath: string) => Promise<ClassifierLoadResult>;

/**
 * Single-writer / many-reader cell for the serving model.
 *
 * Readers call current() once per request and use that snapshot throughout;
 * load() replaces the reference in one assignment, so a reader sees either the
 * old version or the new one.
 */
export class ModelHolder {
  private snapshot: ModelSnapshot | null = null;

  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly loadFile: ClassifierFileLoader = loadClassifierFile
  ) {}

  async load(filePath: string): Promise<ModelLoadOutcome> {
    this.log.info({ path: filePath }, "Loading model");

    let result: ClassifierLoadResult;
    try {
      result = await this.loadFile(filePath);
    } catch (err) {
      result = { status: "INVALID", artifact_ref: "UNREADABLE", error_code: "ARTIFACT_LOAD_FAILED", message: errorMessage(err) };
    }

    if (result.status !== "LOADED") {
      this.log.error(
        { path: filePath, status: result.status, error_code: result.status === "INVALID" ? result.error_code : undefined },
        `Failed to load model: ${result.status === "INVALID" ? result.message : "file not found"}`
      );
      return result;
    }

    const next: ModelSnapshot = Object.freeze({
      name: path.parse(filePath).name,
      path: filePath,
      artifactRef: result.artifact_ref,
      loadedAt: new Date(),
      classifier: result.classifier,
    });
    const previous = this.snapshot;
    this.snapshot = next;

    this.log.info(
      { model_name: next.name, artifact_ref: next.artifactRef, capability: next.classifier.capability, replaced: previous?.name ?? null },
      `Model loaded: ${next.name}`
    );
    return { status: "LOADED", snapshot: next };
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  current(): ModelSnapshot | null {
    return this.snapshot;
  }

  /** Callers gate on isLoaded(); calling this with no model is a bug. */
  predict(features: FeatureVector): string {
    return this.require().classifier.predict(features);
  }

  probabilities(features: FeatureVector): Record<string, number> | null {
    return probabilityMap(this.require().classifier, features);
  }

  private require(): ModelSnapshot {
    if (!this.snapshot) throw new Error("model not loaded");
    return this.snapshot;
  }
}
