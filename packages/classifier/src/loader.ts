import { readFile } from "node:fs/promises";
import crypto from "node:crypto";

import { ZodError } from "zod";

import { ArtifactAdmissionError, validateClassifierArtifact } from "./artifact/classifier_artifact_validator";
import type { ClassifierArtifact } from "./artifact/classifier_artifact_zod";
import type { Classifier } from "./classifier_types";
import { NearestCentroidClassifier } from "./models/nearest_centroid";
import { RandomForestClassifier } from "./models/random_forest";

export type ClassifierLoadResult =
  | { status: "LOADED"; artifact_ref: string; classifier: Classifier }
  | { status: "MISSING"; artifact_ref: "MISSING" }
  | { status: "INVALID"; artifact_ref: string; error_code: string; message: string };

export function classifierFromArtifact(artifact: ClassifierArtifact): Classifier {
  switch (artifact.kind) {
    case "random_forest":
      return new RandomForestClassifier(artifact);
    case "nearest_centroid":
      return new NearestCentroidClassifier(artifact);
  }
}

function artifactRefFromBytes(bytes: Buffer): string {
  return `sha256:${crypto.createHash("sha256").update(bytes).digest("hex")}`;
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Reads and admits a serialized classifier from an explicit path.
 * Never throws: every failure is reported in the result.
 */
export async function loadClassifierFile(filePath: string): Promise<ClassifierLoadResult> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return { status: "MISSING", artifact_ref: "MISSING" };
    return { status: "INVALID", artifact_ref: "UNREADABLE", error_code: "ARTIFACT_UNREADABLE", message: errorMessage(err) };
  }

  const artifact_ref = artifactRefFromBytes(bytes);

  let json: unknown;
  try {
    json = JSON.parse(bytes.toString("utf8"));
  } catch (err) {
    return { status: "INVALID", artifact_ref, error_code: "ARTIFACT_JSON_INVALID", message: errorMessage(err) };
  }

  try {
    const artifact = validateClassifierArtifact(json);
    return { status: "LOADED", artifact_ref, classifier: classifierFromArtifact(artifact) };
  } catch (err) {
    if (err instanceof ZodError) {
      const first = err.issues[0];
      const where = first && first.path.length ? first.path.join(".") : "(root)";
      return { status: "INVALID", artifact_ref, error_code: "ARTIFACT_ZOD_INVALID", message: `${where}: ${first?.message ?? "invalid"}` };
    }
    if (err instanceof ArtifactAdmissionError) {
      return { status: "INVALID", artifact_ref, error_code: err.code, message: err.message };
    }
    return { status: "INVALID", artifact_ref, error_code: "ARTIFACT_ADMISSION_INVALID", message: errorMessage(err) };
  }
}
