import { FEATURE_COUNT, featureNames } from "@glovesign/sensor-features";

import { ClassifierArtifactZ } from "./classifier_artifact_zod";
import type { ClassifierArtifact, NearestCentroidArtifact, RandomForestArtifact, TreeNodeArrays } from "./classifier_artifact_zod";

/** Admission failure that passed the structural schema but breaks a cross-field rule. */
export class ArtifactAdmissionError extends Error {
  constructor(
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ArtifactAdmissionError";
  }
}

function ensureUniqueClasses(classes: readonly string[]): void {
  const seen = new Set<string>();
  for (const c of classes) {
    if (seen.has(c)) throw new ArtifactAdmissionError("ARTIFACT_DUPLICATE_CLASS", `duplicate class label: ${c}`);
    seen.add(c);
  }
}

// Exporters may record the column order they trained on; it must match ours.
function ensureFeatureOrder(metadata: Record<string, unknown> | undefined): void {
  const declared = metadata?.feature_names;
  if (declared === undefined) return;
  const expected = featureNames();
  if (!Array.isArray(declared) || declared.length !== expected.length) {
    throw new ArtifactAdmissionError(
      "ARTIFACT_FEATURE_ORDER",
      `metadata.feature_names must list the ${expected.length} features in extraction order`
    );
  }
  for (let i = 0; i < expected.length; i++) {
    const got: unknown = declared[i];
    if (got !== expected[i]) {
      throw new ArtifactAdmissionError(
        "ARTIFACT_FEATURE_ORDER",
        `metadata.feature_names[${i}] is ${JSON.stringify(got)}, expected "${expected[i]}"`
      );
    }
  }
}

function validateTree(tree: TreeNodeArrays, t: number, classCount: number): void {
  const n = tree.children_left.length;
  if (n === 0) throw new ArtifactAdmissionError("ARTIFACT_TREE_EMPTY", `trees[${t}] has no nodes`);
  for (const key of ["children_right", "feature", "threshold", "value"] as const) {
    if (tree[key].length !== n) {
      throw new ArtifactAdmissionError("ARTIFACT_TREE_SHAPE", `trees[${t}].${key} has ${tree[key].length} entries, expected ${n}`);
    }
  }

  for (let i = 0; i < n; i++) {
    const left = tree.children_left[i];
    const right = tree.children_right[i];
    if ((left === -1) !== (right === -1)) {
      throw new ArtifactAdmissionError("ARTIFACT_TREE_SHAPE", `trees[${t}] node ${i} has exactly one child`);
    }
    if (tree.value[i].length !== classCount) {
      throw new ArtifactAdmissionError(
        "ARTIFACT_CLASS_COUNT",
        `trees[${t}].value[${i}] has ${tree.value[i].length} entries, expected ${classCount}`
      );
    }
    if (left === -1) continue;

    // Children always come after their parent, so traversal cannot cycle.
    if (left <= i || right <= i || left >= n || right >= n) {
      throw new ArtifactAdmissionError("ARTIFACT_TREE_SHAPE", `trees[${t}] node ${i} has out-of-order children`);
    }
    const f = tree.feature[i];
    if (f < 0 || f >= FEATURE_COUNT) {
      throw new ArtifactAdmissionError("ARTIFACT_TREE_FEATURE", `trees[${t}] node ${i} splits on feature ${f}`);
    }
  }
}

function validateRandomForest(a: RandomForestArtifact): void {
  a.trees.forEach((tree, t) => validateTree(tree, t, a.classes.length));
}

function validateNearestCentroid(a: NearestCentroidArtifact): void {
  if (a.centroids.length !== a.classes.length) {
    throw new ArtifactAdmissionError(
      "ARTIFACT_CLASS_COUNT",
      `${a.centroids.length} centroids for ${a.classes.length} classes`
    );
  }
}

/**
 * Two-stage admission: structural zod parse (throws ZodError), then
 * cross-field checks (throws ArtifactAdmissionError).
 */
export function validateClassifierArtifact(input: unknown): ClassifierArtifact {
  const parsed = ClassifierArtifactZ.parse(input);
  ensureUniqueClasses(parsed.classes);
  ensureFeatureOrder(parsed.metadata);
  if (parsed.kind === "random_forest") validateRandomForest(parsed);
  else validateNearestCentroid(parsed);
  return parsed;
}
