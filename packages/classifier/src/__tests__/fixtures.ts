// Small hand-made artifacts. Leaf weights are chosen so that averaged
// probabilities are exact binary fractions.

import type { NearestCentroidArtifact, RandomForestArtifact, TreeNodeArrays } from "../artifact/classifier_artifact_zod";

export function stump(feature: number, threshold: number, left: number[], right: number[]): TreeNodeArrays {
  return {
    children_left: [1, -1, -1],
    children_right: [2, -1, -1],
    feature: [feature, -2, -2],
    threshold: [threshold, -2, -2],
    value: [left.map((v, i) => v + right[i]), left, right],
  };
}

// flex0_mean <= 500 and flex3_mean <= 600 lean to A, high flex3_mean leans to C.
export function demoForest(): RandomForestArtifact {
  return {
    kind: "random_forest",
    classes: ["A", "B", "C"],
    n_features: 25,
    trees: [stump(0, 500, [3, 1, 0], [0, 1, 3]), stump(15, 600, [2, 2, 0], [0, 0, 4])],
  };
}

export function demoCentroids(): NearestCentroidArtifact {
  return {
    kind: "nearest_centroid",
    classes: ["A", "B"],
    centroids: [new Array<number>(25).fill(0), new Array<number>(25).fill(1000)],
  };
}

/** Features of a window whose every reading on every channel equals `v`. */
export function flatFeatures(v: number): number[] {
  const out: number[] = [];
  for (let c = 0; c < 5; c++) out.push(v, 0, v, v, 0);
  return out;
}
