import type { FeatureVector } from "@glovesign/sensor-features";

import type { RandomForestArtifact, TreeNodeArrays } from "../artifact/classifier_artifact_zod";
import type { ProbabilisticClassifier } from "../classifier_types";

function leafIndex(tree: TreeNodeArrays, x: FeatureVector): number {
  let node = 0;
  while (tree.children_left[node] !== -1) {
    node = x[tree.feature[node]] <= tree.threshold[node] ? tree.children_left[node] : tree.children_right[node];
  }
  return node;
}

/** First index of the maximum; ties resolve to the earlier class. */
export function argMax(xs: ReadonlyArray<number>): number {
  let best = 0;
  for (let i = 1; i < xs.length; i++) {
    if (xs[i] > xs[best]) best = i;
  }
  return best;
}

/**
 * Tree ensemble with soft voting: each tree contributes its leaf's class
 * distribution (weights normalized to 1) and the forest averages them.
 */
export class RandomForestClassifier implements ProbabilisticClassifier {
  readonly capability = "probabilities" as const;
  readonly classes: ReadonlyArray<string>;
  private readonly trees: ReadonlyArray<TreeNodeArrays>;

  constructor(artifact: RandomForestArtifact) {
    this.classes = Object.freeze([...artifact.classes]);
    this.trees = artifact.trees;
  }

  predictProba(features: FeatureVector): number[] {
    const k = this.classes.length;
    const acc = new Array<number>(k).fill(0);

    for (const tree of this.trees) {
      const weights = tree.value[leafIndex(tree, features)];
      let total = 0;
      for (const w of weights) total += w;
      for (let j = 0; j < k; j++) acc[j] += total > 0 ? weights[j] / total : 1 / k;
    }

    return acc.map((a) => a / this.trees.length);
  }

  predict(features: FeatureVector): string {
    return this.classes[argMax(this.predictProba(features))];
  }
}
