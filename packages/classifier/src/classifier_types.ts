import type { FeatureVector } from "@glovesign/sensor-features";

export type ClassifierCapability = "probabilities" | "label_only";

interface ClassifierBase {
  /** Known labels, in the order probability vectors use. */
  readonly classes: ReadonlyArray<string>;
  predict(features: FeatureVector): string;
}

export interface ProbabilisticClassifier extends ClassifierBase {
  readonly capability: "probabilities";
  /** One probability per entry of `classes`, summing to 1. */
  predictProba(features: FeatureVector): number[];
}

export interface LabelOnlyClassifier extends ClassifierBase {
  readonly capability: "label_only";
}

// Resolved once when the artifact is admitted; callers switch on `capability`.
export type Classifier = ProbabilisticClassifier | LabelOnlyClassifier;

/** label -> probability for every known label, or null when the model has no probability output. */
export function probabilityMap(classifier: Classifier, features: FeatureVector): Record<string, number> | null {
  if (classifier.capability === "label_only") return null;
  const proba = classifier.predictProba(features);
  const out: Record<string, number> = {};
  classifier.classes.forEach((label, i) => {
    out[label] = proba[i];
  });
  return out;
}
