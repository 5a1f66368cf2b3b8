import type { FeatureVector } from "@glovesign/sensor-features";

import type { NearestCentroidArtifact } from "../artifact/classifier_artifact_zod";
import type { LabelOnlyClassifier } from "../classifier_types";

// Label-only: distances are not calibrated probabilities, so none are exposed.
export class NearestCentroidClassifier implements LabelOnlyClassifier {
  readonly capability = "label_only" as const;
  readonly classes: ReadonlyArray<string>;
  private readonly centroids: ReadonlyArray<ReadonlyArray<number>>;

  constructor(artifact: NearestCentroidArtifact) {
    this.classes = Object.freeze([...artifact.classes]);
    this.centroids = artifact.centroids;
  }

  predict(features: FeatureVector): string {
    let best = 0;
    let bestDist = Infinity;
    this.centroids.forEach((centroid, i) => {
      let d = 0;
      for (let j = 0; j < centroid.length; j++) {
        const diff = features[j] - centroid[j];
        d += diff * diff;
      }
      if (d < bestDist) {
        bestDist = d;
        best = i;
      }
    });
    return this.classes[best];
  }
}
