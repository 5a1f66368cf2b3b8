import { z } from "zod";

import { FEATURE_COUNT } from "@glovesign/sensor-features";

// Structural schema only. Cross-field checks (array lengths, node ordering,
// class counts) live in classifier_artifact_validator.ts.

const ClassLabelsZ = z.array(z.string().min(1).max(5)).min(1);

/**
 * One decision tree in array form (the layout tree ensembles are usually
 * exported in). Node i is a leaf when children_left[i] === -1.
 */
export const TreeNodeArraysZ = z
  .object({
    children_left: z.array(z.number().int().min(-1)),
    children_right: z.array(z.number().int().min(-1)),
    feature: z.array(z.number().int()),
    threshold: z.array(z.number()),
    value: z.array(z.array(z.number().nonnegative())),
  })
  .strict();

export const RandomForestArtifactZ = z
  .object({
    kind: z.literal("random_forest"),
    classes: ClassLabelsZ,
    n_features: z.literal(FEATURE_COUNT),
    trees: z.array(TreeNodeArraysZ).min(1),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export const NearestCentroidArtifactZ = z
  .object({
    kind: z.literal("nearest_centroid"),
    classes: ClassLabelsZ,
    centroids: z.array(z.array(z.number().finite()).length(FEATURE_COUNT)).min(1),
    metadata: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export const ClassifierArtifactZ = z.discriminatedUnion("kind", [RandomForestArtifactZ, NearestCentroidArtifactZ]);

export type TreeNodeArrays = z.infer<typeof TreeNodeArraysZ>;
export type RandomForestArtifact = z.infer<typeof RandomForestArtifactZ>;
export type NearestCentroidArtifact = z.infer<typeof NearestCentroidArtifactZ>;
export type ClassifierArtifact = z.infer<typeof ClassifierArtifactZ>;
