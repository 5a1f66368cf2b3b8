// @glovesign/classifier
// Serialized classifier admission and the two runtime variants.

export * from "./artifact/classifier_artifact_zod";
export * from "./artifact/classifier_artifact_validator";
export * from "./classifier_types";
export * from "./models/random_forest";
export * from "./models/nearest_centroid";
export * from "./loader";
