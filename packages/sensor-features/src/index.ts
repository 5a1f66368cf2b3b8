// @glovesign/sensor-features
// Window normalization and the fixed 25-value feature schema.

export * from "./window";
export * from "./extract";
