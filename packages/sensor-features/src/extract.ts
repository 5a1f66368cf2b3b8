// @glovesign/sensor-features: feature extraction.
//
// Pure arithmetic over a normalized window. No IO, no state.

import { CHANNEL_COUNT, type SensorWindow } from "./window";

export const CHANNEL_FEATURES = ["mean", "std", "min", "max", "range"] as const;

export type ChannelFeature = (typeof CHANNEL_FEATURES)[number];

export const FEATURE_COUNT = CHANNEL_COUNT * CHANNEL_FEATURES.length; // 25

export type FeatureVector = ReadonlyArray<number>;

/** `flex0_mean, flex0_std, ..., flex4_range` in vector order. */
export function featureNames(): string[] {
  const names: string[] = [];
  for (let c = 0; c < CHANNEL_COUNT; c++) {
    for (const f of CHANNEL_FEATURES) names.push(`flex${c}_${f}`);
  }
  return names;
}

/**
 * Channel-major summary of a window: for each channel, in order,
 * {mean, std, min, max, range}. std is the population standard deviation.
 *
 * The caller guarantees n >= 1 rows of 5 values (see normalizeWindow).
 */
export function extractFeatures(window: SensorWindow): number[] {
  const n = window.length;
  const out: number[] = [];

  for (let c = 0; c < CHANNEL_COUNT; c++) {
    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    for (const sample of window) {
      const v = sample[c];
      sum += v;
      if (v < min) min = v;
      if (v > max) max = v;
    }
    const mean = sum / n;

    let sq = 0;
    for (const sample of window) {
      const d = sample[c] - mean;
      sq += d * d;
    }
    const std = Math.sqrt(sq / n);

    out.push(mean, std, min, max, max - min);
  }

  return out;
}
