// @glovesign/sensor-features: window normalization.
//
// The glove sends either one sample (5 flex readings) or a window of samples.
// Both become a 2-D window of shape (n >= 1, 5) before feature extraction.

export const CHANNEL_COUNT = 5;

export type FlexSample = readonly [number, number, number, number, number];

export type SensorWindow = ReadonlyArray<FlexSample>;

/**
 * Raised when the payload is neither a 5-value sample nor a non-empty list of
 * 5-value samples. Callers map it to a client error.
 */
export class WindowShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WindowShapeError";
  }
}

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function toSample(row: unknown, label: string): FlexSample {
  if (!Array.isArray(row)) throw new WindowShapeError(`${label} must be an array of ${CHANNEL_COUNT} numbers`);
  if (row.length !== CHANNEL_COUNT) {
    throw new WindowShapeError(`${label} has ${row.length} values, expected ${CHANNEL_COUNT}`);
  }
  const values: number[] = [];
  for (let c = 0; c < CHANNEL_COUNT; c++) {
    const v: unknown = row[c];
    if (!isFiniteNumber(v)) throw new WindowShapeError(`${label}[${c}] is not a finite number`);
    values.push(v);
  }
  return [values[0], values[1], values[2], values[3], values[4]];
}

/**
 * Accepts `[f1..f5]` (single sample) or `[[f1..f5], ...]` (window) and returns
 * the 2-D form. Any other shape throws WindowShapeError.
 */
export function normalizeWindow(flexSensors: unknown): SensorWindow {
  if (!Array.isArray(flexSensors) || flexSensors.length === 0) {
    throw new WindowShapeError("flex_sensors must be a non-empty array");
  }

  // 1-D: a single sample. Degraded mode, std and range collapse to 0.
  if (!Array.isArray(flexSensors[0])) {
    return [toSample(flexSensors, "flex_sensors")];
  }

  return flexSensors.map((row: unknown, i: number) => toSample(row, `flex_sensors[${i}]`));
}
