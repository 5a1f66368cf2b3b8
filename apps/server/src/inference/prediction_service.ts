import { performance } from "node:perf_hooks";

import type { FastifyBaseLogger } from "fastify";

import { probabilityMap } from "@glovesign/classifier";
import type { PredictRequestV1, PredictionRecordV1, PredictionResponseV1 } from "@glovesign/contracts";
import { extractFeatures, FEATURE_COUNT, normalizeWindow, WindowShapeError } from "@glovesign/sensor-features";
import type { SensorWindow } from "@glovesign/sensor-features";

import { InternalError, InvalidInputError, ServiceError, ServiceUnavailableError, errorMessage } from "../errors";
import type { ModelHolder, ModelSnapshot } from "../model/model_holder";
import type { PredictionRecordSink } from "../store/prediction_sink";

export type PredictionServiceOptions = {
  defaultDeviceId: string;
  /** Monotonic milliseconds, for processing_time_ms. */
  clock?: () => number;
  /** Wall-clock unix milliseconds, for response timestamps. */
  now?: () => number;
};

type InferenceOutcome = {
  features: number[];
  letter: string;
  all_probabilities: Record<string, number>;
  confidence: number;
  processing_time_ms: number;
};

/**
 * predict = availability gate -> window normalization -> 25 features ->
 * inference on one model snapshot -> latency -> detached persistence.
 */
export class PredictionService {
  private readonly clock: () => number;
  private readonly now: () => number;

  constructor(
    private readonly models: ModelHolder,
    private readonly sink: PredictionRecordSink,
    private readonly log: FastifyBaseLogger,
    private readonly opts: PredictionServiceOptions
  ) {
    this.clock = opts.clock ?? (() => performance.now());
    this.now = opts.now ?? (() => Date.now());
  }

  /** Call when the handler starts; pass the value to predict(). */
  startTimer(): number {
    return this.clock();
  }

  predict(req: PredictRequestV1, startedAt: number): PredictionResponseV1 {
    const model = this.models.current();
    if (!model) throw new ServiceUnavailableError("MODEL_UNAVAILABLE", "Model not loaded");

    const device_id = req.device_id ?? this.opts.defaultDeviceId;

    let window: SensorWindow;
    try {
      window = normalizeWindow(req.flex_sensors);
    } catch (err) {
      if (err instanceof WindowShapeError) throw new InvalidInputError(err.message);
      throw this.internal(err, device_id);
    }

    const { features, letter, all_probabilities, confidence, processing_time_ms } = this.infer(
      model,
      window,
      startedAt,
      device_id
    );

    const record: PredictionRecordV1 = { letter, confidence, sensor_data: features, device_id, processing_time_ms };
    this.sink.append(record);

    this.log.debug(
      { letter, confidence, device_id, rows: window.length, processing_time_ms, client_ts: req.timestamp ?? null },
      "Prediction"
    );

    return {
      letter,
      confidence,
      all_probabilities,
      processing_time_ms,
      model_name: model.name,
      timestamp: this.now() / 1000,
    };
  }

  // Steps after a well-formed window; any failure here is a server-side bug.
  private infer(model: ModelSnapshot, window: SensorWindow, startedAt: number, device_id: string): InferenceOutcome {
    try {
      const features = extractFeatures(window);
      if (features.length !== FEATURE_COUNT) {
        throw new InternalError(`Feature vector has ${features.length} values, expected ${FEATURE_COUNT}`);
      }

      const letter = model.classifier.predict(features);
      const all_probabilities = probabilityMap(model.classifier, features) ?? { [letter]: 1.0 };
      const confidence = Math.max(...Object.values(all_probabilities));
      const processing_time_ms = Math.max(0, this.clock() - startedAt);
      return { features, letter, all_probabilities, confidence, processing_time_ms };
    } catch (err) {
      if (err instanceof ServiceError) {
        this.log.error({ err, device_id, model_name: model.name }, err.message);
        throw err;
      }
      throw this.internal(err, device_id, model.name);
    }
  }

  private internal(err: unknown, device_id: string, model_name?: string): InternalError {
    this.log.error({ err, device_id, model_name }, "Prediction error");
    return new InternalError(`Prediction failed: ${errorMessage(err)}`);
  }
}
