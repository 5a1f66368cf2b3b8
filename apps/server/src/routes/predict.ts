import type { FastifyInstance } from "fastify";

import { PredictRequestV1Schema } from "@glovesign/contracts";
import type { PredictionResponseV1 } from "@glovesign/contracts";

import { InvalidInputError } from "../errors";
import type { PredictionService } from "../inference/prediction_service";
import { describeZodError } from "../util";

export function registerPredictRoutes(app: FastifyInstance, service: PredictionService): void {
  // POST /predict
  // Body: { flex_sensors: [f1..f5] | [[f1..f5], ...], timestamp?, device_id? }
  app.post("/predict", async (req): Promise<PredictionResponseV1> => {
    // Latency is measured from here: queueing before the handler is excluded.
    const startedAt = service.startTimer();

    const parsed = PredictRequestV1Schema.safeParse(req.body);
    if (!parsed.success) throw new InvalidInputError(describeZodError(parsed.error));

    return service.predict(parsed.data, startedAt);
  });
}
