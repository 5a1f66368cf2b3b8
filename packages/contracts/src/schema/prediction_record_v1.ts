import { z } from "zod";

/**
 * PredictionRecordV1
 * ------------------
 * One row of the `predictions` table. sensor_data holds the 25 extracted
 * features, not the raw samples. predicted_at is assigned by the database at
 * write time and is not part of the record handed to the sink.
 */
export const PredictionRecordV1Schema = z.object({
  letter: z.string().min(1).max(5),
  confidence: z.number().min(0).max(1),
  sensor_data: z.array(z.number().finite()).length(25),
  device_id: z.string().min(1).max(100),
  processing_time_ms: z.number().nonnegative(),
});

export type PredictionRecordV1 = z.infer<typeof PredictionRecordV1Schema>;
