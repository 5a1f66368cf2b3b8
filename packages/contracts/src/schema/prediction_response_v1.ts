import { z } from "zod";

export const PredictionResponseV1Schema = z.object({
  letter: z.string().min(1),
  confidence: z.number().min(0).max(1),
  all_probabilities: z.record(z.string(), z.number().min(0).max(1)),
  processing_time_ms: z.number().nonnegative(),
  model_name: z.string().min(1),
  timestamp: z.number(), // unix seconds, server clock
});

export type PredictionResponseV1 = z.infer<typeof PredictionResponseV1Schema>;
