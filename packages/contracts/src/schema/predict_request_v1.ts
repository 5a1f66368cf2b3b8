import { z } from "zod";

/**
 * PredictRequestV1
 *
 * flex_sensors is one sample `[f1..f5]` or a window `[[f1..f5], ...]`.
 * Row length (5) is enforced by @glovesign/sensor-features so the error can
 * name the offending row.
 */
export const FlexRowV1Schema = z.array(z.number().finite());

export const PredictRequestV1Schema = z.object({
  flex_sensors: z.union([FlexRowV1Schema, z.array(FlexRowV1Schema)]),
  timestamp: z.number().finite().optional(), // unix seconds, client clock
  device_id: z.string().min(1).max(100).optional(),
});

export type PredictRequestV1 = z.infer<typeof PredictRequestV1Schema>;
