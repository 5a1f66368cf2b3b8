import { z } from "zod";

// "degraded" iff no model is loaded; the database does not affect status.
export const HealthStatusV1 = z.enum(["healthy", "degraded"]);

export const HealthResponseV1Schema = z.object({
  status: HealthStatusV1,
  model_loaded: z.boolean(),
  model_name: z.string().nullable(),
  model_loaded_at: z.string().datetime().nullable(),
  database_connected: z.boolean(),
  uptime_seconds: z.number().nonnegative(),
});

export type HealthStatusV1 = z.infer<typeof HealthStatusV1>;
export type HealthResponseV1 = z.infer<typeof HealthResponseV1Schema>;
