import { z } from "zod";

export const ModelLoadStatusV1 = z.enum(["LOADED", "MISSING", "INVALID"]);

export const ModelReloadResponseV1Schema = z.object({
  ok: z.boolean(),
  status: ModelLoadStatusV1,
  artifact_ref: z.string(), // "sha256:<hex>" or "MISSING"
  error_code: z.string().optional(),
  // Model currently serving after the attempt (the old one when it failed).
  model_name: z.string().nullable(),
  model_loaded_at: z.string().datetime().nullable(),
});

export type ModelLoadStatusV1 = z.infer<typeof ModelLoadStatusV1>;
export type ModelReloadResponseV1 = z.infer<typeof ModelReloadResponseV1Schema>;
