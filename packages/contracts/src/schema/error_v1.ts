import { z } from "zod";

export const ErrorCodeV1 = z.enum([
  "MODEL_UNAVAILABLE",
  "DATABASE_UNAVAILABLE",
  "INVALID_INPUT",
  "BAD_REQUEST",
  "NOT_FOUND",
  "INTERNAL_ERROR",
]);

export const ErrorBodyV1Schema = z.object({
  ok: z.literal(false),
  error: ErrorCodeV1,
  detail: z.string(),
});

export type ErrorCodeV1 = z.infer<typeof ErrorCodeV1>;
export type ErrorBodyV1 = z.infer<typeof ErrorBodyV1Schema>;
