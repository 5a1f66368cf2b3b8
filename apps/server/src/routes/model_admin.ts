import type { FastifyInstance } from "fastify";

import type { ModelReloadResponseV1 } from "@glovesign/contracts";

import type { ModelHolder } from "../model/model_holder";
import { toIso } from "../util";

export type ModelAdminDeps = {
  models: ModelHolder;
  /** Re-runs the MODEL_PATH / fallback search; null when nothing exists. */
  resolveModelPath: () => string | null;
};

export function registerModelAdminRoutes(app: FastifyInstance, deps: ModelAdminDeps): void {
  // POST /admin/model/reload
  // Only the configured candidate paths are loadable. A failed reload keeps the
  // serving model and answers 422.
  app.post("/admin/model/reload", async (req, reply) => {
    const target = deps.resolveModelPath();
    const outcome = target
      ? await deps.models.load(target)
      : ({ status: "MISSING", artifact_ref: "MISSING" } as const);

    const serving = deps.models.current();
    const body: ModelReloadResponseV1 = {
      ok: outcome.status === "LOADED",
      status: outcome.status,
      artifact_ref: outcome.status === "LOADED" ? outcome.snapshot.artifactRef : outcome.artifact_ref,
      error_code: outcome.status === "INVALID" ? outcome.error_code : undefined,
      model_name: serving?.name ?? null,
      model_loaded_at: serving ? toIso(serving.loadedAt) : null,
    };

    if (!body.ok) req.log.warn({ status: body.status, error_code: body.error_code }, "Model reload failed");
    return reply.code(body.ok ? 200 : 422).send(body);
  });
}
