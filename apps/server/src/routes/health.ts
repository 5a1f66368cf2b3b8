import type { FastifyInstance } from "fastify";

import type { HealthResponseV1 } from "@glovesign/contracts";

import type { ModelHolder } from "../model/model_holder";
import type { PredictionStore } from "../store/index";
import { nowMs, toIso } from "../util";

export type HealthDeps = {
  models: ModelHolder;
  store: PredictionStore;
  startedAtMs: number;
  now?: () => number;
};

export function registerHealthRoutes(app: FastifyInstance, deps: HealthDeps): void {
  const now = deps.now ?? nowMs;

  // GET /health
  // "degraded" iff no model; database state is reported but does not change status.
  app.get("/health", async (): Promise<HealthResponseV1> => {
    const database_connected = await deps.store.ensureConnected();
    const model = deps.models.current();
    return {
      status: model ? "healthy" : "degraded",
      model_loaded: model !== null,
      model_name: model?.name ?? null,
      model_loaded_at: model ? toIso(model.loadedAt) : null,
      database_connected,
      uptime_seconds: Math.max(0, now() - deps.startedAtMs) / 1000,
    };
  });
}
