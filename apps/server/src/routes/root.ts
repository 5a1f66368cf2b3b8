import type { FastifyInstance } from "fastify";

import type { ModelHolder } from "../model/model_holder";

export const SERVICE_NAME = "Sign Letter Inference API";
export const SERVICE_VERSION = "1.0.0";

export function registerRootRoutes(app: FastifyInstance, models: ModelHolder): void {
  // GET /
  app.get("/", async () => ({
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    status: "operational",
    endpoints: {
      predict: "POST /predict",
      health: "GET /health",
      stats: "GET /stats",
      stats_daily: "GET /stats/daily",
      stats_letters: "GET /stats/letters",
      model_reload: "POST /admin/model/reload",
    },
    model: models.current()?.name ?? "not loaded",
  }));
}
