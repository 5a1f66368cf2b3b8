import Fastify from "fastify";
import type { FastifyBaseLogger, FastifyInstance } from "fastify";

import type { ErrorBodyV1, ErrorCodeV1 } from "@glovesign/contracts";

import { ServiceError } from "./errors";
import type { PredictionService } from "./inference/prediction_service";
import type { ModelHolder } from "./model/model_holder";
import { registerHealthRoutes } from "./routes/health";
import { registerModelAdminRoutes } from "./routes/model_admin";
import { registerPredictRoutes } from "./routes/predict";
import { registerRootRoutes } from "./routes/root";
import { registerStatsRoutes } from "./routes/stats";
import type { StatsAggregator } from "./stats/stats_aggregator";
import type { PredictionStore } from "./store/index";
import type { PredictionSink } from "./store/prediction_sink";

export type AppDeps = {
  log: FastifyBaseLogger;
  models: ModelHolder;
  store: PredictionStore;
  sink: PredictionSink;
  service: PredictionService;
  stats: StatsAggregator;
  resolveModelPath: () => string | null;
  startedAtMs: number;
  now?: () => number;
  /** Default 2000. */
  drainTimeoutMs?: number;
};

function errorBody(error: ErrorCodeV1, detail: string): ErrorBodyV1 {
  return { ok: false, error, detail };
}

export function buildApp(deps: AppDeps): FastifyInstance {
  const app = Fastify({ logger: deps.log });

  app.addHook("onRequest", async (req, reply) => {
    // CORS (open; the desktop client and dashboards call from anywhere)
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ServiceError) {
      if (err.status >= 500) req.log.error({ err, code: err.code }, err.message);
      return reply.code(err.status).send(errorBody(err.code, err.message));
    }
    // Fastify's own 4xx: malformed JSON, wrong content type, body too large.
    const status = typeof err.statusCode === "number" ? err.statusCode : 500;
    if (status === 400) return reply.code(400).send(errorBody("INVALID_INPUT", err.message));
    if (status >= 400 && status < 500) return reply.code(status).send(errorBody("BAD_REQUEST", err.message));

    req.log.error({ err }, "Unhandled error");
    return reply.code(500).send(errorBody("INTERNAL_ERROR", "Internal server error"));
  });

  app.setNotFoundHandler((req, reply) =>
    reply.code(404).send(errorBody("NOT_FOUND", `${req.method} ${req.url} not found`))
  );

  registerRootRoutes(app, deps.models);
  registerHealthRoutes(app, {
    models: deps.models,
    store: deps.store,
    startedAtMs: deps.startedAtMs,
    now: deps.now,
  });
  registerPredictRoutes(app, deps.service);
  registerStatsRoutes(app, deps.stats);
  registerModelAdminRoutes(app, { models: deps.models, resolveModelPath: deps.resolveModelPath });

  // Pending log writes get a bounded chance to finish; the pool is released either way.
  app.addHook("onClose", async () => {
    try {
      await deps.sink.drain(deps.drainTimeoutMs ?? 2000);
    } finally {
      await deps.store.close();
    }
  });

  return app;
}
