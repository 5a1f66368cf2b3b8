// apps/server/src/server.ts
import { buildApp } from "./app";
import { ConfigError, loadEnv, loadServerConfig } from "./config";
import { errorMessage } from "./errors";
import { PredictionService } from "./inference/prediction_service";
import { createLogger } from "./logger";
import { ModelHolder } from "./model/model_holder";
import { resolveModelPath } from "./model/model_path";
import { StatsAggregator } from "./stats/stats_aggregator";
import { makeStoreFromConfig } from "./store/index";
import { PredictionSink } from "./store/prediction_sink";

loadEnv();

async function main(): Promise<void> {
  const startedAtMs = Date.now();
  const cfg = loadServerConfig();
  const log = createLogger(cfg.logLevel);

  log.info({ host: cfg.host, port: cfg.port, model_paths: cfg.modelPaths }, "Starting inference service");

  const models = new ModelHolder(log.child({ component: "model" }));
  const findModel = () => resolveModelPath(cfg.modelPaths);

  // A missing or broken model leaves the service up in "degraded" state.
  const modelPath = findModel();
  if (modelPath) {
    await models.load(modelPath);
  } else {
    log.error({ searched: cfg.modelPaths }, "No model file found; /predict will answer 503");
  }

  const store = makeStoreFromConfig(cfg.database, log.child({ component: "store" }));
  if (!(await store.ensureConnected())) {
    log.warn("Database unavailable at startup; predictions will not be logged until it is reachable");
  }

  const sink = new PredictionSink(store, log.child({ component: "sink" }));
  const service = new PredictionService(models, sink, log.child({ component: "predict" }), {
    defaultDeviceId: cfg.defaultDeviceId,
  });
  const stats = new StatsAggregator(store);

  const app = buildApp({
    log,
    models,
    store,
    sink,
    service,
    stats,
    resolveModelPath: findModel,
    startedAtMs,
    drainTimeoutMs: cfg.shutdownDrainTimeoutMs,
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) {
      log.warn({ signal }, "Second signal during shutdown; exiting now");
      process.exit(1);
    }
    closing = true;
    log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, "Shutdown failed");
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port: cfg.port, host: cfg.host });
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(`fatal: ${errorMessage(err)}`);
  }
  process.exit(1);
});
