import pino from "pino";
import type { FastifyBaseLogger } from "fastify";

import type { LogLevel } from "./config";

// Fastify takes this instance for request logs; components use child loggers.
export function createLogger(level: LogLevel): FastifyBaseLogger {
  return pino({
    level,
    base: { service: "glovesign-server" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
