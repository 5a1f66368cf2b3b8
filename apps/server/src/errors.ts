import type { ErrorCodeV1 } from "@glovesign/contracts";

/**
 * Request-level failures. The Fastify error handler in app.ts maps them to
 * `{ ok: false, error: code, detail: message }` with `status`.
 */
export class ServiceError extends Error {
  constructor(
    readonly status: number,
    readonly code: ErrorCodeV1,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Model not loaded, or the stats store unreachable. Not retried by callers.
export class ServiceUnavailableError extends ServiceError {
  constructor(code: "MODEL_UNAVAILABLE" | "DATABASE_UNAVAILABLE", message: string) {
    super(503, code, message);
  }
}

export class InvalidInputError extends ServiceError {
  constructor(message: string) {
    super(400, "INVALID_INPUT", message);
  }
}

// Bug or schema drift inside extraction / inference / stats queries.
export class InternalError extends ServiceError {
  constructor(message: string) {
    super(500, "INTERNAL_ERROR", message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
