import type { FastifyBaseLogger } from "fastify";

import type { PredictionRecordV1 } from "@glovesign/contracts";

import type { PredictionStore } from "./index";

export interface PredictionRecordSink {
  /** Returns at once; the write completes (or fails) on its own. */
  append(record: PredictionRecordV1): void;
}

/**
 * Best-effort prediction log. Writes run detached from the response path;
 * failures are logged and dropped (no retry queue).
 */
export class PredictionSink implements PredictionRecordSink {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly store: PredictionStore,
    private readonly log: FastifyBaseLogger
  ) {}

  append(record: PredictionRecordV1): void {
    const task: Promise<void> = this.write(record).finally(() => {
      this.pending.delete(task);
    });
    this.pending.add(task);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Waits for in-flight writes, for at most `timeoutMs`, at shutdown before the
   * pool closes. Resolves with the number of writes still pending (abandoned).
   */
  async drain(timeoutMs: number): Promise<number> {
    if (this.pending.size === 0) return 0;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs);
    });
    try {
      await Promise.race([Promise.all(Array.from(this.pending)).then(() => undefined), deadline]);
    } finally {
      clearTimeout(timer);
    }

    const abandoned = this.pending.size;
    if (abandoned > 0) this.log.warn({ abandoned, timeout_ms: timeoutMs }, "Abandoning pending prediction writes");
    return abandoned;
  }

  private async write(record: PredictionRecordV1): Promise<void> {
    try {
      const written = await this.store.insertPrediction(record);
      if (!written) this.log.debug({ letter: record.letter }, "Database not connected; prediction not logged");
    } catch (err) {
      this.log.warn({ err, letter: record.letter, device_id: record.device_id }, "Failed to log prediction");
    }
  }
}
