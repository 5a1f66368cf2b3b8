import type { FastifyInstance } from "fastify";

import { DailyStatsQueryV1Schema } from "@glovesign/contracts";
import type { DailyStatsRowV1, LetterFrequencyRowV1, StatsResponseV1 } from "@glovesign/contracts";

import { InvalidInputError } from "../errors";
import type { StatsAggregator } from "../stats/stats_aggregator";
import { describeZodError } from "../util";

export function registerStatsRoutes(app: FastifyInstance, stats: StatsAggregator): void {
  // GET /stats
  app.get("/stats", async (): Promise<StatsResponseV1> => stats.summary());

  // GET /stats/daily?limit=30
  app.get("/stats/daily", async (req): Promise<{ days: DailyStatsRowV1[] }> => {
    const q = DailyStatsQueryV1Schema.safeParse(req.query ?? {});
    if (!q.success) throw new InvalidInputError(describeZodError(q.error));
    return { days: await stats.daily(q.data.limit) };
  });

  // GET /stats/letters
  app.get("/stats/letters", async (): Promise<{ letters: LetterFrequencyRowV1[] }> => ({
    letters: await stats.letters(),
  }));
}
