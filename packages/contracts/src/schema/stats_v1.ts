import { z } from "zod";

export const LetterCountV1Schema = z.object({
  letter: z.string(),
  count: z.number().int().nonnegative(),
});

export const StatsResponseV1Schema = z.object({
  total_predictions: z.number().int().nonnegative(),
  last_24h_avg_confidence: z.number(),
  last_1h_avg_processing_ms: z.number(),
  top_letters_24h: z.array(LetterCountV1Schema).max(10),
});

// Row of the daily_stats view (docker/postgres/init/001_predictions.sql).
export const DailyStatsRowV1Schema = z.object({
  date: z.string(), // YYYY-MM-DD
  total_predictions: z.number().int().nonnegative(),
  avg_confidence: z.number(),
  avg_processing_time_ms: z.number(),
  unique_devices: z.number().int().nonnegative(),
});

// Row of the letter_frequency view.
export const LetterFrequencyRowV1Schema = z.object({
  letter: z.string(),
  count: z.number().int().nonnegative(),
  avg_confidence: z.number(),
  min_confidence: z.number(),
  max_confidence: z.number(),
});

export const DailyStatsQueryV1Schema = z.object({
  limit: z.coerce.number().int().min(1).max(366).default(30),
});

export type LetterCountV1 = z.infer<typeof LetterCountV1Schema>;
export type StatsResponseV1 = z.infer<typeof StatsResponseV1Schema>;
export type DailyStatsRowV1 = z.infer<typeof DailyStatsRowV1Schema>;
export type LetterFrequencyRowV1 = z.infer<typeof LetterFrequencyRowV1Schema>;
export type DailyStatsQueryV1 = z.infer<typeof DailyStatsQueryV1Schema>;
