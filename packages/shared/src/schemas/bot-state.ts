import { z } from "zod";

export const MIN_CONFIDENCE_FLOOR = 0.5;
export const MIN_CONFIDENCE_CEILING = 0.95;

export const TimeframeSchema = z.union([z.literal(60), z.literal(300), z.literal(900), z.literal(3600)]);
export type Timeframe = z.infer<typeof TimeframeSchema>;

export function clampConfidence(value: number): number {
  if (Number.isNaN(value)) return MIN_CONFIDENCE_FLOOR;
  return Math.max(MIN_CONFIDENCE_FLOOR, Math.min(MIN_CONFIDENCE_CEILING, value));
}

/** Accepts any number and stores it clamped into [0.50, 0.95]. */
export const MinConfidenceSchema = z.number().transform(clampConfidence);

export const TaskNameSchema = z.enum(["connection", "tournament", "executor", "learner"]);
export type TaskName = z.infer<typeof TaskNameSchema>;

export const BotStateSchema = z.object({
  running: z.boolean(),
  trading: z.boolean(),
  learning: z.boolean(),
  currentAsset: z.string().min(1),
  currentTimeframeSeconds: TimeframeSchema,
  tradesThisHour: z.number().int().nonnegative(),
  minConfidence: MinConfidenceSchema
});
export type BotState = z.infer<typeof BotStateSchema>;

export function defaultBotState(overrides?: { currentAsset?: string; currentTimeframeSeconds?: Timeframe; minConfidence?: number }): BotState {
  return BotStateSchema.parse({
    running: false,
    trading: false,
    learning: false,
    currentAsset: overrides?.currentAsset ?? "EURUSD_otc",
    currentTimeframeSeconds: overrides?.currentTimeframeSeconds ?? 60,
    tradesThisHour: 0,
    minConfidence: overrides?.minConfidence ?? 0.75
  });
}
