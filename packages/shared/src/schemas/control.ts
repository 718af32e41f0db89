import { z } from "zod";

import { TimeframeSchema } from "./bot-state";

export const CONTROL_ACTIONS = ["start", "stop", "joinTournament", "setMinConfidence", "setAsset", "setTimeframe"] as const;
export type ControlAction = (typeof CONTROL_ACTIONS)[number];

export function isControlAction(value: string): value is ControlAction {
  return CONTROL_ACTIONS.some((action) => action === value);
}

export const ControlRequestSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("start") }),
  z.object({ action: z.literal("stop") }),
  z.object({ action: z.literal("joinTournament"), id: z.union([z.string().min(1), z.number()]).transform(String) }),
  z.object({ action: z.literal("setMinConfidence"), value: z.coerce.number() }),
  z.object({ action: z.literal("setAsset"), asset: z.string().trim().min(1) }),
  z.object({ action: z.literal("setTimeframe"), timeframe: z.coerce.number().pipe(TimeframeSchema) })
]);
export type ControlRequest = z.infer<typeof ControlRequestSchema>;
