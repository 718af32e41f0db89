import { z } from "zod";

import { MinConfidenceSchema, TimeframeSchema } from "./bot-state";
import type { Timeframe } from "./bot-state";

const optionalText = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

const booleanFlag = z
  .string()
  .optional()
  .transform((v) => (v ?? "false").trim().toLowerCase() === "true");

export const RuntimeEnvSchema = z.object({
  BROKER_SSID: optionalText,
  BOT_DEMO: booleanFlag,
  BROKER_API_URL: z.union([z.string().url(), z.literal("")]).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  DATA_DIR: optionalText,
  LOG_DIR: optionalText,
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CONTROL_API_KEY: optionalText,
  BOT_ASSET: z.string().min(1).default("EURUSD_otc"),
  BOT_TIMEFRAME: z.coerce.number().pipe(TimeframeSchema).default(60),
  BOT_MIN_CONFIDENCE: z.coerce.number().pipe(MinConfidenceSchema).default(0.75),
  TRADE_AMOUNT: z.coerce.number().positive().default(1),
  MAX_TRADES_PER_HOUR: z.coerce.number().int().min(0).default(10)
});

export type RuntimeConfig = {
  sessionId?: string;
  /** Always true when no session credential is configured. */
  demo: boolean;
  demoForced: boolean;
  brokerApiUrl?: string;
  port: number;
  dataDir?: string;
  logDir?: string;
  logLevel: z.infer<typeof RuntimeEnvSchema>["LOG_LEVEL"];
  controlApiKey?: string;
  defaultAsset: string;
  defaultTimeframe: Timeframe;
  minConfidence: number;
  tradeAmount: number;
  maxTradesPerHour: number;
};

export function loadRuntimeConfig(env: Record<string, string | undefined>): RuntimeConfig {
  const parsed = RuntimeEnvSchema.parse(env);
  const sessionId = parsed.BROKER_SSID;
  const brokerApiUrl = parsed.BROKER_API_URL ? parsed.BROKER_API_URL.replace(/\/+$/, "") : undefined;

  return {
    sessionId,
    demo: sessionId ? parsed.BOT_DEMO : true,
    demoForced: !sessionId,
    brokerApiUrl,
    port: parsed.PORT,
    dataDir: parsed.DATA_DIR,
    logDir: parsed.LOG_DIR,
    logLevel: parsed.LOG_LEVEL,
    controlApiKey: parsed.CONTROL_API_KEY,
    defaultAsset: parsed.BOT_ASSET,
    defaultTimeframe: parsed.BOT_TIMEFRAME,
    minConfidence: parsed.BOT_MIN_CONFIDENCE,
    tradeAmount: parsed.TRADE_AMOUNT,
    maxTradesPerHour: parsed.MAX_TRADES_PER_HOUR
  };
}
