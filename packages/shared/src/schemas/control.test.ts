import { describe, expect, it } from "vitest";

import { ControlRequestSchema, isControlAction } from "./control";

describe("ControlRequestSchema", () => {
  it("recognizes the supported actions only", () => {
    expect(isControlAction("start")).toBe(true);
    expect(isControlAction("join_tournament")).toBe(false);
  });

  it("accepts numeric tournament ids", () => {
    expect(ControlRequestSchema.parse({ action: "joinTournament", id: 12 })).toEqual({ action: "joinTournament", id: "12" });
  });

  it("coerces confidence and timeframe values", () => {
    expect(ControlRequestSchema.parse({ action: "setMinConfidence", value: "0.8" })).toEqual({ action: "setMinConfidence", value: 0.8 });
    expect(ControlRequestSchema.parse({ action: "setTimeframe", timeframe: "3600" })).toEqual({ action: "setTimeframe", timeframe: 3600 });
    expect(ControlRequestSchema.safeParse({ action: "setTimeframe", timeframe: 120 }).success).toBe(false);
  });

  it("trims the asset name and rejects blanks", () => {
    expect(ControlRequestSchema.parse({ action: "setAsset", asset: " GBPUSD_otc " })).toEqual({ action: "setAsset", asset: "GBPUSD_otc" });
    expect(ControlRequestSchema.safeParse({ action: "setAsset", asset: "   " }).success).toBe(false);
  });
});
