import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { TradeRecord } from "@autotrader/shared";

import { configServiceFor, testConfig } from "../testing/fixtures";
import { TradeStoreService } from "./trade-store.service";

function record(id: string, outcome: TradeRecord["outcome"]): TradeRecord {
  return {
    id,
    asset: "EURUSD_otc",
    direction: "call",
    amount: 1,
    confidence: 0.8,
    openedAt: "2026-01-05T09:00:00.000Z",
    expirationEpoch: 1_767_603_660,
    outcome,
    resolvedAt: "2026-01-05T09:01:00.000Z"
  };
}

describe("TradeStoreService", () => {
  let dataDir: string;
  let store: TradeStoreService;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "trade-store-"));
    store = new TradeStoreService(configServiceFor(testConfig(), dataDir));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("appends trades and reads them back in completion order", () => {
    store.recordTrade(record("a", "win"));
    store.recordTrade(record("b", "loss"));

    expect(store.loadTrades().map((t) => [t.id, t.outcome])).toEqual([
      ["a", "win"],
      ["b", "loss"]
    ]);
  });

  it("skips corrupt lines and honours the tail limit", () => {
    store.recordTrade(record("a", "win"));
    fs.appendFileSync(path.join(dataDir, "trades.jsonl"), "{not json\n");
    store.recordTrade(record("b", "loss"));
    store.recordTrade(record("c", "win"));

    expect(store.loadTrades().map((t) => t.id)).toEqual(["a", "b", "c"]);
    expect(store.loadTrades(2).map((t) => t.id)).toEqual(["b", "c"]);
  });

  it("returns empty defaults before anything was written", () => {
    expect(store.loadTrades()).toEqual([]);
    expect(store.loadLearningStats()).toBeNull();
    expect(store.loadDailyJoinState()).toEqual({});
  });

  it("round-trips learning stats and scheduler state", () => {
    const stats = {
      passes: 2,
      samples: 4,
      lastPassAt: "2026-01-05T10:00:00.000Z",
      assets: [{ asset: "EURUSD_otc", trades: 4, wins: 3, callWinRate: 0.75, putWinRate: null }]
    };
    store.saveLearningStats(stats);
    store.saveDailyJoinState({ daily_free: 1_767_603_600_000 });

    expect(store.loadLearningStats()).toEqual(stats);
    expect(store.loadDailyJoinState()).toEqual({ daily_free: 1_767_603_600_000 });
  });
});
