import { Injectable } from "@nestjs/common";
import type { TradeDirection, TradeRecord } from "@autotrader/shared";

import { Clock } from "../common/clock";
import { CollaboratorError } from "../common/errors";
import type { AssetLearningStats, LearningStats } from "../persistence/trade-store.service";
import { TradeStoreService } from "../persistence/trade-store.service";

function emptyStats(): LearningStats {
  return { passes: 0, samples: 0, assets: [] };
}

function winRate(trades: readonly TradeRecord[], direction: TradeDirection): number | null {
  const subset = trades.filter((t) => t.direction === direction);
  if (subset.length === 0) return null;
  return subset.filter((t) => t.outcome === "win").length / subset.length;
}

/** Digests completed trades into per-asset win rates the agent can lean on. */
@Injectable()
export class KnowledgeLearnerService {
  private stats: LearningStats;

  constructor(
    private readonly store: TradeStoreService,
    private readonly clock: Clock
  ) {
    this.stats = store.loadLearningStats() ?? emptyStats();
  }

  runLearningPass(trades: readonly TradeRecord[]): LearningStats {
    const byAsset = new Map<string, TradeRecord[]>();
    for (const trade of trades) {
      const bucket = byAsset.get(trade.asset) ?? [];
      bucket.push(trade);
      byAsset.set(trade.asset, bucket);
    }

    const assets: AssetLearningStats[] = [...byAsset.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([asset, list]) => ({
        asset,
        trades: list.length,
        wins: list.filter((t) => t.outcome === "win").length,
        callWinRate: winRate(list, "call"),
        putWinRate: winRate(list, "put")
      }));

    const next: LearningStats = {
      passes: this.stats.passes + 1,
      samples: trades.length,
      lastPassAt: this.clock.isoNow(),
      assets
    };
    this.stats = next;

    try {
      this.store.saveLearningStats(next);
    } catch (err) {
      throw new CollaboratorError("saveLearningStats", err);
    }
    return next;
  }

  winRate(asset: string, direction: TradeDirection): number | null {
    const entry = this.stats.assets.find((a) => a.asset === asset);
    if (!entry) return null;
    return direction === "call" ? entry.callWinRate : entry.putWinRate;
  }

  getStats(): LearningStats {
    return this.stats;
  }
}
