import { Inject, Injectable } from "@nestjs/common";
import type { Candle, Timeframe } from "@autotrader/shared";

import { Clock } from "../common/clock";
import { CollaboratorError } from "../common/errors";
import type { BrokerGateway } from "../integrations/broker-gateway";
import { BROKER_GATEWAY } from "../integrations/broker-gateway";
import type { DetectedPattern, TrendLabel } from "./candlestick-analyzer";
import { detectPatterns, getTrend } from "./candlestick-analyzer";
import type { IndicatorValues } from "./indicators";
import { computeIndicators } from "./indicators";
import type { PriceLevels } from "./level-analyzer";
import { findLevels } from "./level-analyzer";

const CANDLE_HISTORY = 100;
const PATTERN_HISTORY = 100;

export type MarketSnapshot = {
  asset: string;
  timeframe: Timeframe;
  candles: Candle[];
  lastClosedTime: number | null;
  /** Newest first. */
  patterns: DetectedPattern[];
  levels: PriceLevels;
  indicators: IndicatorValues;
  trend: TrendLabel;
  updatedAt: string;
};

@Injectable()
export class MarketDataService {
  private readonly snapshots = new Map<string, MarketSnapshot>();

  constructor(
    @Inject(BROKER_GATEWAY) private readonly broker: BrokerGateway,
    private readonly clock: Clock
  ) {}

  async refresh(asset: string, timeframe: Timeframe): Promise<MarketSnapshot> {
    let candles: Candle[];
    try {
      candles = await this.broker.getCandles(asset, timeframe, CANDLE_HISTORY);
    } catch (err) {
      throw new CollaboratorError(`getCandles(${asset})`, err);
    }

    const nowSec = Math.floor(this.clock.now() / 1000);
    const closed = candles.filter((c) => c.time + timeframe <= nowSec);

    const previous = this.snapshots.get(asset);
    const known = previous && previous.timeframe === timeframe ? previous.patterns : [];
    const newestKnown = known[0]?.time ?? Number.NEGATIVE_INFINITY;
    const fresh = detectPatterns(closed)
      .filter((p) => p.time > newestKnown)
      .reverse();

    const snapshot: MarketSnapshot = {
      asset,
      timeframe,
      candles,
      lastClosedTime: closed.length > 0 ? closed[closed.length - 1].time : null,
      patterns: [...fresh, ...known].slice(0, PATTERN_HISTORY),
      levels: findLevels(closed),
      indicators: computeIndicators(closed),
      trend: getTrend(closed),
      updatedAt: this.clock.isoNow()
    };
    this.snapshots.set(asset, snapshot);
    return snapshot;
  }

  getSnapshot(asset: string): MarketSnapshot | null {
    return this.snapshots.get(asset) ?? null;
  }

  patternCount(asset: string): number {
    return this.snapshots.get(asset)?.patterns.length ?? 0;
  }
}
