import { Injectable } from "@nestjs/common";
import type { TradeDirection, TradeRecord } from "@autotrader/shared";

import type { MarketSnapshot } from "../analysis/market-data.service";
import { KnowledgeLearnerService } from "./knowledge-learner.service";

export type AgentSignal = {
  asset: string;
  direction: TradeDirection;
  confidence: number;
  reasons: string[];
};

export type AgentStats = {
  evaluations: number;
  lastConfidence: number | null;
  averageConfidence: number | null;
  outcomes: number;
  wins: number;
  losses: number;
};

const LEARNED_WEIGHT = 0.3;

@Injectable()
export class TradingAgentService {
  private evaluations = 0;
  private confidenceSum = 0;
  private lastConfidence: number | null = null;
  private wins = 0;
  private losses = 0;

  constructor(private readonly learner: KnowledgeLearnerService) {}

  /**
   * Scores both directions from RSI extremes, trend, the newest candle pattern and proximity to
   * support/resistance, then blends the winner with the learned win rate for that asset and
   * direction. Returns null until the snapshot has enough history for RSI.
   */
  evaluate(snapshot: MarketSnapshot | null): AgentSignal | null {
    const rsi = snapshot?.indicators.rsi14;
    if (!snapshot || rsi === null || rsi === undefined) return null;

    let call = 0;
    let put = 0;
    const callReasons: string[] = [];
    const putReasons: string[] = [];

    if (rsi < 30) {
      call += ((30 - rsi) / 30) * 0.3;
      callReasons.push(`RSI ${rsi.toFixed(1)} oversold`);
    } else if (rsi > 70) {
      put += ((rsi - 70) / 30) * 0.3;
      putReasons.push(`RSI ${rsi.toFixed(1)} overbought`);
    }

    if (snapshot.trend === "uptrend") {
      call += 0.1;
      callReasons.push("uptrend");
    } else if (snapshot.trend === "downtrend") {
      put += 0.1;
      putReasons.push("downtrend");
    }

    const latestPattern = snapshot.patterns[0];
    if (latestPattern && latestPattern.time === snapshot.lastClosedTime) {
      if (latestPattern.bias === "bullish") {
        call += 0.1;
        callReasons.push(latestPattern.name);
      } else if (latestPattern.bias === "bearish") {
        put += 0.1;
        putReasons.push(latestPattern.name);
      }
    }

    const { lastClose, atr14 } = snapshot.indicators;
    if (lastClose !== null && atr14 !== null && atr14 > 0) {
      const nearSupport = snapshot.levels.support.some((level) => lastClose - level <= atr14);
      const nearResistance = snapshot.levels.resistance.some((level) => level - lastClose <= atr14);
      if (nearSupport) {
        call += 0.05;
        callReasons.push("near support");
      }
      if (nearResistance) {
        put += 0.05;
        putReasons.push("near resistance");
      }
    }

    const direction: TradeDirection = call >= put ? "call" : "put";
    let confidence = 0.5 + Math.max(call, put);
    const learned = this.learner.winRate(snapshot.asset, direction);
    if (learned !== null) {
      confidence = confidence * (1 - LEARNED_WEIGHT) + learned * LEARNED_WEIGHT;
    }
    confidence = Math.round(Math.max(0, Math.min(1, confidence)) * 10_000) / 10_000;

    this.evaluations += 1;
    this.confidenceSum += confidence;
    this.lastConfidence = confidence;

    return {
      asset: snapshot.asset,
      direction,
      confidence,
      reasons: direction === "call" ? callReasons : putReasons
    };
  }

  recordOutcome(trade: TradeRecord): void {
    if (trade.outcome === "win") this.wins += 1;
    else this.losses += 1;
  }

  getStats(): AgentStats {
    return {
      evaluations: this.evaluations,
      lastConfidence: this.lastConfidence,
      averageConfidence: this.evaluations > 0 ? Math.round((this.confidenceSum / this.evaluations) * 10_000) / 10_000 : null,
      outcomes: this.wins + this.losses,
      wins: this.wins,
      losses: this.losses
    };
  }
}
