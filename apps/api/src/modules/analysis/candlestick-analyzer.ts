import type { Candle } from "@autotrader/shared";

import { computeSma } from "./indicators";

export type PatternName = "doji" | "hammer" | "shooting_star" | "bullish_engulfing" | "bearish_engulfing";
export type PatternBias = "bullish" | "bearish" | "neutral";

export type DetectedPattern = {
  name: PatternName;
  bias: PatternBias;
  time: number;
  price: number;
};

export type TrendLabel = "uptrend" | "downtrend" | "sideways" | "unknown";

function body(c: Candle): number {
  return Math.abs(c.close - c.open);
}

function range(c: Candle): number {
  return c.high - c.low;
}

function classify(prev: Candle | undefined, c: Candle): DetectedPattern | null {
  const r = range(c);
  if (r <= 0) return null;

  const upperWick = c.high - Math.max(c.open, c.close);
  const lowerWick = Math.min(c.open, c.close) - c.low;

  if (prev && body(prev) > 0) {
    const prevBearish = prev.close < prev.open;
    const prevBullish = prev.close > prev.open;
    const engulfs = Math.max(c.open, c.close) >= Math.max(prev.open, prev.close) && Math.min(c.open, c.close) <= Math.min(prev.open, prev.close);
    if (engulfs && body(c) > body(prev)) {
      if (prevBearish && c.close > c.open) return { name: "bullish_engulfing", bias: "bullish", time: c.time, price: c.close };
      if (prevBullish && c.close < c.open) return { name: "bearish_engulfing", bias: "bearish", time: c.time, price: c.close };
    }
  }

  if (body(c) <= r * 0.1) {
    return { name: "doji", bias: "neutral", time: c.time, price: c.close };
  }
  if (lowerWick >= body(c) * 2 && upperWick <= body(c) * 0.5) {
    return { name: "hammer", bias: "bullish", time: c.time, price: c.close };
  }
  if (upperWick >= body(c) * 2 && lowerWick <= body(c) * 0.5) {
    return { name: "shooting_star", bias: "bearish", time: c.time, price: c.close };
  }
  return null;
}

/** Patterns found in `candles`, oldest first. At most one pattern per candle. */
export function detectPatterns(candles: Candle[]): DetectedPattern[] {
  const out: DetectedPattern[] = [];
  for (let i = 0; i < candles.length; i += 1) {
    const found = classify(i > 0 ? candles[i - 1] : undefined, candles[i]);
    if (found) out.push(found);
  }
  return out;
}

export function getTrend(candles: Candle[]): TrendLabel {
  const closes = candles.map((c) => c.close);
  const fast = computeSma(closes, 20);
  const slow = computeSma(closes, 50);
  if (fast === null || slow === null || slow === 0) return "unknown";

  const spread = (fast - slow) / slow;
  if (spread > 0.0005) return "uptrend";
  if (spread < -0.0005) return "downtrend";
  return "sideways";
}
