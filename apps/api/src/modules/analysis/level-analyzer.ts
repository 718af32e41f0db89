import type { Candle } from "@autotrader/shared";

export type PriceLevels = {
  support: number[];
  resistance: number[];
};

function mergeNearby(levels: number[], tolerance: number): number[] {
  const sorted = [...levels].sort((a, b) => a - b);
  const merged: number[][] = [];
  for (const level of sorted) {
    const cluster = merged[merged.length - 1];
    if (cluster && Math.abs(level - cluster[cluster.length - 1]) <= tolerance) {
      cluster.push(level);
    } else {
      merged.push([level]);
    }
  }
  return merged.map((cluster) => Number((cluster.reduce((a, b) => a + b, 0) / cluster.length).toFixed(6)));
}

/**
 * Swing highs/lows over a `window`-candle neighbourhood, merged when closer than 0.05% of the
 * last close. Support sits below the last close, resistance above it; each side keeps the
 * `maxLevels` nearest levels.
 */
export function findLevels(candles: Candle[], window = 3, maxLevels = 3): PriceLevels {
  if (candles.length < window * 2 + 1) return { support: [], resistance: [] };

  const highs: number[] = [];
  const lows: number[] = [];
  for (let i = window; i < candles.length - window; i += 1) {
    const neighbours = candles.slice(i - window, i + window + 1);
    const c = candles[i];
    if (neighbours.every((n) => n.high <= c.high)) highs.push(c.high);
    if (neighbours.every((n) => n.low >= c.low)) lows.push(c.low);
  }

  const lastClose = candles[candles.length - 1].close;
  const tolerance = lastClose * 0.0005;
  const levels = mergeNearby([...highs, ...lows], tolerance);

  const support = levels.filter((l) => l < lastClose).sort((a, b) => b - a).slice(0, maxLevels);
  const resistance = levels.filter((l) => l > lastClose).sort((a, b) => a - b).slice(0, maxLevels);
  return { support, resistance };
}
