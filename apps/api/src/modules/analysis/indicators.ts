import type { Candle } from "@autotrader/shared";

export type IndicatorValues = {
  rsi14: number | null;
  sma20: number | null;
  ema20: number | null;
  atr14: number | null;
  lastClose: number | null;
};

export function computeSma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  let sum = 0;
  for (let i = values.length - period; i < values.length; i += 1) {
    sum += values[i];
  }
  return sum / period;
}

export function computeEma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  let ema = values.slice(0, period).reduce((a, b) => a + b, 0) / period;
  const k = 2 / (period + 1);
  for (let i = period; i < values.length; i += 1) {
    ema = (values[i] - ema) * k + ema;
  }
  return ema;
}

// Wilder smoothing
export function computeRsi(closes: number[], period = 14): number | null {
  if (closes.length < period + 1) return null;
  let gain = 0;
  let loss = 0;
  for (let i = 1; i <= period; i += 1) {
    const diff = closes[i] - closes[i - 1];
    if (diff >= 0) gain += diff;
    else loss -= diff;
  }
  let avgGain = gain / period;
  let avgLoss = loss / period;

  for (let i = period + 1; i < closes.length; i += 1) {
    const diff = closes[i] - closes[i - 1];
    const g = diff > 0 ? diff : 0;
    const l = diff < 0 ? -diff : 0;
    avgGain = (avgGain * (period - 1) + g) / period;
    avgLoss = (avgLoss * (period - 1) + l) / period;
  }

  if (avgLoss === 0) return 100;
  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function computeAtr(candles: Candle[], period = 14): number | null {
  if (candles.length < period + 1) return null;
  let atr = 0;
  for (let i = 1; i < candles.length; i += 1) {
    const tr = Math.max(
      candles[i].high - candles[i].low,
      Math.abs(candles[i].high - candles[i - 1].close),
      Math.abs(candles[i].low - candles[i - 1].close)
    );
    if (i <= period) {
      atr += tr;
      if (i === period) atr /= period;
      continue;
    }
    atr = (atr * (period - 1) + tr) / period;
  }
  return atr;
}

export function computeIndicators(candles: Candle[]): IndicatorValues {
  const closes = candles.map((c) => c.close);
  return {
    rsi14: computeRsi(closes, 14),
    sma20: computeSma(closes, 20),
    ema20: computeEma(closes, 20),
    atr14: computeAtr(candles, 14),
    lastClose: closes.length > 0 ? closes[closes.length - 1] : null
  };
}
