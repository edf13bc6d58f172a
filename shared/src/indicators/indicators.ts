import { RSI } from 'technicalindicators';
import type { Bar, IndicatorBar, IndicatorSnapshot } from '../types.js';

const REQUIRED_FIELDS = ['open', 'high', 'low', 'close', 'volume'] as const;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Cumulative VWAP over the given window using typical price (H+L+C)/3.
 * The window is the session: callers reset it by passing a fresh bar series.
 * Entries stay null until cumulative volume becomes positive.
 */
export function calculateVwap(bars: Bar[]): (number | null)[] {
  const vwap: (number | null)[] = [];
  let cumulativeVolume = 0;
  let cumulativePriceVolume = 0;

  for (const bar of bars) {
    const { high, low, close, volume } = bar;
    if (isFiniteNumber(high) && isFiniteNumber(low) && isFiniteNumber(close) && isFiniteNumber(volume)) {
      const typicalPrice = (high + low + close) / 3;
      cumulativeVolume += volume;
      cumulativePriceVolume += typicalPrice * volume;
    }

    vwap.push(cumulativeVolume > 0 ? cumulativePriceVolume / cumulativeVolume : null);
  }

  return vwap;
}

/**
 * Wilder RSI over closing prices. The first `period` entries are null.
 * technicalindicators rounds each value to two decimals, so an overbought
 * check compares against the rounded value.
 */
export function calculateRsi(closes: (number | null)[], period: number = 14): (number | null)[] {
  const rsi: (number | null)[] = closes.map(() => null);

  if (period < 1 || closes.length <= period) return rsi;

  const values: number[] = [];
  for (const close of closes) {
    if (!isFiniteNumber(close)) return rsi;
    values.push(close);
  }

  const output = RSI.calculate({ values, period });
  // Align the library output to the tail of the input series
  const offset = closes.length - output.length;
  output.forEach((value, i) => {
    if (offset + i >= period && Number.isFinite(value)) {
      rsi[offset + i] = Math.min(100, Math.max(0, value));
    }
  });

  return rsi;
}

// Annotate every bar with VWAP and RSI
export function computeIndicators(bars: Bar[], rsiPeriod: number = 14): IndicatorBar[] {
  if (bars.length === 0) return [];

  const vwap = calculateVwap(bars);
  const rsi = calculateRsi(bars.map(b => b.close), rsiPeriod);

  return bars.map((bar, i) => ({ ...bar, vwap: vwap[i], rsi: rsi[i] }));
}

export function latestSnapshot(bars: IndicatorBar[]): IndicatorSnapshot | null {
  if (bars.length === 0) return null;

  const latest = bars[bars.length - 1];
  return {
    close: isFiniteNumber(latest.close) ? latest.close : null,
    high: isFiniteNumber(latest.high) ? latest.high : null,
    low: isFiniteNumber(latest.low) ? latest.low : null,
    vwap: isFiniteNumber(latest.vwap) ? latest.vwap : null,
    rsi: isFiniteNumber(latest.rsi) ? latest.rsi : null,
  };
}

/**
 * Rejects a series that is empty, shorter than `minBars`, has a bar missing
 * any OHLCV field, or trades no volume at all.
 */
export function validateDataQuality(bars: Bar[], minBars: number = 5): boolean {
  if (bars.length === 0) return false;
  if (bars.length < minBars) return false;

  const complete = bars.every(bar => REQUIRED_FIELDS.every(field => isFiniteNumber(bar[field])));
  if (!complete) return false;

  const totalVolume = bars.reduce((sum, bar) => sum + (bar.volume ?? 0), 0);
  return totalVolume > 0;
}
