import type {
  Classification,
  IndicatorSnapshot,
  StrategyParameters,
  SymbolState,
} from '../types.js';
import { DEFAULT_STRATEGY_PARAMETERS } from '../types.js';

export interface StrategyInfo {
  name: string;
  description: string;
  parameters: StrategyParameters;
  buyConditions: string[];
  sellConditions: string[];
}

/**
 * Reports bundles that break vwapSafetyFloor < vwapBuyThreshold < 1 < vwapSellThreshold.
 * Such bundles are still accepted; they just never produce some signals.
 */
export function checkParameterConsistency(params: StrategyParameters): string[] {
  const warnings: string[] = [];

  if (params.vwapSafetyFloor >= params.vwapBuyThreshold) {
    warnings.push(`vwapSafetyFloor (${params.vwapSafetyFloor}) should be below vwapBuyThreshold (${params.vwapBuyThreshold})`);
  }
  if (params.vwapBuyThreshold >= 1) {
    warnings.push(`vwapBuyThreshold (${params.vwapBuyThreshold}) should be below 1`);
  }
  if (params.vwapSellThreshold <= 1) {
    warnings.push(`vwapSellThreshold (${params.vwapSellThreshold}) should be above 1`);
  }
  if (params.vwapBuyThreshold >= params.vwapSellThreshold) {
    warnings.push(`vwapBuyThreshold (${params.vwapBuyThreshold}) should be below vwapSellThreshold (${params.vwapSellThreshold})`);
  }
  if (!Number.isInteger(params.rsiPeriod) || params.rsiPeriod < 1) {
    warnings.push(`rsiPeriod (${params.rsiPeriod}) should be a positive integer`);
  }

  return warnings;
}

// VWAP Reversion Strategy
// Buy: close < VWAP x buyThreshold AND close > VWAP AND close > VWAP x safetyFloor
// Sell: close > VWAP x sellThreshold OR RSI > overbought
export class VwapReversionStrategy {
  private params: StrategyParameters;
  private readonly states = new Map<string, SymbolState>();

  constructor(params: Partial<StrategyParameters> = {}) {
    this.params = { ...DEFAULT_STRATEGY_PARAMETERS, ...params };
  }

  evaluate(symbol: string, snapshot: IndicatorSnapshot | null): Classification {
    if (this.isBuySignal(symbol, snapshot)) return 'BUY';
    if (this.isSellSignal(symbol, snapshot)) return 'SELL';
    return 'HOLD';
  }

  isBuySignal(symbol: string, snapshot: IndicatorSnapshot | null): boolean {
    if (!snapshot) return false;

    const { close, vwap, high, low } = snapshot;
    if (close === null || vwap === null || high === null || low === null) {
      return false;
    }

    // All three are checked against the same bar's close
    const priceBelowThreshold = close < vwap * this.params.vwapBuyThreshold;
    const closesAboveVwap = close > vwap;
    const aboveSafetyFloor = close > vwap * this.params.vwapSafetyFloor;

    const buy = priceBelowThreshold && closesAboveVwap && aboveSafetyFloor;

    this.record(symbol, close, vwap, buy ? 'BUY' : 'HOLD');
    return buy;
  }

  isSellSignal(symbol: string, snapshot: IndicatorSnapshot | null): boolean {
    if (!snapshot) return false;

    const { close, vwap, rsi } = snapshot;
    if (close === null || vwap === null || rsi === null) {
      return false;
    }

    const priceAboveThreshold = close > vwap * this.params.vwapSellThreshold;
    const rsiOverbought = rsi > this.params.rsiOverbought;

    const sell = priceAboveThreshold || rsiOverbought;

    this.record(symbol, close, vwap, sell ? 'SELL' : 'HOLD');
    return sell;
  }

  getState(symbol: string): SymbolState | undefined {
    const state = this.states.get(symbol);
    return state ? { ...state } : undefined;
  }

  getParameters(): StrategyParameters {
    return { ...this.params };
  }

  updateParameters(partial: Partial<StrategyParameters>): StrategyParameters {
    const p = this.params;
    this.params = {
      vwapBuyThreshold: partial.vwapBuyThreshold ?? p.vwapBuyThreshold,
      vwapSellThreshold: partial.vwapSellThreshold ?? p.vwapSellThreshold,
      vwapSafetyFloor: partial.vwapSafetyFloor ?? p.vwapSafetyFloor,
      rsiOverbought: partial.rsiOverbought ?? p.rsiOverbought,
      rsiPeriod: partial.rsiPeriod ?? p.rsiPeriod,
    };
    return this.getParameters();
  }

  reset(): void {
    this.states.clear();
  }

  getStrategyInfo(): StrategyInfo {
    const p = this.params;
    return {
      name: 'VWAP Reversion Strategy',
      description: 'Intraday mean reversion around VWAP with RSI confirmation',
      parameters: this.getParameters(),
      buyConditions: [
        `Price < VWAP × ${p.vwapBuyThreshold}`,
        'Candle closes above VWAP',
        `Price > VWAP × ${p.vwapSafetyFloor} (safety floor)`,
      ],
      sellConditions: [
        `Price > VWAP × ${p.vwapSellThreshold}`,
        `RSI > ${p.rsiOverbought}`,
      ],
    };
  }

  private record(symbol: string, price: number, vwap: number, classification: Classification): void {
    this.states.set(symbol, {
      lastPrice: price,
      lastVwap: vwap,
      lastClassification: classification,
      updatedAt: new Date().toISOString(),
    });
  }
}
