import { VwapReversionStrategy, checkParameterConsistency } from '../../trading/strategies.js';
import { DEFAULT_STRATEGY_PARAMETERS, type IndicatorSnapshot } from '../../types.js';

function snapshot(close: number | null, vwap: number | null, rsi: number | null = 50): IndicatorSnapshot {
  return { close, vwap, rsi, high: close === null ? null : close + 1, low: close === null ? null : close - 1 };
}

describe('VwapReversionStrategy', () => {
  let strategy: VwapReversionStrategy;

  beforeEach(() => {
    strategy = new VwapReversionStrategy();
  });

  test('defaults match the documented parameters', () => {
    expect(strategy.getParameters()).toEqual({
      vwapBuyThreshold: 0.99,
      vwapSellThreshold: 1.01,
      vwapSafetyFloor: 0.95,
      rsiOverbought: 70,
      rsiPeriod: 14,
    });
  });

  describe('BUY', () => {
    test('never fires with consistent defaults: below-threshold and above-VWAP exclude each other', () => {
      for (const close of [90, 96, 98, 99, 100, 100.5]) {
        expect(strategy.isBuySignal('AAPL', snapshot(close, 100))).toBe(false);
      }
    });

    test('fires when all three conditions hold on the same bar', () => {
      strategy.updateParameters({ vwapBuyThreshold: 1.02 });

      expect(strategy.evaluate('AAPL', snapshot(101, 100))).toBe('BUY');
    });

    test('fails the safety floor', () => {
      strategy.updateParameters({ vwapBuyThreshold: 1.02, vwapSafetyFloor: 1.015 });

      // 101 is above VWAP and below 102 but not above 101.5
      expect(strategy.isBuySignal('AAPL', snapshot(101, 100))).toBe(false);
    });

    test('missing fields are never BUY and never throw', () => {
      strategy.updateParameters({ vwapBuyThreshold: 1.02 });

      expect(strategy.isBuySignal('AAPL', snapshot(null, 100))).toBe(false);
      expect(strategy.isBuySignal('AAPL', snapshot(101, null))).toBe(false);
      expect(strategy.isBuySignal('AAPL', { close: 101, vwap: 100, rsi: 50, high: null, low: 100 })).toBe(false);
      expect(strategy.isBuySignal('AAPL', null)).toBe(false);
    });
  });

  describe('SELL', () => {
    test('fires on price above the sell threshold', () => {
      expect(strategy.evaluate('AAPL', snapshot(102, 100, 50))).toBe('SELL');
    });

    test('fires on overbought RSI alone', () => {
      expect(strategy.evaluate('AAPL', snapshot(100, 100, 75))).toBe('SELL');
    });

    test('RSI exactly at the threshold is not overbought', () => {
      expect(strategy.evaluate('AAPL', snapshot(100, 100, 70))).toBe('HOLD');
    });

    test('missing RSI is never SELL', () => {
      expect(strategy.isSellSignal('AAPL', snapshot(102, 100, null))).toBe(false);
      expect(strategy.evaluate('AAPL', snapshot(102, 100, null))).toBe('HOLD');
    });
  });

  test('HOLD when nothing matches', () => {
    expect(strategy.evaluate('AAPL', snapshot(100, 100, 50))).toBe('HOLD');
    expect(strategy.evaluate('AAPL', null)).toBe('HOLD');
  });

  describe('symbol state', () => {
    test('records the last evaluation per symbol', () => {
      strategy.evaluate('AAPL', snapshot(102, 100, 50));
      strategy.evaluate('TSLA', snapshot(100, 100, 50));

      expect(strategy.getState('AAPL')).toMatchObject({ lastPrice: 102, lastVwap: 100, lastClassification: 'SELL' });
      expect(strategy.getState('TSLA')).toMatchObject({ lastPrice: 100, lastVwap: 100, lastClassification: 'HOLD' });
      expect(strategy.getState('NVDA')).toBeUndefined();
    });

    test('reset clears every symbol', () => {
      strategy.evaluate('AAPL', snapshot(102, 100, 50));
      strategy.reset();

      expect(strategy.getState('AAPL')).toBeUndefined();
    });

    test('state does not change classification', () => {
      expect(strategy.evaluate('AAPL', snapshot(102, 100, 50))).toBe('SELL');
      expect(strategy.evaluate('AAPL', snapshot(102, 100, 50))).toBe('SELL');
    });
  });

  test('updateParameters replaces only the provided fields', () => {
    const updated = strategy.updateParameters({ rsiOverbought: 80, vwapSellThreshold: undefined });

    expect(updated).toEqual({ ...DEFAULT_STRATEGY_PARAMETERS, rsiOverbought: 80 });
    expect(strategy.evaluate('AAPL', snapshot(100, 100, 75))).toBe('HOLD');
  });

  test('getStrategyInfo describes the rules with current parameters', () => {
    const info = strategy.getStrategyInfo();

    expect(info.name).toBe('VWAP Reversion Strategy');
    expect(info.buyConditions).toEqual([
      'Price < VWAP × 0.99',
      'Candle closes above VWAP',
      'Price > VWAP × 0.95 (safety floor)',
    ]);
    expect(info.sellConditions).toEqual(['Price > VWAP × 1.01', 'RSI > 70']);
  });
});

describe('checkParameterConsistency', () => {
  test('defaults are consistent', () => {
    expect(checkParameterConsistency(DEFAULT_STRATEGY_PARAMETERS)).toEqual([]);
  });

  test('reports a buy threshold at or above 1', () => {
    const warnings = checkParameterConsistency({ ...DEFAULT_STRATEGY_PARAMETERS, vwapBuyThreshold: 1.02 });

    expect(warnings).toEqual([
      'vwapBuyThreshold (1.02) should be below 1',
      'vwapBuyThreshold (1.02) should be below vwapSellThreshold (1.01)',
    ]);
  });

  test('reports an inverted floor and a low sell threshold', () => {
    const warnings = checkParameterConsistency({
      ...DEFAULT_STRATEGY_PARAMETERS,
      vwapSafetyFloor: 0.99,
      vwapSellThreshold: 0.98,
    });

    expect(warnings).toEqual([
      'vwapSafetyFloor (0.99) should be below vwapBuyThreshold (0.99)',
      'vwapSellThreshold (0.98) should be above 1',
      'vwapBuyThreshold (0.99) should be below vwapSellThreshold (0.98)',
    ]);
  });
});
