import { InMemoryTradeLog } from '../../database/memory.js';
import { ConfigurationError } from '../../errors.js';
import type { LogLine } from '../../logger.js';
import { TradingEngine, type AccountUpdate, type SignalEvent } from '../../trading/engine.js';
import {
  DEFAULT_EXECUTION_SETTINGS,
  DEFAULT_STRATEGY_PARAMETERS,
  type SessionStatus,
  type TradeRecord,
  type TradingEngineConfig,
} from '../../types.js';
import {
  FakeBroker,
  FakeCalendar,
  HOLD_CLOSES,
  ManualScheduler,
  SELL_CLOSES,
  longPosition,
  makeBars,
} from '../helpers/fakes.js';

const NOW = new Date('2024-01-08T15:00:00.000Z');

class TestEngine extends TradingEngine {
  startupChecks = 0;
  startupError: Error | null = null;

  protected async performStartupChecks(): Promise<void> {
    this.startupChecks++;
    if (this.startupError) throw this.startupError;
  }
}

function engineConfig(overrides: Partial<TradingEngineConfig> = {}): TradingEngineConfig {
  return {
    symbols: ['AAPL'],
    timeframe: '5Min',
    barLimit: 50,
    minBars: 5,
    pollIntervalSeconds: 60,
    concurrency: 'sequential',
    strategy: { ...DEFAULT_STRATEGY_PARAMETERS, rsiPeriod: 3 },
    execution: { ...DEFAULT_EXECUTION_SETTINGS },
    ...overrides,
  };
}

describe('TradingEngine', () => {
  let broker: FakeBroker;
  let calendar: FakeCalendar;
  let tradeLog: InMemoryTradeLog;
  let scheduler: ManualScheduler;

  function createEngine(overrides: Partial<TradingEngineConfig> = {}): TestEngine {
    return new TestEngine(engineConfig(overrides), { broker, calendar, tradeLog, scheduler, now: () => NOW });
  }

  beforeEach(() => {
    broker = new FakeBroker();
    calendar = new FakeCalendar(true);
    tradeLog = new InMemoryTradeLog();
    scheduler = new ManualScheduler();
  });

  describe('configuration', () => {
    test('rejects an invalid configuration at construction', () => {
      expect(() => createEngine({ symbols: [] })).toThrow(ConfigurationError);
      expect(() => createEngine({ pollIntervalSeconds: 90 })).toThrow(ConfigurationError);
      expect(() => createEngine({ barLimit: 3, minBars: 5 })).toThrow(ConfigurationError);
    });

    test('setSymbols normalizes and rejects an empty list', () => {
      const engine = createEngine();

      engine.setSymbols(['aapl', ' tsla ', '']);

      expect(engine.getStatus().symbols).toEqual(['AAPL', 'TSLA']);
      expect(() => engine.setSymbols([' '])).toThrow(ConfigurationError);
    });

    test('parameter updates reach the strategy', () => {
      const engine = createEngine();

      engine.updateStrategyParameters({ rsiOverbought: 80 });
      const settings = engine.updateExecutionSettings({ positionSizeDollars: 250 });

      expect(engine.getStrategy().getParameters().rsiOverbought).toBe(80);
      expect(settings.positionSizeDollars).toBe(250);
    });
  });

  describe('iteration', () => {
    test('closed session refreshes the account but never analyzes or trades', async () => {
      calendar.open = false;
      broker.bars.set('AAPL', makeBars(SELL_CLOSES));
      broker.positions = [longPosition('AAPL', 5)];
      const engine = createEngine();
      const sessions: SessionStatus[] = [];
      const accounts: AccountUpdate[] = [];
      engine.on('session', s => sessions.push(s));
      engine.on('account', a => accounts.push(a));

      await engine.runOnce();

      expect(sessions.map(s => s.isOpen)).toEqual([false]);
      expect(accounts).toHaveLength(1);
      expect(accounts[0].positions.map(p => p.symbol)).toEqual(['AAPL']);
      expect(broker.barCalls).toEqual([]);
      expect(broker.orders).toEqual([]);
      expect(await tradeLog.getAccountBalanceHistory()).toHaveLength(1);
    });

    test('a SELL signal with an open position flattens it', async () => {
      broker.bars.set('AAPL', makeBars(SELL_CLOSES));
      broker.positions = [longPosition('AAPL', 5)];
      const engine = createEngine();
      const signals: SignalEvent[] = [];
      const trades: TradeRecord[] = [];
      engine.on('signal', s => signals.push(s));
      engine.on('trade', t => trades.push(t));

      await engine.runOnce();

      expect(signals.map(s => s.classification)).toEqual(['SELL']);
      expect(broker.orders).toEqual([
        { kind: 'market', request: { symbol: 'AAPL', side: 'sell', qty: 5, referencePrice: 15 } },
      ]);
      expect(trades).toHaveLength(1);
      expect(trades[0]).toMatchObject({ symbol: 'AAPL', side: 'sell', status: 'submitted' });

      const status = engine.getStatus();
      expect(status.lastClassifications).toEqual({ AAPL: 'SELL' });
      expect(status.lastIterationAt).toBe(NOW.toISOString());
      expect(status.session?.isOpen).toBe(true);
    });

    test('a HOLD signal submits nothing', async () => {
      broker.bars.set('AAPL', makeBars(HOLD_CLOSES));
      broker.positions = [longPosition('AAPL', 5)];
      const engine = createEngine();

      await engine.runOnce();

      expect(engine.getStatus().lastClassifications).toEqual({ AAPL: 'HOLD' });
      expect(broker.orders).toEqual([]);
      // Only the account refresh reads positions
      expect(broker.positionCalls).toBe(1);
    });

    test('one failing symbol does not stop the others', async () => {
      broker.barErrors.set('BAD', new Error('feed down'));
      broker.bars.set('AAPL', makeBars(SELL_CLOSES));
      broker.positions = [longPosition('AAPL', 5)];
      const engine = createEngine({ symbols: ['BAD', 'AAPL'] });
      const lines: LogLine[] = [];
      const off = engine.on('log', line => lines.push(line));

      await engine.runOnce();
      off();

      expect(broker.barCalls).toEqual(['BAD', 'AAPL']);
      expect(broker.orders).toHaveLength(1);
      expect(lines).toContainEqual(expect.objectContaining({
        level: 'error',
        scope: 'engine',
        message: '❌ Error analyzing BAD: feed down',
      }));
    });

    test('insufficient data is skipped with a warning', async () => {
      broker.bars.set('AAPL', makeBars([10, 11, 12]));
      const engine = createEngine();
      const signals: SignalEvent[] = [];
      const lines: LogLine[] = [];
      engine.on('signal', s => signals.push(s));
      const off = engine.on('log', line => lines.push(line));

      await engine.runOnce();
      off();

      expect(signals).toEqual([]);
      expect(lines).toContainEqual(expect.objectContaining({
        level: 'warn',
        message: '⏭️  Insufficient data for AAPL (3 bars) - skipping',
      }));
    });

    test('parallel mode processes every symbol', async () => {
      broker.bars.set('AAPL', makeBars(SELL_CLOSES));
      broker.bars.set('TSLA', makeBars(SELL_CLOSES));
      broker.positions = [longPosition('AAPL', 5), longPosition('TSLA', 2)];
      const engine = createEngine({ symbols: ['AAPL', 'TSLA'], concurrency: 'parallel' });

      await engine.runOnce();

      expect(broker.orders.map(o => o.request.symbol).sort()).toEqual(['AAPL', 'TSLA']);
    });

    test('overlapping iterations are skipped', async () => {
      let release: () => void = () => undefined;
      broker.accountGate = new Promise<void>(resolve => {
        release = resolve;
      });
      const engine = createEngine();

      const first = engine.runOnce();
      await engine.runOnce();
      expect(calendar.calls).toBe(1);

      release();
      await first;
      expect(calendar.calls).toBe(1);
    });

    test('repeated iterations over the same bars classify identically', async () => {
      broker.bars.set('AAPL', makeBars(SELL_CLOSES));
      broker.bars.set('TSLA', makeBars(HOLD_CLOSES));
      const engine = createEngine({ symbols: ['AAPL', 'TSLA'] });
      const signals: SignalEvent[] = [];
      engine.on('signal', s => signals.push(s));

      await engine.runOnce();
      await engine.runOnce();

      expect(signals.map(s => s.classification)).toEqual(['SELL', 'HOLD', 'SELL', 'HOLD']);
      expect(signals.slice(2)).toEqual(signals.slice(0, 2));
    });

    test('unsubscribed log listeners receive nothing', async () => {
      const engine = createEngine();
      const lines: LogLine[] = [];
      const off = engine.on('log', line => lines.push(line));
      off();

      await engine.runOnce();

      expect(lines).toEqual([]);
    });
  });

  describe('lifecycle', () => {
    test('start runs startup checks, an initial iteration and schedules the loop', async () => {
      const engine = createEngine();

      await engine.start();

      expect(engine.startupChecks).toBe(1);
      expect(engine.isRunning()).toBe(true);
      expect(calendar.calls).toBe(1);
      expect(scheduler.jobs.map(j => j.intervalSeconds)).toEqual([60]);

      await scheduler.fire(0);
      expect(calendar.calls).toBe(2);
    });

    test('calling start twice is a no-op', async () => {
      const engine = createEngine();

      await engine.start();
      await engine.start();

      expect(engine.startupChecks).toBe(1);
      expect(scheduler.jobs).toHaveLength(1);
      expect(calendar.calls).toBe(1);
    });

    test('a failed startup check is fatal', async () => {
      const engine = createEngine();
      engine.startupError = new ConfigurationError(['Failed to connect']);

      await expect(engine.start()).rejects.toThrow('Invalid configuration: Failed to connect');
      expect(engine.isRunning()).toBe(false);
      expect(scheduler.jobs).toEqual([]);
      expect(calendar.calls).toBe(0);
    });

    test('stop cancels the schedule and later ticks do nothing', async () => {
      const engine = createEngine();
      await engine.start();

      engine.stop();

      expect(engine.isRunning()).toBe(false);
      expect(scheduler.jobs[0].stopped).toBe(true);

      // A tick that was already queued when stop() ran
      await scheduler.jobs[0].task();
      expect(calendar.calls).toBe(1);
    });

    test('stop during an iteration lets it finish', async () => {
      let release: () => void = () => undefined;
      broker.accountGate = new Promise<void>(resolve => {
        release = resolve;
      });
      broker.bars.set('AAPL', makeBars(SELL_CLOSES));
      broker.positions = [longPosition('AAPL', 5)];
      const engine = createEngine();

      const starting = engine.start();
      await new Promise(resolve => setImmediate(resolve));
      expect(calendar.calls).toBe(1);

      engine.stop();
      release();
      await starting;

      expect(engine.isRunning()).toBe(false);
      expect(broker.orders.map(o => o.request)).toEqual([
        { symbol: 'AAPL', side: 'sell', qty: 5, referencePrice: 15 },
      ]);
      expect(engine.getStatus().lastIterationAt).toBe(NOW.toISOString());
    });
  });
});
