import { EventEmitter } from 'events';
import type {
  AccountSnapshot,
  BrokerClient,
  Classification,
  ExecutionSettings,
  IndicatorSnapshot,
  MarketCalendar,
  Position,
  SessionStatus,
  StrategyParameters,
  TradeLog,
  TradeRecord,
  TradingEngineConfig,
} from '../types.js';
import { isTimeframe } from '../types.js';
import { BrokerError, ConfigurationError, DataInsufficiencyError } from '../errors.js';
import { computeIndicators, latestSnapshot, validateDataQuality } from '../indicators/indicators.js';
import { createLogger, logFeed, type LogLine } from '../logger.js';
import { ExecutionCoordinator, validateExecutionSettings } from './executor.js';
import { KeyedLock } from './keyedLock.js';
import { cronScheduler, isSchedulableInterval, type ScheduledJob, type Scheduler } from './scheduler.js';
import { VwapReversionStrategy, checkParameterConsistency } from './strategies.js';

const logger = createLogger('engine');

export interface AccountUpdate {
  account: AccountSnapshot;
  positions: Position[];
}

export interface SignalEvent {
  symbol: string;
  classification: Classification;
  snapshot: IndicatorSnapshot;
}

export interface EngineEvents {
  log: LogLine;
  account: AccountUpdate;
  session: SessionStatus;
  signal: SignalEvent;
  trade: TradeRecord;
}

export interface EngineStatus {
  running: boolean;
  symbols: string[];
  session: SessionStatus | null;
  account: AccountUpdate | null;
  lastIterationAt: string | null;
  lastClassifications: Record<string, Classification>;
}

export interface TradingEngineDeps {
  broker: BrokerClient;
  calendar: MarketCalendar;
  tradeLog: TradeLog;
  scheduler?: Scheduler;
  now?: () => Date;
}

export function validateEngineConfig(config: TradingEngineConfig): string[] {
  const errors: string[] = [];

  if (config.symbols.length === 0) {
    errors.push('At least one symbol must be configured');
  }
  if (!isTimeframe(config.timeframe)) {
    errors.push(`Unsupported timeframe: ${config.timeframe}`);
  }
  if (!isSchedulableInterval(config.pollIntervalSeconds)) {
    errors.push(`pollIntervalSeconds must split a minute, an hour or a day evenly: seconds or minutes dividing 60, or hours dividing 24 (got ${config.pollIntervalSeconds})`);
  }
  if (config.minBars < 1 || config.barLimit < config.minBars) {
    errors.push(`barLimit (${config.barLimit}) must be at least minBars (${config.minBars}) and minBars at least 1`);
  }
  errors.push(...validateExecutionSettings(config.execution));
  if (!Number.isInteger(config.strategy.rsiPeriod) || config.strategy.rsiPeriod < 1) {
    errors.push(`rsiPeriod must be a positive integer (got ${config.strategy.rsiPeriod})`);
  }

  return errors;
}

export abstract class TradingEngine {
  protected running = false;
  protected config: TradingEngineConfig;
  protected readonly broker: BrokerClient;
  protected readonly calendar: MarketCalendar;
  protected readonly tradeLog: TradeLog;
  protected readonly strategy: VwapReversionStrategy;
  protected readonly executor: ExecutionCoordinator;

  protected readonly scheduler: Scheduler;
  protected readonly now: () => Date;
  private readonly events = new EventEmitter();
  private job: ScheduledJob | null = null;
  private cycleInFlight = false;
  private detachLogFeed: (() => void) | null = null;

  private lastSession: SessionStatus | null = null;
  private lastAccount: AccountUpdate | null = null;
  private lastIterationAt: string | null = null;
  private readonly lastClassifications = new Map<string, Classification>();

  constructor(config: TradingEngineConfig, deps: TradingEngineDeps) {
    const errors = validateEngineConfig(config);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    this.config = { ...config, symbols: [...config.symbols] };
    this.broker = deps.broker;
    this.calendar = deps.calendar;
    this.tradeLog = deps.tradeLog;
    this.scheduler = deps.scheduler ?? cronScheduler;
    this.now = deps.now ?? (() => new Date());

    this.strategy = new VwapReversionStrategy(config.strategy);
    this.executor = new ExecutionCoordinator(this.broker, this.tradeLog, config.execution, new KeyedLock());

    for (const warning of checkParameterConsistency(this.strategy.getParameters())) {
      logger.warn(`⚠️  ${warning}`);
    }
  }

  async start(): Promise<void> {
    if (this.running) {
      logger.info('Trading engine already running');
      return;
    }

    logger.info('🚀 Starting VWAP Reversion Trader...');

    // Fatal on failure: the loop never starts
    await this.performStartupChecks();

    this.running = true;
    this.job = this.scheduler.every(this.config.pollIntervalSeconds, async () => {
      if (!this.running) return;
      await this.runOnce();
    });

    logger.info(`⏰ Trading engine scheduled to run every ${this.config.pollIntervalSeconds}s`);
    logger.info(`📊 Watching symbols: ${this.config.symbols.join(', ')} (${this.config.timeframe} bars)`);

    // Run initial cycle
    await this.runOnce();
  }

  protected abstract performStartupChecks(): Promise<void>;

  stop(): void {
    if (!this.running && !this.job) return;

    this.running = false;
    this.job?.stop();
    this.job = null;
    logger.info('🛑 Trading engine stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  // One full iteration; overlapping calls are skipped
  async runOnce(): Promise<void> {
    if (this.cycleInFlight) {
      logger.info('⏰ Previous execution still running, skipping...');
      return;
    }

    this.cycleInFlight = true;
    try {
      await this.executeTradingCycle();
    } catch (error) {
      logger.error('❌ Trading cycle error', error);
    } finally {
      this.cycleInFlight = false;
    }
  }

  on<K extends keyof EngineEvents>(event: K, listener: (payload: EngineEvents[K]) => void): () => void {
    this.events.on(event, listener);
    if (event === 'log' && !this.detachLogFeed) {
      this.detachLogFeed = logFeed.subscribe(line => this.events.emit('log', line));
    }

    return () => {
      this.events.off(event, listener);
      if (event === 'log' && this.events.listenerCount('log') === 0 && this.detachLogFeed) {
        this.detachLogFeed();
        this.detachLogFeed = null;
      }
    };
  }

  updateStrategyParameters(partial: Partial<StrategyParameters>): StrategyParameters {
    const params = this.strategy.updateParameters(partial);
    this.config = { ...this.config, strategy: params };

    for (const warning of checkParameterConsistency(params)) {
      logger.warn(`⚠️  ${warning}`);
    }
    logger.info(`⚙️  Strategy parameters updated: ${JSON.stringify(params)}`);
    return params;
  }

  updateExecutionSettings(partial: Partial<ExecutionSettings>): ExecutionSettings {
    const settings = this.executor.updateSettings(partial);
    this.config = { ...this.config, execution: settings };
    return settings;
  }

  setSymbols(symbols: string[]): void {
    const normalized = symbols.map(s => s.trim().toUpperCase()).filter(Boolean);
    if (normalized.length === 0) {
      throw new ConfigurationError(['At least one symbol must be configured']);
    }
    this.config = { ...this.config, symbols: normalized };
    logger.info(`📋 Symbols updated: ${normalized.join(', ')}`);
  }

  getStatus(): EngineStatus {
    return {
      running: this.running,
      symbols: [...this.config.symbols],
      session: this.lastSession,
      account: this.lastAccount,
      lastIterationAt: this.lastIterationAt,
      lastClassifications: Object.fromEntries(this.lastClassifications),
    };
  }

  getStrategy(): VwapReversionStrategy {
    return this.strategy;
  }

  private async executeTradingCycle(): Promise<void> {
    const now = this.now();
    logger.info(`🔄 [${now.toISOString()}] Executing trading cycle...`);

    const session = this.calendar.getSessionStatus(now);
    this.lastSession = session;
    this.events.emit('session', session);

    await this.refreshAccount();

    if (!session.isOpen) {
      logger.info(`🌙 ${session.statusText} - minimal updates only, next open ${session.nextOpen}`);
      this.lastIterationAt = now.toISOString();
      return;
    }

    logger.info(`📈 Market is open - analyzing ${this.config.symbols.length} symbols`);
    const symbols = [...this.config.symbols];

    if (this.config.concurrency === 'parallel') {
      await Promise.all(symbols.map(symbol => this.processSymbol(symbol)));
    } else {
      for (const symbol of symbols) {
        await this.processSymbol(symbol);
      }
    }

    this.lastIterationAt = now.toISOString();
    logger.info('✅ Trading cycle completed');
  }

  protected async refreshAccount(): Promise<AccountUpdate | null> {
    try {
      const [account, positions] = await Promise.all([
        this.broker.getAccountSnapshot(),
        this.broker.getPositions(),
      ]);
      const update: AccountUpdate = { account, positions };
      this.lastAccount = update;
      this.events.emit('account', update);
      await this.recordBalance(account);
      return update;
    } catch (error) {
      logger.error('⚠️  Failed to refresh account info', error);
      return null;
    }
  }

  private async recordBalance(account: AccountSnapshot): Promise<void> {
    try {
      await this.tradeLog.logAccountBalance(account, this.now().toISOString());
    } catch (error) {
      logger.error('Failed to record account balance', error);
    }
  }

  // Never throws: one symbol must not abort the others
  private async processSymbol(symbol: string): Promise<void> {
    try {
      await this.analyzeSymbol(symbol);
    } catch (error) {
      if (error instanceof DataInsufficiencyError) {
        logger.warn(`⏭️  ${error.message}`);
      } else if (error instanceof BrokerError && error.isTransient) {
        logger.warn(`⚠️  Broker unavailable for ${symbol}, retrying next cycle: ${error.message}`);
      } else {
        logger.error(`❌ Error analyzing ${symbol}`, error);
      }
    }
  }

  private async analyzeSymbol(symbol: string): Promise<void> {
    const { timeframe, barLimit, minBars } = this.config;
    const bars = await this.broker.getBars(symbol, timeframe, barLimit);

    if (!validateDataQuality(bars, minBars)) {
      throw new DataInsufficiencyError(symbol, `Insufficient data for ${symbol} (${bars.length} bars) - skipping`);
    }

    const indicators = computeIndicators(bars, this.strategy.getParameters().rsiPeriod);
    const snapshot = latestSnapshot(indicators);
    if (!snapshot) {
      throw new DataInsufficiencyError(symbol, `No indicator snapshot for ${symbol} - skipping`);
    }

    const classification = this.strategy.evaluate(symbol, snapshot);
    this.lastClassifications.set(symbol, classification);
    this.events.emit('signal', { symbol, classification, snapshot });
    this.logSignal(symbol, classification, snapshot);

    const record = await this.executor.onSignal(symbol, classification, snapshot);
    if (record) {
      this.events.emit('trade', record);
    }
  }

  private logSignal(symbol: string, classification: Classification, snapshot: IndicatorSnapshot): void {
    const price = snapshot.close !== null ? `$${snapshot.close.toFixed(2)}` : 'N/A';
    const vwap = snapshot.vwap !== null ? `$${snapshot.vwap.toFixed(2)}` : 'N/A';
    const rsi = snapshot.rsi !== null ? snapshot.rsi.toFixed(1) : 'N/A';
    const ratio = snapshot.close !== null && snapshot.vwap
      ? (snapshot.close / snapshot.vwap).toFixed(3)
      : 'N/A';

    logger.info(`  📊 ${symbol} → ${classification} (Price: ${price}, VWAP: ${vwap}, RSI: ${rsi}, Price/VWAP: ${ratio})`);
  }

  async printAccountSummary(): Promise<void> {
    const update = await this.refreshAccount();
    if (!update) return;

    const { account, positions } = update;
    logger.info('='.repeat(50));
    logger.info('ACCOUNT SUMMARY');
    logger.info(`Account Value: $${account.equity.toFixed(2)}`);
    logger.info(`Buying Power: $${account.buyingPower.toFixed(2)}`);
    logger.info(`Cash: $${account.cash.toFixed(2)}`);
    logger.info(`Open Positions: ${positions.length}`);
    for (const pos of positions) {
      logger.info(`  ${pos.symbol}: ${pos.qty} @ $${pos.avgEntryPrice.toFixed(2)} (P&L: $${pos.unrealizedPl.toFixed(2)})`);
    }
    logger.info('='.repeat(50));
  }
}
