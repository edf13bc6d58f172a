import {
  ConfigurationError,
  InMemoryTradeLog,
  PgTradeLog,
  TradingEngine,
  createLogger,
  createPool,
  errorMessage,
  validateEngineConfig,
  type BrokerClient,
  type MarketCalendar,
  type ParameterBundle,
  type ProfileStore,
  type ScheduledJob,
  type Scheduler,
  type TradeLog,
  type TradeQuery,
  type TradeRecord,
  type TradeStats,
} from '../../shared/src/index.js';
import { AlpacaClient } from './alpacaClient.js';
import type { TraderConfig } from './config.js';
import { MarketHours } from './marketHours.js';
import { ProfileManager } from './profileManager.js';

const logger = createLogger('trader');

const ACCOUNT_SUMMARY_INTERVAL_SECONDS = 3600;

export interface RealTraderDeps {
  broker?: BrokerClient;
  calendar?: MarketCalendar;
  tradeLog?: TradeLog;
  profiles?: ProfileStore;
  scheduler?: Scheduler;
  now?: () => Date;
}

export function createTradeLog(databaseUrl: string): TradeLog {
  if (!databaseUrl) {
    logger.warn('⚠️  DATABASE_URL not set - trades are kept in memory only');
    return new InMemoryTradeLog();
  }
  return new PgTradeLog(createPool(databaseUrl));
}

export class RealTrader extends TradingEngine {
  private readonly traderConfig: TraderConfig;
  private readonly profiles: ProfileStore;
  private summaryJob: ScheduledJob | null = null;

  constructor(traderConfig: TraderConfig, deps: RealTraderDeps = {}) {
    super(traderConfig.engine, {
      broker: deps.broker ?? new AlpacaClient(traderConfig.alpaca),
      calendar: deps.calendar ?? new MarketHours(),
      tradeLog: deps.tradeLog ?? createTradeLog(traderConfig.databaseUrl),
      scheduler: deps.scheduler,
      now: deps.now,
    });
    this.traderConfig = traderConfig;
    this.profiles = deps.profiles ?? new ProfileManager(traderConfig.profilesDir);
  }

  protected async performStartupChecks(): Promise<void> {
    logger.info('🔗 Connecting to Alpaca API...');
    try {
      await this.broker.testConnection();
    } catch (error) {
      throw new ConfigurationError([`Failed to connect to Alpaca API: ${errorMessage(error)}`]);
    }

    try {
      await this.tradeLog.testConnection();
    } catch (error) {
      throw new ConfigurationError([`Failed to connect to trade log: ${errorMessage(error)}`]);
    }

    if (this.traderConfig.profile) {
      await this.loadProfile(this.traderConfig.profile);
    }

    await this.verifyAccountSetup();
  }

  private async verifyAccountSetup(): Promise<void> {
    const [account, positions] = await Promise.all([
      this.broker.getAccountSnapshot(),
      this.broker.getPositions(),
    ]);
    logger.info(`💰 Account Equity: $${account.equity.toFixed(2)}`);
    logger.info(`💵 Buying Power: $${account.buyingPower.toFixed(2)}`);

    if (positions.length > 0) {
      logger.info(`📍 Found ${positions.length} existing positions:`);
      for (const pos of positions) {
        logger.info(`   ${pos.symbol}: ${pos.side} ${pos.qty} @ $${pos.avgEntryPrice.toFixed(2)}`);
      }
    }
  }

  async start(): Promise<void> {
    await super.start();

    if (this.isRunning() && !this.summaryJob) {
      this.summaryJob = this.scheduler.every(ACCOUNT_SUMMARY_INTERVAL_SECONDS, () => this.printAccountSummary());
    }
  }

  stop(): void {
    this.summaryJob?.stop();
    this.summaryJob = null;
    super.stop();
  }

  // Manual refresh without scheduling the loop
  async runSingleCycle(): Promise<void> {
    await this.performStartupChecks();
    await this.runOnce();
  }

  async shutdown(): Promise<void> {
    this.stop();
    await this.tradeLog.close();
  }

  /* =========================
     Profiles
     ========================= */
  currentProfileData(): ParameterBundle {
    return {
      symbols: [...this.config.symbols],
      strategy: this.strategy.getParameters(),
      execution: this.executor.getSettings(),
      refreshIntervalSeconds: this.config.pollIntervalSeconds,
      autoRefresh: this.isRunning(),
    };
  }

  async saveProfile(name: string): Promise<ParameterBundle> {
    const bundle = this.currentProfileData();
    await this.profiles.put(name, bundle);
    return bundle;
  }

  async loadProfile(name: string): Promise<ParameterBundle> {
    const bundle = await this.profiles.get(name);
    if (!bundle) {
      throw new ConfigurationError([`Profile not found: ${name}`]);
    }

    this.applyProfile(bundle);
    logger.info(`📂 Profile loaded: ${name}`);
    return bundle;
  }

  // Rejects the whole bundle before anything is applied
  applyProfile(bundle: ParameterBundle): void {
    const errors = validateEngineConfig({
      ...this.config,
      symbols: bundle.symbols,
      strategy: bundle.strategy,
      execution: bundle.execution,
      pollIntervalSeconds: bundle.refreshIntervalSeconds,
    });
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    this.setSymbols(bundle.symbols);
    this.updateStrategyParameters(bundle.strategy);
    this.updateExecutionSettings(bundle.execution);

    // The polling interval is fixed once the loop is scheduled
    if (!this.isRunning()) {
      this.config = { ...this.config, pollIntervalSeconds: bundle.refreshIntervalSeconds };
    } else if (bundle.refreshIntervalSeconds !== this.config.pollIntervalSeconds) {
      logger.warn(`⚠️  Refresh interval ${bundle.refreshIntervalSeconds}s applies after a restart`);
    }
  }

  listProfiles(): Promise<string[]> {
    return this.profiles.list();
  }

  deleteProfile(name: string): Promise<boolean> {
    return this.profiles.delete(name);
  }

  /* =========================
     Reporting
     ========================= */
  getTradeStats(): Promise<TradeStats> {
    return this.tradeLog.getStats(this.now());
  }

  getRecentTrades(filters: TradeQuery = {}): Promise<TradeRecord[]> {
    return this.tradeLog.query(filters);
  }
}
