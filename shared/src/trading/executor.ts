import type {
  BrokerClient,
  Classification,
  ExecutionSettings,
  IndicatorSnapshot,
  OrderRequest,
  OrderSide,
  Position,
  TradeLog,
  TradeRecord,
} from '../types.js';
import { DEFAULT_EXECUTION_SETTINGS } from '../types.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { KeyedLock } from './keyedLock.js';

const logger = createLogger('executor');

const QTY_PRECISION = 1_000_000; // fractional shares, 6 decimals

export function roundDownQty(qty: number): number {
  return Math.floor(qty * QTY_PRECISION) / QTY_PRECISION;
}

export function roundPrice(price: number): number {
  return Math.round(price * 100) / 100;
}

export function validateExecutionSettings(settings: ExecutionSettings): string[] {
  const errors: string[] = [];
  if (!(settings.positionSizeDollars > 0)) {
    errors.push(`positionSizeDollars must be positive (got ${settings.positionSizeDollars})`);
  }
  if (!(settings.stopLossPct > 0 && settings.stopLossPct < 1)) {
    errors.push(`stopLossPct must be between 0 and 1 (got ${settings.stopLossPct})`);
  }
  if (!(settings.takeProfitPct > 0)) {
    errors.push(`takeProfitPct must be positive (got ${settings.takeProfitPct})`);
  }
  return errors;
}

/**
 * Turns classifications into broker orders. Live positions are fetched from
 * the broker right before every action and never cached, so repeated BUY
 * signals cannot stack positions and repeated SELL signals on a flat symbol
 * do nothing.
 */
export class ExecutionCoordinator {
  private settings: ExecutionSettings;
  private readonly lock: KeyedLock;

  constructor(
    private readonly broker: BrokerClient,
    private readonly tradeLog: TradeLog,
    settings: Partial<ExecutionSettings> = {},
    lock: KeyedLock = new KeyedLock()
  ) {
    this.settings = { ...DEFAULT_EXECUTION_SETTINGS, ...settings };
    this.lock = lock;
  }

  getSettings(): ExecutionSettings {
    return { ...this.settings };
  }

  updateSettings(partial: Partial<ExecutionSettings>): ExecutionSettings {
    const next: ExecutionSettings = {
      positionSizeDollars: partial.positionSizeDollars ?? this.settings.positionSizeDollars,
      stopLossPct: partial.stopLossPct ?? this.settings.stopLossPct,
      takeProfitPct: partial.takeProfitPct ?? this.settings.takeProfitPct,
    };
    const errors = validateExecutionSettings(next);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }
    this.settings = next;

    logger.info(
      `⚙️  Trading settings updated: Position=$${next.positionSizeDollars}, ` +
      `Stop Loss=${(next.stopLossPct * 100).toFixed(1)}%, Take Profit=${(next.takeProfitPct * 100).toFixed(1)}%`
    );
    return this.getSettings();
  }

  calculatePositionSize(price: number): number {
    if (!Number.isFinite(price) || price <= 0) return 0;
    return roundDownQty(this.settings.positionSizeDollars / price);
  }

  async onSignal(
    symbol: string,
    classification: Classification,
    snapshot: IndicatorSnapshot,
    reason?: string
  ): Promise<TradeRecord | null> {
    if (classification === 'HOLD') {
      logger.info(`${symbol} → HOLD (no signal)`);
      return null;
    }

    return this.lock.run(symbol, () =>
      classification === 'BUY'
        ? this.executeBuy(symbol, snapshot, reason)
        : this.executeSell(symbol, snapshot, reason)
    );
  }

  private async executeBuy(symbol: string, snapshot: IndicatorSnapshot, reason?: string): Promise<TradeRecord | null> {
    const positions = await this.broker.getPositions();
    if (findPosition(positions, symbol)) {
      logger.info(`${symbol} → BUY ignored, position already open`);
      return null;
    }

    const price = snapshot.close;
    if (price === null) {
      logger.warn(`${symbol} → BUY ignored, no close price`);
      return null;
    }

    const qty = this.calculatePositionSize(price);
    const stopLoss = roundPrice(price * (1 - this.settings.stopLossPct));
    const takeProfit = roundPrice(price * (1 + this.settings.takeProfitPct));
    const why = reason ?? describeSnapshot('VWAP reversion buy', snapshot);

    if (qty <= 0) {
      logger.warn(`${symbol} → BUY rejected, position size $${this.settings.positionSizeDollars} buys no shares at $${price.toFixed(2)}`);
      return this.persist({
        symbol, side: 'buy', price, qty, status: 'failed', orderId: null, stopLoss, takeProfit,
        reason: `Invalid quantity ${qty} for position size $${this.settings.positionSizeDollars}`,
      });
    }

    const request: OrderRequest = { symbol, side: 'buy', qty, referencePrice: price, stopLoss, takeProfit };

    try {
      const result = await this.broker.submitBracketOrder(request);
      logger.info(`✅ BUY order placed for ${symbol}: ${qty} shares @ $${price.toFixed(2)}`);
      logger.info(`   Stop Loss: $${stopLoss.toFixed(2)}, Take Profit: $${takeProfit.toFixed(2)}`);

      return this.persist({
        symbol, side: 'buy', price, qty, status: 'submitted', orderId: result.orderId, stopLoss, takeProfit, reason: why,
      });
    } catch (error) {
      logger.error(`❌ Failed to place BUY order for ${symbol}`, error);
      return this.persist({
        symbol, side: 'buy', price, qty, status: 'failed', orderId: null, stopLoss, takeProfit,
        reason: `Order failed: ${errorMessage(error)}`,
      });
    }
  }

  private async executeSell(symbol: string, snapshot: IndicatorSnapshot, reason?: string): Promise<TradeRecord | null> {
    const positions = await this.broker.getPositions();
    const position = findPosition(positions, symbol);
    if (!position) {
      logger.info(`${symbol} → No position to sell`);
      return null;
    }

    // Flatten the whole position: sell a long, buy back a short
    const side: OrderSide = position.qty > 0 ? 'sell' : 'buy';
    const qty = Math.abs(position.qty);
    const price = snapshot.close ?? position.avgEntryPrice;
    const why = `Close position: ${reason ?? describeSnapshot('VWAP reversion exit', snapshot)}`;

    try {
      const result = await this.broker.submitMarketOrder({ symbol, side, qty, referencePrice: price });
      logger.info(`✅ Position closed for ${symbol}: ${side.toUpperCase()} ${qty} shares @ $${price.toFixed(2)}`);

      return this.persist({
        symbol, side, price, qty, status: 'submitted', orderId: result.orderId, stopLoss: null, takeProfit: null, reason: why,
      });
    } catch (error) {
      logger.error(`❌ Failed to close position for ${symbol}`, error);
      return this.persist({
        symbol, side, price, qty, status: 'failed', orderId: null, stopLoss: null, takeProfit: null,
        reason: `Order failed: ${errorMessage(error)}`,
      });
    }
  }

  private async persist(fields: Omit<TradeRecord, 'timestamp' | 'id'>): Promise<TradeRecord> {
    const record: TradeRecord = { timestamp: new Date().toISOString(), ...fields };
    try {
      return await this.tradeLog.append(record);
    } catch (error) {
      logger.error(`Failed to record ${record.side} trade for ${record.symbol}`, error);
      return record;
    }
  }
}

function findPosition(positions: Position[], symbol: string): Position | undefined {
  return positions.find(p => p.symbol === symbol && p.qty !== 0);
}

function describeSnapshot(prefix: string, snapshot: IndicatorSnapshot): string {
  const parts = [`close=${snapshot.close?.toFixed(2) ?? 'N/A'}`, `vwap=${snapshot.vwap?.toFixed(2) ?? 'N/A'}`];
  if (snapshot.rsi !== null) parts.push(`rsi=${snapshot.rsi.toFixed(1)}`);
  return `${prefix} (${parts.join(', ')})`;
}
