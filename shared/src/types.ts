// Unified types for the VWAP reversion engine and its collaborators

export type Classification = 'BUY' | 'SELL' | 'HOLD';

export type OrderSide = 'buy' | 'sell';

export type PositionSide = 'long' | 'short';

export type Timeframe = '1Min' | '5Min' | '15Min' | '1Hour' | '1Day';

export interface Bar {
  ts: string; // ISO timestamp
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface IndicatorBar extends Bar {
  vwap: number | null;
  rsi: number | null;
}

export interface IndicatorSnapshot {
  close: number | null;
  high: number | null;
  low: number | null;
  vwap: number | null;
  rsi: number | null;
}

export interface StrategyParameters {
  vwapBuyThreshold: number;
  vwapSellThreshold: number;
  vwapSafetyFloor: number;
  rsiOverbought: number;
  rsiPeriod: number;
}

export interface ExecutionSettings {
  positionSizeDollars: number;
  stopLossPct: number;
  takeProfitPct: number;
}

export interface SymbolState {
  lastPrice: number;
  lastVwap: number;
  lastClassification: Classification;
  updatedAt: string;
}

export interface Position {
  symbol: string;
  qty: number; // signed: negative for short
  side: PositionSide;
  marketValue: number;
  unrealizedPl: number;
  avgEntryPrice: number;
}

export interface AccountSnapshot {
  cash: number;
  equity: number;
  buyingPower: number;
  portfolioValue: number;
}

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  qty: number;
  referencePrice: number;
  stopLoss?: number;
  takeProfit?: number;
}

export interface OrderResult {
  orderId: string;
  status: string;
}

export type TradeStatus = 'submitted' | 'failed' | 'skipped';

export interface TradeRecord {
  id?: number;
  timestamp: string;
  symbol: string;
  side: OrderSide;
  price: number;
  qty: number;
  status: TradeStatus;
  orderId: string | null;
  stopLoss: number | null;
  takeProfit: number | null;
  reason: string | null;
}

export interface TradeQuery {
  symbol?: string;
  since?: string;
  limit?: number;
}

export interface TradeStats {
  totalTrades: number;
  buyTrades: number;
  sellTrades: number;
  symbolCounts: Record<string, number>;
  recentTrades24h: number;
}

export interface AccountBalanceRecord extends AccountSnapshot {
  timestamp: string;
}

export interface SessionStatus {
  isOpen: boolean;
  isPreMarket: boolean;
  isAfterHours: boolean;
  isWeekend: boolean;
  isHoliday: boolean;
  statusText: string;
  currentTime: string;
  marketOpen: string;
  marketClose: string;
  nextOpen: string;
}

// Collaborator interfaces

export interface BrokerClient {
  testConnection(): Promise<boolean>;
  getPositions(): Promise<Position[]>;
  getBars(symbol: string, timeframe: Timeframe, limit: number): Promise<Bar[]>;
  getCurrentPrice(symbol: string): Promise<number | null>;
  submitBracketOrder(request: OrderRequest): Promise<OrderResult>;
  submitMarketOrder(request: OrderRequest): Promise<OrderResult>;
  getAccountSnapshot(): Promise<AccountSnapshot>;
}

export interface MarketCalendar {
  getSessionStatus(time?: Date): SessionStatus;
  getNextMarketOpen(time?: Date): Date;
}

export interface TradeLog {
  testConnection(): Promise<void>;
  append(record: TradeRecord): Promise<TradeRecord>;
  query(filters?: TradeQuery): Promise<TradeRecord[]>;
  getStats(now?: Date): Promise<TradeStats>;
  logAccountBalance(snapshot: AccountSnapshot, timestamp?: string): Promise<void>;
  getAccountBalanceHistory(limit?: number): Promise<AccountBalanceRecord[]>;
  close(): Promise<void>;
}

export interface ParameterBundle {
  symbols: string[];
  strategy: StrategyParameters;
  execution: ExecutionSettings;
  refreshIntervalSeconds: number;
  autoRefresh: boolean;
}

export interface ProfileStore {
  get(name: string): Promise<ParameterBundle | null>;
  put(name: string, bundle: ParameterBundle): Promise<void>;
  list(): Promise<string[]>;
  delete(name: string): Promise<boolean>;
}

// Trading engine configuration
export type SymbolConcurrency = 'sequential' | 'parallel';

export interface TradingEngineConfig {
  symbols: string[];
  timeframe: Timeframe;
  barLimit: number;
  minBars: number;
  pollIntervalSeconds: number;
  concurrency: SymbolConcurrency;
  strategy: StrategyParameters;
  execution: ExecutionSettings;
}

export const DEFAULT_STRATEGY_PARAMETERS: StrategyParameters = {
  vwapBuyThreshold: 0.99,
  vwapSellThreshold: 1.01,
  vwapSafetyFloor: 0.95,
  rsiOverbought: 70,
  rsiPeriod: 14,
};

export const DEFAULT_EXECUTION_SETTINGS: ExecutionSettings = {
  positionSizeDollars: 100,
  stopLossPct: 0.03,
  takeProfitPct: 0.08,
};

export const TIMEFRAMES: readonly Timeframe[] = ['1Min', '5Min', '15Min', '1Hour', '1Day'];

export function isTimeframe(value: string): value is Timeframe {
  return TIMEFRAMES.some(timeframe => timeframe === value);
}
