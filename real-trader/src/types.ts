// Alpaca REST v2 payloads (only the fields this trader reads)

export interface AlpacaConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl: string; // trading API, paper or live
  dataUrl: string; // market data API
  dataFeed: 'iex' | 'sip';
  timeoutMs: number;
  errorConfig?: {
    maxRetries?: number;
    retryDelay?: number;
  };
}

export interface AlpacaAccount {
  id: string;
  account_number: string;
  status: string;
  currency: string;
  cash: string;
  equity: string;
  buying_power: string;
  portfolio_value: string;
  trading_blocked: boolean;
}

export interface AlpacaPosition {
  asset_id: string;
  symbol: string;
  qty: string;
  side: 'long' | 'short';
  avg_entry_price: string;
  market_value: string;
  current_price: string;
  unrealized_pl: string;
  unrealized_plpc: string;
}

export interface AlpacaBar {
  t: string; // RFC-3339 timestamp
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
  n?: number;
  vw?: number;
}

export interface AlpacaBarsResponse {
  bars: AlpacaBar[] | null;
  symbol: string;
  next_page_token: string | null;
}

export interface AlpacaLatestQuoteResponse {
  symbol: string;
  quote: {
    t: string;
    ap: number; // ask price
    as: number;
    bp: number; // bid price
    bs: number;
  };
}

export type AlpacaOrderClass = 'simple' | 'bracket' | 'oco' | 'oto';

export interface AlpacaOrderRequest {
  symbol: string;
  qty: string;
  side: 'buy' | 'sell';
  type: 'market' | 'limit' | 'stop' | 'stop_limit';
  time_in_force: 'day' | 'gtc' | 'ioc' | 'fok';
  order_class?: AlpacaOrderClass;
  stop_loss?: { stop_price: string };
  take_profit?: { limit_price: string };
}

export interface AlpacaOrder {
  id: string;
  client_order_id: string;
  symbol: string;
  status: string;
  qty: string;
  side: 'buy' | 'sell';
  type: string;
  order_class: AlpacaOrderClass | '';
  submitted_at: string;
}

// Error body returned by every Alpaca endpoint
export interface AlpacaErrorBody {
  code?: number;
  message?: string;
}

export interface ErrorHandlingResult {
  shouldRetry: boolean;
  retryDelay: number;
  logLevel: 'info' | 'warn' | 'error';
  message: string;
}
