import type {
  AccountSnapshot,
  Bar,
  BrokerClient,
  OrderRequest,
  OrderResult,
  Position,
  Timeframe,
} from '../../shared/src/index.js';
import { BrokerError, createLogger } from '../../shared/src/index.js';
import { AlpacaErrorHandler, parseAlpacaError, toBrokerError } from './errorHandler.js';
import type {
  AlpacaAccount,
  AlpacaBar,
  AlpacaBarsResponse,
  AlpacaConfig,
  AlpacaLatestQuoteResponse,
  AlpacaOrder,
  AlpacaOrderRequest,
  AlpacaPosition,
} from './types.js';

const logger = createLogger('alpaca');

export interface HttpRequestInit {
  method: 'GET' | 'POST';
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

// The subset of fetch the client relies on
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;
type Guard<T> = (value: unknown) => value is T;

/* =========================
   Response guards
   ========================= */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isAccount(value: unknown): value is AlpacaAccount {
  return isObject(value) &&
    typeof value.cash === 'string' &&
    typeof value.equity === 'string' &&
    typeof value.buying_power === 'string';
}

function isPosition(value: unknown): value is AlpacaPosition {
  return isObject(value) && typeof value.symbol === 'string' && typeof value.qty === 'string';
}

function isPositionList(value: unknown): value is AlpacaPosition[] {
  return Array.isArray(value) && value.every(isPosition);
}

function isBar(value: unknown): value is AlpacaBar {
  return isObject(value) && typeof value.t === 'string' && typeof value.c === 'number';
}

function isBarsResponse(value: unknown): value is AlpacaBarsResponse {
  return isObject(value) && (value.bars === null || (Array.isArray(value.bars) && value.bars.every(isBar)));
}

function isLatestQuote(value: unknown): value is AlpacaLatestQuoteResponse {
  return isObject(value) && isObject(value.quote) &&
    typeof value.quote.ap === 'number' && typeof value.quote.bp === 'number';
}

function isOrder(value: unknown): value is AlpacaOrder {
  return isObject(value) && typeof value.id === 'string' && typeof value.status === 'string';
}

/* =========================
   Mapping into engine types
   ========================= */
export function toPosition(raw: AlpacaPosition): Position {
  const magnitude = Math.abs(parseFloat(raw.qty));
  // Alpaca reports short quantities either signed or with side = short
  const side = raw.side === 'short' || parseFloat(raw.qty) < 0 ? 'short' : 'long';
  return {
    symbol: raw.symbol,
    qty: side === 'short' ? -magnitude : magnitude,
    side,
    marketValue: parseFloat(raw.market_value),
    unrealizedPl: parseFloat(raw.unrealized_pl),
    avgEntryPrice: parseFloat(raw.avg_entry_price),
  };
}

export function toAccountSnapshot(raw: AlpacaAccount): AccountSnapshot {
  return {
    cash: parseFloat(raw.cash),
    equity: parseFloat(raw.equity),
    buyingPower: parseFloat(raw.buying_power),
    portfolioValue: parseFloat(raw.portfolio_value ?? raw.equity),
  };
}

export function toBar(raw: AlpacaBar): Bar {
  return { ts: raw.t, open: raw.o, high: raw.h, low: raw.l, close: raw.c, volume: raw.v };
}

export function formatQuantity(quantity: number): string {
  return quantity.toFixed(6).replace(/\.?0+$/, '');
}

export function formatPrice(price: number): string {
  return price.toFixed(2);
}

export class AlpacaClient implements BrokerClient {
  private readonly config: AlpacaConfig;
  private readonly errorHandler: AlpacaErrorHandler;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    config: AlpacaConfig,
    options: { fetchImpl?: FetchLike; sleep?: (ms: number) => Promise<void> } = {}
  ) {
    this.config = config;
    this.errorHandler = new AlpacaErrorHandler(config.errorConfig);
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async testConnection(): Promise<boolean> {
    const account = await this.getAccountInfo();
    const mode = this.config.baseUrl.includes('paper') ? 'Paper' : 'Live';
    logger.info(`✓ Connected to Alpaca ${mode}. Account: ${account.account_number} (${account.status})`);
    if (account.trading_blocked) {
      throw new BrokerError('Trading is blocked on this Alpaca account', 'auth');
    }
    return true;
  }

  async getAccountInfo(): Promise<AlpacaAccount> {
    return this.executeWithRetry(
      () => this.request(this.config.baseUrl, '/v2/account', 'getAccount', isAccount),
      'getAccount'
    );
  }

  async getAccountSnapshot(): Promise<AccountSnapshot> {
    return toAccountSnapshot(await this.getAccountInfo());
  }

  async getPositions(): Promise<Position[]> {
    const positions = await this.executeWithRetry(
      () => this.request(this.config.baseUrl, '/v2/positions', 'getPositions', isPositionList),
      'getPositions'
    );
    return positions.map(toPosition).filter(p => p.qty !== 0);
  }

  async getBars(symbol: string, timeframe: Timeframe, limit: number): Promise<Bar[]> {
    const path = `/v2/stocks/${encodeURIComponent(symbol)}/bars`;
    const response = await this.executeWithRetry(
      () => this.request(this.config.dataUrl, path, 'getBars', isBarsResponse, {
        query: { timeframe, limit, feed: this.config.dataFeed },
      }),
      'getBars'
    );
    return (response.bars ?? []).map(toBar);
  }

  async getCurrentPrice(symbol: string): Promise<number | null> {
    const path = `/v2/stocks/${encodeURIComponent(symbol)}/quotes/latest`;
    const response = await this.executeWithRetry(
      () => this.request(this.config.dataUrl, path, 'getCurrentPrice', isLatestQuote, {
        query: { feed: this.config.dataFeed },
      }),
      'getCurrentPrice'
    );

    const { ap, bp } = response.quote;
    if (ap > 0) return ap;
    if (bp > 0) return bp;
    return null;
  }

  // Market entry with attached stop-loss and take-profit legs
  async submitBracketOrder(request: OrderRequest): Promise<OrderResult> {
    if (request.stopLoss === undefined || request.takeProfit === undefined) {
      throw new BrokerError('submitBracketOrder: stop-loss and take-profit prices are required', 'rejected');
    }

    const order = await this.placeOrder({
      symbol: request.symbol,
      qty: formatQuantity(request.qty),
      side: request.side,
      type: 'market',
      time_in_force: 'day',
      order_class: 'bracket',
      stop_loss: { stop_price: formatPrice(request.stopLoss) },
      take_profit: { limit_price: formatPrice(request.takeProfit) },
    }, 'submitBracketOrder');

    return { orderId: order.id, status: order.status };
  }

  async submitMarketOrder(request: OrderRequest): Promise<OrderResult> {
    const order = await this.placeOrder({
      symbol: request.symbol,
      qty: formatQuantity(request.qty),
      side: request.side,
      type: 'market',
      time_in_force: 'day',
    }, 'submitMarketOrder');

    return { orderId: order.id, status: order.status };
  }

  // Orders are sent once: a retried POST could open a second position
  private async placeOrder(body: AlpacaOrderRequest, operation: string): Promise<AlpacaOrder> {
    try {
      return await this.request(this.config.baseUrl, '/v2/orders', operation, isOrder, { method: 'POST', body });
    } catch (error) {
      const brokerError = toBrokerError(error, operation);
      logger.error(`❌ ${brokerError.message}`);
      throw brokerError;
    }
  }

  private async request<T>(
    baseUrl: string,
    path: string,
    operation: string,
    guard: Guard<T>,
    init: { method?: 'GET' | 'POST'; body?: AlpacaOrderRequest; query?: Record<string, string | number> } = {}
  ): Promise<T> {
    const url = new URL(path, baseUrl);
    for (const [key, value] of Object.entries(init.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(url.toString(), {
        method: init.method ?? 'GET',
        headers: {
          'APCA-API-KEY-ID': this.config.apiKey,
          'APCA-API-SECRET-KEY': this.config.apiSecret,
          'Content-Type': 'application/json',
        },
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw toBrokerError(error, operation);
    }

    const text = await response.text();
    const payload = parseBody(text);

    if (!response.ok) {
      throw parseAlpacaError(response.status, payload, operation);
    }

    if (!guard(payload)) {
      throw new BrokerError(`${operation}: unexpected response payload`, 'unknown', { status: response.status });
    }
    return payload;
  }

  // Read-only calls only; retries stay inside the adapter
  private async executeWithRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    const maxRetries = this.errorHandler.getMaxRetries();

    for (let attempt = 0; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const brokerError = toBrokerError(error, operationName);
        const result = this.errorHandler.handleError(brokerError, attempt);

        if (result.logLevel === 'error') {
          logger.error(`❌ ${result.message}`);
        } else {
          logger.warn(`⚠️ ${result.message}`);
        }

        if (!result.shouldRetry) {
          throw brokerError;
        }

        logger.info(`🔄 Retrying ${operationName} in ${result.retryDelay}ms (attempt ${attempt + 1}/${maxRetries})`);
        await this.sleep(result.retryDelay);
      }
    }
  }
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
