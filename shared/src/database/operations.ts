import { Pool } from 'pg';
import type {
  AccountBalanceRecord,
  AccountSnapshot,
  OrderSide,
  TradeLog,
  TradeQuery,
  TradeRecord,
  TradeStats,
  TradeStatus,
} from '../types.js';
import { createLogger } from '../logger.js';

const logger = createLogger('db');

interface TradeRow {
  id: number;
  ts: Date | string;
  symbol: string;
  side: OrderSide;
  price: string | number;
  qty: string | number;
  status: TradeStatus;
  order_id: string | null;
  stop_loss: string | number | null;
  take_profit: string | number | null;
  reason: string | null;
}

interface BalanceRow {
  ts: Date | string;
  cash: string | number;
  equity: string | number;
  buying_power: string | number;
  portfolio_value: string | number;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS vwap_trades (
    id BIGSERIAL PRIMARY KEY,
    ts TIMESTAMPTZ NOT NULL,
    symbol TEXT NOT NULL,
    side TEXT NOT NULL,
    price NUMERIC NOT NULL,
    qty NUMERIC NOT NULL,
    status TEXT NOT NULL,
    order_id TEXT,
    stop_loss NUMERIC,
    take_profit NUMERIC,
    reason TEXT
  );
  CREATE INDEX IF NOT EXISTS vwap_trades_symbol_ts_idx ON vwap_trades (symbol, ts DESC);
  CREATE TABLE IF NOT EXISTS vwap_account_balance (
    id BIGSERIAL PRIMARY KEY,
    ts TIMESTAMPTZ NOT NULL,
    cash NUMERIC NOT NULL,
    equity NUMERIC NOT NULL,
    buying_power NUMERIC NOT NULL,
    portfolio_value NUMERIC NOT NULL
  );
`;

const toIso = (value: Date | string): string => new Date(value).toISOString();
const toNullableNumber = (value: string | number | null): number | null => (value === null ? null : Number(value));

function rowToTrade(row: TradeRow): TradeRecord {
  return {
    id: Number(row.id),
    timestamp: toIso(row.ts),
    symbol: row.symbol,
    side: row.side,
    price: Number(row.price),
    qty: Number(row.qty),
    status: row.status,
    orderId: row.order_id,
    stopLoss: toNullableNumber(row.stop_loss),
    takeProfit: toNullableNumber(row.take_profit),
    reason: row.reason,
  };
}

export const createPool = (connectionString: string): Pool => new Pool({
  connectionString,
  ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
  max: 5,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
});

// Append-only trade log on PostgreSQL
export class PgTradeLog implements TradeLog {
  private schemaReady = false;

  constructor(private readonly pool: Pool) {}

  async testConnection(): Promise<void> {
    try {
      const client = await this.pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
      await this.ensureSchema();
      logger.info('✓ Database connected successfully');
    } catch (error) {
      logger.error('✗ Database connection failed', error);
      throw error;
    }
  }

  async append(record: TradeRecord): Promise<TradeRecord> {
    await this.ensureSchema();

    const query = `
      INSERT INTO vwap_trades (
        ts, symbol, side, price, qty, status, order_id, stop_loss, take_profit, reason
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING id
    `;

    const result = await this.pool.query<{ id: string }>(query, [
      record.timestamp,
      record.symbol,
      record.side,
      record.price,
      record.qty,
      record.status,
      record.orderId,
      record.stopLoss,
      record.takeProfit,
      record.reason,
    ]);

    return { ...record, id: Number(result.rows[0].id) };
  }

  async query(filters: TradeQuery = {}): Promise<TradeRecord[]> {
    await this.ensureSchema();

    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (filters.symbol) {
      params.push(filters.symbol);
      conditions.push(`symbol = $${params.length}`);
    }
    if (filters.since) {
      params.push(filters.since);
      conditions.push(`ts >= $${params.length}`);
    }
    params.push(filters.limit ?? 10);

    const query = `
      SELECT * FROM vwap_trades
      ${conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''}
      ORDER BY ts DESC, id DESC
      LIMIT $${params.length}
    `;

    const result = await this.pool.query<TradeRow>(query, params);
    return result.rows.map(rowToTrade);
  }

  async getStats(now: Date = new Date()): Promise<TradeStats> {
    await this.ensureSchema();

    const since = new Date(now.getTime() - 24 * 60 * 60 * 1000).toISOString();

    const [totals, bySymbol] = await Promise.all([
      this.pool.query<{ total: string; buys: string; sells: string; recent: string }>(
        `
          SELECT
            COUNT(*) AS total,
            COUNT(*) FILTER (WHERE side = 'buy') AS buys,
            COUNT(*) FILTER (WHERE side = 'sell') AS sells,
            COUNT(*) FILTER (WHERE ts > $1) AS recent
          FROM vwap_trades
        `,
        [since]
      ),
      this.pool.query<{ symbol: string; count: string }>(
        'SELECT symbol, COUNT(*) AS count FROM vwap_trades GROUP BY symbol ORDER BY COUNT(*) DESC'
      ),
    ]);

    const row = totals.rows[0];
    const symbolCounts: Record<string, number> = {};
    for (const r of bySymbol.rows) {
      symbolCounts[r.symbol] = Number(r.count);
    }

    return {
      totalTrades: Number(row.total),
      buyTrades: Number(row.buys),
      sellTrades: Number(row.sells),
      symbolCounts,
      recentTrades24h: Number(row.recent),
    };
  }

  async logAccountBalance(snapshot: AccountSnapshot, timestamp: string = new Date().toISOString()): Promise<void> {
    await this.ensureSchema();
    await this.pool.query(
      `
        INSERT INTO vwap_account_balance (ts, cash, equity, buying_power, portfolio_value)
        VALUES ($1, $2, $3, $4, $5)
      `,
      [timestamp, snapshot.cash, snapshot.equity, snapshot.buyingPower, snapshot.portfolioValue]
    );
  }

  async getAccountBalanceHistory(limit: number = 24): Promise<AccountBalanceRecord[]> {
    await this.ensureSchema();
    const result = await this.pool.query<BalanceRow>(
      'SELECT * FROM vwap_account_balance ORDER BY ts DESC LIMIT $1',
      [limit]
    );
    return result.rows.map(row => ({
      timestamp: toIso(row.ts),
      cash: Number(row.cash),
      equity: Number(row.equity),
      buyingPower: Number(row.buying_power),
      portfolioValue: Number(row.portfolio_value),
    }));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async ensureSchema(): Promise<void> {
    if (this.schemaReady) return;
    await this.pool.query(SCHEMA);
    this.schemaReady = true;
  }
}
