import type {
  AccountBalanceRecord,
  AccountSnapshot,
  TradeLog,
  TradeQuery,
  TradeRecord,
  TradeStats,
} from '../types.js';

// About a week of balance rows at one poll per minute
export const MAX_BALANCE_HISTORY = 10_080;

// Process-local trade log, used when no DATABASE_URL is configured
export class InMemoryTradeLog implements TradeLog {
  private readonly trades: TradeRecord[] = [];
  private readonly balances: AccountBalanceRecord[] = [];
  private nextId = 1;

  constructor(private readonly maxBalances: number = MAX_BALANCE_HISTORY) {}

  async testConnection(): Promise<void> {
    return;
  }

  async append(record: TradeRecord): Promise<TradeRecord> {
    const stored: TradeRecord = { ...record, id: this.nextId++ };
    this.trades.push(stored);
    return { ...stored };
  }

  async query(filters: TradeQuery = {}): Promise<TradeRecord[]> {
    const since = filters.since ? new Date(filters.since).getTime() : null;

    return this.trades
      .filter(t => !filters.symbol || t.symbol === filters.symbol)
      .filter(t => since === null || new Date(t.timestamp).getTime() >= since)
      .sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime() || (b.id ?? 0) - (a.id ?? 0))
      .slice(0, filters.limit ?? 10)
      .map(t => ({ ...t }));
  }

  async getStats(now: Date = new Date()): Promise<TradeStats> {
    const cutoff = now.getTime() - 24 * 60 * 60 * 1000;
    const symbolCounts: Record<string, number> = {};
    for (const trade of this.trades) {
      symbolCounts[trade.symbol] = (symbolCounts[trade.symbol] ?? 0) + 1;
    }

    return {
      totalTrades: this.trades.length,
      buyTrades: this.trades.filter(t => t.side === 'buy').length,
      sellTrades: this.trades.filter(t => t.side === 'sell').length,
      symbolCounts,
      recentTrades24h: this.trades.filter(t => new Date(t.timestamp).getTime() > cutoff).length,
    };
  }

  async logAccountBalance(snapshot: AccountSnapshot, timestamp: string = new Date().toISOString()): Promise<void> {
    this.balances.push({ ...snapshot, timestamp });
    if (this.balances.length > this.maxBalances) {
      this.balances.splice(0, this.balances.length - this.maxBalances);
    }
  }

  async getAccountBalanceHistory(limit: number = 24): Promise<AccountBalanceRecord[]> {
    return [...this.balances]
      .sort((a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime())
      .slice(0, limit);
  }

  async close(): Promise<void> {
    return;
  }
}
