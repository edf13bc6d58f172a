import { errorMessage, type TradeRecord } from '../../shared/src/index.js';
import type { RealTrader } from './real-trader.js';

export const USAGE = `Usage: vwap-trader <command>

Commands:
  start                         run the trading loop until interrupted (default)
  run-once                      run a single trading cycle and exit
  account                       print the account summary
  stats                         print trade statistics
  trades [symbol] [limit]       print recent trades, newest first
  profiles list                 list saved profiles
  profiles save <name>          save the current parameters as a profile
  profiles load <name>          show a profile after applying it
  profiles delete <name>        delete a profile`;

type Output = (line: string) => void;

export function formatTrade(trade: TradeRecord): string {
  const order = trade.orderId ? ` order=${trade.orderId}` : '';
  const reason = trade.reason ? ` (${trade.reason})` : '';
  return `${trade.timestamp} ${trade.symbol} ${trade.side.toUpperCase()} ${trade.qty} @ $${trade.price.toFixed(2)} [${trade.status}]${order}${reason}`;
}

async function runProfilesCommand(trader: RealTrader, args: string[], out: Output): Promise<number> {
  const [action, name] = args;

  switch (action) {
    case 'list': {
      const profiles = await trader.listProfiles();
      out(profiles.length > 0 ? profiles.join('\n') : 'No profiles saved');
      return 0;
    }
    case 'save':
    case 'load':
    case 'delete': {
      if (!name) {
        out(`profiles ${action} requires a profile name`);
        return 1;
      }
      if (action === 'save') {
        await trader.saveProfile(name);
        out(`Saved profile ${name}`);
        return 0;
      }
      if (action === 'load') {
        const bundle = await trader.loadProfile(name);
        out(JSON.stringify(bundle, null, 2));
        return 0;
      }
      const deleted = await trader.deleteProfile(name);
      out(deleted ? `Deleted profile ${name}` : `Profile not found: ${name}`);
      return deleted ? 0 : 1;
    }
    default:
      out(USAGE);
      return 1;
  }
}

/**
 * Runs every command except `start`, which keeps the process alive and is
 * wired in index.ts. Returns the process exit code.
 */
export async function runCommand(trader: RealTrader, args: string[], out: Output = console.log): Promise<number> {
  const [command, ...rest] = args;

  try {
    switch (command) {
      case 'run-once':
        await trader.runSingleCycle();
        return 0;

      case 'account':
        await trader.printAccountSummary();
        return 0;

      case 'stats': {
        const stats = await trader.getTradeStats();
        out(`Total trades: ${stats.totalTrades} (buy ${stats.buyTrades}, sell ${stats.sellTrades})`);
        out(`Last 24h: ${stats.recentTrades24h}`);
        for (const [symbol, count] of Object.entries(stats.symbolCounts)) {
          out(`  ${symbol}: ${count}`);
        }
        return 0;
      }

      case 'trades': {
        const [symbol, limit] = rest;
        const parsedLimit = limit ? parseInt(limit, 10) : NaN;
        const trades = await trader.getRecentTrades({
          symbol: symbol ? symbol.toUpperCase() : undefined,
          limit: Number.isInteger(parsedLimit) && parsedLimit > 0 ? parsedLimit : undefined,
        });
        out(trades.length > 0 ? trades.map(formatTrade).join('\n') : 'No trades recorded');
        return 0;
      }

      case 'profiles':
        return await runProfilesCommand(trader, rest, out);

      default:
        out(USAGE);
        return 1;
    }
  } catch (error) {
    out(`❌ ${command} failed: ${errorMessage(error)}`);
    return 1;
  }
}
