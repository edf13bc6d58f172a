// config.ts - Configuration for the live VWAP trader
import {
  DEFAULT_EXECUTION_SETTINGS,
  DEFAULT_STRATEGY_PARAMETERS,
  createLogger,
  isTimeframe,
  validateEngineConfig,
  type SymbolConcurrency,
  type TradingEngineConfig,
} from '../../shared/src/index.js';
import { DEFAULT_SYMBOLS } from './profileManager.js';
import type { AlpacaConfig } from './types.js';

const logger = createLogger('config');

export const PAPER_BASE_URL = 'https://paper-api.alpaca.markets';
export const DATA_BASE_URL = 'https://data.alpaca.markets';

/* =========================
   Types
   ========================= */
export interface TraderConfig {
  alpaca: AlpacaConfig;
  databaseUrl: string;
  profilesDir: string;
  profile: string | null;
  timeframeSetting: string;
  engine: TradingEngineConfig;
}

type EnvSource = Record<string, string | undefined>;

/* =========================
   Config Parsing
   ========================= */
const env = (source: EnvSource, k: string, d: string | undefined = undefined): string | undefined => {
  const value = source[k];
  return value === undefined || value.trim() === '' ? d : value.trim();
};

// Invalid values fall back to the default with an error log
export function parseEnvNumber(
  source: EnvSource,
  key: string,
  defaultValue: number,
  min = -Infinity,
  max = Infinity
): number {
  const raw = env(source, key, defaultValue.toString());
  const num = Number(raw);
  if (isNaN(num)) {
    logger.error(`❌ Invalid ${key}="${raw}" - must be a number. Using default: ${defaultValue}`);
    return defaultValue;
  }
  if (num < min || num > max) {
    logger.error(`❌ Invalid ${key}="${num}" - must be between ${min} and ${max}. Using default: ${defaultValue}`);
    return defaultValue;
  }
  return num;
}

export function parseSymbols(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map(s => s.trim().toUpperCase())
    .filter(Boolean);
}

function parseConcurrency(source: EnvSource): SymbolConcurrency {
  const raw = env(source, 'CONCURRENCY', 'sequential');
  if (raw === 'sequential' || raw === 'parallel') return raw;
  logger.error(`❌ Invalid CONCURRENCY="${raw}" - must be sequential or parallel. Using default: sequential`);
  return 'sequential';
}

function parseDataFeed(source: EnvSource): AlpacaConfig['dataFeed'] {
  const raw = env(source, 'ALPACA_DATA_FEED', 'iex');
  if (raw === 'iex' || raw === 'sip') return raw;
  logger.error(`❌ Invalid ALPACA_DATA_FEED="${raw}" - must be iex or sip. Using default: iex`);
  return 'iex';
}

export function loadConfig(source: EnvSource = process.env): TraderConfig {
  const timeframeSetting = env(source, 'TIMEFRAME', '5Min') ?? '5Min';

  return {
    alpaca: {
      apiKey: env(source, 'ALPACA_API_KEY', '') ?? '',
      apiSecret: env(source, 'ALPACA_SECRET_KEY', '') ?? '',
      baseUrl: env(source, 'ALPACA_BASE_URL', PAPER_BASE_URL) ?? PAPER_BASE_URL,
      dataUrl: env(source, 'ALPACA_DATA_URL', DATA_BASE_URL) ?? DATA_BASE_URL,
      dataFeed: parseDataFeed(source),
      timeoutMs: parseEnvNumber(source, 'BROKER_TIMEOUT_MS', 10000, 1000, 120000),
      errorConfig: {
        maxRetries: parseEnvNumber(source, 'BROKER_MAX_RETRIES', 2, 0, 10),
        retryDelay: parseEnvNumber(source, 'BROKER_RETRY_DELAY_MS', 1000, 0, 60000),
      },
    },

    databaseUrl: env(source, 'DATABASE_URL', '') ?? '',
    profilesDir: env(source, 'PROFILES_DIR', 'profiles') ?? 'profiles',
    profile: env(source, 'PROFILE') ?? null,
    timeframeSetting,

    engine: {
      symbols: parseSymbols(env(source, 'SYMBOLS', DEFAULT_SYMBOLS.join(','))),
      timeframe: isTimeframe(timeframeSetting) ? timeframeSetting : '5Min',
      barLimit: parseEnvNumber(source, 'BAR_LIMIT', 200, 1, 10000),
      minBars: parseEnvNumber(source, 'MIN_BARS', 5, 1, 10000),
      pollIntervalSeconds: parseEnvNumber(source, 'POLL_INTERVAL_SECONDS', 60, 1, 86400),
      concurrency: parseConcurrency(source),
      strategy: {
        vwapBuyThreshold: parseEnvNumber(source, 'VWAP_BUY_THRESHOLD', DEFAULT_STRATEGY_PARAMETERS.vwapBuyThreshold, 0, 10),
        vwapSellThreshold: parseEnvNumber(source, 'VWAP_SELL_THRESHOLD', DEFAULT_STRATEGY_PARAMETERS.vwapSellThreshold, 0, 10),
        vwapSafetyFloor: parseEnvNumber(source, 'VWAP_SAFETY_THRESHOLD', DEFAULT_STRATEGY_PARAMETERS.vwapSafetyFloor, 0, 10),
        rsiOverbought: parseEnvNumber(source, 'RSI_OVERBOUGHT', DEFAULT_STRATEGY_PARAMETERS.rsiOverbought, 0, 100),
        rsiPeriod: parseEnvNumber(source, 'RSI_PERIOD', DEFAULT_STRATEGY_PARAMETERS.rsiPeriod, 1, 500),
      },
      execution: {
        positionSizeDollars: parseEnvNumber(source, 'POSITION_SIZE', DEFAULT_EXECUTION_SETTINGS.positionSizeDollars, 0.01, 1_000_000),
        stopLossPct: parseEnvNumber(source, 'STOP_LOSS_PCT', DEFAULT_EXECUTION_SETTINGS.stopLossPct, 0.0001, 0.99),
        takeProfitPct: parseEnvNumber(source, 'TAKE_PROFIT_PCT', DEFAULT_EXECUTION_SETTINGS.takeProfitPct, 0.0001, 10),
      },
    },
  };
}

// Validation
export function validateConfig(config: TraderConfig): string[] {
  const errors: string[] = [];

  if (!config.alpaca.apiKey) {
    errors.push('ALPACA_API_KEY is required');
  }
  if (!config.alpaca.apiSecret) {
    errors.push('ALPACA_SECRET_KEY is required');
  }
  if (!isTimeframe(config.timeframeSetting)) {
    errors.push(`Unsupported TIMEFRAME "${config.timeframeSetting}" (use 1Min, 5Min, 15Min, 1Hour or 1Day)`);
  }

  return [...errors, ...validateEngineConfig(config.engine)];
}
