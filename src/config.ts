import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnvVar(key: string): string | null {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? null : value.trim();
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getOptionalEnvNumber(key: string, defaultValue: number | null): number | null {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  if (value.trim() === '' || value.trim().toLowerCase() === 'off') {
    return null;
  }
  return getEnvNumber(key, 0);
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

export const config = {
  // Market Configuration
  market: {
    /** Slug prefix of the 15-minute up/down events */
    slugPrefix: getEnvVar('MARKET_SLUG_PREFIX', 'btc-updown-15m'),

    /** Window length in minutes */
    windowMinutes: getEnvNumber('WINDOW_MINUTES', 15),

    /** Reference symbol on Binance spot */
    referenceSymbol: getEnvVar('REFERENCE_SYMBOL', 'BTCUSDT'),

    /** Levels per side of the reference order book */
    referenceDepthLimit: getEnvNumber('REFERENCE_DEPTH_LIMIT', 100),

    /** Coinbase spot product used as the preferred live reference */
    coinbaseProduct: getEnvVar('COINBASE_PRODUCT', 'BTC-USD'),

    gammaApiUrl: getEnvVar('GAMMA_API_URL', 'https://gamma-api.polymarket.com'),
    clobApiUrl: getEnvVar('CLOB_API_URL', 'https://clob.polymarket.com'),
    coinbaseApiUrl: getEnvVar('COINBASE_API_URL', 'https://api.coinbase.com'),
  },

  // Indicator Configuration
  indicators: {
    candleCount: getEnvNumber('CANDLE_COUNT', 60),
    bollingerPeriod: getEnvNumber('BB_PERIOD', 20),
    bollingerStdDev: getEnvNumber('BB_STD_DEV', 2),
    atrPeriod: getEnvNumber('ATR_PERIOD', 14),
    rsiPeriod: getEnvNumber('RSI_PERIOD', 14),

    /** Shift candle history onto the live reference price */
    alignCandles: getEnvBoolean('ALIGN_CANDLES', true),
  },

  // Scoring Configuration
  scoring: {
    /** Named weight preset: balanced | kinetic | conservative */
    preset: getEnvVar('SCORING_PRESET', 'balanced'),
  },

  // Hard constraints (set to "off" to disable one)
  constraints: {
    contractPriceMin: getOptionalEnvNumber('SHARE_PRICE_MIN', 0.6),
    contractPriceMax: getOptionalEnvNumber('SHARE_PRICE_MAX', 0.85),
    depthRatioMin: getOptionalEnvNumber('ORDER_BOOK_RATIO_MIN', null),
  },

  // Trading sub-window (minutes before expiry)
  tradeWindow: {
    minMinutes: getEnvNumber('TRADE_WINDOW_MIN', 1),
    maxMinutes: getEnvNumber('TRADE_WINDOW_MAX', 14),
  },

  // Exit Configuration
  exit: {
    /** Close when the contract bid reaches this price */
    takeProfitPrice: getEnvNumber('EXIT_TAKE_PROFIT_PRICE', 0.97),

    /** Close when the contract bid falls this fraction below entry (0.3 = 30%) */
    stopLossPercent: getEnvNumber('EXIT_STOP_LOSS_PERCENT', 0.3),

    /** Close when the reference leaves the favored side of the strike */
    strikeBarrierEnabled: getEnvBoolean('EXIT_STRIKE_BARRIER', true),
  },

  // Polling loop Configuration
  loop: {
    tickIntervalMs: getEnvNumber('TICK_INTERVAL_MS', 5000),
    nextWindowWaitMs: getEnvNumber('NEXT_WINDOW_WAIT_MS', 10000),
    discoveryRetryMs: getEnvNumber('DISCOVERY_RETRY_MS', 15000),
    fetchConcurrency: getEnvNumber('FETCH_CONCURRENCY', 4),
    fetchTimeoutMs: getEnvNumber('FETCH_TIMEOUT_MS', 10000),

    /** Oldest contract quote reused when a fresh one is missing */
    maxQuoteAgeMs: getEnvNumber('MAX_QUOTE_AGE_MS', 30000),
  },

  // Execution Configuration
  execution: {
    /** Kill switch - false keeps the engine on the paper client */
    enabled: getEnvBoolean('EXECUTION_ENABLED', false),

    /** Stake per position in USD */
    stakeUsd: getEnvNumber('EXECUTION_STAKE_USD', 5),

    /** Venue minimum order value, with a small buffer */
    minOrderValueUsd: getEnvNumber('EXECUTION_MIN_ORDER_USD', 1.05),

    /** Decimal places kept when sizing orders */
    sizePrecision: getEnvNumber('EXECUTION_SIZE_PRECISION', 2),

    /** Decimal places kept when closing from the live balance */
    closePrecision: getEnvNumber('EXECUTION_CLOSE_PRECISION', 4),

    /** Retry attempts for transient order failures */
    retryAttempts: getEnvNumber('EXECUTION_RETRY_ATTEMPTS', 3),

    /** First backoff delay (ms), doubled on each retry */
    retryBaseDelayMs: getEnvNumber('EXECUTION_RETRY_DELAY_MS', 500),

    /** Fill confirmation polling */
    fillPollAttempts: getEnvNumber('EXECUTION_FILL_POLL_ATTEMPTS', 20),
    fillPollIntervalMs: getEnvNumber('EXECUTION_FILL_POLL_INTERVAL_MS', 500),
  },

  // Polymarket credentials (live execution only)
  polymarket: {
    apiKey: getOptionalEnvVar('POLYMARKET_API_KEY'),
    apiSecret: getOptionalEnvVar('POLYMARKET_API_SECRET'),
    apiPassphrase: getOptionalEnvVar('POLYMARKET_API_PASSPHRASE'),
    privateKey: getOptionalEnvVar('POLYMARKET_PRIVATE_KEY'),
    funderAddress: getOptionalEnvVar('POLYMARKET_FUNDER_ADDRESS'),
    chainId: getEnvNumber('POLYMARKET_CHAIN_ID', 137),
    signatureType: getEnvNumber('POLYMARKET_SIGNATURE_TYPE', 2),
  },

  // Reporting Configuration
  reporting: {
    csvPath: getEnvVar('RESULTS_CSV_PATH', 'results.csv'),
    telegramBotToken: getOptionalEnvVar('TELEGRAM_BOT_TOKEN'),
    telegramChatId: getOptionalEnvVar('TELEGRAM_CHAT_ID'),
    telegramRetryAttempts: getEnvNumber('TELEGRAM_RETRY_ATTEMPTS', 3),
    telegramRetryDelayMs: getEnvNumber('TELEGRAM_RETRY_DELAY_MS', 1000),
  },

  // Logging Configuration
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    toFile: getEnvBoolean('LOG_TO_FILE', true),
    dir: getEnvVar('LOG_DIR', 'logs'),
  },
} as const;

export type Config = typeof config;

export interface LiveCredentials {
  apiKey: string;
  apiSecret: string;
  apiPassphrase: string;
  privateKey: string;
  funderAddress: string | null;
}

/**
 * Credentials are optional until live execution is switched on
 */
export function assertLiveCredentials(polymarket: Config['polymarket']): LiveCredentials {
  const { apiKey, apiSecret, apiPassphrase, privateKey, funderAddress } = polymarket;
  const missing = [
    ['POLYMARKET_API_KEY', apiKey],
    ['POLYMARKET_API_SECRET', apiSecret],
    ['POLYMARKET_API_PASSPHRASE', apiPassphrase],
    ['POLYMARKET_PRIVATE_KEY', privateKey],
  ]
    .filter(([, value]) => value === null)
    .map(([key]) => key);

  if (apiKey === null || apiSecret === null || apiPassphrase === null || privateKey === null) {
    throw new Error(`Live execution requires: ${missing.join(', ')}`);
  }

  return { apiKey, apiSecret, apiPassphrase, privateKey, funderAddress };
}
