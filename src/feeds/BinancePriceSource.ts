/**
 * Binance Price Source
 *
 * REST market data for the reference symbol on Binance spot:
 * - 1m klines for the indicator history
 * - ticker price as a reference price provider
 * - order book depth for the depth ratio
 * - the 1m open at a window start, used as the strike
 */

import { MainClient, type KlineInterval } from 'binance';
import { logger, normalizeError } from '../logger.js';
import type { DepthSnapshot, PriceSample } from '../types.js';
import { isRecord, parseDepthSnapshot, toFiniteNumber } from './parse.js';
import type { CandleSource, PriceProvider, ReferenceBookSource, StrikeSource } from './types.js';

/**
 * The subset of the Binance REST client used here
 */
export interface BinanceMarketClient {
  getKlines(params: {
    symbol: string;
    interval: KlineInterval;
    limit?: number;
    startTime?: number;
  }): Promise<unknown[]>;
  getSymbolPriceTicker(params: { symbol: string }): Promise<unknown>;
  getOrderBook(params: { symbol: string; limit?: number }): Promise<unknown>;
}

export interface BinancePriceSourceConfig {
  symbol: string;
  /** Levels requested per side */
  depthLimit: number;
}

const ONE_MINUTE_MS = 60_000;

/**
 * [openTime, open, high, low, close, ...]
 */
export function parseKline(raw: unknown): PriceSample | null {
  if (!Array.isArray(raw) || raw.length < 5) {
    return null;
  }

  const [openTime, open, high, low, close] = raw.slice(0, 5).map(toFiniteNumber);
  if (openTime === null || open === null || high === null || low === null || close === null) {
    return null;
  }
  return { openTime, open, high, low, close };
}

export class BinancePriceSource
  implements PriceProvider, CandleSource, ReferenceBookSource, StrikeSource
{
  readonly name = 'binance';

  private readonly config: BinancePriceSourceConfig;
  private readonly client: BinanceMarketClient;

  constructor(config: BinancePriceSourceConfig, client: BinanceMarketClient = new MainClient()) {
    this.config = config;
    this.client = client;

    logger.info('Binance Price Source initialized', {
      symbol: config.symbol,
      depthLimit: config.depthLimit,
    });
  }

  async latestPrice(): Promise<number | null> {
    try {
      const ticker = await this.client.getSymbolPriceTicker({ symbol: this.config.symbol });
      return isRecord(ticker) ? toFiniteNumber(ticker.price) : null;
    } catch (error) {
      this.logFailure('ticker', error);
      return null;
    }
  }

  async recentCandles(count: number): Promise<PriceSample[] | null> {
    try {
      const rows = await this.client.getKlines({
        symbol: this.config.symbol,
        interval: '1m',
        limit: count,
      });
      const samples = rows
        .map(parseKline)
        .filter((sample): sample is PriceSample => sample !== null);
      return samples.length > 0 ? samples : null;
    } catch (error) {
      this.logFailure('klines', error);
      return null;
    }
  }

  async orderBook(): Promise<DepthSnapshot | null> {
    try {
      const book = await this.client.getOrderBook({
        symbol: this.config.symbol,
        limit: this.config.depthLimit,
      });
      return parseDepthSnapshot(book);
    } catch (error) {
      this.logFailure('order book', error);
      return null;
    }
  }

  /**
   * Open of the 1m candle starting at the given instant
   */
  async openPriceAt(timestampMs: number): Promise<number | null> {
    const minuteStart = Math.floor(timestampMs / ONE_MINUTE_MS) * ONE_MINUTE_MS;
    try {
      const rows = await this.client.getKlines({
        symbol: this.config.symbol,
        interval: '1m',
        startTime: minuteStart,
        limit: 1,
      });
      const candle = rows.length > 0 ? parseKline(rows[0]) : null;
      if (!candle || candle.openTime !== minuteStart) {
        return null;
      }
      return candle.open;
    } catch (error) {
      this.logFailure('strike kline', error);
      return null;
    }
  }

  private logFailure(what: string, error: unknown): void {
    logger.warn(`Binance ${what} unavailable`, {
      symbol: this.config.symbol,
      error: normalizeError(error).message,
    });
  }
}
