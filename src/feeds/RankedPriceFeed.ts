/**
 * Ranked Price Feed
 *
 * Asks each reference price provider in order of preference and returns
 * the first price it gets. Candles come from a single source.
 */

import { logger, normalizeError } from '../logger.js';
import type { PriceSample } from '../types.js';
import type { CandleSource, PriceFeed, PriceProvider } from './types.js';

export class RankedPriceFeed implements PriceFeed {
  private readonly providers: readonly PriceProvider[];
  private readonly candles: CandleSource;
  private lastProvider: string | null = null;

  constructor(providers: readonly PriceProvider[], candles: CandleSource) {
    if (providers.length === 0) {
      throw new Error('RankedPriceFeed needs at least one price provider');
    }
    this.providers = providers;
    this.candles = candles;

    logger.info('Ranked Price Feed initialized', {
      providers: providers.map((p) => p.name),
    });
  }

  /**
   * Provider of the last successful price
   */
  get source(): string | null {
    return this.lastProvider;
  }

  async latestPrice(): Promise<number | null> {
    for (const provider of this.providers) {
      let price: number | null = null;
      try {
        price = await provider.latestPrice();
      } catch (error) {
        logger.warn('Price provider failed', {
          provider: provider.name,
          error: normalizeError(error).message,
        });
      }

      if (price !== null && price > 0) {
        if (this.lastProvider !== provider.name) {
          logger.info('Reference price source', { provider: provider.name });
        }
        this.lastProvider = provider.name;
        return price;
      }
    }

    return null;
  }

  async recentCandles(count: number): Promise<PriceSample[] | null> {
    try {
      return await this.candles.recentCandles(count);
    } catch (error) {
      logger.warn('Candle history unavailable', { error: normalizeError(error).message });
      return null;
    }
  }
}
