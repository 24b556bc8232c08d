/**
 * Price feed collaborator interfaces
 *
 * Every read resolves to null when the data is unavailable. Adapters never
 * throw for a failed fetch.
 */

import type { DepthSnapshot, PriceSample } from '../types.js';

/**
 * One source of the live reference price
 */
export interface PriceProvider {
  readonly name: string;
  latestPrice(): Promise<number | null>;
}

export interface CandleSource {
  /** Most recent `count` one-minute candles, oldest first */
  recentCandles(count: number): Promise<PriceSample[] | null>;
}

export interface PriceFeed extends CandleSource {
  latestPrice(): Promise<number | null>;
}

/**
 * Order book of the reference asset
 */
export interface ReferenceBookSource {
  orderBook(): Promise<DepthSnapshot | null>;
}

/**
 * Quotes of the binary contracts
 */
export interface ContractPricer {
  bestAsk(contractId: string): Promise<number | null>;
  bestBid(contractId: string): Promise<number | null>;
  depth(contractId: string): Promise<DepthSnapshot | null>;
}

/**
 * Opening price of the reference at a given instant, used as the strike
 */
export interface StrikeSource {
  openPriceAt(timestampMs: number): Promise<number | null>;
}
