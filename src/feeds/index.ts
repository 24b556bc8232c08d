export { BinancePriceSource, parseKline } from './BinancePriceSource.js';
export type { BinanceMarketClient, BinancePriceSourceConfig } from './BinancePriceSource.js';
export { CoinbasePriceSource } from './CoinbasePriceSource.js';
export type { CoinbasePriceSourceConfig } from './CoinbasePriceSource.js';
export { RankedPriceFeed } from './RankedPriceFeed.js';
export { ClobBookSource } from './ClobBookSource.js';
export type { ClobBookSourceConfig } from './ClobBookSource.js';
export { FallbackValue, valueOf } from './fallback.js';
export type { FallbackPolicy, FallbackOptions, Resolved } from './fallback.js';
export {
  toFiniteNumber,
  isRecord,
  parseBookLevel,
  parseDepthSnapshot,
  bestAskOf,
  bestBidOf,
} from './parse.js';
export type {
  PriceProvider,
  CandleSource,
  PriceFeed,
  ReferenceBookSource,
  ContractPricer,
  StrikeSource,
} from './types.js';
