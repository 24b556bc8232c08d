/**
 * Common types for the strike window trader
 */

// ===========================================
// Market Types
// ===========================================

/**
 * Outcome a contract pays on: the reference settling above or below the strike
 */
export type Direction = 'above' | 'below';

/**
 * Token ids of the two contracts of one window
 */
export interface ContractPair {
  above: string;
  below: string;
}

/**
 * One fixed-duration binary market instance. Built by createMarketWindow(),
 * frozen afterwards.
 */
export interface MarketWindow {
  readonly id: string;
  readonly slug: string;
  readonly strikePrice: number;
  readonly openTime: number;
  readonly closeTime: number;
  readonly contracts: Readonly<ContractPair>;
}

// ===========================================
// Price Data Types
// ===========================================

/**
 * One OHLC candle of the reference asset
 */
export interface PriceSample {
  readonly openTime: number;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
}

/**
 * [price, size] level of an order book
 */
export interface BookLevel {
  price: number;
  size: number;
}

export interface DepthSnapshot {
  bids: BookLevel[];
  asks: BookLevel[];
}

// ===========================================
// Indicator Types
// ===========================================

/**
 * Bollinger Bands calculation result
 */
export interface BollingerResult {
  upper: number;
  middle: number;
  lower: number;
}

/**
 * Indicators for one tick. null means the history was too short.
 */
export interface IndicatorSet {
  bands: BollingerResult | null;
  atr: number | null;
  rsi: number | null;
}

// ===========================================
// Score Types
// ===========================================

export interface ScoreBreakdown {
  direction: Direction;
  band: number;
  barrier: number;
  depth: number;
  value: number;
  /** Sum of components before the kill-switch and the zero floor */
  rawTotal: number;
  /** Displayed total used for the threshold comparison */
  total: number;
  killSwitch: boolean;
  /** Diagnostics */
  bandPosition: number | null;
  maxMove: number | null;
  depthRatio: number | null;
  contractPrice: number | null;
}

// ===========================================
// Order Types
// ===========================================

export type OrderSide = 'BUY' | 'SELL';

/**
 * Order execution result
 */
export interface OrderResult {
  success: boolean;
  orderId?: string;
  filledSize: number;
  fillPrice: number;
  error?: string;
  timestamp: number;
}
