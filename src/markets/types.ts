/**
 * Market directory types
 */

import type { MarketWindow } from '../types.js';

export interface MarketDirectory {
  /** The window trading now, or null if it cannot be resolved yet */
  findActiveWindow(): Promise<MarketWindow | null>;
}

export interface GammaMarketDirectoryConfig {
  baseUrl: string;
  slugPrefix: string;
  windowMinutes: number;
  timeoutMs: number;
}
