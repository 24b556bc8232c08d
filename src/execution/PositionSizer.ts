/**
 * Position Sizer
 *
 * Converts the USD stake into a contract size at the quoted ask.
 */

import type { PositionSizerConfig, PositionSizeResult } from './types.js';

/**
 * Truncate (never round up) to the given number of decimals
 */
export function floorToDecimals(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.floor(value * factor + 1e-9) / factor;
}

export function ceilToDecimals(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.ceil(value * factor - 1e-9) / factor;
}

export class PositionSizer {
  private readonly config: PositionSizerConfig;

  constructor(config: PositionSizerConfig) {
    this.config = config;
  }

  /**
   * Calculate the entry size
   *
   * Formula:
   * 1. size = stakeUsd / price, truncated to sizePrecision
   * 2. size = max(size, minOrderValueUsd / price rounded up)
   */
  calculateSize(price: number): PositionSizeResult {
    if (!(price > 0 && price < 1)) {
      return this.createInvalidResult(`Contract price ${price} is outside (0, 1)`);
    }

    const { stakeUsd, minOrderValueUsd, sizePrecision } = this.config;
    const stakeSize = floorToDecimals(stakeUsd / price, sizePrecision);
    const minimumSize = ceilToDecimals(minOrderValueUsd / price, sizePrecision);
    const size = Math.max(stakeSize, minimumSize);

    if (!(size > 0)) {
      return this.createInvalidResult(`Stake ${stakeUsd} USD buys no contracts at ${price}`);
    }

    return {
      size,
      cost: parseFloat((size * price).toFixed(6)),
      valid: true,
    };
  }

  /**
   * Get current configuration
   */
  getConfig(): Readonly<PositionSizerConfig> {
    return this.config;
  }

  /**
   * Create an invalid position size result
   */
  private createInvalidResult(reason: string): PositionSizeResult {
    return {
      size: 0,
      cost: 0,
      valid: false,
      reason,
    };
  }
}
