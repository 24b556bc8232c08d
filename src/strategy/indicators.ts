/**
 * Technical Indicators
 *
 * Bollinger Bands and RSI come from the technicalindicators library.
 * ATR is the simple mean of the last `period` true ranges, which is not
 * the Wilder-smoothed ATR the library ships.
 */

import { BollingerBands, RSI } from 'technicalindicators';
import type { BollingerResult, IndicatorSet, PriceSample } from '../types.js';
import type { IndicatorConfig } from './types.js';

/**
 * Calculate Bollinger Bands over the last `period` closes
 *
 * @param closePrices - Close prices, most recent last
 * @param period - Moving average period (default: 20)
 * @param stdDev - Standard deviation multiplier (default: 2)
 * @returns Bands, or null if there are fewer than `period` closes
 */
export function bollinger(
  closePrices: readonly number[],
  period: number = 20,
  stdDev: number = 2
): BollingerResult | null {
  if (period <= 0 || closePrices.length < period) {
    return null;
  }

  const result = BollingerBands.calculate({
    period,
    values: closePrices.slice(-period),
    stdDev,
  });

  const latest = result[result.length - 1];
  if (!latest) {
    return null;
  }

  return {
    upper: latest.upper,
    middle: latest.middle,
    lower: latest.lower,
  };
}

/**
 * Average True Range: mean of the last `period` true ranges.
 * Needs `period + 1` samples since the first true range uses the previous close.
 */
export function atr(
  highs: readonly number[],
  lows: readonly number[],
  closes: readonly number[],
  period: number = 14
): number | null {
  const length = Math.min(highs.length, lows.length, closes.length);
  if (period <= 0 || length < period + 1) {
    return null;
  }

  const trueRanges: number[] = [];
  for (let i = 1; i < length; i++) {
    const highLow = highs[i] - lows[i];
    const highClose = Math.abs(highs[i] - closes[i - 1]);
    const lowClose = Math.abs(lows[i] - closes[i - 1]);
    trueRanges.push(Math.max(highLow, highClose, lowClose));
  }

  const window = trueRanges.slice(-period);
  return window.reduce((sum, value) => sum + value, 0) / period;
}

/**
 * Relative Strength Index of the close series
 */
export function rsi(closePrices: readonly number[], period: number = 14): number | null {
  if (period <= 0 || closePrices.length < period + 1) {
    return null;
  }

  const result = RSI.calculate({ period, values: [...closePrices] });
  const latest = result[result.length - 1];
  return latest === undefined ? null : latest;
}

/**
 * Shift a candle history so its last close equals the live reference price.
 * Candles come from one venue and the reference from another; the offset
 * keeps bands on the same scale as the strike.
 */
export function alignToReference(
  samples: readonly PriceSample[],
  referencePrice: number
): PriceSample[] {
  const last = samples[samples.length - 1];
  if (!last) {
    return [];
  }

  const offset = referencePrice - last.close;
  return samples.map((sample) => ({
    openTime: sample.openTime,
    open: sample.open + offset,
    high: sample.high + offset,
    low: sample.low + offset,
    close: sample.close + offset,
  }));
}

/**
 * Compute every indicator for one tick
 */
export function computeIndicators(
  samples: readonly PriceSample[],
  config: IndicatorConfig
): IndicatorSet {
  const closes = samples.map((s) => s.close);
  const highs = samples.map((s) => s.high);
  const lows = samples.map((s) => s.low);

  return {
    bands: bollinger(closes, config.bollingerPeriod, config.bollingerStdDev),
    atr: atr(highs, lows, closes, config.atrPeriod),
    rsi: rsi(closes, config.rsiPeriod),
  };
}
