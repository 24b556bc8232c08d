/**
 * Scoring Engine
 *
 * Turns the reference price, the strike and the tick's indicators into a
 * bounded composite score. Each component is a linear ramp scaled to its
 * weight and rounded to an integer:
 *
 * - band:    where the strike sits inside the Bollinger channel
 * - barrier: distance to strike against the ATR move expected before expiry
 * - depth:   supporting vs opposing reference order book volume
 * - value:   cheapness of the favored contract, with a kill-switch ceiling
 */

import { logger } from '../logger.js';
import type { DepthSnapshot, Direction, ScoreBreakdown } from '../types.js';
import type { DepthAnalysis, DepthScoring, ScoringInput, ScoringPreset, ValueScoring } from './types.js';

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * The contract that pays if the reference stays where it is now
 */
export function favoredDirection(currentPrice: number, strikePrice: number): Direction {
  return currentPrice > strikePrice ? 'above' : 'below';
}

/**
 * Normalized location of the strike in the channel: 0 = lower band, 1 = upper band
 */
export function bandPosition(strikePrice: number, upper: number, lower: number): number | null {
  const range = upper - lower;
  if (!(range > 0)) {
    return null;
  }
  return clamp((strikePrice - lower) / range, 0, 1);
}

/**
 * An above bet wants the strike deep in the lower half of the channel,
 * a below bet deep in the upper half. Zero at and past the midpoint.
 */
export function bandPositionScore(position: number, direction: Direction, weight: number): number {
  if (direction === 'above') {
    if (position >= 0.5) return 0;
    return Math.min(weight, Math.round(weight * (1 - position / 0.5)));
  }

  if (position <= 0.5) return 0;
  return Math.min(weight, Math.round(weight * ((position - 0.5) / 0.5)));
}

/**
 * Largest move expected before expiry: ATR scaled by sqrt(time) like a random walk
 */
export function expectedMaxMove(atrValue: number, minutesLeft: number, multiplier: number): number {
  return atrValue * Math.sqrt(Math.max(minutesLeft, 0)) * multiplier;
}

/**
 * 0 while the price could plausibly reach the strike, full weight from 1.5x maxMove
 */
export function volatilityBarrierScore(distance: number, maxMove: number, weight: number): number {
  if (!(maxMove > 0) || distance < maxMove) {
    return 0;
  }
  const ratio = clamp((distance - maxMove) / (0.5 * maxMove), 0, 1);
  return Math.round(weight * ratio);
}

/**
 * Sum book volume within `scanDepth` of the price and compare the side that
 * holds the favored outcome against the side that pushes it over the strike.
 */
export function analyzeDepth(
  book: DepthSnapshot,
  currentPrice: number,
  direction: Direction,
  scanDepth: number,
  emptySideRatio: number
): DepthAnalysis {
  const bidVolume = book.bids
    .filter((level) => level.price > currentPrice - scanDepth && level.price < currentPrice)
    .reduce((sum, level) => sum + level.size, 0);
  const askVolume = book.asks
    .filter((level) => level.price > currentPrice && level.price < currentPrice + scanDepth)
    .reduce((sum, level) => sum + level.size, 0);

  const supporting = direction === 'above' ? bidVolume : askVolume;
  const opposing = direction === 'above' ? askVolume : bidVolume;

  let ratio: number | null;
  if (opposing > 0) {
    ratio = supporting / opposing;
  } else {
    ratio = supporting > 0 ? emptySideRatio : null;
  }

  return { bidVolume, askVolume, ratio };
}

export function depthRatioScore(ratio: number, depth: DepthScoring, weight: number): number {
  const span = depth.cap - depth.floor;
  if (!(span > 0)) {
    return ratio >= depth.cap ? weight : 0;
  }
  return Math.round(weight * clamp((ratio - depth.floor) / span, 0, 1));
}

export function contractValueScore(price: number, value: ValueScoring, weight: number): number {
  const span = value.highPrice - value.lowPrice;
  if (!(span > 0)) {
    return price <= value.lowPrice ? weight : 0;
  }
  return Math.round(weight * clamp((value.highPrice - price) / span, 0, 1));
}

export function isKillSwitchActive(price: number | null, value: ValueScoring): boolean {
  return price !== null && value.killSwitchCeiling !== null && price > value.killSwitchCeiling;
}

export class ScoringEngine {
  private readonly preset: ScoringPreset;

  constructor(preset: ScoringPreset) {
    this.preset = preset;

    logger.info('Scoring Engine initialized', {
      preset: preset.name,
      threshold: preset.threshold,
      weights: preset.weights,
      atrMultiplier: preset.atrMultiplier,
      killSwitchCeiling: preset.value.killSwitchCeiling,
    });
  }

  get threshold(): number {
    return this.preset.threshold;
  }

  get presetName(): string {
    return this.preset.name;
  }

  /**
   * Score one tick. Missing inputs score their component 0.
   */
  score(input: ScoringInput): ScoreBreakdown {
    const { weights } = this.preset;
    const { currentPrice, strikePrice, indicators, minutesLeft, contractPrice } = input;
    const direction = favoredDirection(currentPrice, strikePrice);

    // Band position
    let band = 0;
    let position: number | null = null;
    if (indicators.bands && weights.band > 0) {
      position = bandPosition(strikePrice, indicators.bands.upper, indicators.bands.lower);
      if (position !== null) {
        band = bandPositionScore(position, direction, weights.band);
      }
    }

    // Volatility barrier
    let barrier = 0;
    let maxMove: number | null = null;
    if (indicators.atr !== null && weights.barrier > 0) {
      maxMove = expectedMaxMove(indicators.atr, minutesLeft, this.preset.atrMultiplier);
      barrier = volatilityBarrierScore(Math.abs(currentPrice - strikePrice), maxMove, weights.barrier);
    }

    // Depth ratio, also read by the constraint gate when unweighted
    let depth = 0;
    let depthRatio: number | null = null;
    if (input.referenceBook) {
      const scanDepth = indicators.atr ?? currentPrice * this.preset.depth.fallbackScanFraction;
      depthRatio = analyzeDepth(
        input.referenceBook,
        currentPrice,
        direction,
        scanDepth,
        this.preset.depth.emptySideRatio
      ).ratio;
      if (depthRatio !== null && weights.depth > 0) {
        depth = depthRatioScore(depthRatio, this.preset.depth, weights.depth);
      }
    }

    // Contract value
    let value = 0;
    if (contractPrice !== null && weights.value > 0) {
      value = contractValueScore(contractPrice, this.preset.value, weights.value);
    }

    const rawTotal = band + barrier + depth + value;
    const killSwitch = isKillSwitchActive(contractPrice, this.preset.value);
    const total = killSwitch ? 0 : Math.max(0, rawTotal);

    return {
      direction,
      band,
      barrier,
      depth,
      value,
      rawTotal,
      total,
      killSwitch,
      bandPosition: position,
      maxMove,
      depthRatio,
      contractPrice,
    };
  }

  meetsThreshold(breakdown: ScoreBreakdown): boolean {
    return breakdown.total >= this.preset.threshold;
  }
}
