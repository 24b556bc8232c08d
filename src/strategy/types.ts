/**
 * Types for the Scoring Engine
 */

import type { DepthSnapshot, IndicatorSet } from '../types.js';

/**
 * Indicator periods and multipliers
 */
export interface IndicatorConfig {
  bollingerPeriod: number;
  bollingerStdDev: number;
  atrPeriod: number;
  rsiPeriod: number;
}

/**
 * Maximum points per component. A weight of 0 disables the component.
 */
export interface ScoringWeights {
  band: number;
  barrier: number;
  depth: number;
  value: number;
}

export interface DepthScoring {
  /** Ratio scoring 0 */
  floor: number;
  /** Ratio scoring the full weight */
  cap: number;
  /** Ratio used when the opposing side of the band is empty */
  emptySideRatio: number;
  /** Scan band as a fraction of price when ATR is unavailable */
  fallbackScanFraction: number;
}

export interface ValueScoring {
  /** Contract price scoring the full weight */
  lowPrice: number;
  /** Contract price scoring 0 */
  highPrice: number;
  /** Above this contract price the displayed total is forced to 0 */
  killSwitchCeiling: number | null;
}

/**
 * A named weight configuration
 */
export interface ScoringPreset {
  name: string;
  threshold: number;
  weights: ScoringWeights;
  atrMultiplier: number;
  depth: DepthScoring;
  value: ValueScoring;
}

/**
 * Everything one score evaluation reads
 */
export interface ScoringInput {
  currentPrice: number;
  strikePrice: number;
  indicators: IndicatorSet;
  minutesLeft: number;
  /** Best ask of the favored contract */
  contractPrice: number | null;
  /** Order book of the reference asset */
  referenceBook: DepthSnapshot | null;
}

/**
 * Volumes inside the scan band
 */
export interface DepthAnalysis {
  bidVolume: number;
  askVolume: number;
  ratio: number | null;
}
