/**
 * Scoring presets
 *
 * `balanced` is canonical. The others keep the same component formulas and
 * only change weights, threshold and cut-offs.
 */

import type { ScoringPreset } from './types.js';

const DEFAULT_DEPTH = {
  floor: 0.3,
  cap: 3.0,
  emptySideRatio: 10,
  fallbackScanFraction: 0.001,
} as const;

export const SCORING_PRESETS = {
  balanced: {
    name: 'balanced',
    threshold: 75,
    weights: { band: 30, barrier: 25, depth: 15, value: 30 },
    atrMultiplier: 1.5,
    depth: DEFAULT_DEPTH,
    value: { lowPrice: 0.3, highPrice: 0.85, killSwitchCeiling: 0.92 },
  },
  // Bands and ATR only
  kinetic: {
    name: 'kinetic',
    threshold: 60,
    weights: { band: 50, barrier: 50, depth: 0, value: 0 },
    atrMultiplier: 1.5,
    depth: DEFAULT_DEPTH,
    value: { lowPrice: 0.3, highPrice: 0.85, killSwitchCeiling: null },
  },
  conservative: {
    name: 'conservative',
    threshold: 80,
    weights: { band: 30, barrier: 30, depth: 20, value: 20 },
    atrMultiplier: 2.0,
    depth: DEFAULT_DEPTH,
    value: { lowPrice: 0.4, highPrice: 0.8, killSwitchCeiling: 0.9 },
  },
} as const satisfies Record<string, ScoringPreset>;

export type PresetName = keyof typeof SCORING_PRESETS;

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(SCORING_PRESETS, name);
}

export function resolvePreset(name: string): ScoringPreset {
  if (!isPresetName(name)) {
    throw new Error(
      `Unknown scoring preset "${name}" (expected one of: ${Object.keys(SCORING_PRESETS).join(', ')})`
    );
  }
  return SCORING_PRESETS[name];
}
