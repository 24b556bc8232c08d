export { ScoringEngine } from './ScoringEngine.js';
export {
  favoredDirection,
  bandPosition,
  bandPositionScore,
  expectedMaxMove,
  volatilityBarrierScore,
  analyzeDepth,
  depthRatioScore,
  contractValueScore,
  isKillSwitchActive,
} from './ScoringEngine.js';
export { bollinger, atr, rsi, alignToReference, computeIndicators } from './indicators.js';
export { SCORING_PRESETS, resolvePreset, isPresetName } from './presets.js';
export type { PresetName } from './presets.js';
export type {
  IndicatorConfig,
  ScoringWeights,
  DepthScoring,
  ValueScoring,
  ScoringPreset,
  ScoringInput,
  DepthAnalysis,
} from './types.js';
