/**
 * Constraint Gate Types
 *
 * Hard pass/fail predicates checked on every tick, independently of the score.
 */

export type ConstraintName = 'contract-price-min' | 'contract-price-max' | 'depth-ratio-min';

/**
 * Active limits. A null limit disables its constraint.
 */
export interface ConstraintGateConfig {
  /** Lowest acceptable ask of the favored contract */
  contractPriceMin: number | null;

  /** Highest acceptable ask of the favored contract */
  contractPriceMax: number | null;

  /** Lowest acceptable supporting/opposing depth ratio */
  depthRatioMin: number | null;
}

/**
 * Observables the constraints read
 */
export interface ConstraintInput {
  contractPrice: number | null;
  depthRatio: number | null;
}

export interface ConstraintFailure {
  constraint: ConstraintName;
  limit: number;
  /** null when the observable was unavailable */
  observed: number | null;
}

export interface GateResult {
  passed: boolean;
  failures: ConstraintFailure[];
}
