/**
 * Constraint Gate
 *
 * Blocks entries regardless of score:
 * - contract price below the minimum (market already against us)
 * - contract price above the maximum (too little left to win)
 * - supporting depth ratio below the minimum
 *
 * A constraint whose observable is missing fails.
 */

import { logger } from '../logger.js';
import type {
  ConstraintFailure,
  ConstraintGateConfig,
  ConstraintInput,
  ConstraintName,
  GateResult,
} from './types.js';

interface Constraint {
  name: ConstraintName;
  limit: number;
  observe: (input: ConstraintInput) => number | null;
  satisfied: (observed: number, limit: number) => boolean;
}

export class ConstraintGate {
  private readonly constraints: Constraint[];

  constructor(config: ConstraintGateConfig) {
    this.constraints = [];

    if (config.contractPriceMin !== null) {
      this.constraints.push({
        name: 'contract-price-min',
        limit: config.contractPriceMin,
        observe: (input) => input.contractPrice,
        satisfied: (observed, limit) => observed >= limit,
      });
    }

    if (config.contractPriceMax !== null) {
      this.constraints.push({
        name: 'contract-price-max',
        limit: config.contractPriceMax,
        observe: (input) => input.contractPrice,
        satisfied: (observed, limit) => observed <= limit,
      });
    }

    if (config.depthRatioMin !== null) {
      this.constraints.push({
        name: 'depth-ratio-min',
        limit: config.depthRatioMin,
        observe: (input) => input.depthRatio,
        satisfied: (observed, limit) => observed >= limit,
      });
    }

    logger.info('Constraint Gate initialized', {
      active: this.constraints.map((c) => `${c.name}=${c.limit}`),
    });
  }

  /**
   * Names of the enabled constraints
   */
  get activeConstraints(): ConstraintName[] {
    return this.constraints.map((c) => c.name);
  }

  /**
   * Check every enabled constraint
   */
  evaluate(input: ConstraintInput): GateResult {
    const failures: ConstraintFailure[] = [];

    for (const constraint of this.constraints) {
      const observed = constraint.observe(input);
      if (observed === null || !constraint.satisfied(observed, constraint.limit)) {
        failures.push({ constraint: constraint.name, limit: constraint.limit, observed });
      }
    }

    return { passed: failures.length === 0, failures };
  }
}

/**
 * One-line description for logs
 */
export function describeFailures(failures: readonly ConstraintFailure[]): string {
  return failures
    .map((f) =>
      f.observed === null
        ? `${f.constraint}: unavailable`
        : `${f.constraint}: ${f.observed} vs ${f.limit}`
    )
    .join(', ');
}
