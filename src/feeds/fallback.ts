/**
 * Fallback policies for externally sourced values
 *
 * - skip-tick:        a missing value aborts the tick
 * - reuse-last:       a missing value is replaced by the last fresh one while
 *                     it is younger than maxAgeMs
 * - treat-as-missing: a missing value stays missing; dependent components
 *                     score 0
 */

import { logger } from '../logger.js';

export type FallbackPolicy = 'skip-tick' | 'reuse-last' | 'treat-as-missing';

export type Resolved<T> =
  | { status: 'fresh'; value: T }
  | { status: 'stale'; value: T; ageMs: number }
  | { status: 'missing' }
  | { status: 'skip' };

export interface FallbackOptions {
  /** Oldest value reuse-last may return */
  maxAgeMs?: number;
}

export class FallbackValue<T> {
  readonly name: string;
  readonly policy: FallbackPolicy;
  private readonly maxAgeMs: number;
  private last: { value: T; at: number } | null = null;

  constructor(name: string, policy: FallbackPolicy, options: FallbackOptions = {}) {
    this.name = name;
    this.policy = policy;
    this.maxAgeMs = options.maxAgeMs ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Apply the policy to this tick's fetch result
   */
  resolve(fresh: T | null, now: number): Resolved<T> {
    if (fresh !== null) {
      this.last = { value: fresh, at: now };
      return { status: 'fresh', value: fresh };
    }

    switch (this.policy) {
      case 'skip-tick':
        logger.warn(`${this.name} unavailable, skipping tick`);
        return { status: 'skip' };

      case 'reuse-last': {
        const last = this.last;
        if (last && now - last.at <= this.maxAgeMs) {
          const ageMs = now - last.at;
          logger.debug(`${this.name} unavailable, reusing last value`, { ageMs });
          return { status: 'stale', value: last.value, ageMs };
        }
        logger.debug(`${this.name} unavailable, no recent value`);
        return { status: 'missing' };
      }

      case 'treat-as-missing':
        logger.debug(`${this.name} unavailable`);
        return { status: 'missing' };
    }
  }

  reset(): void {
    this.last = null;
  }
}

/**
 * The usable value of a resolution, if any
 */
export function valueOf<T>(resolved: Resolved<T>): T | null {
  return resolved.status === 'fresh' || resolved.status === 'stale' ? resolved.value : null;
}
