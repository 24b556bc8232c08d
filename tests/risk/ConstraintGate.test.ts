/**
 * Tests for ConstraintGate
 */

import { describe, it, expect } from 'vitest';
import { ConstraintGate, describeFailures } from '../../src/risk/ConstraintGate.js';

describe('ConstraintGate', () => {
  const gate = new ConstraintGate({
    contractPriceMin: 0.6,
    contractPriceMax: 0.85,
    depthRatioMin: 2,
  });

  it('should pass when every observable is inside its limit', () => {
    expect(gate.evaluate({ contractPrice: 0.7, depthRatio: 2.5 })).toEqual({
      passed: true,
      failures: [],
    });
  });

  it('should accept values exactly at the limits', () => {
    expect(gate.evaluate({ contractPrice: 0.6, depthRatio: 2 }).passed).toBe(true);
    expect(gate.evaluate({ contractPrice: 0.85, depthRatio: 2 }).passed).toBe(true);
  });

  it('should report each violated constraint', () => {
    const result = gate.evaluate({ contractPrice: 0.9, depthRatio: 1.5 });

    expect(result.passed).toBe(false);
    expect(result.failures).toEqual([
      { constraint: 'contract-price-max', limit: 0.85, observed: 0.9 },
      { constraint: 'depth-ratio-min', limit: 2, observed: 1.5 },
    ]);
  });

  it('should fail a constraint whose observable is missing', () => {
    const result = gate.evaluate({ contractPrice: null, depthRatio: 3 });

    expect(result.failures.map((f) => f.constraint)).toEqual([
      'contract-price-min',
      'contract-price-max',
    ]);
  });

  it('should skip disabled constraints', () => {
    const priceOnly = new ConstraintGate({
      contractPriceMin: 0.6,
      contractPriceMax: null,
      depthRatioMin: null,
    });

    expect(priceOnly.activeConstraints).toEqual(['contract-price-min']);
    expect(priceOnly.evaluate({ contractPrice: 0.99, depthRatio: null }).passed).toBe(true);
  });

  it('should describe failures for logs', () => {
    const { failures } = gate.evaluate({ contractPrice: 0.5, depthRatio: null });

    expect(describeFailures(failures)).toBe(
      'contract-price-min: 0.5 vs 0.6, depth-ratio-min: unavailable'
    );
  });
});
