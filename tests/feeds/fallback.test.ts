/**
 * Tests for fallback policies
 */

import { describe, it, expect } from 'vitest';
import { FallbackValue, valueOf } from '../../src/feeds/fallback.js';

describe('FallbackValue', () => {
  it('should pass fresh values through under every policy', () => {
    for (const policy of ['skip-tick', 'reuse-last', 'treat-as-missing'] as const) {
      const value = new FallbackValue<number>('price', policy);
      expect(value.resolve(100, 1_000)).toEqual({ status: 'fresh', value: 100 });
    }
  });

  describe('skip-tick', () => {
    it('should skip the tick even when an earlier value exists', () => {
      const value = new FallbackValue<number>('price', 'skip-tick');
      value.resolve(100, 1_000);

      const resolved = value.resolve(null, 2_000);

      expect(resolved).toEqual({ status: 'skip' });
      expect(valueOf(resolved)).toBeNull();
    });
  });

  describe('reuse-last', () => {
    it('should reuse the last value while it is young enough', () => {
      const value = new FallbackValue<number>('ask', 'reuse-last', { maxAgeMs: 30_000 });
      value.resolve(0.65, 1_000);

      const resolved = value.resolve(null, 20_000);

      expect(resolved).toEqual({ status: 'stale', value: 0.65, ageMs: 19_000 });
      expect(valueOf(resolved)).toBe(0.65);
    });

    it('should accept a value exactly at the age limit', () => {
      const value = new FallbackValue<number>('ask', 'reuse-last', { maxAgeMs: 30_000 });
      value.resolve(0.65, 1_000);

      expect(value.resolve(null, 31_000)).toEqual({ status: 'stale', value: 0.65, ageMs: 30_000 });
    });

    it('should report missing once the last value is too old', () => {
      const value = new FallbackValue<number>('ask', 'reuse-last', { maxAgeMs: 30_000 });
      value.resolve(0.65, 1_000);

      expect(value.resolve(null, 40_000)).toEqual({ status: 'missing' });
    });

    it('should report missing without any earlier value', () => {
      const value = new FallbackValue<number>('ask', 'reuse-last', { maxAgeMs: 30_000 });

      expect(value.resolve(null, 1_000)).toEqual({ status: 'missing' });
    });

    it('should forget the last value on reset', () => {
      const value = new FallbackValue<number>('ask', 'reuse-last');
      value.resolve(0.65, 1_000);
      value.reset();

      expect(value.resolve(null, 2_000)).toEqual({ status: 'missing' });
    });
  });

  describe('treat-as-missing', () => {
    it('should never reuse an earlier value', () => {
      const value = new FallbackValue<number>('book', 'treat-as-missing');
      value.resolve(1, 1_000);

      const resolved = value.resolve(null, 2_000);

      expect(resolved).toEqual({ status: 'missing' });
      expect(valueOf(resolved)).toBeNull();
    });
  });
});
