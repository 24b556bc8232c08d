/**
 * Market window construction
 *
 * Venue payloads are validated once here; everything downstream receives a
 * frozen MarketWindow.
 */

import type { MarketWindow } from '../types.js';

export class InvalidMarketWindowError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid market window (${field}): ${message}`);
    this.name = 'InvalidMarketWindowError';
    this.field = field;
  }
}

export interface MarketWindowInput {
  id: unknown;
  slug: unknown;
  strikePrice: unknown;
  openTime: unknown;
  closeTime: unknown;
  contracts: { above: unknown; below: unknown };
}

function requireText(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidMarketWindowError(field, 'expected a non-empty string');
  }
  return value.trim();
}

function requirePositive(field: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new InvalidMarketWindowError(field, `expected a positive number, got ${String(value)}`);
  }
  return value;
}

export function createMarketWindow(input: MarketWindowInput): MarketWindow {
  const id = requireText('id', input.id);
  const slug = requireText('slug', input.slug);
  const strikePrice = requirePositive('strikePrice', input.strikePrice);
  const openTime = requirePositive('openTime', input.openTime);
  const closeTime = requirePositive('closeTime', input.closeTime);
  const above = requireText('contracts.above', input.contracts.above);
  const below = requireText('contracts.below', input.contracts.below);

  if (closeTime <= openTime) {
    throw new InvalidMarketWindowError('closeTime', 'must be after openTime');
  }
  if (above === below) {
    throw new InvalidMarketWindowError('contracts', 'above and below must differ');
  }

  return Object.freeze({
    id,
    slug,
    strikePrice,
    openTime,
    closeTime,
    contracts: Object.freeze({ above, below }),
  });
}

/**
 * Minutes until the window closes, negative once expired
 */
export function minutesLeft(window: MarketWindow, now: number): number {
  return (window.closeTime - now) / 60_000;
}
