/**
 * Helpers for loosely typed venue payloads
 */

import type { BookLevel, DepthSnapshot } from '../types.js';

/**
 * Finite number from a number or numeric string
 */
export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Accepts `{ price, size }` objects and `[price, size]` tuples
 */
export function parseBookLevel(raw: unknown): BookLevel | null {
  let price: number | null;
  let size: number | null;

  if (Array.isArray(raw)) {
    price = toFiniteNumber(raw[0]);
    size = toFiniteNumber(raw[1]);
  } else if (isRecord(raw)) {
    price = toFiniteNumber(raw.price);
    size = toFiniteNumber(raw.size);
  } else {
    return null;
  }

  if (price === null || size === null || price <= 0 || size < 0) {
    return null;
  }
  return { price, size };
}

/**
 * Book with bids best-first (descending) and asks best-first (ascending)
 */
export function parseDepthSnapshot(raw: unknown): DepthSnapshot | null {
  if (!isRecord(raw) || !Array.isArray(raw.bids) || !Array.isArray(raw.asks)) {
    return null;
  }

  const levels = (side: unknown[]): BookLevel[] =>
    side.map(parseBookLevel).filter((level): level is BookLevel => level !== null);

  return {
    bids: levels(raw.bids).sort((a, b) => b.price - a.price),
    asks: levels(raw.asks).sort((a, b) => a.price - b.price),
  };
}

export function bestBidOf(book: DepthSnapshot | null): number | null {
  return book?.bids[0]?.price ?? null;
}

export function bestAskOf(book: DepthSnapshot | null): number | null {
  return book?.asks[0]?.price ?? null;
}
