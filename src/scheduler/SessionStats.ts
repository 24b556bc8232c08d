/**
 * Session statistics
 *
 * An immutable value owned by the scheduler loop; every settled window
 * produces the next value.
 */

import type { Settlement } from '../position/types.js';

export interface SessionStats {
  readonly windows: number;
  /** Windows in which a position was opened */
  readonly signals: number;
  readonly wins: number;
  readonly losses: number;
  readonly noSignal: number;
  readonly unresolved: number;
  readonly realizedPnl: number;
}

export const EMPTY_SESSION: SessionStats = Object.freeze({
  windows: 0,
  signals: 0,
  wins: 0,
  losses: 0,
  noSignal: 0,
  unresolved: 0,
  realizedPnl: 0,
});

export function recordWindowOutcome(stats: SessionStats, settlement: Settlement): SessionStats {
  const traded = settlement.outcome !== 'no-signal';

  return Object.freeze({
    windows: stats.windows + 1,
    signals: stats.signals + (traded ? 1 : 0),
    wins: stats.wins + (settlement.outcome === 'win' ? 1 : 0),
    losses: stats.losses + (settlement.outcome === 'loss' ? 1 : 0),
    noSignal: stats.noSignal + (traded ? 0 : 1),
    unresolved: stats.unresolved + (settlement.outcome === 'unresolved' ? 1 : 0),
    realizedPnl: stats.realizedPnl + (settlement.pnlUsd ?? 0),
  });
}

/**
 * Wins over resolved trades, null before the first one
 */
export function winRate(stats: SessionStats): number | null {
  const resolved = stats.wins + stats.losses;
  return resolved === 0 ? null : stats.wins / resolved;
}
