/**
 * Shared report fixtures
 */

import type { Position } from '../../src/position/types.js';
import type { WindowReport } from '../../src/reporting/types.js';

export const position: Position = {
  contractId: 'tok-up',
  direction: 'above',
  entryPrice: 0.65,
  entrySize: 10,
  openedAt: 1_700_000_400_000,
  entryReferencePrice: 100_200,
  closed: false,
  close: null,
  closeAttempts: 0,
};

export function winReport(): WindowReport {
  return {
    window: {
      id: 'evt-1',
      slug: 'btc-updown-15m-1700000100',
      strikePrice: 100_000,
      openTime: 1_700_000_100_000,
      closeTime: 1_700_001_000_000,
      contracts: { above: 'tok-up', below: 'tok-down' },
    },
    statistics: {
      slug: 'btc-updown-15m-1700000100',
      strikePrice: 100_000,
      startedAt: 1_700_000_100_000,
      evaluations: 170,
      signals: 3,
      blocked: 1,
      maxScore: 85,
      sums: { band: 2097.8, barrier: 3485, depth: 629, value: 4250, total: 10461.8 },
    },
    averages: { band: 12.34, barrier: 20.5, depth: 3.7, value: 25, total: 61.54 },
    settlement: {
      outcome: 'win',
      position,
      finalPrice: 100_250.5,
      cost: 6.5,
      pnlUsd: 3.5,
      pnlPercent: 53.84615384615385,
    },
    session: {
      windows: 1,
      signals: 1,
      wins: 1,
      losses: 0,
      noSignal: 0,
      unresolved: 0,
      realizedPnl: 3.5,
    },
    settledAt: 1_700_001_000_000,
  };
}

export function noSignalReport(): WindowReport {
  const report = winReport();
  return {
    ...report,
    statistics: { ...report.statistics, signals: 0, blocked: 0 },
    settlement: {
      outcome: 'no-signal',
      position: null,
      finalPrice: 100_250.5,
      cost: null,
      pnlUsd: null,
      pnlPercent: null,
    },
    session: { ...report.session, signals: 0, wins: 0, noSignal: 1, realizedPnl: 0 },
  };
}
