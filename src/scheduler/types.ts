/**
 * Window Scheduler Types
 */

import type { ContractPricer, PriceFeed, ReferenceBookSource } from '../feeds/types.js';
import type { MarketDirectory } from '../markets/types.js';
import type { Sleep } from '../execution/RetryPolicy.js';
import type { PositionStateMachine } from '../position/PositionStateMachine.js';
import type { EntryOutcome, ExitOutcome } from '../position/types.js';
import type { ReportSink, WindowReport } from '../reporting/types.js';
import type { ConstraintGate } from '../risk/ConstraintGate.js';
import type { GateResult } from '../risk/types.js';
import type { ScoringEngine } from '../strategy/ScoringEngine.js';
import type { IndicatorConfig } from '../strategy/types.js';
import type { MarketWindow, ScoreBreakdown } from '../types.js';
import type { TickFetcher } from './TickFetcher.js';

export interface WindowSchedulerConfig {
  /** One-minute candles read per tick */
  candleCount: number;
  indicators: IndicatorConfig;
  /** Shift candles onto the live reference before computing indicators */
  alignCandles: boolean;
  tickIntervalMs: number;
  /** Pause after a window settles */
  nextWindowWaitMs: number;
  /** Pause after a failed window lookup */
  discoveryRetryMs: number;
  /** Oldest contract book reused when a fresh one is missing */
  maxQuoteAgeMs: number;
  /** Trading sub-window bounds, minutes before expiry */
  tradeWindowMin: number;
  tradeWindowMax: number;
}

export interface WindowSchedulerDeps {
  directory: MarketDirectory;
  prices: PriceFeed;
  referenceBook: ReferenceBookSource;
  pricer: ContractPricer;
  fetcher: TickFetcher;
  scoring: ScoringEngine;
  gate: ConstraintGate;
  /** A fresh state machine for every window */
  createMachine: (window: MarketWindow) => PositionStateMachine;
  sinks: ReportSink[];
  clock?: () => number;
  sleep?: Sleep;
}

export type TickReport =
  | {
      kind: 'skipped';
      slug: string;
      timestamp: number;
      reason: string;
    }
  | {
      kind: 'evaluated';
      slug: string;
      timestamp: number;
      minutesLeft: number;
      referencePrice: number;
      score: ScoreBreakdown;
      gate: GateResult;
      entry: EntryOutcome | null;
      exit: ExitOutcome | null;
    };

export type TradeWindowPhase = 'open' | 'closing';

export type WindowSchedulerEvents = {
  windowStarted: [window: MarketWindow];
  tradeWindow: [phase: TradeWindowPhase, window: MarketWindow];
  tick: [report: TickReport];
  windowSettled: [report: WindowReport];
  error: [error: Error];
};
