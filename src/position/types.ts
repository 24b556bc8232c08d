/**
 * Position State Machine Types
 */

import type { ConstraintFailure, GateResult } from '../risk/types.js';
import type { Direction, ScoreBreakdown } from '../types.js';

export type PositionState = 'flat' | 'pending-entry' | 'open' | 'pending-close' | 'closed';

export type CloseReason = 'take-profit' | 'stop-loss' | 'strike-barrier';

export interface PositionClose {
  readonly price: number;
  readonly size: number;
  readonly timestamp: number;
  readonly reason: CloseReason;
  /** Reference price observed when the close fired */
  readonly referencePrice: number | null;
}

/**
 * The single position of a window. Every update produces a new frozen object.
 */
export interface Position {
  readonly contractId: string;
  readonly direction: Direction;
  readonly entryPrice: number;
  readonly entrySize: number;
  readonly openedAt: number;
  readonly entryReferencePrice: number;
  readonly closed: boolean;
  readonly close: PositionClose | null;
  readonly closeAttempts: number;
}

/**
 * Position State Machine configuration
 */
export interface PositionMachineConfig {
  /** Earliest entry, in minutes before expiry */
  tradeWindowMax: number;

  /** Latest entry, in minutes before expiry */
  tradeWindowMin: number;

  /** Close once the contract bid reaches this price */
  takeProfitPrice: number;

  /** Close once the bid is this fraction below entry (0.3 = 30%) */
  stopLossPercent: number;

  /** Close when the reference leaves the favored side of the strike */
  strikeBarrierEnabled: boolean;

  /** Decimal places of the close size */
  closePrecision: number;
}

export interface EntryContext {
  minutesLeft: number;
  score: ScoreBreakdown;
  threshold: number;
  gate: GateResult;
  /** Best ask of the favored contract */
  askPrice: number | null;
  referencePrice: number;
  timestamp: number;
}

export type EntryOutcome =
  | { kind: 'not-flat' }
  | { kind: 'outside-window' }
  | { kind: 'below-threshold' }
  | { kind: 'blocked'; failures: ConstraintFailure[] }
  | { kind: 'no-quote' }
  | { kind: 'invalid-size'; reason: string }
  | { kind: 'filled'; position: Position }
  | { kind: 'failed'; error: string };

export interface ExitContext {
  /** Best bid of the held contract */
  bidPrice: number | null;
  referencePrice: number | null;
  timestamp: number;
}

export type ExitOutcome =
  | { kind: 'not-open' }
  | { kind: 'hold' }
  | { kind: 'no-quote'; reason: CloseReason }
  | { kind: 'closed'; position: Position }
  | { kind: 'close-failed'; reason: CloseReason; error: string; attempts: number };

export type SettlementOutcome = 'win' | 'loss' | 'no-signal' | 'unresolved';

export interface Settlement {
  outcome: SettlementOutcome;
  position: Position | null;
  finalPrice: number | null;
  /** Amount paid for the entry */
  cost: number | null;
  pnlUsd: number | null;
  pnlPercent: number | null;
}

export type PositionMachineEvents = {
  stateChange: [from: PositionState, to: PositionState];
  opened: [position: Position];
  closed: [position: Position];
  entryFailed: [error: string];
  closeFailed: [position: Position, error: string];
};
