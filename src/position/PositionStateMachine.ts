/**
 * Position State Machine
 *
 * Owns the single position of one market window:
 *
 *   flat -> pending-entry -> open -> pending-close -> closed
 *   flat -> closed (expiry without entry)
 *
 * Entries and closes go through the RetryPolicy. A failed entry returns to
 * flat, a failed close returns to open and is retried on the next tick.
 */

import { EventEmitter } from 'eventemitter3';
import { logger, normalizeError } from '../logger.js';
import type { MarketWindow, OrderResult } from '../types.js';
import { floorToDecimals, type PositionSizer } from '../execution/PositionSizer.js';
import type { RetryPolicy } from '../execution/RetryPolicy.js';
import type { OrderExecution } from '../execution/types.js';
import type {
  CloseReason,
  EntryContext,
  EntryOutcome,
  ExitContext,
  ExitOutcome,
  Position,
  PositionMachineConfig,
  PositionMachineEvents,
  PositionState,
  Settlement,
} from './types.js';

function failedOrder(error: string): OrderResult {
  return { success: false, filledSize: 0, fillPrice: 0, error, timestamp: Date.now() };
}

export class PositionStateMachine extends EventEmitter<PositionMachineEvents> {
  private readonly config: PositionMachineConfig;
  private readonly window: MarketWindow;
  private readonly execution: OrderExecution;
  private readonly sizer: PositionSizer;
  private readonly retryPolicy: RetryPolicy;

  private currentState: PositionState = 'flat';
  private currentPosition: Position | null = null;
  private settlement: Settlement | null = null;

  constructor(
    config: PositionMachineConfig,
    window: MarketWindow,
    execution: OrderExecution,
    sizer: PositionSizer,
    retryPolicy: RetryPolicy
  ) {
    super();
    this.config = config;
    this.window = window;
    this.execution = execution;
    this.sizer = sizer;
    this.retryPolicy = retryPolicy;
  }

  get state(): PositionState {
    return this.currentState;
  }

  get position(): Position | null {
    return this.currentPosition;
  }

  /**
   * Open a position if the tick qualifies
   */
  async evaluateEntry(ctx: EntryContext): Promise<EntryOutcome> {
    if (this.currentState !== 'flat') {
      return { kind: 'not-flat' };
    }

    const { tradeWindowMin, tradeWindowMax } = this.config;
    if (ctx.minutesLeft < tradeWindowMin || ctx.minutesLeft > tradeWindowMax) {
      return { kind: 'outside-window' };
    }

    if (ctx.score.total < ctx.threshold) {
      return { kind: 'below-threshold' };
    }

    if (!ctx.gate.passed) {
      return { kind: 'blocked', failures: ctx.gate.failures };
    }

    if (ctx.askPrice === null) {
      return { kind: 'no-quote' };
    }
    const askPrice = ctx.askPrice;

    const sizing = this.sizer.calculateSize(askPrice);
    if (!sizing.valid) {
      logger.warn('Entry skipped: invalid size', { askPrice, reason: sizing.reason });
      return { kind: 'invalid-size', reason: sizing.reason ?? 'Invalid size' };
    }

    const direction = ctx.score.direction;
    const contractId = this.window.contracts[direction];
    this.transition('pending-entry');

    let result: OrderResult;
    try {
      logger.info('Opening position', {
        window: this.window.slug,
        direction,
        askPrice,
        size: sizing.size,
        cost: sizing.cost,
        score: ctx.score.total,
      });

      result = await this.submit(contractId, 'Entry order', () =>
        this.execution.placeOrder(contractId, 'BUY', askPrice, sizing.size)
      );
    } catch (error) {
      result = failedOrder(normalizeError(error).message);
    }

    if (!result.success || result.filledSize <= 0) {
      const error = result.error ?? 'Entry order not filled';
      this.transition('flat');
      logger.warn('Signal failed: entry not filled', { window: this.window.slug, error });
      this.emit('entryFailed', error);
      return { kind: 'failed', error };
    }

    const position: Position = Object.freeze({
      contractId,
      direction,
      entryPrice: result.fillPrice,
      entrySize: result.filledSize,
      openedAt: ctx.timestamp,
      entryReferencePrice: ctx.referencePrice,
      closed: false,
      close: null,
      closeAttempts: 0,
    });

    this.currentPosition = position;
    this.transition('open');
    logger.info('Position opened', { ...position });
    this.emit('opened', position);

    return { kind: 'filled', position };
  }

  /**
   * First matching close condition: take-profit, stop-loss, strike barrier
   */
  closeReason(ctx: ExitContext): CloseReason | null {
    const position = this.currentPosition;
    if (!position) {
      return null;
    }

    const { bidPrice, referencePrice } = ctx;

    if (bidPrice !== null && bidPrice >= this.config.takeProfitPrice) {
      return 'take-profit';
    }

    if (
      bidPrice !== null &&
      (position.entryPrice - bidPrice) / position.entryPrice > this.config.stopLossPercent
    ) {
      return 'stop-loss';
    }

    if (this.config.strikeBarrierEnabled && referencePrice !== null) {
      const strike = this.window.strikePrice;
      const crossed =
        position.direction === 'above' ? referencePrice <= strike : referencePrice >= strike;
      if (crossed) {
        return 'strike-barrier';
      }
    }

    return null;
  }

  /**
   * Close the open position if a close condition fires
   */
  async evaluateExit(ctx: ExitContext): Promise<ExitOutcome> {
    const position = this.currentPosition;
    if (this.currentState !== 'open' || !position) {
      return { kind: 'not-open' };
    }

    const reason = this.closeReason(ctx);
    if (reason === null) {
      return { kind: 'hold' };
    }

    if (ctx.bidPrice === null) {
      logger.warn('Close condition without a bid', { reason, window: this.window.slug });
      return { kind: 'no-quote', reason };
    }
    const bidPrice = ctx.bidPrice;

    this.transition('pending-close');

    // Any failure from here on leaves the position open for the next tick
    let result: OrderResult;
    try {
      const size = await this.closeSize(position);

      logger.info('Closing position', {
        window: this.window.slug,
        reason,
        bidPrice,
        size,
        referencePrice: ctx.referencePrice,
      });

      result = await this.submit(position.contractId, 'Close order', () =>
        this.execution.placeOrder(position.contractId, 'SELL', bidPrice, size)
      );
    } catch (error) {
      result = failedOrder(normalizeError(error).message);
    }

    if (!result.success || result.filledSize <= 0) {
      const error = result.error ?? 'Close order not filled';
      const retried: Position = Object.freeze({
        ...position,
        closeAttempts: position.closeAttempts + 1,
      });
      this.currentPosition = retried;
      this.transition('open');
      logger.error('Close failed, will retry next tick', {
        window: this.window.slug,
        reason,
        error,
        attempts: retried.closeAttempts,
      });
      this.emit('closeFailed', retried, error);
      return { kind: 'close-failed', reason, error, attempts: retried.closeAttempts };
    }

    const closed: Position = Object.freeze({
      ...position,
      closed: true,
      close: Object.freeze({
        price: result.fillPrice,
        size: result.filledSize,
        timestamp: ctx.timestamp,
        reason,
        referencePrice: ctx.referencePrice,
      }),
    });

    this.currentPosition = closed;
    this.transition('closed');
    logger.info('Position closed', {
      window: this.window.slug,
      reason,
      entryPrice: closed.entryPrice,
      closePrice: result.fillPrice,
      size: result.filledSize,
    });
    this.emit('closed', closed);

    return { kind: 'closed', position: closed };
  }

  /**
   * Resolve the window at expiry against the final reference price
   */
  settle(finalPrice: number | null): Settlement {
    if (this.settlement) {
      return this.settlement;
    }

    if (this.currentState === 'pending-entry' || this.currentState === 'pending-close') {
      throw new Error(`Cannot settle ${this.window.slug} while ${this.currentState}`);
    }

    const settlement = this.resolve(finalPrice);
    this.settlement = settlement;

    if (this.currentState !== 'closed') {
      this.transition('closed');
    }

    logger.info('Window settled', {
      window: this.window.slug,
      strikePrice: this.window.strikePrice,
      finalPrice,
      outcome: settlement.outcome,
      pnlUsd: settlement.pnlUsd,
    });

    return settlement;
  }

  private resolve(finalPrice: number | null): Settlement {
    const position = this.currentPosition;
    if (!position) {
      return { outcome: 'no-signal', position: null, finalPrice, cost: null, pnlUsd: null, pnlPercent: null };
    }

    const cost = position.entrySize * position.entryPrice;

    let pnlUsd: number;
    if (position.close) {
      pnlUsd = position.close.size * (position.close.price - position.entryPrice);
    } else if (finalPrice === null) {
      return { outcome: 'unresolved', position, finalPrice, cost, pnlUsd: null, pnlPercent: null };
    } else {
      const strike = this.window.strikePrice;
      const won = position.direction === 'above' ? finalPrice > strike : finalPrice < strike;
      pnlUsd = won
        ? position.entrySize * (1 - position.entryPrice)
        : -position.entrySize * position.entryPrice;
    }

    return {
      outcome: pnlUsd > 0 ? 'win' : 'loss',
      position,
      finalPrice,
      cost,
      pnlUsd,
      pnlPercent: cost > 0 ? (pnlUsd / cost) * 100 : null,
    };
  }

  /**
   * Live holdings truncated to the close precision, or the entry size
   * when holdings cannot be read
   */
  private async closeSize(position: Position): Promise<number> {
    const holdings = await this.execution.currentHoldings(position.contractId);
    if (holdings !== null) {
      const size = floorToDecimals(holdings, this.config.closePrecision);
      if (size > 0) {
        return size;
      }
    }

    logger.warn('Holdings unavailable, closing recorded size', {
      contractId: position.contractId,
      holdings,
      entrySize: position.entrySize,
    });
    return position.entrySize;
  }

  /**
   * Run an order through the retry policy. Exhausted retries and
   * rejections become a failed result.
   */
  private async submit(
    contractId: string,
    label: string,
    operation: () => Promise<OrderResult>
  ): Promise<OrderResult> {
    try {
      return await this.retryPolicy.execute(operation, label);
    } catch (error) {
      const message = normalizeError(error).message;
      logger.error(`${label} failed`, { contractId, error: message });
      return failedOrder(message);
    }
  }

  private transition(to: PositionState): void {
    const from = this.currentState;
    this.currentState = to;
    logger.debug('Position state change', { window: this.window.slug, from, to });
    this.emit('stateChange', from, to);
  }
}
