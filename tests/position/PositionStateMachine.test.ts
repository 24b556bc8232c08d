/**
 * Tests for PositionStateMachine
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { PositionStateMachine } from '../../src/position/PositionStateMachine.js';
import { PositionSizer } from '../../src/execution/PositionSizer.js';
import { RetryPolicy } from '../../src/execution/RetryPolicy.js';
import { TransientOrderError, isTransientError } from '../../src/execution/errors.js';
import type { OrderExecution } from '../../src/execution/types.js';
import type { EntryContext, PositionMachineConfig } from '../../src/position/types.js';
import type { Direction, MarketWindow, OrderResult, ScoreBreakdown } from '../../src/types.js';

const window: MarketWindow = Object.freeze({
  id: 'evt-1',
  slug: 'btc-updown-15m-1700000100',
  strikePrice: 100_000,
  openTime: 1_700_000_100_000,
  closeTime: 1_700_001_000_000,
  contracts: Object.freeze({ above: 'tok-up', below: 'tok-down' }),
});

const config: PositionMachineConfig = {
  tradeWindowMin: 1,
  tradeWindowMax: 14,
  takeProfitPrice: 0.97,
  stopLossPercent: 0.3,
  strikeBarrierEnabled: true,
  closePrecision: 4,
};

function score(total: number, direction: Direction = 'above'): ScoreBreakdown {
  return {
    direction,
    band: 0,
    barrier: 0,
    depth: 0,
    value: 0,
    rawTotal: total,
    total,
    killSwitch: false,
    bandPosition: null,
    maxMove: null,
    depthRatio: null,
    contractPrice: 0.65,
  };
}

function entry(overrides: Partial<EntryContext> = {}): EntryContext {
  return {
    minutesLeft: 8,
    score: score(85),
    threshold: 75,
    gate: { passed: true, failures: [] },
    askPrice: 0.65,
    referencePrice: 100_200,
    timestamp: 1_700_000_400_000,
    ...overrides,
  };
}

function filled(size: number, price: number): OrderResult {
  return { success: true, orderId: 'o-1', filledSize: size, fillPrice: price, timestamp: 1 };
}

function rejected(error: string): OrderResult {
  return { success: false, filledSize: 0, fillPrice: 0, error, timestamp: 1 };
}

describe('PositionStateMachine', () => {
  let execution: {
    mode: 'paper';
    placeOrder: Mock<OrderExecution['placeOrder']>;
    currentHoldings: Mock<OrderExecution['currentHoldings']>;
  };
  let machine: PositionStateMachine;

  beforeEach(() => {
    execution = {
      mode: 'paper',
      placeOrder: vi.fn<OrderExecution['placeOrder']>(),
      currentHoldings: vi.fn<OrderExecution['currentHoldings']>().mockResolvedValue(7.69),
    };
    const sizer = new PositionSizer({ stakeUsd: 5, minOrderValueUsd: 1.05, sizePrecision: 2 });
    const retryPolicy = new RetryPolicy(
      { maxAttempts: 2, baseDelayMs: 10 },
      isTransientError,
      vi.fn().mockResolvedValue(undefined)
    );
    machine = new PositionStateMachine(config, window, execution, sizer, retryPolicy);
  });

  async function openPosition(): Promise<void> {
    execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.65));
    await machine.evaluateEntry(entry());
  }

  describe('evaluateEntry', () => {
    it('should open the favored contract at the filled price and size', async () => {
      execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.65));
      const opened = vi.fn();
      machine.on('opened', opened);

      const outcome = await machine.evaluateEntry(entry());

      // 5 USD / 0.65 = 7.6923 -> 7.69
      expect(execution.placeOrder).toHaveBeenCalledWith('tok-up', 'BUY', 0.65, 7.69);
      expect(outcome).toEqual({
        kind: 'filled',
        position: {
          contractId: 'tok-up',
          direction: 'above',
          entryPrice: 0.65,
          entrySize: 7.69,
          openedAt: 1_700_000_400_000,
          entryReferencePrice: 100_200,
          closed: false,
          close: null,
          closeAttempts: 0,
        },
      });
      expect(machine.state).toBe('open');
      expect(Object.isFrozen(machine.position)).toBe(true);
      expect(opened).toHaveBeenCalledTimes(1);
    });

    it('should buy the below contract for a below signal', async () => {
      execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.65));

      await machine.evaluateEntry(entry({ score: score(85, 'below') }));

      expect(execution.placeOrder).toHaveBeenCalledWith('tok-down', 'BUY', 0.65, 7.69);
    });

    it('should record the actual fill', async () => {
      execution.placeOrder.mockResolvedValueOnce(filled(5, 0.64));

      await machine.evaluateEntry(entry());

      expect(machine.position?.entryPrice).toBe(0.64);
      expect(machine.position?.entrySize).toBe(5);
    });

    it('should only act inside the trading window', async () => {
      expect(await machine.evaluateEntry(entry({ minutesLeft: 14.5 }))).toEqual({
        kind: 'outside-window',
      });
      expect(await machine.evaluateEntry(entry({ minutesLeft: 0.5 }))).toEqual({
        kind: 'outside-window',
      });
      expect(execution.placeOrder).not.toHaveBeenCalled();
    });

    it('should require the threshold', async () => {
      const outcome = await machine.evaluateEntry(entry({ score: score(74) }));

      expect(outcome).toEqual({ kind: 'below-threshold' });
      expect(machine.state).toBe('flat');
    });

    it('should respect the constraint gate', async () => {
      const failures = [{ constraint: 'contract-price-max' as const, limit: 0.85, observed: 0.9 }];

      const outcome = await machine.evaluateEntry(entry({ gate: { passed: false, failures } }));

      expect(outcome).toEqual({ kind: 'blocked', failures });
      expect(execution.placeOrder).not.toHaveBeenCalled();
    });

    it('should need a quote', async () => {
      expect(await machine.evaluateEntry(entry({ askPrice: null }))).toEqual({ kind: 'no-quote' });
    });

    it('should reject an unusable size', async () => {
      const outcome = await machine.evaluateEntry(entry({ askPrice: 1 }));

      expect(outcome).toEqual({ kind: 'invalid-size', reason: 'Contract price 1 is outside (0, 1)' });
      expect(machine.state).toBe('flat');
    });

    it('should hold at most one position', async () => {
      await openPosition();

      expect(await machine.evaluateEntry(entry())).toEqual({ kind: 'not-flat' });
      expect(execution.placeOrder).toHaveBeenCalledTimes(1);
    });

    it('should return to flat after a rejected entry', async () => {
      execution.placeOrder.mockResolvedValueOnce(rejected('not enough balance'));
      const entryFailed = vi.fn();
      machine.on('entryFailed', entryFailed);

      const outcome = await machine.evaluateEntry(entry());

      expect(outcome).toEqual({ kind: 'failed', error: 'not enough balance' });
      expect(machine.state).toBe('flat');
      expect(entryFailed).toHaveBeenCalledWith('not enough balance');
      expect(execution.placeOrder).toHaveBeenCalledTimes(1);
    });

    it('should treat a zero fill as a failed entry', async () => {
      execution.placeOrder.mockResolvedValueOnce(filled(0, 0.65));

      const outcome = await machine.evaluateEntry(entry());

      expect(outcome.kind).toBe('failed');
      expect(machine.position).toBeNull();
    });

    it('should retry transient failures', async () => {
      execution.placeOrder
        .mockRejectedValueOnce(new TransientOrderError('timeout'))
        .mockResolvedValueOnce(filled(7.69, 0.65));

      const outcome = await machine.evaluateEntry(entry());

      expect(outcome.kind).toBe('filled');
      expect(execution.placeOrder).toHaveBeenCalledTimes(2);
    });

    it('should give up after the retry budget', async () => {
      execution.placeOrder.mockRejectedValue(new TransientOrderError('timeout'));

      const outcome = await machine.evaluateEntry(entry());

      expect(outcome).toEqual({ kind: 'failed', error: 'timeout' });
      expect(execution.placeOrder).toHaveBeenCalledTimes(2);
      expect(machine.state).toBe('flat');
    });

    it('should allow a new entry on a later tick after a failure', async () => {
      execution.placeOrder
        .mockResolvedValueOnce(rejected('not filled'))
        .mockResolvedValueOnce(filled(7.69, 0.65));

      await machine.evaluateEntry(entry());
      const outcome = await machine.evaluateEntry(entry());

      expect(outcome.kind).toBe('filled');
    });
  });

  describe('evaluateExit', () => {
    it('should do nothing without an open position', async () => {
      expect(
        await machine.evaluateExit({ bidPrice: 0.99, referencePrice: 100_200, timestamp: 2 })
      ).toEqual({ kind: 'not-open' });
    });

    it('should hold while no condition fires', async () => {
      await openPosition();

      // (0.65 - 0.46) / 0.65 = 0.292 is under the stop
      const outcome = await machine.evaluateExit({
        bidPrice: 0.46,
        referencePrice: 100_010,
        timestamp: 2,
      });

      expect(outcome).toEqual({ kind: 'hold' });
      expect(machine.state).toBe('open');
    });

    it('should take profit at the target bid', async () => {
      await openPosition();
      execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.97));

      const outcome = await machine.evaluateExit({
        bidPrice: 0.97,
        referencePrice: 100_300,
        timestamp: 1_700_000_700_000,
      });

      expect(execution.placeOrder).toHaveBeenLastCalledWith('tok-up', 'SELL', 0.97, 7.69);
      expect(outcome.kind).toBe('closed');
      expect(machine.position?.close).toEqual({
        price: 0.97,
        size: 7.69,
        timestamp: 1_700_000_700_000,
        reason: 'take-profit',
        referencePrice: 100_300,
      });
      expect(machine.state).toBe('closed');
    });

    it('should rank take-profit over the strike barrier', async () => {
      await openPosition();

      expect(machine.closeReason({ bidPrice: 0.98, referencePrice: 99_900, timestamp: 2 })).toBe(
        'take-profit'
      );
    });

    it('should stop out beyond the loss limit', async () => {
      await openPosition();

      // (0.65 - 0.45) / 0.65 = 0.3077
      expect(machine.closeReason({ bidPrice: 0.45, referencePrice: 99_900, timestamp: 2 })).toBe(
        'stop-loss'
      );
    });

    it('should close when the reference reaches the strike', async () => {
      await openPosition();

      expect(
        machine.closeReason({ bidPrice: 0.6, referencePrice: 100_000, timestamp: 2 })
      ).toBe('strike-barrier');
      expect(machine.closeReason({ bidPrice: 0.6, referencePrice: 100_001, timestamp: 2 })).toBeNull();
    });

    it('should wait for a bid before closing', async () => {
      await openPosition();

      const outcome = await machine.evaluateExit({
        bidPrice: null,
        referencePrice: 99_950,
        timestamp: 2,
      });

      expect(outcome).toEqual({ kind: 'no-quote', reason: 'strike-barrier' });
      expect(machine.state).toBe('open');
    });

    it('should truncate live holdings to the close precision', async () => {
      await openPosition();
      execution.currentHoldings.mockResolvedValueOnce(7.691234567);
      execution.placeOrder.mockResolvedValueOnce(filled(7.6912, 0.97));

      await machine.evaluateExit({ bidPrice: 0.97, referencePrice: 100_300, timestamp: 2 });

      expect(execution.placeOrder).toHaveBeenLastCalledWith('tok-up', 'SELL', 0.97, 7.6912);
    });

    it('should fall back to the recorded size when holdings are unreadable', async () => {
      await openPosition();
      execution.currentHoldings.mockResolvedValueOnce(null);
      execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.97));

      await machine.evaluateExit({ bidPrice: 0.97, referencePrice: 100_300, timestamp: 2 });

      expect(execution.placeOrder).toHaveBeenLastCalledWith('tok-up', 'SELL', 0.97, 7.69);
    });

    it('should count failed closes and retry on the next tick', async () => {
      await openPosition();
      const closed = vi.fn();
      machine.on('closed', closed);
      execution.placeOrder
        .mockResolvedValueOnce(rejected('not enough balance / allowance'))
        .mockResolvedValueOnce(filled(7.69, 0.5));

      const first = await machine.evaluateExit({ bidPrice: 0.5, referencePrice: 99_900, timestamp: 2 });

      expect(first).toEqual({
        kind: 'close-failed',
        reason: 'strike-barrier',
        error: 'not enough balance / allowance',
        attempts: 1,
      });
      expect(machine.state).toBe('open');
      expect(machine.position?.closed).toBe(false);

      const second = await machine.evaluateExit({ bidPrice: 0.5, referencePrice: 99_900, timestamp: 3 });

      expect(second.kind).toBe('closed');
      expect(machine.position?.closeAttempts).toBe(1);
      expect(closed).toHaveBeenCalledTimes(1);
      expect(
        await machine.evaluateExit({ bidPrice: 0.5, referencePrice: 99_900, timestamp: 4 })
      ).toEqual({ kind: 'not-open' });
    });
    it('should keep the position open when reading holdings throws', async () => {
      await openPosition();
      const closeFailed = vi.fn();
      machine.on('closeFailed', closeFailed);
      execution.currentHoldings.mockRejectedValueOnce(new Error('malformed balance response'));

      const outcome = await machine.evaluateExit({ bidPrice: 0.97, referencePrice: 100_300, timestamp: 2 });

      expect(outcome).toEqual({
        kind: 'close-failed',
        reason: 'take-profit',
        error: 'malformed balance response',
        attempts: 1,
      });
      expect(machine.state).toBe('open');
      expect(machine.position?.closeAttempts).toBe(1);
      expect(closeFailed).toHaveBeenCalledTimes(1);
      expect(execution.placeOrder).toHaveBeenCalledTimes(1);

      execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.97));
      const retried = await machine.evaluateExit({ bidPrice: 0.97, referencePrice: 100_300, timestamp: 3 });

      expect(retried.kind).toBe('closed');
      expect(machine.settle(100_300).outcome).toBe('win');
    });

    it('should return to flat when the entry order throws synchronously', async () => {
      execution.placeOrder.mockImplementationOnce(() => {
        throw new Error('unexpected payload');
      });

      const outcome = await machine.evaluateEntry(entry());

      expect(outcome).toEqual({ kind: 'failed', error: 'unexpected payload' });
      expect(machine.state).toBe('flat');
      expect(machine.settle(100_100).outcome).toBe('no-signal');
    });
  });

  describe('settle', () => {
    it('should report no signal without a position', () => {
      const settlement = machine.settle(100_500);

      expect(settlement).toEqual({
        outcome: 'no-signal',
        position: null,
        finalPrice: 100_500,
        cost: null,
        pnlUsd: null,
        pnlPercent: null,
      });
      expect(machine.state).toBe('closed');
    });

    it('should pay out a winning open position', async () => {
      await openPosition();

      const settlement = machine.settle(100_100);

      // 7.69 * (1 - 0.65)
      expect(settlement.outcome).toBe('win');
      expect(settlement.pnlUsd).toBeCloseTo(2.6915, 6);
      expect(settlement.cost).toBeCloseTo(4.9985, 6);
      expect(settlement.pnlPercent).toBeCloseTo(53.846, 2);
    });

    it('should lose the stake when the final price sits on the strike', async () => {
      await openPosition();

      const settlement = machine.settle(100_000);

      expect(settlement.outcome).toBe('loss');
      expect(settlement.pnlUsd).toBeCloseTo(-4.9985, 6);
      expect(settlement.pnlPercent).toBeCloseTo(-100, 6);
    });

    it('should settle below positions on a lower final price', async () => {
      execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.65));
      await machine.evaluateEntry(entry({ score: score(85, 'below'), referencePrice: 99_800 }));

      expect(machine.settle(99_900).outcome).toBe('win');
    });

    it('should leave an open position unresolved without a final price', async () => {
      await openPosition();

      const settlement = machine.settle(null);

      expect(settlement.outcome).toBe('unresolved');
      expect(settlement.pnlUsd).toBeNull();
    });

    it('should realize the close of an already closed position', async () => {
      await openPosition();
      execution.placeOrder.mockResolvedValueOnce(filled(7.69, 0.97));
      await machine.evaluateExit({ bidPrice: 0.97, referencePrice: 100_300, timestamp: 2 });

      const settlement = machine.settle(null);

      // 7.69 * (0.97 - 0.65)
      expect(settlement.outcome).toBe('win');
      expect(settlement.pnlUsd).toBeCloseTo(2.4608, 6);
    });

    it('should settle once', async () => {
      await openPosition();

      const first = machine.settle(100_100);

      expect(machine.settle(99_000)).toBe(first);
    });
  });
});
