/**
 * Paper Order Client
 *
 * Fills every valid order in full at the requested price and keeps
 * holdings in memory. Used whenever live execution is disabled.
 */

import { logger } from '../logger.js';
import type { OrderResult, OrderSide } from '../types.js';
import type { OrderExecution } from './types.js';

export class PaperOrderClient implements OrderExecution {
  readonly mode = 'paper';

  private readonly holdings: Map<string, number> = new Map();
  private readonly now: () => number;
  private orderSequence = 0;

  constructor(now: () => number = Date.now) {
    this.now = now;
    logger.info('Paper Order Client initialized');
  }

  async placeOrder(
    contractId: string,
    side: OrderSide,
    price: number,
    size: number
  ): Promise<OrderResult> {
    const timestamp = this.now();

    if (!(price > 0 && price < 1) || !(size > 0)) {
      return this.createFailedResult(`Invalid order ${side} ${size} @ ${price}`, timestamp);
    }

    const held = this.holdings.get(contractId) ?? 0;
    if (side === 'SELL' && size > held + 1e-9) {
      return this.createFailedResult(`Insufficient balance: ${held} < ${size}`, timestamp);
    }

    const next = side === 'BUY' ? held + size : Math.max(0, held - size);
    this.holdings.set(contractId, parseFloat(next.toFixed(6)));
    this.orderSequence++;

    const orderId = `paper-${this.orderSequence}`;
    logger.info('Paper order filled', { orderId, contractId, side, price, size });

    return {
      success: true,
      orderId,
      filledSize: size,
      fillPrice: price,
      timestamp,
    };
  }

  async currentHoldings(contractId: string): Promise<number | null> {
    return this.holdings.get(contractId) ?? 0;
  }

  private createFailedResult(error: string, timestamp: number): OrderResult {
    logger.warn('Paper order rejected', { error });
    return { success: false, filledSize: 0, fillPrice: 0, error, timestamp };
  }
}
