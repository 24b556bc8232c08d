/**
 * Order Execution Types
 */

import type { OrderResult, OrderSide } from '../types.js';

/**
 * Order placement collaborator used by the Position State Machine.
 *
 * placeOrder() reports an application rejection either as
 * `success: false` or by throwing OrderRejectedError. Transient failures
 * throw TransientOrderError (or a network error) and may be retried.
 */
export interface OrderExecution {
  readonly mode: 'paper' | 'live';
  placeOrder(contractId: string, side: OrderSide, price: number, size: number): Promise<OrderResult>;

  /** Contracts currently held, or null if the balance cannot be read */
  currentHoldings(contractId: string): Promise<number | null>;
}

/**
 * Position sizing configuration
 */
export interface PositionSizerConfig {
  /** Amount to spend per entry in USD */
  stakeUsd: number;

  /** Venue minimum order value in USD */
  minOrderValueUsd: number;

  /** Decimal places of the contract size */
  sizePrecision: number;
}

/**
 * Position size calculation result
 */
export interface PositionSizeResult {
  /** Contracts to buy */
  size: number;

  /** size * price */
  cost: number;

  valid: boolean;
  reason?: string;
}

/**
 * Live CLOB client configuration
 */
export interface ClobOrderClientConfig {
  host: string;
  chainId: number;
  signatureType: number;
  privateKey: string;
  apiKey: string;
  apiSecret: string;
  apiPassphrase: string;
  funderAddress: string | null;
  fillPollAttempts: number;
  fillPollIntervalMs: number;
}
