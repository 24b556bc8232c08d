/**
 * Order execution errors
 *
 * Rejections are terminal for the attempt. Transient failures are retried
 * by the RetryPolicy and then treated as rejections.
 */

import axios from 'axios';
import Bottleneck from 'bottleneck';

export class OrderRejectedError extends Error {
  readonly contractId: string;

  constructor(message: string, contractId: string) {
    super(message);
    this.name = 'OrderRejectedError';
    this.contractId = contractId;
  }
}

export class TransientOrderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientOrderError';
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNABORTED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
]);

/**
 * Timeouts, dropped connections, 429 and 5xx responses
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientOrderError || error instanceof Bottleneck.BottleneckError) {
    return true;
  }

  if (axios.isAxiosError(error)) {
    if (error.code !== undefined && TRANSIENT_NETWORK_CODES.has(error.code)) {
      return true;
    }
    const status = error.response?.status;
    return status === undefined || status === 429 || status >= 500;
  }

  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return TRANSIENT_NETWORK_CODES.has(error.code);
  }

  return false;
}
