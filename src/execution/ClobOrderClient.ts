/**
 * CLOB Order Client
 *
 * Live order placement on the Polymarket CLOB:
 * - limit orders signed with the configured wallet
 * - fill confirmation by polling the order's matched size
 * - holdings from the conditional token balance
 */

import { AssetType, ClobClient, Side } from '@polymarket/clob-client';
import { Wallet } from 'ethers';
import { logger, maskSecret, normalizeError } from '../logger.js';
import type { OrderResult, OrderSide } from '../types.js';
import { OrderRejectedError, TransientOrderError, isTransientError } from './errors.js';
import { defaultSleep, type Sleep } from './RetryPolicy.js';
import type { ClobOrderClientConfig, OrderExecution } from './types.js';

/** Conditional token balances above this are reported in micro-units */
const MICRO_UNIT_THRESHOLD = 1000;
const MICRO_UNITS = 1_000_000;

interface PostOrderResponse {
  orderId: string | null;
  status: string | null;
  error: string | null;
}

function readString(source: object, key: string): string | null {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' && value !== '' ? value : null;
}

/**
 * The client resolves to a loosely shaped object, including on HTTP errors
 */
export function parsePostOrderResponse(response: unknown): PostOrderResponse {
  if (typeof response !== 'object' || response === null) {
    return { orderId: null, status: null, error: 'Empty order response' };
  }

  const orderId = readString(response, 'orderID');
  const status = readString(response, 'status');
  const error = readString(response, 'errorMsg') ?? readString(response, 'error');
  const success: unknown = Reflect.get(response, 'success');

  if (success === false || orderId === null) {
    return { orderId, status, error: error ?? 'Order was not accepted' };
  }
  return { orderId, status, error: null };
}

/**
 * Convert a raw conditional token balance to contracts
 */
export function balanceToContracts(rawBalance: string): number | null {
  const raw = Number(rawBalance);
  if (!Number.isFinite(raw) || raw < 0) {
    return null;
  }
  return raw > MICRO_UNIT_THRESHOLD ? raw / MICRO_UNITS : raw;
}

export class ClobOrderClient implements OrderExecution {
  readonly mode = 'live';

  private readonly client: ClobClient;
  private readonly config: ClobOrderClientConfig;
  private readonly sleep: Sleep;

  constructor(config: ClobOrderClientConfig, sleep: Sleep = defaultSleep) {
    this.config = config;
    this.sleep = sleep;

    const wallet = new Wallet(config.privateKey);
    this.client = new ClobClient(
      config.host,
      config.chainId,
      wallet,
      {
        key: config.apiKey,
        secret: config.apiSecret,
        passphrase: config.apiPassphrase,
      },
      config.signatureType,
      config.funderAddress ?? undefined
    );

    logger.info('CLOB Order Client initialized', {
      host: config.host,
      chainId: config.chainId,
      apiKey: maskSecret(config.apiKey),
      wallet: maskSecret(wallet.address),
    });
  }

  /**
   * Place a limit order and wait for it to match.
   * An order still unmatched after polling is cancelled.
   */
  async placeOrder(
    contractId: string,
    side: OrderSide,
    price: number,
    size: number
  ): Promise<OrderResult> {
    let response: unknown;
    try {
      response = await this.client.createAndPostOrder({
        tokenID: contractId,
        price,
        size,
        side: side === 'BUY' ? Side.BUY : Side.SELL,
      });
    } catch (error) {
      throw this.classifyError(error, contractId);
    }

    const posted = parsePostOrderResponse(response);
    if (posted.error !== null || posted.orderId === null) {
      logger.warn('Order rejected by venue', { contractId, side, price, size, error: posted.error });
      return this.createFailedResult(posted.error ?? 'Order was not accepted');
    }

    const { orderId } = posted;
    logger.info('Order posted', { orderId, contractId, side, price, size, status: posted.status });

    if (posted.status === 'matched') {
      return this.createFilledResult(orderId, size, price);
    }

    const filledSize = await this.waitForFill(orderId);
    if (filledSize >= size - 1e-9) {
      return this.createFilledResult(orderId, size, price);
    }

    await this.cancelQuietly(orderId);

    if (filledSize > 0) {
      logger.warn('Order partially filled, remainder cancelled', { orderId, filledSize, size });
      return this.createFilledResult(orderId, filledSize, price);
    }

    return this.createFailedResult(`Order ${orderId} not filled`, orderId);
  }

  /**
   * Conditional token balance of the contract
   */
  async currentHoldings(contractId: string): Promise<number | null> {
    try {
      const response = await this.client.getBalanceAllowance({
        asset_type: AssetType.CONDITIONAL,
        token_id: contractId,
      });
      const holdings = balanceToContracts(response.balance);
      logger.debug('Holdings read', { contractId, raw: response.balance, holdings });
      return holdings;
    } catch (error) {
      logger.warn('Failed to read holdings', {
        contractId,
        error: normalizeError(error).message,
      });
      return null;
    }
  }

  /**
   * Poll the matched size of an order
   */
  private async waitForFill(orderId: string): Promise<number> {
    let matched = 0;

    for (let attempt = 1; attempt <= this.config.fillPollAttempts; attempt++) {
      await this.sleep(this.config.fillPollIntervalMs);

      try {
        const order = await this.client.getOrder(orderId);
        matched = Number(order.size_matched) || 0;
        const status = order.status.toUpperCase();

        if (status === 'MATCHED' || status === 'FILLED') {
          return matched;
        }
        if (status === 'CANCELED' || status === 'CANCELLED') {
          return matched;
        }
      } catch (error) {
        logger.debug('Order status unavailable', {
          orderId,
          attempt,
          error: normalizeError(error).message,
        });
      }
    }

    return matched;
  }

  private async cancelQuietly(orderId: string): Promise<void> {
    try {
      await this.client.cancelOrder({ orderID: orderId });
    } catch (error) {
      logger.warn('Failed to cancel unfilled order', {
        orderId,
        error: normalizeError(error).message,
      });
    }
  }

  private classifyError(error: unknown, contractId: string): Error {
    const normalized = normalizeError(error);
    if (isTransientError(error)) {
      return new TransientOrderError(normalized.message, { cause: error });
    }
    return new OrderRejectedError(normalized.message, contractId);
  }

  private createFilledResult(orderId: string, filledSize: number, fillPrice: number): OrderResult {
    return { success: true, orderId, filledSize, fillPrice, timestamp: Date.now() };
  }

  private createFailedResult(error: string, orderId?: string): OrderResult {
    return { success: false, orderId, filledSize: 0, fillPrice: 0, error, timestamp: Date.now() };
  }
}
