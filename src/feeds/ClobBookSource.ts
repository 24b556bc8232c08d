/**
 * CLOB Book Source
 *
 * Contract quotes from the public order book endpoint.
 */

import axios, { type AxiosInstance } from 'axios';
import { logger, normalizeError } from '../logger.js';
import type { DepthSnapshot } from '../types.js';
import { bestAskOf, bestBidOf, parseDepthSnapshot } from './parse.js';
import type { ContractPricer } from './types.js';

export interface ClobBookSourceConfig {
  baseUrl: string;
  timeoutMs: number;
}

export class ClobBookSource implements ContractPricer {
  private readonly http: AxiosInstance;

  constructor(config: ClobBookSourceConfig, http?: AxiosInstance) {
    this.http = http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs });
  }

  async depth(contractId: string): Promise<DepthSnapshot | null> {
    try {
      const response = await this.http.get<unknown>('/book', { params: { token_id: contractId } });
      const book = parseDepthSnapshot(response.data);
      if (!book) {
        logger.warn('Unexpected order book payload', { contractId });
      }
      return book;
    } catch (error) {
      logger.warn('Contract order book unavailable', {
        contractId,
        error: normalizeError(error).message,
      });
      return null;
    }
  }

  async bestAsk(contractId: string): Promise<number | null> {
    return bestAskOf(await this.depth(contractId));
  }

  async bestBid(contractId: string): Promise<number | null> {
    return bestBidOf(await this.depth(contractId));
  }
}
