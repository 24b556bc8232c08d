/**
 * Coinbase spot price, the preferred reference price provider
 */

import axios, { type AxiosInstance } from 'axios';
import { logger, normalizeError } from '../logger.js';
import { isRecord, toFiniteNumber } from './parse.js';
import type { PriceProvider } from './types.js';

export interface CoinbasePriceSourceConfig {
  baseUrl: string;
  product: string;
  timeoutMs: number;
}

export class CoinbasePriceSource implements PriceProvider {
  readonly name = 'coinbase';

  private readonly config: CoinbasePriceSourceConfig;
  private readonly http: AxiosInstance;

  constructor(config: CoinbasePriceSourceConfig, http?: AxiosInstance) {
    this.config = config;
    this.http = http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs });
  }

  async latestPrice(): Promise<number | null> {
    try {
      const response = await this.http.get<unknown>(`/v2/prices/${this.config.product}/spot`);
      const body = response.data;
      if (!isRecord(body) || !isRecord(body.data)) {
        logger.warn('Unexpected Coinbase price payload', { product: this.config.product });
        return null;
      }
      return toFiniteNumber(body.data.amount);
    } catch (error) {
      logger.warn('Coinbase price unavailable', {
        product: this.config.product,
        error: normalizeError(error).message,
      });
      return null;
    }
  }
}
