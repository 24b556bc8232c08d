/**
 * Tests for CoinbasePriceSource
 */

import { describe, it, expect } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import { CoinbasePriceSource } from '../../src/feeds/CoinbasePriceSource.js';

const config = { baseUrl: 'https://coinbase.test', product: 'BTC-USD', timeoutMs: 1000 };

function stubHttp(data: unknown) {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (request) => {
      requests.push(request);
      return { data, status: 200, statusText: 'OK', headers: {}, config: request };
    },
  });
  return { http, requests };
}

describe('CoinbasePriceSource', () => {
  it('should read the spot amount of the product', async () => {
    const { http, requests } = stubHttp({ data: { amount: '100250.12', base: 'BTC', currency: 'USD' } });
    const source = new CoinbasePriceSource(config, http);

    expect(await source.latestPrice()).toBe(100250.12);
    expect(requests[0].url).toBe('/v2/prices/BTC-USD/spot');
    expect(source.name).toBe('coinbase');
  });

  it('should return null for an unexpected payload', async () => {
    const { http } = stubHttp({ errors: [{ id: 'not_found' }] });
    const source = new CoinbasePriceSource(config, http);

    expect(await source.latestPrice()).toBeNull();
  });

  it('should return null when the request fails', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('ETIMEDOUT');
      },
    });
    const source = new CoinbasePriceSource(config, http);

    expect(await source.latestPrice()).toBeNull();
  });
});
