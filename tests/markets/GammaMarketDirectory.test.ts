/**
 * Tests for GammaMarketDirectory
 */

import { describe, it, expect, vi } from 'vitest';
import axios, { type InternalAxiosRequestConfig } from 'axios';
import {
  GammaMarketDirectory,
  extractContracts,
  scheduleFor,
} from '../../src/markets/GammaMarketDirectory.js';
import type { StrikeSource } from '../../src/feeds/types.js';

const config = {
  baseUrl: 'https://gamma.test',
  slugPrefix: 'btc-updown-15m',
  windowMinutes: 15,
  timeoutMs: 1000,
};

// 2023-11-14T22:16:40Z, 1 minute 40 seconds into the window opened at 22:15:00
const NOW = 1_700_000_200_000;
const OPEN = 1_700_000_100_000;

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

const event = {
  id: '90210',
  slug: 'btc-updown-15m-1700000100',
  markets: [
    {
      clobTokenIds: '["tok-up", "tok-down"]',
      outcomes: '["Up", "Down"]',
    },
  ],
};

function strikes(price: number | null): StrikeSource {
  return { openPriceAt: vi.fn().mockResolvedValue(price) };
}

describe('scheduleFor', () => {
  it('should align the window to the clock', () => {
    expect(scheduleFor(NOW, 'btc-updown-15m', 15)).toEqual({
      slug: 'btc-updown-15m-1700000100',
      openTime: OPEN,
      closeTime: OPEN + 900_000,
    });
  });

  it('should start a new window exactly on the boundary', () => {
    expect(scheduleFor(OPEN + 900_000, 'btc-updown-15m', 15).slug).toBe('btc-updown-15m-1700001000');
  });
});

describe('extractContracts', () => {
  it('should order token ids by outcome name', () => {
    expect(
      extractContracts({ markets: [{ clobTokenIds: '["tok-down", "tok-up"]', outcomes: '["Down", "Up"]' }] })
    ).toEqual({ above: 'tok-up', below: 'tok-down' });
  });

  it('should accept arrays and fall back to listing order', () => {
    expect(extractContracts({ markets: [{ clobTokenIds: ['tok-a', 'tok-b'] }] })).toEqual({
      above: 'tok-a',
      below: 'tok-b',
    });
  });

  it('should skip markets without two token ids', () => {
    expect(
      extractContracts({
        markets: [{ clobTokenIds: '["tok-only"]' }, { clobTokenIds: 'not json' }],
      })
    ).toBeNull();
    expect(extractContracts(null)).toBeNull();
  });
});

describe('GammaMarketDirectory', () => {
  it('should build the active window with the strike at its open', async () => {
    const { http, requests } = stubHttp([event]);
    const strikeSource = strikes(99_950.5);
    const directory = new GammaMarketDirectory(config, strikeSource, http, () => NOW);

    const window = await directory.findActiveWindow();

    expect(window).toEqual({
      id: '90210',
      slug: 'btc-updown-15m-1700000100',
      strikePrice: 99_950.5,
      openTime: OPEN,
      closeTime: OPEN + 900_000,
      contracts: { above: 'tok-up', below: 'tok-down' },
    });
    expect(requests[0].url).toBe('/events');
    expect(requests[0].params).toEqual({ slug: 'btc-updown-15m-1700000100' });
    expect(strikeSource.openPriceAt).toHaveBeenCalledWith(OPEN);
  });

  it('should return null when the event is not listed yet', async () => {
    const { http } = stubHttp([]);
    const directory = new GammaMarketDirectory(config, strikes(99_950.5), http, () => NOW);

    expect(await directory.findActiveWindow()).toBeNull();
  });

  it('should return null while the strike is unknown', async () => {
    const { http } = stubHttp([event]);
    const directory = new GammaMarketDirectory(config, strikes(null), http, () => NOW);

    expect(await directory.findActiveWindow()).toBeNull();
  });

  it('should reject an invalid payload instead of throwing', async () => {
    const { http } = stubHttp([
      { id: '1', markets: [{ clobTokenIds: '["tok", "tok"]' }] },
    ]);
    const directory = new GammaMarketDirectory(config, strikes(99_950.5), http, () => NOW);

    expect(await directory.findActiveWindow()).toBeNull();
  });

  it('should return null when the lookup fails', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('getaddrinfo ENOTFOUND gamma.test');
      },
    });
    const directory = new GammaMarketDirectory(config, strikes(99_950.5), http, () => NOW);

    expect(await directory.findActiveWindow()).toBeNull();
  });
});
