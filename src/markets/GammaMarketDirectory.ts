/**
 * Gamma Market Directory
 *
 * Up/down windows are aligned to the clock: the live window starts at the
 * last multiple of the window length and its slug ends with the start epoch
 * in seconds. The event lookup supplies the two contract token ids; the
 * strike is the reference open price at the window start.
 */

import axios, { type AxiosInstance } from 'axios';
import { logger, normalizeError } from '../logger.js';
import type { StrikeSource } from '../feeds/types.js';
import { isRecord } from '../feeds/parse.js';
import type { ContractPair, MarketWindow } from '../types.js';
import { createMarketWindow, InvalidMarketWindowError } from './window.js';
import type { GammaMarketDirectoryConfig, MarketDirectory } from './types.js';

export interface WindowSchedule {
  slug: string;
  openTime: number;
  closeTime: number;
}

/**
 * Window containing `now`
 */
export function scheduleFor(now: number, slugPrefix: string, windowMinutes: number): WindowSchedule {
  const length = windowMinutes * 60_000;
  const openTime = Math.floor(now / length) * length;
  return {
    slug: `${slugPrefix}-${openTime / 1000}`,
    openTime,
    closeTime: openTime + length,
  };
}

function parseJsonArray(value: unknown): unknown[] | null {
  if (Array.isArray(value)) {
    return value;
  }
  if (typeof value !== 'string') {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Token ids of the first market carrying two of them, ordered by outcome
 * name when outcomes are listed, otherwise [up, down]
 */
export function extractContracts(event: unknown): ContractPair | null {
  if (!isRecord(event) || !Array.isArray(event.markets)) {
    return null;
  }

  for (const market of event.markets) {
    if (!isRecord(market)) continue;

    const tokenIds = parseJsonArray(market.clobTokenIds);
    if (!tokenIds || tokenIds.length < 2) continue;

    const ids = tokenIds.map((id) => (typeof id === 'string' ? id : ''));
    const outcomes = (parseJsonArray(market.outcomes) ?? []).map((o) =>
      typeof o === 'string' ? o.toLowerCase() : ''
    );

    const upIndex = outcomes.findIndex((o) => o === 'up' || o === 'yes');
    const downIndex = outcomes.findIndex((o) => o === 'down' || o === 'no');
    if (upIndex >= 0 && downIndex >= 0) {
      return { above: ids[upIndex] ?? '', below: ids[downIndex] ?? '' };
    }

    return { above: ids[0], below: ids[1] };
  }

  return null;
}

export class GammaMarketDirectory implements MarketDirectory {
  private readonly config: GammaMarketDirectoryConfig;
  private readonly strikes: StrikeSource;
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(
    config: GammaMarketDirectoryConfig,
    strikes: StrikeSource,
    http?: AxiosInstance,
    now: () => number = Date.now
  ) {
    this.config = config;
    this.strikes = strikes;
    this.http = http ?? axios.create({ baseURL: config.baseUrl, timeout: config.timeoutMs });
    this.now = now;
  }

  async findActiveWindow(): Promise<MarketWindow | null> {
    const schedule = scheduleFor(this.now(), this.config.slugPrefix, this.config.windowMinutes);

    const event = await this.fetchEvent(schedule.slug);
    if (!event) {
      return null;
    }

    const contracts = extractContracts(event);
    if (!contracts) {
      logger.warn('Market event has no contract token ids', { slug: schedule.slug });
      return null;
    }

    const strikePrice = await this.strikes.openPriceAt(schedule.openTime);
    if (strikePrice === null) {
      logger.warn('Strike price not available yet', { slug: schedule.slug });
      return null;
    }

    try {
      const window = createMarketWindow({
        id: isRecord(event) ? String(event.id ?? schedule.slug) : schedule.slug,
        slug: schedule.slug,
        strikePrice,
        openTime: schedule.openTime,
        closeTime: schedule.closeTime,
        contracts,
      });

      logger.info('Market window found', {
        slug: window.slug,
        strikePrice: window.strikePrice,
        closeTime: new Date(window.closeTime).toISOString(),
      });
      return window;
    } catch (error) {
      if (error instanceof InvalidMarketWindowError) {
        logger.warn('Rejected market payload', { slug: schedule.slug, error: error.message });
        return null;
      }
      throw error;
    }
  }

  private async fetchEvent(slug: string): Promise<unknown> {
    try {
      const response = await this.http.get<unknown>('/events', { params: { slug } });
      const events = response.data;
      if (!Array.isArray(events) || events.length === 0) {
        logger.info('Market not listed yet', { slug });
        return null;
      }
      return events[0];
    } catch (error) {
      logger.warn('Market lookup failed', { slug, error: normalizeError(error).message });
      return null;
    }
  }
}
