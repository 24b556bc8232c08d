/**
 * Tick Fetcher
 *
 * Runs a tick's independent reads concurrently through a bottleneck limiter.
 * Each read has its own deadline; failures and timeouts become null.
 */

import Bottleneck from 'bottleneck';
import { logger, normalizeError } from '../logger.js';

export interface TickFetcherConfig {
  /** Reads in flight at once */
  concurrency: number;

  /** Deadline of a single read */
  timeoutMs: number;
}

export class TickFetcher {
  private readonly config: TickFetcherConfig;
  private readonly limiter: Bottleneck;

  constructor(config: TickFetcherConfig) {
    this.config = config;
    this.limiter = new Bottleneck({ maxConcurrent: Math.max(1, config.concurrency) });

    this.limiter.on('error', (error: unknown) => {
      logger.error('Fetch limiter error', { error: normalizeError(error).message });
    });
  }

  /**
   * Run one read. Resolves to null on failure or timeout, never rejects.
   */
  async fetch<T>(label: string, read: () => Promise<T | null>): Promise<T | null> {
    try {
      return await this.limiter.schedule({ expiration: this.config.timeoutMs }, read);
    } catch (error) {
      logger.warn(`${label} fetch failed`, { error: normalizeError(error).message });
      return null;
    }
  }

  /**
   * Drop queued reads
   */
  async stop(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: true });
  }
}
