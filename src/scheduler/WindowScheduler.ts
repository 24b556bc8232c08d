/**
 * Window Scheduler
 *
 * The polling loop. Finds the active market window, ticks it until expiry,
 * settles it, reports it and moves on to the next one.
 *
 * Per tick:
 *   fetch (parallel) -> indicators -> score -> constraint gate
 *     -> exit check (open) or entry check (flat)
 *
 * Statistics cover the ticks evaluated for entry: flat and inside the
 * trading sub-window.
 */

import { EventEmitter } from 'eventemitter3';
import { logger, normalizeError } from '../logger.js';
import { defaultSleep, type Sleep } from '../execution/RetryPolicy.js';
import { FallbackValue, valueOf } from '../feeds/fallback.js';
import { bestAskOf, bestBidOf } from '../feeds/parse.js';
import { minutesLeft } from '../markets/window.js';
import type { PositionStateMachine } from '../position/PositionStateMachine.js';
import type { EntryOutcome, ExitOutcome } from '../position/types.js';
import { describeFailures } from '../risk/ConstraintGate.js';
import type { WindowReport } from '../reporting/types.js';
import { alignToReference, computeIndicators } from '../strategy/indicators.js';
import { favoredDirection } from '../strategy/ScoringEngine.js';
import type { DepthSnapshot, IndicatorSet, MarketWindow, PriceSample } from '../types.js';
import { EMPTY_SESSION, recordWindowOutcome, winRate, type SessionStats } from './SessionStats.js';
import { WindowStatistics, type TickVerdict } from './WindowStatistics.js';
import type {
  TickReport,
  TradeWindowPhase,
  WindowSchedulerConfig,
  WindowSchedulerDeps,
  WindowSchedulerEvents,
} from './types.js';

const NO_INDICATORS: IndicatorSet = { bands: null, atr: null, rsi: null };

function verdictOf(entry: EntryOutcome): TickVerdict {
  switch (entry.kind) {
    case 'filled':
    case 'failed':
      return 'signal';
    case 'blocked':
      return 'blocked';
    default:
      return 'none';
  }
}

/**
 * Everything scoped to a single window
 */
interface WindowRun {
  window: MarketWindow;
  machine: PositionStateMachine;
  statistics: WindowStatistics;
  price: FallbackValue<number>;
  candles: FallbackValue<PriceSample[]>;
  referenceBook: FallbackValue<DepthSnapshot>;
  aboveBook: FallbackValue<DepthSnapshot>;
  belowBook: FallbackValue<DepthSnapshot>;
  announced: Set<TradeWindowPhase>;
}

export class WindowScheduler extends EventEmitter<WindowSchedulerEvents> {
  private readonly config: WindowSchedulerConfig;
  private readonly deps: WindowSchedulerDeps;
  private readonly clock: () => number;
  private readonly sleep: Sleep;

  private sessionStats: SessionStats = EMPTY_SESSION;
  private lastSlug: string | null = null;
  private loop: Promise<void> | null = null;
  private stopping = false;
  private stopped = false;
  private readonly abort = new AbortController();

  constructor(config: WindowSchedulerConfig, deps: WindowSchedulerDeps) {
    super();
    this.config = config;
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;

    logger.info('Window Scheduler initialized', {
      tickIntervalMs: config.tickIntervalMs,
      candleCount: config.candleCount,
      tradeWindow: `${config.tradeWindowMin}-${config.tradeWindowMax}min`,
      sinks: deps.sinks.map((sink) => sink.name),
    });
  }

  get session(): SessionStats {
    return this.sessionStats;
  }

  get isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * Start the loop in the background
   */
  start(): void {
    if (this.stopped) {
      throw new Error('Window Scheduler cannot be restarted after stop()');
    }
    if (this.loop) {
      logger.warn('Window Scheduler already running');
      return;
    }

    this.stopping = false;
    this.loop = this.run().catch((error: unknown) => {
      const normalized = normalizeError(error);
      logger.error('Window Scheduler loop crashed', { error: normalized.message, stack: normalized.stack });
      this.loop = null;
      this.emit('error', normalized);
    });
  }

  /**
   * Stop after the current tick
   */
  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.stopping = true;
    this.abort.abort();

    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    await this.deps.fetcher.stop();

    logger.info('Window Scheduler stopped', { ...this.sessionStats });
  }

  private async run(): Promise<void> {
    while (!this.stopping) {
      const window = await this.discover();
      if (!window) {
        await this.pause(this.config.discoveryRetryMs);
        continue;
      }

      if (window.slug === this.lastSlug) {
        logger.debug('Window already processed, waiting for the next one', { slug: window.slug });
        await this.pause(this.config.nextWindowWaitMs);
        continue;
      }

      this.lastSlug = window.slug;
      await this.runWindow(window);

      if (!this.stopping) {
        await this.pause(this.config.nextWindowWaitMs);
      }
    }
  }

  private async discover(): Promise<MarketWindow | null> {
    try {
      const window = await this.deps.directory.findActiveWindow();
      if (!window) {
        logger.info('No active market window, retrying', {
          retryMs: this.config.discoveryRetryMs,
        });
        return null;
      }
      if (window.closeTime <= this.clock()) {
        logger.debug('Active window already expired', { slug: window.slug });
        return null;
      }
      return window;
    } catch (error) {
      logger.error('Market window lookup failed', { error: normalizeError(error).message });
      return null;
    }
  }

  /**
   * Tick one window until it expires, then settle and report it.
   * Returns null if the scheduler was stopped first or settlement failed.
   */
  async runWindow(window: MarketWindow): Promise<WindowReport | null> {
    const run = this.createRun(window);

    logger.info('Market window started', {
      slug: window.slug,
      strikePrice: window.strikePrice,
      closeTime: new Date(window.closeTime).toISOString(),
    });
    this.emit('windowStarted', window);

    while (!this.stopping) {
      const now = this.clock();
      if (now >= window.closeTime) {
        break;
      }

      this.announce(run, minutesLeft(window, now));

      try {
        const report = await this.tick(run, now);
        this.emit('tick', report);
      } catch (error) {
        const normalized = normalizeError(error);
        logger.error('Tick failed', { slug: window.slug, error: normalized.message, stack: normalized.stack });
        this.emit('error', normalized);
      }

      const remaining = window.closeTime - this.clock();
      if (remaining > 0) {
        await this.pause(Math.min(this.config.tickIntervalMs, remaining));
      }
    }

    if (this.clock() < window.closeTime) {
      if (run.machine.state !== 'flat') {
        logger.warn('Stopped before expiry with a position on the book', {
          slug: window.slug,
          state: run.machine.state,
          position: run.machine.position,
        });
      }
      return null;
    }

    try {
      return await this.settle(run);
    } catch (error) {
      const normalized = normalizeError(error);
      logger.error('Window settlement failed', {
        slug: window.slug,
        state: run.machine.state,
        error: normalized.message,
      });
      this.emit('error', normalized);
      return null;
    }
  }

  /**
   * Evaluate one tick of a window
   */
  private async tick(run: WindowRun, now: number): Promise<TickReport> {
    const { window, machine } = run;
    const { fetcher, prices, referenceBook, pricer, scoring, gate } = this.deps;

    const [price, candles, refBook, aboveBook, belowBook] = await Promise.all([
      fetcher.fetch('Reference price', () => prices.latestPrice()),
      fetcher.fetch('Candles', () => prices.recentCandles(this.config.candleCount)),
      fetcher.fetch('Reference book', () => referenceBook.orderBook()),
      fetcher.fetch('Above contract book', () => pricer.depth(window.contracts.above)),
      fetcher.fetch('Below contract book', () => pricer.depth(window.contracts.below)),
    ]);

    const resolvedPrice = run.price.resolve(price, now);
    const referencePrice = valueOf(resolvedPrice);
    if (referencePrice === null) {
      return { kind: 'skipped', slug: window.slug, timestamp: now, reason: 'reference price unavailable' };
    }

    const samples = valueOf(run.candles.resolve(candles, now));
    const indicators = samples
      ? computeIndicators(
          this.config.alignCandles ? alignToReference(samples, referencePrice) : samples,
          this.config.indicators
        )
      : NO_INDICATORS;

    const books = {
      above: valueOf(run.aboveBook.resolve(aboveBook, now)),
      below: valueOf(run.belowBook.resolve(belowBook, now)),
    };

    const left = minutesLeft(window, now);
    const direction = favoredDirection(referencePrice, window.strikePrice);
    const score = scoring.score({
      currentPrice: referencePrice,
      strikePrice: window.strikePrice,
      indicators,
      minutesLeft: left,
      contractPrice: bestAskOf(books[direction]),
      referenceBook: valueOf(run.referenceBook.resolve(refBook, now)),
    });

    const gateResult = gate.evaluate({
      contractPrice: score.contractPrice,
      depthRatio: score.depthRatio,
    });

    logger.info('Tick evaluated', {
      slug: window.slug,
      minutesLeft: Number(left.toFixed(2)),
      price: referencePrice,
      strike: window.strikePrice,
      direction: score.direction,
      score: `${score.total} (${score.band}/${score.barrier}/${score.depth}/${score.value})`,
      contractPrice: score.contractPrice,
      state: machine.state,
    });

    let entry: EntryOutcome | null = null;
    let exit: ExitOutcome | null = null;
    if (machine.state === 'open' && machine.position) {
      exit = await machine.evaluateExit({
        bidPrice: bestBidOf(books[machine.position.direction]),
        referencePrice,
        timestamp: now,
      });
    } else if (machine.state === 'flat') {
      entry = await machine.evaluateEntry({
        minutesLeft: left,
        score,
        threshold: scoring.threshold,
        gate: gateResult,
        askPrice: score.contractPrice,
        referencePrice,
        timestamp: now,
      });

      if (entry.kind !== 'outside-window') {
        run.statistics.record(score, verdictOf(entry));
      }
      if (entry.kind === 'blocked') {
        logger.info('Signal blocked', { slug: window.slug, failures: describeFailures(entry.failures) });
      }
    }

    return {
      kind: 'evaluated',
      slug: window.slug,
      timestamp: now,
      minutesLeft: left,
      referencePrice,
      score,
      gate: gateResult,
      entry,
      exit,
    };
  }

  private createRun(window: MarketWindow): WindowRun {
    const quoteOptions = { maxAgeMs: this.config.maxQuoteAgeMs };
    return {
      window,
      machine: this.deps.createMachine(window),
      statistics: new WindowStatistics(window.slug, window.strikePrice, this.clock()),
      price: new FallbackValue<number>('Reference price', 'skip-tick'),
      candles: new FallbackValue<PriceSample[]>('Candles', 'treat-as-missing'),
      referenceBook: new FallbackValue<DepthSnapshot>('Reference book', 'treat-as-missing'),
      aboveBook: new FallbackValue<DepthSnapshot>('Above contract book', 'reuse-last', quoteOptions),
      belowBook: new FallbackValue<DepthSnapshot>('Below contract book', 'reuse-last', quoteOptions),
      announced: new Set(),
    };
  }

  /**
   * Log entering the trading sub-window and approaching its end, once each
   */
  private announce(run: WindowRun, left: number): void {
    const { tradeWindowMin, tradeWindowMax } = this.config;

    if (!run.announced.has('open') && left <= tradeWindowMax && left >= tradeWindowMin) {
      run.announced.add('open');
      logger.info('Trading window open', {
        slug: run.window.slug,
        minutesLeft: Number(left.toFixed(2)),
        closesAt: `${tradeWindowMin}min before expiry`,
      });
      this.emit('tradeWindow', 'open', run.window);
    }

    if (!run.announced.has('closing') && left < tradeWindowMin) {
      run.announced.add('closing');
      logger.info('Trading window closed, holding until expiry', {
        slug: run.window.slug,
        minutesLeft: Number(left.toFixed(2)),
      });
      this.emit('tradeWindow', 'closing', run.window);
    }
  }

  private async settle(run: WindowRun): Promise<WindowReport> {
    const { window, machine, statistics } = run;

    const finalPrice = await this.deps.fetcher.fetch('Final price', () =>
      this.deps.prices.latestPrice()
    );
    const settlement = machine.settle(finalPrice);
    this.sessionStats = recordWindowOutcome(this.sessionStats, settlement);

    const report: WindowReport = {
      window,
      statistics: statistics.toJSON(),
      averages: statistics.averages(),
      settlement,
      session: this.sessionStats,
      settledAt: this.clock(),
    };

    for (const sink of this.deps.sinks) {
      try {
        await sink.recordWindow(report);
      } catch (error) {
        logger.error('Report sink failed', {
          sink: sink.name,
          slug: window.slug,
          error: normalizeError(error).message,
        });
      }
    }

    const rate = winRate(this.sessionStats);
    logger.info('Session summary', {
      markets: this.sessionStats.windows,
      signals: this.sessionStats.signals,
      wins: this.sessionStats.wins,
      losses: this.sessionStats.losses,
      winRate: rate === null ? null : `${(rate * 100).toFixed(1)}%`,
      realizedPnl: Number(this.sessionStats.realizedPnl.toFixed(2)),
      preset: this.deps.scoring.presetName,
    });

    this.emit('windowSettled', report);
    return report;
  }

  /**
   * Sleep that ends early when the scheduler is stopped
   */
  private async pause(ms: number): Promise<void> {
    if (this.stopping) {
      return;
    }
    await this.sleep(ms, this.abort.signal);
  }
}
