/**
 * Application
 *
 * Wires the collaborators and runs the window loop:
 * Market Directory → Window Scheduler → Scoring / Constraint Gate
 *   → Position State Machine → Order Execution → Report Sinks
 */

import { logger } from './logger.js';
import { assertLiveCredentials, config } from './config.js';
import {
  ClobOrderClient,
  PaperOrderClient,
  PositionSizer,
  RetryPolicy,
  type OrderExecution,
} from './execution/index.js';
import {
  BinancePriceSource,
  ClobBookSource,
  CoinbasePriceSource,
  RankedPriceFeed,
} from './feeds/index.js';
import { GammaMarketDirectory } from './markets/index.js';
import { PositionStateMachine } from './position/index.js';
import {
  CsvReportSink,
  TelegramClient,
  TelegramReportSink,
  type ReportSink,
} from './reporting/index.js';
import { ConstraintGate } from './risk/index.js';
import { TickFetcher, WindowScheduler } from './scheduler/index.js';
import { ScoringEngine, resolvePreset } from './strategy/index.js';
import type { MarketWindow } from './types.js';

export class App {
  private readonly execution: OrderExecution;
  private readonly scoring: ScoringEngine;
  private readonly scheduler: WindowScheduler;
  private readonly telegram: TelegramReportSink | null;
  private isRunning = false;

  constructor() {
    this.execution = this.createExecution();
    this.scoring = new ScoringEngine(resolvePreset(config.scoring.preset));

    const binance = new BinancePriceSource({
      symbol: config.market.referenceSymbol,
      depthLimit: config.market.referenceDepthLimit,
    });
    const coinbase = new CoinbasePriceSource({
      baseUrl: config.market.coinbaseApiUrl,
      product: config.market.coinbaseProduct,
      timeoutMs: config.loop.fetchTimeoutMs,
    });

    const directory = new GammaMarketDirectory(
      {
        baseUrl: config.market.gammaApiUrl,
        slugPrefix: config.market.slugPrefix,
        windowMinutes: config.market.windowMinutes,
        timeoutMs: config.loop.fetchTimeoutMs,
      },
      binance
    );

    const sizer = new PositionSizer({
      stakeUsd: config.execution.stakeUsd,
      minOrderValueUsd: config.execution.minOrderValueUsd,
      sizePrecision: config.execution.sizePrecision,
    });
    const retryPolicy = new RetryPolicy({
      maxAttempts: config.execution.retryAttempts,
      baseDelayMs: config.execution.retryBaseDelayMs,
    });

    this.telegram = this.createTelegramSink();
    const sinks: ReportSink[] = [new CsvReportSink({ path: config.reporting.csvPath })];
    if (this.telegram) {
      sinks.push(this.telegram);
    }

    this.scheduler = new WindowScheduler(
      {
        candleCount: config.indicators.candleCount,
        indicators: {
          bollingerPeriod: config.indicators.bollingerPeriod,
          bollingerStdDev: config.indicators.bollingerStdDev,
          atrPeriod: config.indicators.atrPeriod,
          rsiPeriod: config.indicators.rsiPeriod,
        },
        alignCandles: config.indicators.alignCandles,
        tickIntervalMs: config.loop.tickIntervalMs,
        nextWindowWaitMs: config.loop.nextWindowWaitMs,
        discoveryRetryMs: config.loop.discoveryRetryMs,
        maxQuoteAgeMs: config.loop.maxQuoteAgeMs,
        tradeWindowMin: config.tradeWindow.minMinutes,
        tradeWindowMax: config.tradeWindow.maxMinutes,
      },
      {
        directory,
        prices: new RankedPriceFeed([coinbase, binance], binance),
        referenceBook: binance,
        pricer: new ClobBookSource({
          baseUrl: config.market.clobApiUrl,
          timeoutMs: config.loop.fetchTimeoutMs,
        }),
        fetcher: new TickFetcher({
          concurrency: config.loop.fetchConcurrency,
          timeoutMs: config.loop.fetchTimeoutMs,
        }),
        scoring: this.scoring,
        gate: new ConstraintGate(config.constraints),
        createMachine: (window) => this.createMachine(window, sizer, retryPolicy),
        sinks,
      }
    );

    this.setupEventHandlers();
  }

  private createExecution(): OrderExecution {
    if (!config.execution.enabled) {
      logger.info('Live execution disabled (EXECUTION_ENABLED=false), paper trading');
      return new PaperOrderClient();
    }

    const credentials = assertLiveCredentials(config.polymarket);
    return new ClobOrderClient({
      host: config.market.clobApiUrl,
      chainId: config.polymarket.chainId,
      signatureType: config.polymarket.signatureType,
      privateKey: credentials.privateKey,
      apiKey: credentials.apiKey,
      apiSecret: credentials.apiSecret,
      apiPassphrase: credentials.apiPassphrase,
      funderAddress: credentials.funderAddress,
      fillPollAttempts: config.execution.fillPollAttempts,
      fillPollIntervalMs: config.execution.fillPollIntervalMs,
    });
  }

  private createTelegramSink(): TelegramReportSink | null {
    const { telegramBotToken, telegramChatId } = config.reporting;
    if (telegramBotToken === null || telegramChatId === null) {
      logger.info('Telegram reporting disabled (TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID not set)');
      return null;
    }

    return new TelegramReportSink(
      new TelegramClient({
        botToken: telegramBotToken,
        chatId: telegramChatId,
        retryAttempts: config.reporting.telegramRetryAttempts,
        retryDelayMs: config.reporting.telegramRetryDelayMs,
      })
    );
  }

  private createMachine(
    window: MarketWindow,
    sizer: PositionSizer,
    retryPolicy: RetryPolicy
  ): PositionStateMachine {
    const machine = new PositionStateMachine(
      {
        tradeWindowMin: config.tradeWindow.minMinutes,
        tradeWindowMax: config.tradeWindow.maxMinutes,
        takeProfitPrice: config.exit.takeProfitPrice,
        stopLossPercent: config.exit.stopLossPercent,
        strikeBarrierEnabled: config.exit.strikeBarrierEnabled,
        closePrecision: config.execution.closePrecision,
      },
      window,
      this.execution,
      sizer,
      retryPolicy
    );

    machine.on('entryFailed', (error) => {
      logger.warn('Entry failed, window stays flat', { slug: window.slug, error });
    });

    machine.on('closeFailed', (position, error) => {
      logger.error('Close failed, position still open', {
        slug: window.slug,
        contractId: position.contractId,
        attempts: position.closeAttempts,
        error,
      });
    });

    return machine;
  }

  private setupEventHandlers(): void {
    this.scheduler.on('error', (error) => {
      logger.error('Window Scheduler error', { error: error.message });
    });

    this.scheduler.on('tradeWindow', (phase, window) => {
      logger.debug('Trading window phase', { phase, slug: window.slug });
    });

    this.scheduler.on('windowSettled', (report) => {
      logger.info('Window report recorded', {
        slug: report.window.slug,
        outcome: report.settlement.outcome,
        pnlUsd: report.settlement.pnlUsd,
      });
    });
  }

  /**
   * Start the application
   */
  async start(): Promise<void> {
    logger.info('Starting Strike Window Trader', {
      slugPrefix: config.market.slugPrefix,
      referenceSymbol: config.market.referenceSymbol,
      preset: this.scoring.presetName,
      execution: this.execution.mode,
    });

    if (this.telegram) {
      await this.telegram.notifyStartup(this.execution.mode, this.scoring.presetName);
    }

    this.scheduler.start();
    this.isRunning = true;

    logger.info('Trader started successfully');
  }

  /**
   * Stop the application gracefully
   */
  async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;

    logger.info('Stopping Strike Window Trader', { reason });
    this.isRunning = false;

    await this.scheduler.stop();

    if (this.telegram) {
      await this.telegram.notifyShutdown(reason, this.scheduler.session);
    }

    logger.info('Trader stopped successfully');
  }

  getStatus(): {
    isRunning: boolean;
    execution: 'paper' | 'live';
    preset: string;
    windows: number;
    realizedPnl: number;
  } {
    return {
      isRunning: this.isRunning,
      execution: this.execution.mode,
      preset: this.scoring.presetName,
      windows: this.scheduler.session.windows,
      realizedPnl: this.scheduler.session.realizedPnl,
    };
  }
}
