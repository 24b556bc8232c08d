/**
 * Telegram Report Sink
 *
 * Posts a summary of every settled window, plus startup and shutdown notices.
 */

import { logger } from '../logger.js';
import type { SessionStats } from '../scheduler/SessionStats.js';
import { formatShutdownMessage, formatStartupMessage, formatWindowMessage } from './formatter.js';
import type { MessageSender, ReportSink, WindowReport } from './types.js';

export class TelegramReportSink implements ReportSink {
  readonly name = 'telegram';

  private readonly sender: MessageSender;
  private readonly now: () => number;

  constructor(sender: MessageSender, now: () => number = Date.now) {
    this.sender = sender;
    this.now = now;
  }

  async recordWindow(report: WindowReport): Promise<void> {
    const sent = await this.sender.sendMessage(formatWindowMessage(report));
    if (!sent) {
      throw new Error(`Window report for ${report.window.slug} was not delivered`);
    }
  }

  async notifyStartup(mode: 'paper' | 'live', preset: string): Promise<void> {
    const sent = await this.sender.sendMessage(formatStartupMessage(mode, preset, this.now()));
    if (!sent) {
      logger.warn('Startup notification was not delivered');
    }
  }

  async notifyShutdown(reason: string, session: SessionStats): Promise<void> {
    const sent = await this.sender.sendMessage(formatShutdownMessage(reason, session, this.now()));
    if (!sent) {
      logger.warn('Shutdown notification was not delivered');
    }
  }
}
