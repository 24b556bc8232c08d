/**
 * Telegram Client
 *
 * Sends messages through the Telegram Bot API with retries and
 * rate limit handling.
 */

import TelegramBot from 'node-telegram-bot-api';
import { isRecord } from '../feeds/parse.js';
import { logger, maskSecret, normalizeError } from '../logger.js';
import { defaultSleep, type Sleep } from '../execution/RetryPolicy.js';
import type { MessageSender } from './types.js';

export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
  retryAttempts: number;
  retryDelayMs: number;
}

/**
 * HTTP status and retry_after (seconds) of a Bot API error, when present
 */
function readErrorResponse(error: unknown): { statusCode: number | null; retryAfter: number | null } {
  if (!isRecord(error) || !isRecord(error.response)) {
    return { statusCode: null, retryAfter: null };
  }

  const { response } = error;
  const statusCode = typeof response.statusCode === 'number' ? response.statusCode : null;

  let retryAfter: number | null = null;
  if (isRecord(response.body) && isRecord(response.body.parameters)) {
    const value = response.body.parameters.retry_after;
    retryAfter = typeof value === 'number' && value > 0 ? value : null;
  }

  return { statusCode, retryAfter };
}

export class TelegramClient implements MessageSender {
  private readonly bot: TelegramBot;
  private readonly chatId: string;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly sleep: Sleep;

  constructor(config: TelegramClientConfig, sleep: Sleep = defaultSleep) {
    this.bot = new TelegramBot(config.botToken);
    this.chatId = config.chatId;
    this.retryAttempts = Math.max(1, config.retryAttempts);
    this.retryDelayMs = config.retryDelayMs;
    this.sleep = sleep;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a message with retry logic
   * Returns true if message was sent successfully
   */
  async sendMessage(text: string, parseMode: 'Markdown' | 'HTML' = 'Markdown'): Promise<boolean> {
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        await this.bot.sendMessage(this.chatId, text, {
          parse_mode: parseMode,
          disable_web_page_preview: true,
        });

        logger.debug('Telegram message sent successfully', { attempt });
        return true;
      } catch (error) {
        lastError = normalizeError(error);
        const { statusCode, retryAfter } = readErrorResponse(error);

        if (statusCode === 429) {
          const waitTime = retryAfter !== null ? retryAfter * 1000 : this.retryDelayMs * attempt;
          logger.warn('Telegram rate limit hit, waiting...', { attempt, waitTime });
          await this.sleep(waitTime);
        } else if (attempt < this.retryAttempts) {
          logger.warn('Telegram send failed, retrying...', {
            attempt,
            error: lastError.message,
          });
          await this.sleep(this.retryDelayMs * attempt);
        }
      }
    }

    logger.error('Failed to send Telegram message after all retries', {
      error: lastError?.message,
    });
    return false;
  }

  /**
   * Verify the bot token is valid
   */
  async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', { username: me.username });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', {
        error: normalizeError(error).message,
      });
      return false;
    }
  }
}
