/**
 * Telegram Client
 *
 * Handles communication with Telegram Bot API.
 * Sends plain text once per call; retrying is left to the poll loop.
 */

import TelegramBot from 'node-telegram-bot-api';
import { logger, maskSecret } from '../logger.js';
import type {
  TelegramClientConfig,
  TelegramTransport,
  DeliveryResult,
  DeliveryFailureKind,
} from './types.js';

export class TelegramClient {
  private bot: TelegramTransport;
  private chatId: string;

  constructor(config: TelegramClientConfig, transport?: TelegramTransport) {
    this.bot = transport ?? new TelegramBot(config.botToken);
    this.chatId = config.chatId;

    logger.info('Telegram client initialized', {
      chatId: maskSecret(config.chatId),
    });
  }

  /**
   * Send a message to the configured chat. Never throws.
   */
  public async sendMessage(text: string): Promise<DeliveryResult> {
    try {
      await this.bot.sendMessage(this.chatId, text);
      logger.debug('Telegram message sent successfully', { text });
      return { delivered: true };
    } catch (error) {
      const kind = this.classifyError(error);
      const message = error instanceof Error ? error.message : String(error);

      logger.error('Failed to send Telegram message', { kind, error: message });
      return { delivered: false, kind, error: message };
    }
  }

  /**
   * Verify the bot token is valid
   */
  public async verifyConnection(): Promise<boolean> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', {
        username: me.username,
      });
      return true;
    } catch (error) {
      logger.error('Failed to verify Telegram bot', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * ETELEGRAM means Telegram answered with an error; EFATAL and EPARSE
   * mean the request or its response was lost on the way.
   */
  private classifyError(error: unknown): DeliveryFailureKind {
    if (error && typeof error === 'object' && 'code' in error) {
      return error.code === 'ETELEGRAM' ? 'channel' : 'transport';
    }
    return 'transport';
  }
}
