/**
 * Notification Service
 *
 * Output layer that relays homework status messages to the chat.
 * Reports delivery as a boolean so the poll loop decides what to retry.
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { TelegramClient } from './TelegramClient.js';
import type { Notifier, TelegramClientConfig, TelegramTransport, DeliveryFailureKind } from './types.js';

interface NotificationEventTypes {
  sent: [string];
  failed: [string, DeliveryFailureKind];
}

export class NotificationService
  extends EventEmitter<NotificationEventTypes>
  implements Notifier
{
  private client: TelegramClient;

  constructor(config: TelegramClientConfig, transport?: TelegramTransport) {
    super();

    this.client = new TelegramClient(config, transport);

    logger.info('Notification Service initialized');
  }

  /**
   * Verify Telegram connection on startup
   */
  public async verifyConnection(): Promise<boolean> {
    return this.client.verifyConnection();
  }

  /**
   * Deliver a message. Resolves false on any delivery failure, never rejects.
   */
  public async notify(message: string): Promise<boolean> {
    const result = await this.client.sendMessage(message);

    if (result.delivered) {
      this.emit('sent', message);
      return true;
    }

    this.emit('failed', message, result.kind);
    return false;
  }
}
