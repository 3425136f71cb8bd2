/**
 * Types for Notification Service
 */

import type TelegramBot from 'node-telegram-bot-api';

/**
 * Configuration for Telegram client
 */
export interface TelegramClientConfig {
  botToken: string;
  chatId: string;
}

/**
 * The part of the bot API the client uses
 */
export type TelegramTransport = Pick<TelegramBot, 'sendMessage' | 'getMe'>;

/**
 * Anything that can deliver a text message and report success
 */
export interface Notifier {
  notify(message: string): Promise<boolean>;
}

/**
 * Why a message could not be delivered
 * - channel: Telegram rejected the request (bad chat id, blocked bot, 429)
 * - transport: the request never got a Telegram answer
 */
export type DeliveryFailureKind = 'channel' | 'transport';

export type DeliveryResult =
  | { delivered: true }
  | { delivered: false; kind: DeliveryFailureKind; error: string };
