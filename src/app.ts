/**
 * Application
 *
 * Wires the modules together:
 * Practicum Client → Homework Poller → Notification Service
 */

import { logger } from './logger.js';
import type { AppConfig } from './config.js';
import { PracticumClient } from './practicum/index.js';
import { NotificationService } from './notification/index.js';
import { HomeworkPoller } from './poller/index.js';

export class App {
  private practicumClient: PracticumClient;
  private notificationService: NotificationService;
  private poller: HomeworkPoller;
  private isRunning = false;

  constructor(private readonly config: AppConfig) {
    // Initialize Practicum Client
    this.practicumClient = new PracticumClient({
      endpoint: config.practicum.endpoint,
      token: config.credentials.practicumToken,
      requestTimeoutMs: config.practicum.requestTimeoutMs,
    });

    // Initialize Notification Service
    this.notificationService = new NotificationService({
      botToken: config.credentials.telegramToken,
      chatId: config.credentials.telegramChatId,
    });

    // Initialize Homework Poller
    this.poller = new HomeworkPoller(
      { retryPeriodMs: config.polling.retryPeriodMs },
      { source: this.practicumClient, notifier: this.notificationService }
    );

    this.setupEvents();
  }

  private setupEvents(): void {
    this.poller.on('polled', (outcome) => {
      switch (outcome.status) {
        case 'notified':
          logger.info('Status change delivered', { message: outcome.message });
          break;
        case 'unchanged':
          logger.debug('Status unchanged', { message: outcome.message });
          break;
        case 'delivery_failed':
          logger.warn('Status change not delivered, will retry', { message: outcome.message });
          break;
        case 'failed':
          logger.debug('Poll failed', {
            message: outcome.message,
            relayed: outcome.notified,
          });
          break;
      }
      logger.debug('Poll state', this.poller.getState());
    });
  }

  /**
   * Start the application
   */
  public async start(): Promise<void> {
    logger.info('Starting Homework Status Bot', {
      endpoint: this.config.practicum.endpoint,
      retryPeriodMs: this.config.polling.retryPeriodMs,
    });

    const telegramOk = await this.notificationService.verifyConnection();
    if (!telegramOk) {
      logger.warn('Telegram connection could not be verified, polling anyway');
    }

    this.poller.start();
    this.isRunning = true;

    logger.info('Bot started successfully');
  }

  /**
   * Stop the application gracefully
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;

    logger.info('Stopping Homework Status Bot', { reason });

    this.isRunning = false;
    await this.poller.stop();

    logger.info('Bot stopped successfully');
  }
}
