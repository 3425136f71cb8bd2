/**
 * Homework Poller
 *
 * Polls the homework statuses endpoint on a fixed interval and notifies
 * the chat whenever the computed message differs from the last delivered one.
 *
 * Polling → Evaluating → (Unchanged | Notifying) → Sleeping → Polling …
 */

import { EventEmitter } from 'eventemitter3';
import { logger } from '../logger.js';
import { HomeworkBotError, type PollError } from '../errors.js';
import { validateResponse, parseVerdict, extractCurrentDate } from '../practicum/validation.js';
import { NO_NEW_STATUSES_MESSAGE, formatFailureMessage } from '../notification/formatter.js';
import { ok, toError, type PollState, type Result } from '../types.js';
import type { HomeworkStatusSource } from '../practicum/types.js';
import type { Notifier } from '../notification/types.js';
import { sleep as defaultSleep } from './sleep.js';
import type {
  HomeworkPollerConfig,
  HomeworkPollerDeps,
  HomeworkPollerEvents,
  PollOutcome,
} from './types.js';

interface Evaluation {
  message: string;
  currentDate: number;
}

export class HomeworkPoller extends EventEmitter<HomeworkPollerEvents> {
  private readonly config: HomeworkPollerConfig;
  private readonly source: HomeworkStatusSource;
  private readonly notifier: Notifier;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private state: PollState;
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(config: HomeworkPollerConfig, deps: HomeworkPollerDeps) {
    super();
    this.config = config;
    this.source = deps.source;
    this.notifier = deps.notifier;
    this.sleep = deps.sleep ?? defaultSleep;
    this.state = {
      timestamp: config.initialTimestamp ?? Math.floor(Date.now() / 1000),
      lastVerdict: null,
    };

    logger.info('Homework Poller initialized', {
      retryPeriodMs: config.retryPeriodMs,
      timestamp: this.state.timestamp,
    });
  }

  /**
   * Start the poll loop in the background
   */
  start(): void {
    if (this.loop) {
      logger.warn('Homework Poller already running');
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.loop = this.run(controller.signal);
    logger.info('Homework Poller started');
  }

  /**
   * Interrupt the current sleep and wait for the loop to exit.
   * An iteration in progress finishes first.
   */
  async stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (!this.loop || !this.abortController) return;

    this.stopping = this.finishLoop(this.loop, this.abortController);
    try {
      await this.stopping;
    } finally {
      this.stopping = null;
    }
  }

  private async finishLoop(loop: Promise<void>, controller: AbortController): Promise<void> {
    controller.abort();
    await loop;

    this.loop = null;
    this.abortController = null;
    logger.info('Homework Poller stopped');
    this.emit('stopped');
  }

  /**
   * Snapshot of the current poll state
   */
  getState(): Readonly<PollState> {
    return { ...this.state };
  }

  /**
   * Run one iteration: fetch, evaluate, notify on change.
   * Never rejects; failures are reported in the outcome.
   */
  async pollOnce(): Promise<PollOutcome> {
    let evaluation: Result<Evaluation, PollError>;
    try {
      evaluation = await this.evaluate();
    } catch (error) {
      return this.handleFailure(toError(error));
    }

    if (!evaluation.ok) {
      return this.handleFailure(evaluation.error);
    }

    const { message, currentDate } = evaluation.value;

    if (message === this.state.lastVerdict) {
      logger.debug('No changes in status', { message });
      this.state = { ...this.state, timestamp: currentDate };
      return { status: 'unchanged', message };
    }

    const delivered = await this.notifier.notify(message);
    if (!delivered) {
      // Keep the cursor so the same change is seen again next tick
      return { status: 'delivery_failed', message };
    }

    this.state = { timestamp: currentDate, lastVerdict: message };
    return { status: 'notified', message };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const outcome = await this.pollOnce();
        this.emit('polled', outcome);
      } catch (error) {
        logger.error('Poll iteration crashed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }

      await this.sleep(this.config.retryPeriodMs, signal);
    }
  }

  private async evaluate(): Promise<Result<Evaluation, PollError>> {
    const fetched = await this.source.fetchStatus(this.state.timestamp);
    if (!fetched.ok) return fetched;

    const homeworks = validateResponse(fetched.value);
    if (!homeworks.ok) return homeworks;

    const currentDate = extractCurrentDate(fetched.value, this.state.timestamp);

    // Only the first record is reported, in whatever order the server sends
    const [first] = homeworks.value;
    if (first === undefined) {
      return ok({ message: NO_NEW_STATUSES_MESSAGE, currentDate });
    }

    const verdict = parseVerdict(first);
    if (!verdict.ok) return verdict;

    return ok({ message: verdict.value, currentDate });
  }

  /**
   * Log the failure and relay it once per distinct message
   */
  private async handleFailure(error: Error): Promise<PollOutcome> {
    const message = formatFailureMessage(error);
    logger.error(message, {
      kind: error instanceof HomeworkBotError ? error.kind : 'unexpected',
    });

    if (message === this.state.lastVerdict) {
      return { status: 'failed', message, error, notified: false };
    }

    const notified = await this.notifier.notify(message);
    if (notified) {
      this.state = { ...this.state, lastVerdict: message };
    }

    return { status: 'failed', message, error, notified };
  }
}
