/**
 * Homework Poller Types
 */

import type { HomeworkStatusSource } from '../practicum/types.js';
import type { Notifier } from '../notification/types.js';

/**
 * Homework Poller configuration
 */
export interface HomeworkPollerConfig {
  /** Pause after every iteration, in milliseconds */
  retryPeriodMs: number;

  /** Initial `from_date` cursor in unix seconds (default: now) */
  initialTimestamp?: number;
}

/**
 * Collaborators of the poller. `sleep` is replaceable for tests.
 */
export interface HomeworkPollerDeps {
  source: HomeworkStatusSource;
  notifier: Notifier;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

/**
 * Result of a single poll iteration
 * - notified: a new message was delivered
 * - unchanged: the message equals the last delivered one
 * - delivery_failed: a new message could not be delivered, retried next tick
 * - failed: fetching or validation failed; `notified` tells whether the
 *   failure message reached the chat
 */
export type PollOutcome =
  | { status: 'notified'; message: string }
  | { status: 'unchanged'; message: string }
  | { status: 'delivery_failed'; message: string }
  | { status: 'failed'; message: string; error: Error; notified: boolean };

/**
 * Homework Poller events
 */
export type HomeworkPollerEvents = {
  polled: [outcome: PollOutcome];
  stopped: [];
};
