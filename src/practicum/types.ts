/**
 * Practicum Client Types
 */

import type { Dispatcher } from 'undici';
import type { Result } from '../types.js';
import type { FetchError } from '../errors.js';

/**
 * Configuration for PracticumClient
 */
export interface PracticumClientConfig {
  /** Homework statuses endpoint */
  endpoint: string;

  /** OAuth token sent in the Authorization header */
  token: string;

  /** Abort a request after this many milliseconds */
  requestTimeoutMs: number;

  /** Custom undici dispatcher (connection pool, MockAgent in tests) */
  dispatcher?: Dispatcher;
}

/**
 * Anything that can fetch the raw status response for a time cursor
 */
export interface HomeworkStatusSource {
  fetchStatus(timestamp: number): Promise<Result<unknown, FetchError>>;
}
