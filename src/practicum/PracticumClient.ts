/**
 * Practicum Client
 *
 * Fetches homework review statuses from the Practicum API.
 * Network and HTTP failures come back as typed errors, never thrown.
 */

import { fetch, type Dispatcher, type Response } from 'undici';
import { logger, maskSecret } from '../logger.js';
import { ApiResponseError, ConnectivityError, type FetchError } from '../errors.js';
import { ok, err, type Result } from '../types.js';
import type { HomeworkStatusSource, PracticumClientConfig } from './types.js';

/** Longest response body kept on an ApiResponseError */
const MAX_ERROR_BODY_LENGTH = 500;

export class PracticumClient implements HomeworkStatusSource {
  private readonly endpoint: string;
  private readonly token: string;
  private readonly requestTimeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(config: PracticumClientConfig) {
    this.endpoint = config.endpoint;
    this.token = config.token;
    this.requestTimeoutMs = config.requestTimeoutMs;
    this.dispatcher = config.dispatcher;

    logger.info('Practicum client initialized', {
      endpoint: config.endpoint,
      token: maskSecret(config.token),
    });
  }

  /**
   * Request statuses changed since `timestamp` (unix seconds)
   */
  async fetchStatus(timestamp: number): Promise<Result<unknown, FetchError>> {
    let response: Response;
    try {
      const url = new URL(this.endpoint);
      url.searchParams.set('from_date', String(timestamp));

      response = await fetch(url, {
        method: 'GET',
        headers: { Authorization: `OAuth ${this.token}` },
        signal: AbortSignal.timeout(this.requestTimeoutMs),
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      return err(new ConnectivityError(this.endpoint, error));
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      return err(new ConnectivityError(this.endpoint, error));
    }

    if (!response.ok) {
      return err(
        new ApiResponseError(
          `Эндпоинт ${this.endpoint} вернул код ${response.status}`,
          response.status,
          truncate(body)
        )
      );
    }

    try {
      const data: unknown = JSON.parse(body);
      logger.debug('Practicum API response received', { from_date: timestamp });
      return ok(data);
    } catch {
      return err(
        new ApiResponseError(
          `Ответ эндпоинта ${this.endpoint} не является JSON`,
          response.status,
          truncate(body)
        )
      );
    }
  }
}

function truncate(text: string): string {
  return text.length > MAX_ERROR_BODY_LENGTH ? `${text.slice(0, MAX_ERROR_BODY_LENGTH)}…` : text;
}
