/**
 * Response Validation
 *
 * Turns the raw JSON body of the homework statuses endpoint into a status
 * message. Every defect is returned as a typed error, never thrown.
 */

import { logger } from '../logger.js';
import { ResponseShapeError, HomeworkFieldError } from '../errors.js';
import { formatStatusChangeMessage } from '../notification/formatter.js';
import { HOMEWORK_VERDICTS, isHomeworkStatus } from './verdicts.js';
import { ok, err, isRecord, describeType } from '../types.js';
import type { Result } from '../types.js';

/**
 * Check the response shape and extract the `homeworks` list.
 * The list may be empty; its elements are checked by parseVerdict.
 */
export function validateResponse(response: unknown): Result<unknown[], ResponseShapeError> {
  if (!response || isEmptyCollection(response)) {
    return err(new ResponseShapeError('empty', 'Пустой ответ API'));
  }

  if (!isRecord(response)) {
    return err(
      new ResponseShapeError(
        'not_object',
        `Ответ API не является словарём: получен ${describeType(response)}`
      )
    );
  }

  if (!('homeworks' in response)) {
    return err(
      new ResponseShapeError('missing_homeworks', 'В ответе API отсутствует ключ "homeworks"')
    );
  }

  const homeworks = response.homeworks;
  if (!Array.isArray(homeworks)) {
    return err(
      new ResponseShapeError(
        'homeworks_not_array',
        `Значение "homeworks" не является списком: получен ${describeType(homeworks)}`
      )
    );
  }

  if (homeworks.length === 0) {
    logger.debug('No new statuses in API response');
  }

  return ok(homeworks);
}

/**
 * Build the status change message for a single homework record
 */
export function parseVerdict(homework: unknown): Result<string, HomeworkFieldError> {
  if (!isRecord(homework)) {
    return err(
      new HomeworkFieldError(
        'homework',
        'not_object',
        `Данные работы не являются словарём: получен ${describeType(homework)}`
      )
    );
  }

  const name = homework.homework_name;
  if (typeof name !== 'string' || name === '') {
    return err(
      new HomeworkFieldError(
        'homework_name',
        'missing',
        'В данных работы отсутствует ключ "homework_name"'
      )
    );
  }

  if (!('status' in homework) || homework.status === undefined || homework.status === null) {
    return err(
      new HomeworkFieldError('status', 'missing', 'В данных работы отсутствует ключ "status"')
    );
  }

  const status = homework.status;
  if (!isHomeworkStatus(status)) {
    return err(
      new HomeworkFieldError(
        'status',
        'unknown',
        `Неизвестный статус домашней работы: ${String(status)}`
      )
    );
  }

  logger.debug('New homework status detected', { homework: name, status });

  return ok(formatStatusChangeMessage(name, HOMEWORK_VERDICTS[status]));
}

/**
 * Server time cursor from the response, or the fallback when absent
 */
export function extractCurrentDate(response: unknown, fallback: number): number {
  if (isRecord(response) && Number.isInteger(response.current_date)) {
    return Number(response.current_date);
  }
  return fallback;
}

function isEmptyCollection(value: unknown): boolean {
  if (Array.isArray(value)) return value.length === 0;
  return isRecord(value) && Object.keys(value).length === 0;
}
