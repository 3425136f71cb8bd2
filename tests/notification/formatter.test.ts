/**
 * Tests for message formatting
 */

import { describe, it, expect } from 'vitest';
import {
  NO_NEW_STATUSES_MESSAGE,
  formatStatusChangeMessage,
  formatFailureMessage,
} from '../../src/notification/formatter.js';
import { ResponseShapeError } from '../../src/errors.js';

describe('formatter', () => {
  it('should format a status change', () => {
    expect(formatStatusChangeMessage('proj1', 'Работа взята на проверку ревьюером.')).toBe(
      'Изменился статус проверки работы "proj1". Работа взята на проверку ревьюером.'
    );
  });

  it('should format a failure from an Error', () => {
    const error = new ResponseShapeError('empty', 'Пустой ответ API');

    expect(formatFailureMessage(error)).toBe('Сбой в работе программы: Пустой ответ API');
  });

  it('should format a failure from a non-Error value', () => {
    expect(formatFailureMessage('timeout')).toBe('Сбой в работе программы: timeout');
  });

  it('should expose the no new statuses text', () => {
    expect(NO_NEW_STATUSES_MESSAGE).toBe('Нет новых статусов.');
  });
});
