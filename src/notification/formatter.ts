/**
 * Message Formatter
 *
 * Plain-text messages sent to the Telegram chat.
 */

/**
 * Sent when the API reports no status changes since the last cursor
 */
export const NO_NEW_STATUSES_MESSAGE = 'Нет новых статусов.';

const FAILURE_PREFIX = 'Сбой в работе программы';

/**
 * Format a review status change for a homework
 */
export function formatStatusChangeMessage(homeworkName: string, verdict: string): string {
  return `Изменился статус проверки работы "${homeworkName}". ${verdict}`;
}

/**
 * Format a poll failure for the chat
 */
export function formatFailureMessage(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `${FAILURE_PREFIX}: ${message}`;
}
