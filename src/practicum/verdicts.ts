import type { HomeworkStatus } from '../types.js';

/**
 * Display text for each review status
 */
export const HOMEWORK_VERDICTS: Readonly<Record<HomeworkStatus, string>> = Object.freeze({
  approved: 'Работа проверена: ревьюеру всё понравилось. Ура!',
  reviewing: 'Работа взята на проверку ревьюером.',
  rejected: 'Работа проверена: у ревьюера есть замечания.',
});

export function isHomeworkStatus(value: unknown): value is HomeworkStatus {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(HOMEWORK_VERDICTS, value);
}
