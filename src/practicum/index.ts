/**
 * Practicum API Module
 *
 * Fetching and validating homework review statuses.
 */

// Types
export type { PracticumClientConfig, HomeworkStatusSource } from './types.js';

// Classes
export { PracticumClient } from './PracticumClient.js';

// Functions
export { validateResponse, parseVerdict, extractCurrentDate } from './validation.js';
export { HOMEWORK_VERDICTS, isHomeworkStatus } from './verdicts.js';
