/**
 * Homework Polling Module
 */

// Types
export type {
  HomeworkPollerConfig,
  HomeworkPollerDeps,
  HomeworkPollerEvents,
  PollOutcome,
} from './types.js';

// Classes
export { HomeworkPoller } from './HomeworkPoller.js';

// Functions
export { sleep } from './sleep.js';
