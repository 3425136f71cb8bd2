/**
 * Common types for the Homework Status Bot
 */

// ===========================================
// Result Types
// ===========================================

/**
 * Outcome of a step that can fail with a typed error.
 * Validation and fetch steps return this instead of throwing.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

// ===========================================
// Homework Types
// ===========================================

/**
 * Review status reported by the Practicum API
 */
export type HomeworkStatus = 'approved' | 'reviewing' | 'rejected';

// ===========================================
// Poll State
// ===========================================

/**
 * In-memory state of the poll loop. Lost on restart.
 */
export interface PollState {
  /** Server time cursor passed as `from_date`, in seconds */
  timestamp: number;

  /** Last message actually delivered to the chat */
  lastVerdict: string | null;
}

// ===========================================
// Utility Functions
// ===========================================

/**
 * Checks if input is a plain mapping (not null, not an array).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Human-readable type name used in validation messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
