/**
 * Error types
 *
 * Every failure the bot can report carries a `kind` so callers can branch
 * on it without inspecting messages.
 */

export type ErrorKind = 'configuration' | 'connectivity' | 'response' | 'shape' | 'field';

export abstract class HomeworkBotError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Required environment variables are missing. Fatal before the poll loop.
 */
export class ConfigurationError extends HomeworkBotError {
  readonly kind = 'configuration';

  constructor(
    message: string,
    public readonly missing: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * The endpoint could not be reached (DNS, refused connection, timeout)
 */
export class ConnectivityError extends HomeworkBotError {
  readonly kind = 'connectivity';

  constructor(
    public readonly endpoint: string,
    cause: unknown
  ) {
    super(`Эндпоинт ${endpoint} недоступен: ${describeCause(cause)}`, { cause });
  }
}

/**
 * The endpoint answered with a non-2xx status or an unreadable body
 */
export class ApiResponseError extends HomeworkBotError {
  readonly kind = 'response';

  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string
  ) {
    super(message);
  }
}

export type ResponseDefect = 'empty' | 'not_object' | 'missing_homeworks' | 'homeworks_not_array';

/**
 * The response body does not have the `{ homeworks: [...] }` shape
 */
export class ResponseShapeError extends HomeworkBotError {
  readonly kind = 'shape';

  constructor(
    public readonly defect: ResponseDefect,
    message: string
  ) {
    super(message);
  }
}

export type HomeworkField = 'homework' | 'homework_name' | 'status';
export type FieldDefect = 'not_object' | 'missing' | 'unknown';

/**
 * A homework record is missing a field or carries an unknown status
 */
export class HomeworkFieldError extends HomeworkBotError {
  readonly kind = 'field';

  constructor(
    public readonly field: HomeworkField,
    public readonly reason: FieldDefect,
    message: string
  ) {
    super(message);
  }
}

export type FetchError = ConnectivityError | ApiResponseError;
export type PollError = FetchError | ResponseShapeError | HomeworkFieldError;

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // undici wraps socket errors as TypeError('fetch failed', { cause })
    if (cause.cause instanceof Error) {
      return `${cause.message} (${cause.cause.message})`;
    }
    return cause.message;
  }
  return String(cause);
}
