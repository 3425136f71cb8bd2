import { config as dotenvConfig } from 'dotenv';
import { ConfigurationError } from './errors.js';

// Load environment variables
dotenvConfig();

type Env = Record<string, string | undefined>;

const DEFAULT_ENDPOINT = 'https://practicum.yandex.ru/api/user_api/homework_statuses/';

/**
 * Required credentials and the environment variables they come from
 */
export const CREDENTIAL_ENV_VARS = {
  practicumToken: 'PRACTICUM_TOKEN',
  telegramToken: 'TOKEN',
  telegramChatId: 'TELEGRAM_CHAT_ID',
} as const;

export type Credentials = {
  readonly [K in keyof typeof CREDENTIAL_ENV_VARS]: string;
};

export interface AppConfig {
  readonly credentials: Credentials;

  readonly practicum: {
    /** Homework statuses endpoint */
    readonly endpoint: string;

    /** Abort a request after this many milliseconds */
    readonly requestTimeoutMs: number;
  };

  readonly polling: {
    /** Pause between iterations in milliseconds */
    readonly retryPeriodMs: number;
  };
}

/** Node clamps longer timer delays to 1 ms */
const MAX_TIMER_DELAY_MS = 2147483647;

function getEnvVar(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

function getEnvUrl(env: Env, key: string, defaultValue: string): string {
  const value = getEnvVar(env, key, defaultValue);
  try {
    new URL(value);
  } catch {
    throw new ConfigurationError(`Environment variable ${key} must be an absolute URL`);
  }
  return value;
}

function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Environment variable ${key} must be a positive number`);
  }
  return parsed;
}

function getEnvDurationMs(env: Env, key: string, defaultSeconds: number): number {
  const ms = getEnvNumber(env, key, defaultSeconds) * 1000;
  if (ms > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(
      `Environment variable ${key} must not exceed ${Math.floor(MAX_TIMER_DELAY_MS / 1000)} seconds`
    );
  }
  return ms;
}

// Logging settings are read at import time so the logger can be built first
export const logging = {
  level: getEnvVar(process.env, 'LOG_LEVEL', 'info'),
  /** Empty string disables the file transport */
  file: process.env.LOG_FILE ?? 'logs/bot.log',
} as const;

/**
 * Names of required variables that are unset or empty
 */
export function findMissingCredentials(env: Env = process.env): string[] {
  return Object.values(CREDENTIAL_ENV_VARS).filter((name) => !env[name]);
}

/**
 * Build the immutable application config.
 * Throws ConfigurationError naming every missing credential.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing = findMissingCredentials(env);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      missing
    );
  }

  const credentials: Credentials = {
    practicumToken: getEnvVar(env, CREDENTIAL_ENV_VARS.practicumToken, ''),
    telegramToken: getEnvVar(env, CREDENTIAL_ENV_VARS.telegramToken, ''),
    telegramChatId: getEnvVar(env, CREDENTIAL_ENV_VARS.telegramChatId, ''),
  };

  return Object.freeze({
    credentials: Object.freeze(credentials),
    practicum: Object.freeze({
      endpoint: getEnvUrl(env, 'PRACTICUM_ENDPOINT', DEFAULT_ENDPOINT),
      requestTimeoutMs: getEnvDurationMs(env, 'REQUEST_TIMEOUT', 30),
    }),
    polling: Object.freeze({
      retryPeriodMs: getEnvDurationMs(env, 'RETRY_PERIOD', 600),
    }),
  });
}
