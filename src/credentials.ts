/**
 * Startup credential gate
 */

import { findMissingCredentials } from './config.js';
import { logger } from './logger.js';

/**
 * Returns false and logs every missing variable when any credential is unset.
 * The poll loop must not start in that case.
 */
export function checkCredentials(env: Record<string, string | undefined> = process.env): boolean {
  const missing = findMissingCredentials(env);

  if (missing.length > 0) {
    logger.error(`Missing required environment variables: ${missing.join(', ')}`, {
      missing,
    });
    return false;
  }

  return true;
}
