/**
 * Startup
 *
 * Gates application start on configuration. Nothing is constructed
 * unless every credential is present and the config is valid.
 */

import { loadConfig, type AppConfig } from './config.js';
import { checkCredentials } from './credentials.js';
import { logger } from './logger.js';

export interface Startable {
  start(): Promise<void>;
}

/**
 * Build and start the application.
 * Resolves null when configuration is missing or invalid.
 */
export async function launch<T extends Startable>(
  env: Record<string, string | undefined>,
  createApp: (config: AppConfig) => T
): Promise<T | null> {
  if (!checkCredentials(env)) {
    return null;
  }

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    logger.error('Invalid configuration', {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const app = createApp(config);
  await app.start();
  return app;
}
