import type { Logger } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Bootstrap logger for code that runs BEFORE the DI container is initialized
 * (CLI argument handling, config loading) and for sessions built by hand
 * without a factory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger();
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
