import { rootLogger } from './logger.js';
import type { LoggingOptions, ModuleLogger } from './logger.js';

export { Logger, ModuleLogger, rootLogger, isLogLevel, loggingOptionsFromEnv } from './logger.js';
export type { LogLevel, LoggingOptions } from './logger.js';

export function getLogger(module: string): ModuleLogger {
  return rootLogger.getLogger(module);
}

export function configureLogging(options: Partial<LoggingOptions>): void {
  rootLogger.configure(options);
}
