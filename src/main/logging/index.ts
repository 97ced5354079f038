/**
 * Logging module index file
 * Exports the logger and convenience methods
 */
import { rootLogger, LoggerInstance } from './logger';

export type { LoggerInstance };

// Export the root logger
export default rootLogger;

// Export the getLogger function as a convenience method
export function getLogger(module: string): LoggerInstance {
  return rootLogger.getLogger(module);
}
