/**
 * Error module index file
 * Exports all error types and utility functions
 */
export * from './app.error';

/**
 * Utility to handle errors consistently
 * Logs the error with its code when it is an AppError
 */
import { getLogger } from '../logging';
import { AppError } from './app.error';

const logger = getLogger('ErrorHandler');

export function handleError(error: Error | AppError): void {
  if (error instanceof AppError) {
    logger.error(`${error.name} (${error.code}): ${error.message}`, { stack: error.stack });
  } else {
    logger.error(`Unhandled error: ${error.message}`, { stack: error.stack });
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wraps an async function with error handling
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>
): (...args: T) => Promise<R> {
  return async (...args: T): Promise<R> => {
    try {
      return await fn(...args);
    } catch (error) {
      handleError(toError(error));
      throw error;
    }
  };
}
