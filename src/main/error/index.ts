/**
 * Error module index file
 * Exports all error types and utility functions
 */
export * from './app.error';

/**
 * Utility to handle errors consistently
 * Logs the error and optionally forwards it to the renderer
 */
import type { AppErrorPayload } from '../../@types';
import { getLogger } from '../logging';
import { AppError } from './app.error';

const logger = getLogger('ErrorHandler');

export type ErrorNotifier = (error: AppErrorPayload) => void;

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Shape of an error as the renderer sees it
 */
export function toErrorPayload(error: Error | AppError): AppErrorPayload {
  return error instanceof AppError
    ? { message: error.message, code: error.code, name: error.name }
    : { message: error.message, name: error.name };
}

export function handleError(error: Error | AppError, notify?: ErrorNotifier): void {
  // Log the error
  if (error instanceof AppError) {
    logger.error(`${error.name} (${error.code}): ${error.message}`, { stack: error.stack });
  } else {
    logger.error(`Unhandled error: ${error.message}`, { stack: error.stack });
  }

  // Notify renderer if needed
  if (notify) {
    notify(toErrorPayload(error));
  }
}
