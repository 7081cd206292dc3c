/**
 * =============================================================================
 * Error utilities
 * Provides functional error handling helpers
 * =============================================================================
 */

import { AppError, ErrorCategory } from './types';

/**
 * Creates an AppError of the given category
 */
export function createError(
  category: ErrorCategory,
  code: string,
  message: string,
  details?: string
): AppError {
  return {
    code,
    category,
    message,
    details,
  };
}

/**
 * Creates an AppError with CONFIGURATION category
 */
export function createConfigError(
  code: string,
  message: string,
  details?: string
): AppError {
  return createError('CONFIGURATION', code, message, details);
}

/**
 * Extracts a message from anything thrown
 */
export function describeThrown(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
