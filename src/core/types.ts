/**
 * =============================================================================
 * Core types shared by every module
 * =============================================================================
 */

/**
 * Error categories for classification
 */
export type ErrorCategory =
  | 'CONFIGURATION'
  | 'VALIDATION'
  | 'SESSION'
  | 'TRANSPORT'
  | 'UNKNOWN';

/**
 * Application error type for functional error handling.
 */
export interface AppError {
  code: string;
  category: ErrorCategory;
  message: string;
  details?: string;
}

/**
 * Result tuple.
 * First element is error (or null), second is result (or null).
 */
export type SyncResult<T> = [AppError | null, T | null];
