/**
 * @module reorder/order-validator
 *
 * Parses and validates a user-typed permutation such as `"3 1 2"`.
 * Pure functions, no state.
 */

import { createError } from '../core/errors';
import { REORDER_ERROR_CODES } from './types';
import type { SyncResult } from './types';

const INTEGER_TOKEN = /^[+-]?\d+$/;

const DECIMAL_DIGIT = /^\p{Nd}$/u;
const DECIMAL_DIGITS = /\p{Nd}/gu;

/**
 * Digit value of a Unicode decimal digit. Unicode assigns these in
 * contiguous runs of ten, from 0 to 9, so the value is the distance from
 * the start of the run modulo ten.
 */
function decimalDigitValue(digit: string): number {
  const codePoint = digit.codePointAt(0) ?? 0;
  let runStart = codePoint;
  while (runStart > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(runStart - 1))) {
    runStart--;
  }
  return (codePoint - runStart) % 10;
}

/**
 * Rewrites every Unicode decimal digit (Arabic-Indic, fullwidth, ...) as its
 * ASCII counterpart, so `"٣ ١ ٢"` reads as `"3 1 2"`.
 */
export function normalizeDigits(text: string): string {
  return text.replace(DECIMAL_DIGITS, (digit) => String(decimalDigitValue(digit)));
}

/**
 * Validates `inputText` as a permutation of `1..expectedCount`.
 * Digits from any script are accepted.
 *
 * Checks run in order: every token must be an integer (`PARSE_ERROR`),
 * the count must match with no duplicates (`COUNT_MISMATCH`), and the
 * sorted values must equal `1..expectedCount` (`RANGE_ERROR`).
 *
 * @returns The 1-based permutation on success.
 *
 * @example
 * ```ts
 * const [err, order] = validateOrder('3 1 2', 3); // order = [3, 1, 2]
 * ```
 */
export function validateOrder(inputText: string, expectedCount: number): SyncResult<number[]> {
  const tokens = normalizeDigits(inputText)
    .split(/\s+/)
    .filter((token) => token.length > 0);

  if (tokens.some((token) => !INTEGER_TOKEN.test(token))) {
    return [
      createError('VALIDATION', REORDER_ERROR_CODES.PARSE_ERROR, 'Order must contain only numbers'),
      null,
    ];
  }

  const order = tokens.map((token) => parseInt(token, 10));

  if (order.length !== expectedCount || new Set(order).size !== expectedCount) {
    return [
      createError(
        'VALIDATION',
        REORDER_ERROR_CODES.COUNT_MISMATCH,
        `Expected ${expectedCount} distinct numbers`,
        `got ${order.length} values, ${new Set(order).size} distinct`
      ),
      null,
    ];
  }

  const sorted = [...order].sort((a, b) => a - b);
  if (sorted.some((value, index) => value !== index + 1)) {
    return [
      createError(
        'VALIDATION',
        REORDER_ERROR_CODES.RANGE_ERROR,
        `Numbers must be between 1 and ${expectedCount}`
      ),
      null,
    ];
  }

  return [null, order];
}

/**
 * Maps a validated 1-based permutation onto the stored items.
 */
export function applyOrder<T>(items: readonly T[], order: readonly number[]): T[] {
  return order.map((position) => items[position - 1]);
}

/** `"1 2 3"` for a count of 3. */
export function formatIdentityOrder(count: number): string {
  return Array.from({ length: count }, (_, i) => i + 1).join(' ');
}

/** `"3 2 1"` for a count of 3. */
export function formatReversedOrder(count: number): string {
  return Array.from({ length: count }, (_, i) => count - i).join(' ');
}
