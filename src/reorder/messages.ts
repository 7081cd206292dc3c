/**
 * @module reorder/messages
 * Every text the bot sends to users.
 */

import { formatIdentityOrder, formatReversedOrder } from './order-validator';
import { MAX_GROUP_SIZE, MIN_GROUP_SIZE } from './types';

export const BUTTONS = {
  HELP: '🆘 Help',
  RESET: '↩️ Reset',
} as const;

export const BOT_MESSAGES = {
  START:
    "Let's set a new order!\n" +
    `Send one message with ${MIN_GROUP_SIZE}–${MAX_GROUP_SIZE} files of the same type.`,
  HELP:
    '<b>How to use:</b>\n\n' +
    `1. Send a media group: ${MIN_GROUP_SIZE}–${MAX_GROUP_SIZE} attachments of the <b>same</b> type ` +
    '(photos, videos, audio or documents).\n' +
    '2. The bot shows the current order of the files and you type the new one.\n\n' +
    "<b>Example:</b> with 3 files, send '3 2 1'.\n" +
    'You get the files back in the new order as one message, ready to forward.',
  INVALID_GROUP: `Send ${MIN_GROUP_SIZE}–${MAX_GROUP_SIZE} files of the same type.`,
  NO_SESSION: 'Send a media group first.',
  SESSION_EXPIRED: 'The session has expired, send a new media group.',
  PARSE_ERROR: 'Enter numbers only, separated by spaces.',
  SEND_FAILED: 'Failed to send the media group. Please try again.',
  UNRECOGNIZED: 'Unrecognized command. Use /help',
} as const;

export function groupReceivedMessage(count: number): string {
  return (
    `Received: ${count} files\n\n` +
    `Current order: ${formatIdentityOrder(count)}\n` +
    `Send the new order, for example: ${formatReversedOrder(count)}`
  );
}

export function countMismatchMessage(expectedCount: number): string {
  return `Enter the numbers 1 to ${expectedCount} separated by spaces.`;
}

export function rangeErrorMessage(expectedCount: number): string {
  return `Numbers must be in the range 1–${expectedCount}.`;
}
