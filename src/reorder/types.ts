/**
 * @module reorder/types
 * Shared type definitions for the media-group reorder feature.
 */

import type { AppError, SyncResult } from '../core/types';

export type { AppError, SyncResult };

/** Error codes for reorder operations. */
export const REORDER_ERROR_CODES = {
  INVALID_GROUP_COMPOSITION: 'REORDER_001',
  PARSE_ERROR: 'REORDER_002',
  COUNT_MISMATCH: 'REORDER_003',
  RANGE_ERROR: 'REORDER_004',
  SESSION_EXPIRED: 'REORDER_005',
  NO_SESSION: 'REORDER_006',
  TRANSPORT_ERROR: 'REORDER_007',
  DISPATCH_FAILED: 'REORDER_008',
} as const;

/** Content types that can be regrouped. */
export type ContentType = 'photo' | 'video' | 'audio' | 'document';

/** Smallest and largest media group Telegram accepts. */
export const MIN_GROUP_SIZE = 2;
export const MAX_GROUP_SIZE = 10;

// ---------------------------------------------------------------------------
// Incoming events
// ---------------------------------------------------------------------------

interface BaseEvent {
  userId: number;
  chatId: number;
  messageId: number;
  /** Creation time reported by the platform (epoch ms), when known. */
  sentAt?: number;
}

export interface TextEvent extends BaseEvent {
  kind: 'text';
  text: string;
}

/**
 * One attachment. `groupId` is set when the platform delivered it as part
 * of a media group. `contentType` is `'unsupported'` for anything that is
 * not a {@link ContentType} (stickers, voice notes, ...).
 */
export interface AttachmentEvent extends BaseEvent {
  kind: 'attachment';
  groupId?: string;
  contentType: ContentType | 'unsupported';
  fileRef: string | null;
}

export interface OtherEvent extends BaseEvent {
  kind: 'other';
}

export type IncomingEvent = TextEvent | AttachmentEvent | OtherEvent;

/** An attachment that is known to belong to a media group. */
export type GroupedAttachmentEvent = AttachmentEvent & { groupId: string };

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

/** Attachments buffered while a media group is still arriving. */
export interface PendingGroup {
  groupId: string;
  ownerId: number;
  chatId: number;
  events: GroupedAttachmentEvent[];
  /** Epoch ms when the buffer was opened. */
  createdAt: number;
}

/** A finalized media group waiting for the user's new order. */
export interface Session {
  files: string[];
  type: ContentType;
  expectedCount: number;
  /** Epoch ms when the session was created. */
  createdAt: number;
}

// ---------------------------------------------------------------------------
// Messaging client
// ---------------------------------------------------------------------------

export interface SendTextOptions {
  parseMode?: 'HTML';
  /** Attach the Help / Reset reply keyboard. */
  keyboard?: boolean;
}

export interface GroupedMediaItem {
  type: ContentType;
  fileRef: string;
}

/**
 * Outgoing side of the messaging platform.
 * Implementations reject when the platform refuses the request.
 */
export interface MessagingClient {
  sendText(chatId: number, text: string, options?: SendTextOptions): Promise<void>;
  sendGroupedMedia(chatId: number, items: GroupedMediaItem[]): Promise<void>;
}
