/**
 * =============================================================================
 * Test helpers: fake messaging client and event builders
 * =============================================================================
 */

import { vi } from 'vitest';
import type {
  GroupedAttachmentEvent,
  GroupedMediaItem,
  SendTextOptions,
  TextEvent,
} from '../src/reorder/types';

export const USER_ID = 42;

/**
 * Messaging client whose methods record their calls and resolve immediately.
 */
export function createFakeClient() {
  return {
    sendText: vi.fn(async (_chatId: number, _text: string, _options?: SendTextOptions) => {}),
    sendGroupedMedia: vi.fn(async (_chatId: number, _items: GroupedMediaItem[]) => {}),
  };
}

export type FakeClient = ReturnType<typeof createFakeClient>;

let nextMessageId = 1;

export function attachmentEvent(
  groupId: string,
  fileRef: string,
  overrides: Partial<Omit<GroupedAttachmentEvent, 'kind' | 'groupId' | 'fileRef'>> = {}
): GroupedAttachmentEvent {
  return {
    kind: 'attachment',
    userId: USER_ID,
    chatId: USER_ID,
    messageId: nextMessageId++,
    groupId,
    contentType: 'photo',
    fileRef,
    sentAt: Date.now(),
    ...overrides,
  };
}

export function textEvent(text: string, userId: number = USER_ID): TextEvent {
  return {
    kind: 'text',
    userId,
    chatId: userId,
    messageId: nextMessageId++,
    text,
    sentAt: Date.now(),
  };
}
