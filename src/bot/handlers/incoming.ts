/**
 * @module handlers/incoming
 * Maps a Telegram message onto the platform-neutral {@link IncomingEvent}.
 */

import type { ContentType, IncomingEvent } from '../../reorder/types';

interface FileLike {
  file_id: string;
}

/**
 * The parts of a Telegram `Message` the bot looks at.
 * grammY's `Message` type satisfies it structurally.
 */
export interface IncomingMessageLike {
  message_id: number;
  /** Unix time in seconds. */
  date?: number;
  chat: { id: number };
  from?: { id: number };
  media_group_id?: string;
  text?: string;
  photo?: readonly FileLike[];
  video?: FileLike;
  audio?: FileLike;
  document?: FileLike;
  sticker?: FileLike;
  animation?: FileLike;
  voice?: FileLike;
  video_note?: FileLike;
}

interface ExtractedAttachment {
  contentType: ContentType | 'unsupported';
  fileRef: string | null;
}

/**
 * Finds the attachment carried by a message. Photos come in several sizes;
 * the last one is the largest.
 */
function extractAttachment(message: IncomingMessageLike): ExtractedAttachment | null {
  if (message.photo && message.photo.length > 0) {
    return { contentType: 'photo', fileRef: message.photo[message.photo.length - 1].file_id };
  }
  // Animations also carry a `document` field; check them first.
  if (message.animation) return { contentType: 'unsupported', fileRef: message.animation.file_id };
  if (message.video) return { contentType: 'video', fileRef: message.video.file_id };
  if (message.audio) return { contentType: 'audio', fileRef: message.audio.file_id };
  if (message.document) return { contentType: 'document', fileRef: message.document.file_id };

  const other = message.sticker ?? message.voice ?? message.video_note;
  if (other) return { contentType: 'unsupported', fileRef: other.file_id };

  return null;
}

/**
 * Converts a message into an event, or `null` when it has no sender
 * (channel posts, service messages).
 */
export function toIncomingEvent(message: IncomingMessageLike | undefined): IncomingEvent | null {
  if (!message || !message.from) return null;

  const base = {
    userId: message.from.id,
    chatId: message.chat.id,
    messageId: message.message_id,
    sentAt: message.date !== undefined ? message.date * 1000 : undefined,
  };

  const attachment = extractAttachment(message);
  if (attachment) {
    return {
      kind: 'attachment',
      ...base,
      groupId: message.media_group_id,
      ...attachment,
    };
  }

  if (message.text !== undefined) {
    return { kind: 'text', ...base, text: message.text };
  }

  return { kind: 'other', ...base };
}
