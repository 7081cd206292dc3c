/**
 * =============================================================================
 * Messaging Client - grammY implementation
 *
 * Thin adapter from the feature's MessagingClient interface to the Telegram
 * Bot API. Errors from Telegram (GrammyError, HttpError) are not caught
 * here; callers decide how to report them.
 * =============================================================================
 */

import { InputMediaBuilder, Keyboard } from 'grammy';
import type { Api } from 'grammy';
import { BUTTONS } from '../reorder/messages';
import type { GroupedMediaItem, MessagingClient, SendTextOptions } from '../reorder/types';

/**
 * The part of grammY's `Api` this client calls
 */
export type MessagingApi = Pick<Api, 'sendMessage' | 'sendMediaGroup'>;

/**
 * The Help / Reset reply keyboard shown after /start
 */
export function buildStartKeyboard(): Keyboard {
  return new Keyboard().text(BUTTONS.HELP).text(BUTTONS.RESET).resized();
}

function toInputMedia(item: GroupedMediaItem) {
  switch (item.type) {
    case 'photo':
      return InputMediaBuilder.photo(item.fileRef);
    case 'video':
      return InputMediaBuilder.video(item.fileRef);
    case 'audio':
      return InputMediaBuilder.audio(item.fileRef);
    case 'document':
      return InputMediaBuilder.document(item.fileRef);
  }
}

/**
 * Creates a MessagingClient backed by a grammY `Api` instance (or anything
 * exposing its `sendMessage` and `sendMediaGroup`).
 *
 * @example
 * ```ts
 * const bot = new Bot(token);
 * const client = createGrammyMessagingClient(bot.api);
 * await client.sendText(chatId, 'Hello', { parseMode: 'HTML' });
 * ```
 */
export function createGrammyMessagingClient(api: MessagingApi): MessagingClient {
  async function sendText(chatId: number, text: string, options: SendTextOptions = {}): Promise<void> {
    await api.sendMessage(chatId, text, {
      parse_mode: options.parseMode,
      reply_markup: options.keyboard ? buildStartKeyboard() : undefined,
    });
  }

  async function sendGroupedMedia(chatId: number, items: GroupedMediaItem[]): Promise<void> {
    await api.sendMediaGroup(chatId, items.map(toInputMedia));
  }

  return { sendText, sendGroupedMedia };
}
