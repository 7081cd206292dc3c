/**
 * =============================================================================
 * Reorder Handler - Routes every incoming message
 *
 * Matching runs in a fixed priority order:
 *   1. /start or the Reset button  → drop session and pending groups
 *   2. /help or the Help button    → static help text
 *   3. attachment in a media group → group aggregator
 *   4. digits separated by spaces  → validate order, send regrouped media
 *   5. anything else               → throttled "unrecognized" warning
 *
 * Nothing thrown while handling one event escapes `dispatch`.
 * =============================================================================
 */

import { auditLog } from '../../core/audit-log';
import { describeThrown } from '../../core/errors';
import type { AppError } from '../../core/types';
import type { GroupAggregator } from '../../reorder/group-aggregator';
import {
  BOT_MESSAGES,
  BUTTONS,
  countMismatchMessage,
  rangeErrorMessage,
} from '../../reorder/messages';
import { applyOrder, normalizeDigits, validateOrder } from '../../reorder/order-validator';
import type { SessionStore } from '../../reorder/session-store';
import { REORDER_ERROR_CODES } from '../../reorder/types';
import type {
  GroupedAttachmentEvent,
  GroupedMediaItem,
  IncomingEvent,
  MessagingClient,
  TextEvent,
} from '../../reorder/types';
import type { WarningThrottle } from '../../reorder/warning-throttle';

/** One or more digit groups separated by whitespace, after `normalizeDigits`. */
const ORDER_INPUT_REGEX = /^\d+(?:\s+\d+)*\s*$/;

/** `/name` or `/name@botname`. */
const COMMAND_REGEX = /^\/([a-z]+)(?:@\w+)?$/i;

/**
 * Reorder handler configuration
 */
export interface ReorderHandlerConfig {
  client: MessagingClient;
  sessions: SessionStore;
  aggregator: GroupAggregator;
  throttle: WarningThrottle;
}

/**
 * Reorder handler interface
 */
export interface ReorderHandler {
  dispatch: (event: IncomingEvent) => Promise<void>;
}

function commandName(text: string): string | null {
  const match = text.trim().match(COMMAND_REGEX);
  return match ? match[1].toLowerCase() : null;
}

function isStartRequest(text: string): boolean {
  return text === BUTTONS.RESET || commandName(text) === 'start';
}

function isHelpRequest(text: string): boolean {
  return text === BUTTONS.HELP || commandName(text) === 'help';
}

function isGroupedAttachment(event: IncomingEvent): event is GroupedAttachmentEvent {
  return event.kind === 'attachment' && event.groupId !== undefined;
}

/**
 * Picks the reply for a failed order validation
 */
function validationReply(error: AppError | null, expectedCount: number): string {
  switch (error?.code) {
    case REORDER_ERROR_CODES.PARSE_ERROR:
      return BOT_MESSAGES.PARSE_ERROR;
    case REORDER_ERROR_CODES.COUNT_MISMATCH:
      return countMismatchMessage(expectedCount);
    default:
      return rangeErrorMessage(expectedCount);
  }
}

/**
 * Creates the reorder handler.
 *
 * Factory function pattern - returns a closure of methods.
 *
 * @example
 * ```ts
 * const handler = createReorderHandler({ client, sessions, aggregator, throttle });
 *
 * bot.on('message', async (ctx) => {
 *   const event = toIncomingEvent(ctx.message);
 *   if (event) await handler.dispatch(event);
 * });
 * ```
 */
export function createReorderHandler(config: ReorderHandlerConfig): ReorderHandler {
  const { client, sessions, aggregator, throttle } = config;

  async function handleStart(event: TextEvent): Promise<void> {
    sessions.clear(event.userId);
    const dropped = aggregator.discardUserGroups(event.userId);

    auditLog.trace(`Reset by user ${event.userId}, ${dropped} pending groups dropped`);

    await client.sendText(event.chatId, BOT_MESSAGES.START, { keyboard: true });
  }

  async function handleHelp(event: TextEvent): Promise<void> {
    await client.sendText(event.chatId, BOT_MESSAGES.HELP, { parseMode: 'HTML' });
  }

  /**
   * Validates the typed order against the user's session and sends the
   * regrouped media. The session is cleared once a send was attempted,
   * whether or not it succeeded.
   */
  async function handleOrderInput(event: TextEvent): Promise<void> {
    const { userId, chatId } = event;

    const [sessionError, session] = sessions.resolve(userId);
    if (!session) {
      await client.sendText(
        chatId,
        sessionError?.code === REORDER_ERROR_CODES.SESSION_EXPIRED
          ? BOT_MESSAGES.SESSION_EXPIRED
          : BOT_MESSAGES.NO_SESSION
      );
      return;
    }

    const [orderError, order] = validateOrder(event.text, session.expectedCount);
    if (!order) {
      auditLog.trace(`Rejected order from user ${userId}: ${orderError?.code}`);
      await client.sendText(chatId, validationReply(orderError, session.expectedCount));
      return;
    }

    const items: GroupedMediaItem[] = applyOrder(session.files, order).map((fileRef) => ({
      type: session.type,
      fileRef,
    }));

    try {
      await client.sendGroupedMedia(userId, items);
      auditLog.trace(`Sent ${items.length} reordered ${session.type} files to user ${userId}`);
    } catch (error) {
      auditLog.record(REORDER_ERROR_CODES.TRANSPORT_ERROR, {
        userId,
        count: items.length,
        error: describeThrown(error),
      });
      await client.sendText(chatId, BOT_MESSAGES.SEND_FAILED);
    } finally {
      sessions.clear(userId);
    }
  }

  async function handleFallback(event: IncomingEvent): Promise<void> {
    if (!throttle.tryAcquire(event.userId)) return;
    await client.sendText(event.chatId, BOT_MESSAGES.UNRECOGNIZED);
  }

  async function route(event: IncomingEvent): Promise<void> {
    if (event.kind === 'text') {
      if (isStartRequest(event.text)) return handleStart(event);
      if (isHelpRequest(event.text)) return handleHelp(event);
    }

    if (isGroupedAttachment(event)) {
      aggregator.onAttachment(event);
      return;
    }

    if (event.kind === 'text' && ORDER_INPUT_REGEX.test(normalizeDigits(event.text))) {
      return handleOrderInput(event);
    }

    return handleFallback(event);
  }

  async function dispatch(event: IncomingEvent): Promise<void> {
    try {
      await route(event);
    } catch (error) {
      auditLog.record(REORDER_ERROR_CODES.DISPATCH_FAILED, {
        userId: event.userId,
        chatId: event.chatId,
        kind: event.kind,
        error: describeThrown(error),
      });
    }
  }

  return { dispatch };
}
