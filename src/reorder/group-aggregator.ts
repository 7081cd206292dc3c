/**
 * @module reorder/group-aggregator
 *
 * Collects the separate messages Telegram delivers for one media group and
 * turns them into a {@link Session} once the burst is over.
 *
 * Every new attachment for a group cancels that group's timer and arms a
 * fresh one, so finalization runs once, `debounceMs` after the *last*
 * attachment. There is never more than one live timer per group id.
 *
 * Finalization rejects groups that mix content types or fall outside
 * 2–10 items; the buffer is dropped and the user is told what to send.
 */

import { auditLog } from '../core/audit-log';
import { createError, describeThrown } from '../core/errors';
import { BOT_MESSAGES, groupReceivedMessage } from './messages';
import type { SessionStore } from './session-store';
import { cancelGroupTimer, evictGroup } from './state';
import type { ReorderState } from './state';
import { MAX_GROUP_SIZE, MIN_GROUP_SIZE, REORDER_ERROR_CODES } from './types';
import type {
  GroupedAttachmentEvent,
  MessagingClient,
  PendingGroup,
  Session,
  SyncResult,
} from './types';

export interface GroupAggregatorConfig {
  state: ReorderState;
  client: MessagingClient;
  sessions: SessionStore;
  /** Quiet period after the last attachment before finalizing (default 700 ms). */
  debounceMs?: number;
  now?: () => number;
}

export class GroupAggregator {
  private readonly state: ReorderState;

  private readonly client: MessagingClient;

  private readonly sessions: SessionStore;

  private readonly debounceMs: number;

  private readonly now: () => number;

  constructor(config: GroupAggregatorConfig) {
    this.state = config.state;
    this.client = config.client;
    this.sessions = config.sessions;
    this.debounceMs = config.debounceMs ?? 700;
    this.now = config.now ?? (() => Date.now());
  }

  /**
   * Buffers an attachment and (re)arms the group's debounce timer.
   */
  onAttachment(event: GroupedAttachmentEvent): void {
    const { groupId } = event;

    let group = this.state.groups.get(groupId);
    if (!group) {
      group = {
        groupId,
        ownerId: event.userId,
        chatId: event.chatId,
        events: [],
        createdAt: this.now(),
      };
      this.state.groups.set(groupId, group);
    }
    group.events.push(event);

    cancelGroupTimer(this.state, groupId);

    const timer = setTimeout(() => {
      this.state.timers.delete(groupId);
      this.finalize(groupId).catch((error: unknown) => {
        auditLog.record(REORDER_ERROR_CODES.DISPATCH_FAILED, {
          userId: event.userId,
          groupId,
          error: describeThrown(error),
        });
      });
    }, this.debounceMs);

    this.state.timers.set(groupId, timer);
  }

  /**
   * Pops the buffered group and promotes it to a session for its owner.
   * A group that is no longer buffered is ignored.
   */
  async finalize(groupId: string): Promise<void> {
    const group = this.state.groups.get(groupId);
    if (!group) return;

    cancelGroupTimer(this.state, groupId);
    this.state.groups.delete(groupId);

    const [error, session] = this.buildSession(group);

    if (error || !session) {
      auditLog.record(REORDER_ERROR_CODES.INVALID_GROUP_COMPOSITION, {
        userId: group.ownerId,
        groupId,
        count: group.events.length,
        details: error?.details,
      });
      await this.client.sendText(group.chatId, BOT_MESSAGES.INVALID_GROUP);
      return;
    }

    this.sessions.put(group.ownerId, session);

    await this.client.sendText(group.chatId, groupReceivedMessage(session.expectedCount));

    auditLog.trace(
      `Media group ${groupId} from user ${group.ownerId}: ${session.expectedCount} files of type ${session.type}`
    );
  }

  /**
   * Drops every group still buffering for a user. Returns how many were removed.
   */
  discardUserGroups(userId: number): number {
    let removed = 0;
    for (const [groupId, group] of [...this.state.groups]) {
      if (group.ownerId === userId && evictGroup(this.state, groupId)) {
        removed++;
      }
    }
    return removed;
  }

  /**
   * Cancels all live debounce timers. Buffers are left in place.
   */
  dispose(): void {
    for (const timer of this.state.timers.values()) {
      clearTimeout(timer);
    }
    this.state.timers.clear();
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private buildSession(group: PendingGroup): SyncResult<Session> {
    const { events } = group;

    const contentTypes = new Set(events.map((e) => e.contentType));
    if (contentTypes.size > 1) {
      return [this.compositionError(`mixed content types: ${[...contentTypes].join(', ')}`), null];
    }

    if (events.length < MIN_GROUP_SIZE || events.length > MAX_GROUP_SIZE) {
      return [this.compositionError(`group has ${events.length} attachments`), null];
    }

    const type = events[0].contentType;
    if (type === 'unsupported') {
      return [this.compositionError('unsupported content type'), null];
    }

    const files = events
      .map((e) => e.fileRef)
      .filter((fileRef): fileRef is string => fileRef !== null);

    if (files.length !== events.length) {
      return [this.compositionError('attachment without a file reference'), null];
    }

    return [
      null,
      {
        files,
        type,
        expectedCount: files.length,
        createdAt: this.now(),
      },
    ];
  }

  private compositionError(details: string) {
    return createError(
      'VALIDATION',
      REORDER_ERROR_CODES.INVALID_GROUP_COMPOSITION,
      'Invalid media group composition',
      details
    );
  }
}
