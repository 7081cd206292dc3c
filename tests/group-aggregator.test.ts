/**
 * =============================================================================
 * Unit tests: group aggregator
 *
 * Verifies that:
 *   1  A burst of attachments is finalized once, debounceMs after the last one.
 *   2  Only one debounce timer is ever live per group id.
 *   3  Mixed types and out-of-range counts are rejected without a session.
 *   4  A valid group becomes the owner's session, replacing any older one.
 *   5  Discarding a user's groups also cancels their timers.
 * =============================================================================
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { GroupAggregator } from '../src/reorder/group-aggregator';
import { BOT_MESSAGES } from '../src/reorder/messages';
import { createSessionStore } from '../src/reorder/session-store';
import type { SessionStore } from '../src/reorder/session-store';
import { createReorderState } from '../src/reorder/state';
import type { ReorderState } from '../src/reorder/state';
import { USER_ID, attachmentEvent, createFakeClient } from './helpers';
import type { FakeClient } from './helpers';

const RECEIVED_THREE =
  'Received: 3 files\n\nCurrent order: 1 2 3\nSend the new order, for example: 3 2 1';

describe('GroupAggregator', () => {
  let state: ReorderState;
  let client: FakeClient;
  let sessions: SessionStore;
  let aggregator: GroupAggregator;

  beforeEach(() => {
    vi.useFakeTimers();
    state = createReorderState();
    client = createFakeClient();
    sessions = createSessionStore({ state, ttlMs: 120_000 });
    aggregator = new GroupAggregator({ state, client, sessions, debounceMs: 700 });
  });

  afterEach(() => {
    aggregator.dispose();
    vi.useRealTimers();
  });

  // -----------------------------------------------------------------------
  // Debounce
  // -----------------------------------------------------------------------

  it('finalizes once, 700 ms after the last of three attachments', async () => {
    aggregator.onAttachment(attachmentEvent('album', 'file-1'));
    await vi.advanceTimersByTimeAsync(300);
    aggregator.onAttachment(attachmentEvent('album', 'file-2'));
    await vi.advanceTimersByTimeAsync(300);
    aggregator.onAttachment(attachmentEvent('album', 'file-3'));

    // t = 1299 ms
    await vi.advanceTimersByTimeAsync(699);
    expect(client.sendText).not.toHaveBeenCalled();

    // t = 1300 ms
    await vi.advanceTimersByTimeAsync(1);
    expect(client.sendText).toHaveBeenCalledTimes(1);
    expect(client.sendText).toHaveBeenCalledWith(USER_ID, RECEIVED_THREE);

    expect(sessions.get(USER_ID)?.files).toEqual(['file-1', 'file-2', 'file-3']);
    expect(state.groups.size).toBe(0);
    expect(state.timers.size).toBe(0);
  });

  it('keeps a single live timer per group id', () => {
    aggregator.onAttachment(attachmentEvent('album', 'file-1'));
    aggregator.onAttachment(attachmentEvent('album', 'file-2'));
    aggregator.onAttachment(attachmentEvent('album', 'file-3'));

    expect(state.timers.size).toBe(1);
    expect(vi.getTimerCount()).toBe(1);
  });

  it('debounces different groups independently', async () => {
    aggregator.onAttachment(attachmentEvent('a', 'a-1'));
    aggregator.onAttachment(attachmentEvent('a', 'a-2'));
    aggregator.onAttachment(attachmentEvent('b', 'b-1', { userId: 7, chatId: 7 }));
    aggregator.onAttachment(attachmentEvent('b', 'b-2', { userId: 7, chatId: 7 }));

    expect(state.timers.size).toBe(2);

    await vi.advanceTimersByTimeAsync(700);

    expect(sessions.get(USER_ID)?.files).toEqual(['a-1', 'a-2']);
    expect(sessions.get(7)?.files).toEqual(['b-1', 'b-2']);
  });

  // -----------------------------------------------------------------------
  // Composition checks
  // -----------------------------------------------------------------------

  it('rejects a group mixing photos and a video', async () => {
    aggregator.onAttachment(attachmentEvent('mixed', 'p-1'));
    aggregator.onAttachment(attachmentEvent('mixed', 'p-2'));
    aggregator.onAttachment(attachmentEvent('mixed', 'v-1', { contentType: 'video' }));

    await vi.advanceTimersByTimeAsync(700);

    expect(client.sendText).toHaveBeenCalledWith(USER_ID, BOT_MESSAGES.INVALID_GROUP);
    expect(state.sessions.size).toBe(0);
    expect(state.groups.size).toBe(0);
  });

  it('rejects a group with a single attachment', async () => {
    aggregator.onAttachment(attachmentEvent('single', 'only'));
    await vi.advanceTimersByTimeAsync(700);

    expect(client.sendText).toHaveBeenCalledWith(USER_ID, BOT_MESSAGES.INVALID_GROUP);
    expect(state.sessions.size).toBe(0);
  });

  it('rejects a group with more than ten attachments', async () => {
    for (let i = 1; i <= 11; i++) {
      aggregator.onAttachment(attachmentEvent('big', `file-${i}`));
    }
    await vi.advanceTimersByTimeAsync(700);

    expect(client.sendText).toHaveBeenCalledWith(USER_ID, BOT_MESSAGES.INVALID_GROUP);
    expect(state.sessions.size).toBe(0);
  });

  it('accepts exactly ten attachments', async () => {
    for (let i = 1; i <= 10; i++) {
      aggregator.onAttachment(attachmentEvent('ten', `file-${i}`, { contentType: 'document' }));
    }
    await vi.advanceTimersByTimeAsync(700);

    const session = sessions.get(USER_ID);
    expect(session?.expectedCount).toBe(10);
    expect(session?.type).toBe('document');
  });

  it('rejects unsupported content types', async () => {
    aggregator.onAttachment(attachmentEvent('odd', 's-1', { contentType: 'unsupported' }));
    aggregator.onAttachment(attachmentEvent('odd', 's-2', { contentType: 'unsupported' }));
    await vi.advanceTimersByTimeAsync(700);

    expect(client.sendText).toHaveBeenCalledWith(USER_ID, BOT_MESSAGES.INVALID_GROUP);
    expect(state.sessions.size).toBe(0);
  });

  // -----------------------------------------------------------------------
  // Sessions
  // -----------------------------------------------------------------------

  it('replaces an older session of the same user', async () => {
    sessions.put(USER_ID, { files: ['old'], type: 'audio', expectedCount: 1, createdAt: Date.now() });

    aggregator.onAttachment(attachmentEvent('album', 'file-1', { contentType: 'video' }));
    aggregator.onAttachment(attachmentEvent('album', 'file-2', { contentType: 'video' }));
    await vi.advanceTimersByTimeAsync(700);

    expect(sessions.get(USER_ID)).toEqual({
      files: ['file-1', 'file-2'],
      type: 'video',
      expectedCount: 2,
      createdAt: Date.now(),
    });
  });

  it('ignores finalize for a group that is not buffered', async () => {
    await aggregator.finalize('unknown');

    expect(client.sendText).not.toHaveBeenCalled();
    expect(state.sessions.size).toBe(0);
  });

  it('keeps the session when the confirmation reply fails', async () => {
    client.sendText.mockRejectedValueOnce(new Error('network down'));

    aggregator.onAttachment(attachmentEvent('album', 'file-1'));
    aggregator.onAttachment(attachmentEvent('album', 'file-2'));
    await vi.advanceTimersByTimeAsync(700);

    expect(sessions.get(USER_ID)?.files).toEqual(['file-1', 'file-2']);
  });

  // -----------------------------------------------------------------------
  // Discard
  // -----------------------------------------------------------------------

  it("discards only the given user's groups and cancels their timers", async () => {
    aggregator.onAttachment(attachmentEvent('mine', 'm-1'));
    aggregator.onAttachment(attachmentEvent('theirs', 't-1', { userId: 7, chatId: 7 }));

    expect(aggregator.discardUserGroups(USER_ID)).toBe(1);
    expect([...state.groups.keys()]).toEqual(['theirs']);
    expect([...state.timers.keys()]).toEqual(['theirs']);

    await vi.advanceTimersByTimeAsync(700);

    // Only the other user's single-item group was finalized (and rejected).
    expect(client.sendText).toHaveBeenCalledTimes(1);
    expect(client.sendText).toHaveBeenCalledWith(7, BOT_MESSAGES.INVALID_GROUP);
  });

  it('dispose cancels every pending timer', async () => {
    aggregator.onAttachment(attachmentEvent('a', 'a-1'));
    aggregator.onAttachment(attachmentEvent('b', 'b-1'));

    aggregator.dispose();
    await vi.advanceTimersByTimeAsync(5_000);

    expect(client.sendText).not.toHaveBeenCalled();
    expect(state.timers.size).toBe(0);
  });
});
