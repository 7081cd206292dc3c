/**
 * @module reorder/state
 *
 * Process-wide container for every in-memory map the reorder feature uses.
 * Created once at startup and handed to each component, so tests can build
 * an isolated instance per case.
 */

import type { PendingGroup, Session } from './types';

export interface ReorderState {
  /** Media groups still arriving, keyed by group id. */
  groups: Map<string, PendingGroup>;
  /** Live debounce timer per group id. At most one per key. */
  timers: Map<string, ReturnType<typeof setTimeout>>;
  /** Finalized groups awaiting a new order, keyed by user id. */
  sessions: Map<number, Session>;
  /** Last fallback warning per user (epoch ms). */
  warnings: Map<number, number>;
}

export function createReorderState(): ReorderState {
  return {
    groups: new Map(),
    timers: new Map(),
    sessions: new Map(),
    warnings: new Map(),
  };
}

/**
 * Cancels the debounce timer for a group, if one is live.
 */
export function cancelGroupTimer(state: ReorderState, groupId: string): void {
  const timer = state.timers.get(groupId);
  if (timer !== undefined) {
    clearTimeout(timer);
    state.timers.delete(groupId);
  }
}

/**
 * Drops a pending group together with its timer.
 * Returns true when a buffer was actually removed.
 */
export function evictGroup(state: ReorderState, groupId: string): boolean {
  cancelGroupTimer(state, groupId);
  return state.groups.delete(groupId);
}
