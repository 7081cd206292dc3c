/**
 * =============================================================================
 * Cache Janitor - Periodic sweep of abandoned media-group buffers
 *
 * The debounce timer is the normal way a buffer leaves memory. The janitor
 * only catches groups whose timer never fired.
 * =============================================================================
 */

import { auditLog } from '../core/audit-log';
import { evictGroup } from './state';
import type { ReorderState } from './state';
import type { PendingGroup } from './types';
import type { WarningThrottle } from './warning-throttle';

/**
 * Cache janitor configuration
 */
export interface CacheJanitorConfig {
  state: ReorderState;
  intervalMs: number;
  maxAgeMs: number;
  throttle?: WarningThrottle;
  now?: () => number;
}

/**
 * Cache janitor interface
 */
export interface CacheJanitor {
  start: () => void;
  stop: () => void;
  sweep: () => void;
  isRunning: () => boolean;
}

/**
 * Age reference for a buffer: the creation time of its earliest event,
 * or the buffer's own creation time when the platform sent none.
 */
function groupStartedAt(group: PendingGroup): number {
  const first = group.events[0];
  return first?.sentAt ?? group.createdAt;
}

/**
 * Creates the cache janitor.
 *
 * Factory function pattern - returns a closure of methods.
 */
export function createCacheJanitor(config: CacheJanitorConfig): CacheJanitor {
  const { state, intervalMs, maxAgeMs, throttle, now = () => Date.now() } = config;

  let timer: ReturnType<typeof setInterval> | null = null;

  function sweep(): void {
    const current = now();
    const expired: string[] = [];

    for (const [groupId, group] of state.groups) {
      if (current - groupStartedAt(group) > maxAgeMs) {
        expired.push(groupId);
      }
    }

    for (const groupId of expired) {
      evictGroup(state, groupId);
    }

    const warningsRemoved = throttle ? throttle.prune() : 0;

    if (expired.length > 0 || warningsRemoved > 0) {
      auditLog.trace(
        `Janitor sweep: ${expired.length} stale groups, ${warningsRemoved} warning entries removed`
      );
    }
  }

  function start(): void {
    if (timer) return;
    timer = setInterval(sweep, intervalMs);
    timer.unref(); // unref so it doesn't keep the process alive
    auditLog.trace(`Cache janitor started: every ${intervalMs}ms, max age ${maxAgeMs}ms`);
  }

  function stop(): void {
    if (!timer) return;
    clearInterval(timer);
    timer = null;
    auditLog.trace('Cache janitor stopped');
  }

  function isRunning(): boolean {
    return timer !== null;
  }

  return { start, stop, sweep, isRunning };
}
