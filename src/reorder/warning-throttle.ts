/**
 * =============================================================================
 * Warning Throttle - Suppresses repeated "invalid input" replies
 *
 * Keeps one timestamp per user: the last time a fallback warning was sent.
 * A user who keeps sending junk gets at most one warning per cooldown.
 * =============================================================================
 */

import { auditLog } from '../core/audit-log';
import type { ReorderState } from './state';

/**
 * Warning throttle configuration
 */
export interface WarningThrottleConfig {
  state: ReorderState;
  cooldownMs: number;    // Minimum gap between two warnings to one user
  now?: () => number;
}

/**
 * Warning throttle interface
 */
export interface WarningThrottle {
  tryAcquire: (userId: number) => boolean;
  prune: () => number;
}

/**
 * Creates a warning throttle.
 *
 * @example
 * ```ts
 * const throttle = createWarningThrottle({ state, cooldownMs: 1500 });
 *
 * if (throttle.tryAcquire(userId)) {
 *   await ctx.reply('Unrecognized command. Use /help');
 * }
 * ```
 */
export function createWarningThrottle(config: WarningThrottleConfig): WarningThrottle {
  const { state, cooldownMs, now = () => Date.now() } = config;

  /**
   * Returns true and records the warning when the user is outside the cooldown
   */
  function tryAcquire(userId: number): boolean {
    const current = now();
    const last = state.warnings.get(userId);

    if (last !== undefined && current - last < cooldownMs) {
      auditLog.trace(`Warning suppressed for user ${userId}`);
      return false;
    }

    state.warnings.set(userId, current);
    return true;
  }

  /**
   * Drops entries whose cooldown has already passed
   */
  function prune(): number {
    const cutoff = now() - cooldownMs;
    let removed = 0;

    for (const [userId, last] of [...state.warnings]) {
      if (last <= cutoff) {
        state.warnings.delete(userId);
        removed++;
      }
    }

    return removed;
  }

  return { tryAcquire, prune };
}
