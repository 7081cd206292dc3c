/**
 * =============================================================================
 * Session Store - One pending reorder per user
 *
 * Sessions expire lazily: the TTL is only checked when a session is read,
 * and an expired session is evicted on that read. No timer is involved.
 * =============================================================================
 */

import { auditLog } from '../core/audit-log';
import { createError } from '../core/errors';
import type { ReorderState } from './state';
import { REORDER_ERROR_CODES } from './types';
import type { Session, SyncResult } from './types';

/**
 * Session store configuration
 */
export interface SessionStoreConfig {
  state: ReorderState;
  ttlMs: number;
  now?: () => number;
}

/**
 * Session store interface
 */
export interface SessionStore {
  get: (userId: number) => Session | null;
  resolve: (userId: number) => SyncResult<Session>;
  put: (userId: number, session: Session) => void;
  clear: (userId: number) => boolean;
}

/**
 * Creates the session store.
 *
 * Factory function pattern - returns a closure of methods.
 */
export function createSessionStore(config: SessionStoreConfig): SessionStore {
  const { state, ttlMs, now = () => Date.now() } = config;

  /**
   * Looks up a session, evicting it if it outlived the TTL
   */
  function resolve(userId: number): SyncResult<Session> {
    const session = state.sessions.get(userId);

    if (!session) {
      return [
        createError('SESSION', REORDER_ERROR_CODES.NO_SESSION, 'No active session'),
        null,
      ];
    }

    const age = now() - session.createdAt;
    if (age > ttlMs) {
      state.sessions.delete(userId);
      auditLog.record(REORDER_ERROR_CODES.SESSION_EXPIRED, { userId, ageMs: age, ttlMs });
      return [
        createError('SESSION', REORDER_ERROR_CODES.SESSION_EXPIRED, 'Session expired'),
        null,
      ];
    }

    return [null, session];
  }

  function get(userId: number): Session | null {
    const [, session] = resolve(userId);
    return session;
  }

  function put(userId: number, session: Session): void {
    state.sessions.set(userId, session);
  }

  function clear(userId: number): boolean {
    return state.sessions.delete(userId);
  }

  return { get, resolve, put, clear };
}
