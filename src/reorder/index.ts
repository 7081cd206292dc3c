/**
 * @module reorder
 * Public API of the media-group reorder feature.
 */

export { createReorderState } from './state';
export type { ReorderState } from './state';

export { createSessionStore } from './session-store';
export type { SessionStore } from './session-store';
export { GroupAggregator } from './group-aggregator';
export { createCacheJanitor } from './cache-janitor';
export type { CacheJanitor } from './cache-janitor';
export { createWarningThrottle } from './warning-throttle';
export type { WarningThrottle } from './warning-throttle';

export { REORDER_ERROR_CODES } from './types';
export type { MessagingClient } from './types';
