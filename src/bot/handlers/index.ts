/**
 * =============================================================================
 * Bot Handlers - Public API
 * =============================================================================
 */

export { createReorderHandler } from './reorder';
export type { ReorderHandler } from './reorder';

export { toIncomingEvent } from './incoming';
