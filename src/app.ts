/**
 * =============================================================================
 * Bot Wiring
 *
 * Builds the reorder feature's components around one shared state container
 * and attaches them to a grammY bot using long polling.
 * =============================================================================
 */

import { Bot } from 'grammy';
import { loadConfig } from './config';
import type { AppConfig, Env, ReorderConfig } from './config';
import { auditLog } from './core/audit-log';
import { describeThrown } from './core/errors';
import { createReorderHandler, toIncomingEvent } from './bot/handlers';
import type { ReorderHandler } from './bot/handlers';
import { createGrammyMessagingClient } from './bot/messaging-client';
import {
  GroupAggregator,
  REORDER_ERROR_CODES,
  createCacheJanitor,
  createReorderState,
  createSessionStore,
  createWarningThrottle,
} from './reorder';
import type {
  CacheJanitor,
  MessagingClient,
  ReorderState,
  SessionStore,
  WarningThrottle,
} from './reorder';

/**
 * Everything the reorder feature needs, wired together
 */
export interface ReorderComponents {
  state: ReorderState;
  sessions: SessionStore;
  aggregator: GroupAggregator;
  throttle: WarningThrottle;
  janitor: CacheJanitor;
  handler: ReorderHandler;
}

export interface ReorderComponentsOptions {
  client: MessagingClient;
  config: ReorderConfig;
  state?: ReorderState;
  now?: () => number;
}

/**
 * Builds the components over one state container.
 * The janitor is created but not started.
 */
export function createReorderComponents(options: ReorderComponentsOptions): ReorderComponents {
  const { client, config, now } = options;
  const state = options.state ?? createReorderState();

  const sessions = createSessionStore({ state, ttlMs: config.sessionTtlMs, now });
  const aggregator = new GroupAggregator({
    state,
    client,
    sessions,
    debounceMs: config.debounceMs,
    now,
  });
  const throttle = createWarningThrottle({ state, cooldownMs: config.warningCooldownMs, now });
  const janitor = createCacheJanitor({
    state,
    intervalMs: config.janitorIntervalMs,
    maxAgeMs: config.groupMaxAgeMs,
    throttle,
    now,
  });
  const handler = createReorderHandler({ client, sessions, aggregator, throttle });

  return { state, sessions, aggregator, throttle, janitor, handler };
}

/**
 * Running bot handle
 */
export interface ReorderBot {
  bot: Bot;
  components: ReorderComponents;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

const BOT_COMMANDS = [
  { command: 'start', description: 'Start over with a new media group' },
  { command: 'help', description: 'How to reorder files' },
];

/**
 * Creates the grammY bot with the reorder handler attached.
 */
export function createReorderBot(config: AppConfig): ReorderBot {
  const bot = new Bot(config.bot.token);
  let stopping = false;
  const client = createGrammyMessagingClient(bot.api);
  const components = createReorderComponents({ client, config: config.reorder });

  bot.on('message', async (ctx) => {
    const event = toIncomingEvent(ctx.message);
    if (event) {
      await components.handler.dispatch(event);
    }
  });

  bot.catch((err) => {
    auditLog.record(REORDER_ERROR_CODES.DISPATCH_FAILED, {
      updateId: err.ctx.update.update_id,
      userId: err.ctx.from?.id,
      error: describeThrown(err.error),
    });
  });

  async function start(): Promise<void> {
    await bot.api.setMyCommands(BOT_COMMANDS);
    // stop() may have run while the command menu was being registered
    if (stopping) return;

    components.janitor.start();

    await bot.start({
      onStart: (info) => auditLog.trace(`Bot @${info.username} is running...`),
    });
  }

  async function stop(): Promise<void> {
    stopping = true;
    components.janitor.stop();
    components.aggregator.dispose();
    await bot.stop();
    auditLog.trace('Bot stopped');
  }

  return { bot, components, start, stop };
}

/**
 * Loads configuration, starts the bot and wires SIGINT/SIGTERM to a
 * graceful stop. Resolves with the process exit code once polling ends.
 */
export async function runReorderBot(env: Env = process.env): Promise<number> {
  // requireEnv has already recorded the error
  const [, config] = loadConfig(env);
  if (!config) return 1;

  const reorderBot = createReorderBot(config);

  const shutdown = (signal: string) => {
    auditLog.trace(`Received ${signal}, shutting down`);
    reorderBot.stop().catch((error: unknown) => {
      auditLog.record('SHUTDOWN_FAILED', { error: describeThrown(error) });
    });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  await reorderBot.start();
  return 0;
}
