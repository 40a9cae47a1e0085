import dotenv from 'dotenv';
import { Events } from 'discord.js';
import { createClient } from './client.js';
import { createLogger } from './log.js';
import { getConfig } from './config/index.js';
import { SessionStore } from './games/blackjack/sessionStore.js';
import { startSweepLoop, type SweepHandle } from './games/blackjack/sweeper.js';
import { initInteractionRouter } from './interactions/router.js';
import { registerCommands } from './register.js';
import { normalizeError } from './utils/errors.js';
import type { BotContext } from './bot/context.js';

dotenv.config({ override: false });

async function main() {
  const config = getConfig();
  const log = createLogger(config.logLevel);

  process.on('unhandledRejection', (reason) => {
    log.error({ msg: 'unhandledRejection', error: normalizeError(reason) });
  });

  const token = config.token;
  if (!token) {
    log.error({ msg: 'BOT_TOKEN is missing. Create a .env file (copy from .env.example) and set BOT_TOKEN.' });
    process.exit(1);
  }

  const ctx: BotContext = { store: new SessionStore(), config, log };
  const client = createClient();
  let sweep: SweepHandle | null = null;

  client.once(Events.ClientReady, (ready) => {
    log.info({ msg: 'ready', user: ready.user.tag, guilds: ready.guilds.cache.size });
    sweep = startSweepLoop(ctx.store, {
      log,
      thresholdMs: config.blackjack.idleMs,
      intervalMs: config.blackjack.sweepIntervalMs,
      backoffMs: config.blackjack.sweepBackoffMs,
    });
  });

  initInteractionRouter(client, ctx);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ msg: 'shutdown', signal, tables: ctx.store.size });
    sweep?.stop();
    try { await client.destroy(); } catch (e) { log.warn({ msg: 'client_destroy_failed', error: normalizeError(e) }); }
    process.exit(0);
  };
  process.on('SIGINT', () => { void shutdown('SIGINT'); });
  process.on('SIGTERM', () => { void shutdown('SIGTERM'); });

  await client.login(token);

  if (config.registerOnStart) {
    const appId = config.clientId ?? client.application?.id;
    if (!appId) {
      log.warn({ msg: 'register_skipped', reason: 'no application id' });
    } else {
      try {
        await registerCommands({ token, appId, guildId: config.devGuildId, log });
      } catch (e) {
        log.error({ msg: 'Slash registration failed', scope: 'register', error: normalizeError(e) });
      }
    }
  }
}

main().catch((e) => {
  console.error({ msg: 'Fatal error', scope: 'startup', error: normalizeError(e) });
  process.exit(1);
});
