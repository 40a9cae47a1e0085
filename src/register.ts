import dotenv from 'dotenv';
import { REST, Routes } from 'discord.js';
import { getSlashCommands } from './commands/slash/index.js';
import type { Logger } from './log.js';

export function buildAllCommands() {
  const commands = getSlashCommands();
  const deduped = commands.filter((c, i) => commands.findIndex((x) => x.data.name === c.data.name) === i);
  return deduped.map((c) => c.data.toJSON());
}

/** Upserts every slash command, to one guild when `guildId` is set (instant) or globally. */
export async function registerCommands(opts: { token: string; appId: string; guildId?: string | null; log: Logger }) {
  const rest = new REST({ version: '10' }).setToken(opts.token);
  const body = buildAllCommands();
  const route = opts.guildId
    ? Routes.applicationGuildCommands(opts.appId, opts.guildId)
    : Routes.applicationCommands(opts.appId);
  await rest.put(route, { body });
  opts.log.info({ msg: 'commands_registered', scope: opts.guildId ? 'guild' : 'global', names: body.map((c) => c.name) });
  return body.map((c) => c.name);
}

// Allow running as a standalone script: `node dist/register.js`
if (require.main === module) {
  (async () => {
    dotenv.config();
    const { getConfig } = await import('./config/index.js');
    const { createLogger } = await import('./log.js');
    const cfg = getConfig();
    const log = createLogger(cfg.logLevel);
    if (!cfg.token || !cfg.clientId) throw new Error('BOT_TOKEN and CLIENT_ID are required to register commands');
    await registerCommands({ token: cfg.token, appId: cfg.clientId, guildId: cfg.devGuildId, log });
  })().catch((e) => {
    console.error('register_fatal', e);
    process.exit(1);
  });
}
