import { Client, GatewayIntentBits } from 'discord.js';

export function createClient() {
  // slash commands and buttons only need guild events
  return new Client({ intents: [GatewayIntentBits.Guilds] });
}
