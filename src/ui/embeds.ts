import { EmbedBuilder, type APIEmbedField } from 'discord.js';

export type EmbedFlavor = 'info' | 'success' | 'warn' | 'error' | 'game';

const Colors: Record<EmbedFlavor, number> = {
  info: 0x7AA2F7,
  success: 0x9ECE6A,
  warn: 0xE0AF68,
  error: 0xF7768E,
  game: 0x2E8B57,
};

const Icons: Record<EmbedFlavor, string> = {
  info: 'ℹ️',
  success: '✅',
  warn: '⚠️',
  error: '❌',
  game: '🎮',
};

export function themedEmbed(flavor: EmbedFlavor, title: string, description?: string, fields?: APIEmbedField[]): EmbedBuilder {
  const emb = new EmbedBuilder()
    .setColor(Colors[flavor])
    .setTitle(`${Icons[flavor]} ${title}`)
    .setTimestamp();
  if (description) emb.setDescription(description);
  if (fields?.length) emb.addFields(fields);
  return emb;
}
