import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import type { BotContext } from '../../bot/context.js';
import { NO_GAME_MESSAGE } from '../../games/blackjack/commands.js';
import { boardPayload } from '../../games/blackjack/view.js';

export const data = new SlashCommandBuilder().setName('score').setDescription('Show the table and scores for this channel');

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
  const board = await ctx.store.withChannel(interaction.channelId, () => {
    const session = ctx.store.get(interaction.channelId);
    return session ? boardPayload(session, false) : null;
  });
  if (!board) {
    await interaction.reply({ content: NO_GAME_MESSAGE });
    return;
  }
  await interaction.reply({ ...board, allowedMentions: { parse: [] } });
}
