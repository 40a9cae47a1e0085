import { SlashCommandBuilder, MessageFlags, type ChatInputCommandInteraction } from 'discord.js';
import type { BotContext } from '../../bot/context.js';
import { isSweepAdmin } from '../../admin/permissions.js';
import { sweepInactive } from '../../games/blackjack/sweeper.js';
import { logBlocked } from '../../utils/logger.js';

export const data = new SlashCommandBuilder().setName('cleanup').setDescription('Clean up inactive games (admin)');

/** Sweeps with the admin threshold and returns the reply text. */
export async function runCleanup(ctx: BotContext, userId: string): Promise<{ allowed: boolean; message: string }> {
  if (!isSweepAdmin(ctx.config, userId)) {
    return { allowed: false, message: 'Only admins can use this command.' };
  }
  const removed = await sweepInactive(ctx.store, { thresholdMs: ctx.config.blackjack.adminIdleMs, log: ctx.log });
  ctx.log.info({ msg: 'bj_manual_sweep', userId, removed: removed.length });
  return { allowed: true, message: `🧹 Cleaned up ${removed.length} inactive games.` };
}

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
  const { allowed, message } = await runCleanup(ctx, interaction.user.id);
  if (!allowed) {
    logBlocked('not an admin', { command: 'cleanup', user: { id: interaction.user.id }, channel: { id: interaction.channelId } });
    await interaction.reply({ content: message, flags: MessageFlags.Ephemeral });
    return;
  }
  await interaction.reply({ content: message });
}
