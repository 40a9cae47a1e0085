import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import { themedEmbed } from '../../ui/embeds.js';

export const data = new SlashCommandBuilder().setName('help').setDescription('How to play and the command list');

export const HELP_TEXT = [
  '**Commands:**',
  '/blackjack - Start a new multiplayer blackjack game',
  '/rules - Show blackjack rules',
  '/score - Show player scores',
  '/cleanup - Clean up inactive games (admin)',
  '',
  '**How to Play:**',
  '1. Use `/blackjack` to create a game',
  '2. Others click "Join Game"',
  '3. Creator clicks "Start Game"',
  '4. Take turns hitting or standing',
  '5. Beat the dealer without going over 21!',
  '',
  'Have fun! 🃏',
].join('\n');

export async function execute(interaction: ChatInputCommandInteraction) {
  await interaction.reply({ embeds: [themedEmbed('game', 'Multiplayer Blackjack Bot', HELP_TEXT)] });
}
