import { SlashCommandBuilder, type ChatInputCommandInteraction } from 'discord.js';
import { themedEmbed } from '../../ui/embeds.js';

export const data = new SlashCommandBuilder().setName('rules').setDescription('Show the blackjack rules');

export const RULES_TEXT = [
  '**Goal:** Beat the dealer by having a hand value closer to 21 without going over.',
  '',
  '**Card Values:**',
  '- Number cards = face value (2-10)',
  '- Face cards (J, Q, K) = 10',
  '- Ace = 1 or 11 (whichever is better)',
  '',
  '**Game Flow:**',
  '1. Players join the game',
  '2. Each player gets 2 cards face up',
  '3. Dealer gets 1 card face up, 1 face down',
  '4. Players take turns: **Hit** takes another card, **Stand** keeps the hand',
  '5. If you go over 21, you **BUST** and lose',
  '6. After all players finish, the dealer reveals the hidden card',
  '7. Dealer must hit until they have 17 or more',
  '8. Compare hands with the dealer',
  '',
  '**Winning:**',
  '- Beat the dealer\'s hand without busting',
  '- If the dealer busts, all remaining players win',
  '- Tie = push',
  '',
  '**Scoring:** Win +1 · Loss -1 · Push 0',
  '',
  '**Good luck!** 🍀',
].join('\n');

export async function execute(interaction: ChatInputCommandInteraction) {
  await interaction.reply({ embeds: [themedEmbed('info', 'Multiplayer Blackjack Rules', RULES_TEXT)] });
}
