import { ActionRowBuilder, ButtonBuilder, ButtonStyle, EmbedBuilder, escapeMarkdown } from 'discord.js';
import { formatCard, formatHand } from '../../cards/Card.js';
import { themedEmbed } from '../../ui/embeds.js';
import { handValue } from './engine.js';
import type { GameSession } from './session.js';
import { MAX_PLAYERS, type PlayerStatus, type PlayerView, type RoundResult } from './types.js';

export const TABLE_ACTIONS = ['join', 'start_game', 'hit', 'stand', 'status', 'rematch', 'leaderboard', 'cancel'] as const;
export type TableAction = (typeof TABLE_ACTIONS)[number];

const BUTTON_PREFIX = 'bj';

export function actionCustomId(action: TableAction): string {
  return `${BUTTON_PREFIX}:${action}`;
}

export function parseActionCustomId(customId: string): TableAction | null {
  const [prefix, action] = customId.split(':');
  if (prefix !== BUTTON_PREFIX) return null;
  return TABLE_ACTIONS.find((a) => a === action) ?? null;
}

const STATUS_EMOJI: Record<PlayerStatus, string> = {
  waiting: '⏳',
  playing: '🎲',
  stood: '✋',
  busted: '💥',
};

const RESULT_EMOJI: Record<RoundResult, string> = {
  win: '🎉',
  lose: '😞',
  push: '🤝',
  bust: '💥',
  dealer_bust: '🎉',
};

const RESULT_TEXT: Record<RoundResult, string> = {
  win: 'WIN! 🎉',
  lose: 'Lose',
  push: 'Push (Tie)',
  bust: 'Busted! 💥',
  dealer_bust: 'Dealer Busted! 🎉',
};

const name = (p: PlayerView) => escapeMarkdown(p.name);

function waitingLines(session: GameSession): string[] {
  const lines = ['🕐 **Waiting for players...**', `👥 Players joined (${session.playerCount}/${MAX_PLAYERS}):`];
  for (const p of session.players) {
    lines.push(p.totalScore !== 0 ? `• ${name(p)} (Score: ${p.totalScore})` : `• ${name(p)}`);
  }
  lines.push('', 'Click ➕ Join to play!');
  return lines;
}

function inProgressLines(session: GameSession): string[] {
  const turnId = session.currentPlayerId();
  const turn = turnId ? session.getPlayer(turnId) : undefined;
  const [up] = session.dealerHand;
  const lines = [
    `🎯 **Current turn: ${turn ? name(turn) : 'Dealer'}**`,
    '',
    `💼 **Dealer:** ${up ? formatCard(up) : '?'} ❓`,
  ];
  for (const p of session.players) {
    lines.push('', `${STATUS_EMOJI[p.status]} **${name(p)}:** ${formatHand(p.hand)} (${handValue(p.hand)})`);
    if (p.status === 'busted') lines.push('   💥 BUSTED!');
    else if (p.status === 'stood') lines.push('   ✋ STOOD');
  }
  return lines;
}

function signed(score: number): string {
  if (score > 0) return ' +1';
  if (score < 0) return ' -1';
  return '';
}

function finishedLines(session: GameSession): string[] {
  const dealerTotal = handValue(session.dealerHand);
  const dealer = `💼 **Dealer:** ${formatHand(session.dealerHand)} (${dealerTotal})${dealerTotal > 21 ? ' 💥 BUSTED!' : ''}`;
  const lines = ['🏁 **Game Finished!** 🏁', '', dealer, ''];
  for (const p of session.players) {
    if (!p.result) {
      lines.push(`⏳ **${name(p)}:** joins next round | Total: ${p.totalScore}`);
      continue;
    }
    lines.push(
      `${RESULT_EMOJI[p.result]} **${name(p)}:** ${formatHand(p.hand)} (${handValue(p.hand)}) - ` +
      `${RESULT_TEXT[p.result]}${signed(p.gameScore)} | Total: ${p.totalScore}`,
    );
  }
  return lines;
}

/** Markdown body of the table message for the session's current state. */
export function renderTable(session: GameSession): string {
  switch (session.state) {
    case 'waiting': return waitingLines(session).join('\n');
    case 'in_progress': return inProgressLines(session).join('\n');
    case 'finished': return finishedLines(session).join('\n');
  }
}

function button(action: TableAction, label: string, style: ButtonStyle): ButtonBuilder {
  return new ButtonBuilder().setCustomId(actionCustomId(action)).setLabel(label).setStyle(style);
}

export function tableControls(session: GameSession): ActionRowBuilder<ButtonBuilder>[] {
  const row = new ActionRowBuilder<ButtonBuilder>();
  switch (session.state) {
    case 'waiting':
      row.addComponents(
        button('join', '➕ Join Game', ButtonStyle.Success),
        button('start_game', '🚀 Start Game', ButtonStyle.Primary),
        button('cancel', '❌ Cancel Game', ButtonStyle.Danger),
      );
      break;
    case 'in_progress':
      row.addComponents(
        button('hit', '🃏 Hit', ButtonStyle.Primary),
        button('stand', '✋ Stand', ButtonStyle.Secondary),
        button('status', '📊 Game Status', ButtonStyle.Secondary),
      );
      break;
    case 'finished':
      row.addComponents(
        button('rematch', '🔄 Play Again', ButtonStyle.Success),
        button('cancel', '❌ End Game', ButtonStyle.Danger),
        button('leaderboard', '📈 Leaderboard', ButtonStyle.Secondary),
      );
      break;
  }
  return [row];
}

export function tableEmbed(session: GameSession): EmbedBuilder {
  return themedEmbed('game', 'Multiplayer Blackjack', renderTable(session));
}

export type BoardPayload = {
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<ButtonBuilder>[];
};

export function boardPayload(session: GameSession, withControls = true): BoardPayload {
  return { embeds: [tableEmbed(session)], components: withControls ? tableControls(session) : [] };
}

const MEDALS = ['🥇', '🥈', '🥉'];

export function leaderboardText(session: GameSession): string {
  const lines = ['📈 **Leaderboard** 📈', ''];
  session.leaderboard().forEach((p, i) => {
    const place = MEDALS[i] ?? `${i + 1}.`;
    lines.push(`${place} ${name(p)}: ${p.totalScore} points`);
  });
  return lines.join('\n');
}
