import {
  SlashCommandBuilder,
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
  type InteractionUpdateOptions,
} from 'discord.js';
import type { BotContext } from '../../bot/context.js';
import { GameSession } from './session.js';
import type { SessionStore } from './sessionStore.js';
import { boardPayload, leaderboardText, parseActionCustomId, type BoardPayload, type TableAction } from './view.js';

export const NO_GAME_MESSAGE = 'No active game in this channel. Use /blackjack to start one!';

export const data = new SlashCommandBuilder()
  .setName('blackjack')
  .setDescription('Open a multiplayer blackjack table in this channel (or show the current one)');

export type TableActor = {
  channelId: string;
  userId: string;
  displayName: string;
};

export type TableResponse =
  | { kind: 'render'; board: BoardPayload }
  | { kind: 'notice'; message: string }
  | { kind: 'closed'; message: string };

const notice = (message: string): TableResponse => ({ kind: 'notice', message });
const render = (session: GameSession): TableResponse => ({ kind: 'render', board: boardPayload(session) });

function applyAction(store: SessionStore, session: GameSession, action: TableAction, actor: TableActor): TableResponse {
  const isCreator = actor.userId === session.creatorId;

  switch (action) {
    case 'join':
      if (!session.addPlayer(actor.userId, actor.displayName)) {
        return notice('Cannot join game (full, already joined, or round in progress)');
      }
      return render(session);

    case 'start_game':
      if (!isCreator) return notice('Only the game creator can start the game');
      if (session.state !== 'waiting') return notice('The game has already started');
      if (!session.startGame()) return notice('Need at least 1 player to start');
      return render(session);

    case 'hit': {
      const outcome = session.playerHit(actor.userId);
      if (outcome === 'not_your_turn') return notice('Wait for your turn!');
      if (outcome === 'bust') session.nextPlayer();
      return render(session);
    }

    case 'stand':
      if (session.playerStand(actor.userId) === 'not_your_turn') return notice('Wait for your turn!');
      session.nextPlayer();
      return render(session);

    case 'status':
      return render(session);

    case 'rematch':
      if (!isCreator || session.state !== 'finished') {
        return notice('Only the creator can start a rematch after the game ends');
      }
      if (!session.startGame()) return notice('Error starting new game');
      return render(session);

    case 'leaderboard':
      return notice(leaderboardText(session));

    case 'cancel':
      if (!isCreator) return notice('Only the game creator can cancel');
      store.remove(session.channelId);
      return { kind: 'closed', message: '❌ Game cancelled by creator.' };
  }
}

/** Applies one button press to the channel's table while holding the channel lock. */
export function handleTableAction(store: SessionStore, action: TableAction, actor: TableActor): Promise<TableResponse> {
  return store.withChannel(actor.channelId, () => {
    const session = store.get(actor.channelId);
    if (!session) return { kind: 'closed', message: NO_GAME_MESSAGE };
    session.touch();
    return applyAction(store, session, action, actor);
  });
}

/** Returns the channel's table, creating it with the caller as creator when there is none. */
export function openTable(store: SessionStore, actor: TableActor): Promise<{ session: GameSession; created: boolean; board: BoardPayload }> {
  return store.withChannel(actor.channelId, () => {
    const existing = store.get(actor.channelId);
    if (existing) return { session: existing, created: false, board: boardPayload(existing) };
    const session = new GameSession({ channelId: actor.channelId, creatorId: actor.userId, creatorName: actor.displayName });
    store.put(session);
    return { session, created: true, board: boardPayload(session) };
  });
}

export async function execute(interaction: ChatInputCommandInteraction, ctx: BotContext) {
  const { session, created, board } = await openTable(ctx.store, {
    channelId: interaction.channelId,
    userId: interaction.user.id,
    displayName: interaction.user.displayName,
  });
  if (created) ctx.log.info({ msg: 'bj_session_created', channelId: session.channelId, creatorId: session.creatorId });
  await interaction.reply({ ...board, allowedMentions: { parse: [] } });
}

/** The parts of a ButtonInteraction the table reads and answers through. */
export interface TableButtonPress {
  readonly customId: string;
  readonly channelId: string;
  readonly user: { readonly id: string; readonly displayName: string };
  update(options: InteractionUpdateOptions): Promise<unknown>;
  reply(options: InteractionReplyOptions): Promise<unknown>;
}

/** Returns false when the button does not belong to the blackjack table. */
export async function handleButton(interaction: TableButtonPress, ctx: BotContext): Promise<boolean> {
  const action = parseActionCustomId(interaction.customId);
  if (!action) return false;

  ctx.log.debug({ msg: 'bj_button', action, userId: interaction.user.id, channelId: interaction.channelId });
  const response = await handleTableAction(ctx.store, action, {
    channelId: interaction.channelId,
    userId: interaction.user.id,
    displayName: interaction.user.displayName,
  });

  switch (response.kind) {
    case 'render':
      await interaction.update({ ...response.board, allowedMentions: { parse: [] } });
      break;
    case 'notice':
      await interaction.reply({ content: response.message, flags: MessageFlags.Ephemeral });
      break;
    case 'closed':
      await interaction.update({ content: response.message, embeds: [], components: [] });
      break;
  }
  return true;
}
