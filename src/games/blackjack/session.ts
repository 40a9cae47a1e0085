import { Deck } from '../../cards/Deck.js';
import type { Card } from '../../cards/Card.js';
import { handValue, resolveHand, scoreFor } from './engine.js';
import {
  DEALER_STANDS_AT,
  MAX_PLAYERS,
  type AdvanceOutcome,
  type GameState,
  type HitOutcome,
  type PlayerEntry,
  type PlayerView,
  type StandOutcome,
} from './types.js';

function snapshot(p: PlayerEntry): PlayerView {
  return { ...p, hand: [...p.hand] };
}

export interface GameSessionOptions {
  channelId: string;
  creatorId: string;
  creatorName: string;
  clock?: () => number;
  deckFactory?: () => Deck;
}

/**
 * One channel's blackjack table.
 *
 * Actions and turn advancement are separate steps: `playerHit`/`playerStand`
 * only change the acting player, and the caller decides when to call
 * `nextPlayer`. A non-busting hit leaves the same player on turn.
 */
export class GameSession {
  readonly channelId: string;
  readonly creatorId: string;
  readonly createdAt: number;

  private readonly roster = new Map<string, PlayerEntry>();
  private dealer: Card[] = [];
  private deck: Deck | null = null;
  private gameState: GameState = 'waiting';
  private turnIndex = 0;
  private lastActivity: number;
  private readonly clock: () => number;
  private readonly deckFactory: () => Deck;

  constructor(opts: GameSessionOptions) {
    this.channelId = opts.channelId;
    this.creatorId = opts.creatorId;
    this.clock = opts.clock ?? Date.now;
    this.deckFactory = opts.deckFactory ?? (() => new Deck());
    this.createdAt = this.clock();
    this.lastActivity = this.createdAt;
    this.addPlayer(opts.creatorId, opts.creatorName);
  }

  get state(): GameState {
    return this.gameState;
  }

  get dealerHand(): readonly Card[] {
    return this.dealer;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  /** Players in join order, which is also turn order. */
  get players(): PlayerView[] {
    return this.seats().map(snapshot);
  }

  get playerCount(): number {
    return this.roster.size;
  }

  getPlayer(id: string): PlayerView | undefined {
    const p = this.roster.get(id);
    return p && snapshot(p);
  }

  touch(): void {
    this.lastActivity = this.clock();
  }

  idleFor(now: number = this.clock()): number {
    return now - this.lastActivity;
  }

  isInactive(thresholdMs: number, now: number = this.clock()): boolean {
    return this.idleFor(now) > thresholdMs;
  }

  addPlayer(id: string, name: string): boolean {
    if (this.gameState === 'in_progress') return false;
    if (this.roster.has(id) || this.roster.size >= MAX_PLAYERS) return false;
    this.roster.set(id, { id, name, hand: [], status: 'waiting', gameScore: 0, totalScore: 0, result: null });
    this.touch();
    return true;
  }

  /** Deals a new round to the current roster; also serves as the rematch. */
  startGame(): boolean {
    if (this.roster.size < 1) return false;

    this.deck = this.deckFactory();
    this.dealer = [];
    for (const p of this.roster.values()) {
      p.hand = [this.draw(), this.draw()];
      p.status = 'playing';
      p.gameScore = 0;
      p.result = null;
    }
    this.dealer = [this.draw(), this.draw()];
    this.turnIndex = 0;
    this.gameState = 'in_progress';
    this.touch();
    return true;
  }

  currentPlayerId(): string | null {
    if (this.gameState !== 'in_progress') return null;
    return this.seats()[this.turnIndex]?.id ?? null;
  }

  playerHit(id: string): HitOutcome {
    const player = this.turnHolder(id);
    if (!player) return 'not_your_turn';

    player.hand.push(this.draw());
    this.touch();
    if (handValue(player.hand) > 21) {
      player.status = 'busted';
      return 'bust';
    }
    return 'continue';
  }

  playerStand(id: string): StandOutcome {
    const player = this.turnHolder(id);
    if (!player) return 'not_your_turn';

    player.status = 'stood';
    this.touch();
    return 'stood';
  }

  nextPlayer(): AdvanceOutcome {
    const order = this.seats();
    while (this.turnIndex < order.length && order[this.turnIndex].status !== 'playing') {
      this.turnIndex++;
    }
    this.touch();
    if (this.turnIndex < order.length) return 'next_player';

    this.dealerPlay();
    this.calculateResults();
    this.gameState = 'finished';
    return 'game_over';
  }

  dealerPlay(): void {
    while (handValue(this.dealer) < DEALER_STANDS_AT) {
      this.dealer.push(this.draw());
    }
  }

  calculateResults(): void {
    const dealerTotal = handValue(this.dealer);
    for (const p of this.roster.values()) {
      // late joiners sat this round out
      if (p.status === 'waiting') continue;
      const result = resolveHand(p.status === 'busted', handValue(p.hand), dealerTotal);
      p.result = result;
      p.gameScore = scoreFor(result);
      p.totalScore += p.gameScore;
    }
  }

  /** Highest total first; ties keep join order. */
  leaderboard(): PlayerView[] {
    return this.players.sort((a, b) => b.totalScore - a.totalScore);
  }

  private seats(): PlayerEntry[] {
    return [...this.roster.values()];
  }

  private draw(): Card {
    this.deck ??= this.deckFactory();
    return this.deck.deal();
  }

  private turnHolder(id: string): PlayerEntry | undefined {
    if (id !== this.currentPlayerId()) return undefined;
    return this.roster.get(id);
  }
}
