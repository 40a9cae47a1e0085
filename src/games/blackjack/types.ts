import type { Card } from '../../cards/Card.js';

export type GameState = 'waiting' | 'in_progress' | 'finished';
export type PlayerStatus = 'waiting' | 'playing' | 'stood' | 'busted';
export type RoundResult = 'win' | 'lose' | 'push' | 'bust' | 'dealer_bust';

export type HitOutcome = 'not_your_turn' | 'bust' | 'continue';
export type StandOutcome = 'not_your_turn' | 'stood';
export type AdvanceOutcome = 'next_player' | 'game_over';

export const MAX_PLAYERS = 6;
export const DEALER_STANDS_AT = 17;

export interface PlayerEntry {
  readonly id: string;
  name: string;
  hand: Card[];
  status: PlayerStatus;
  /** This round: -1, 0 or +1. */
  gameScore: number;
  totalScore: number;
  result: RoundResult | null;
}

/** What callers outside the session see: a snapshot that cannot steer the round. */
export type PlayerView = Readonly<Omit<PlayerEntry, 'hand'>> & { readonly hand: readonly Card[] };
