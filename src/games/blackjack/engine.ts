import { cardValue, type Card } from '../../cards/Card.js';
import type { RoundResult } from './types.js';

export function handTotal(cards: readonly Card[]): { total: number; soft: boolean } {
  let total = 0;
  let aces = 0;
  for (const c of cards) {
    total += cardValue(c);
    if (c.rank === 'A') aces++;
  }
  while (total > 21 && aces > 0) {
    total -= 10; // count one Ace as 1 instead of 11
    aces--;
  }
  // any Ace still counted as 11
  return { total, soft: aces > 0 };
}

export function handValue(cards: readonly Card[]): number {
  return handTotal(cards).total;
}

export function isBust(cards: readonly Card[]): boolean {
  return handValue(cards) > 21;
}

export function scoreFor(result: RoundResult): number {
  switch (result) {
    case 'win':
    case 'dealer_bust':
      return 1;
    case 'push':
      return 0;
    case 'lose':
    case 'bust':
      return -1;
  }
}

/** Outcome of one settled hand against the dealer's final hand. */
export function resolveHand(busted: boolean, playerTotal: number, dealerTotal: number): RoundResult {
  if (busted) return 'bust';
  if (dealerTotal > 21) return 'dealer_bust';
  if (playerTotal > dealerTotal) return 'win';
  if (playerTotal < dealerTotal) return 'lose';
  return 'push';
}
