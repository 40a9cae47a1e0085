import { RNG, cryptoRNG } from '../util/rng.js';
import { RANKS, SUITS, type Card } from './Card.js';

export const DECK_SIZE = 52;
// Below this many cards the deck is rebuilt before dealing.
export const RESHUFFLE_BELOW = 10;

export function freshCards(): Card[] {
  const cards: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) cards.push({ suit, rank });
  }
  return cards;
}

/**
 * Single 52-card deck dealt from the end.
 *
 * Running low rebuilds the whole deck, so cards already in players' hands can
 * show up again in the same round.
 */
export class Deck {
  private cards: Card[] = [];

  constructor(private readonly rng: RNG = cryptoRNG) {
    this.reset();
  }

  /**
   * Deck whose first deals are `top`, in order, with the rest of the 52 cards
   * shuffled underneath.
   */
  static stacked(top: readonly Card[], rng: RNG = cryptoRNG): Deck {
    const deck = new Deck(rng);
    const picked = new Set(top.map((c) => `${c.rank}${c.suit}`));
    const rest = deck.cards.filter((c) => !picked.has(`${c.rank}${c.suit}`));
    deck.cards = [...rest, ...top.slice().reverse()];
    return deck;
  }

  get remaining(): number {
    return this.cards.length;
  }

  shuffle(): void {
    const a = this.cards;
    for (let i = a.length - 1; i > 0; i--) {
      const j = this.rng(i + 1);
      [a[i], a[j]] = [a[j], a[i]];
    }
  }

  deal(): Card {
    if (this.cards.length < RESHUFFLE_BELOW) this.reset();
    const next = this.cards.pop();
    if (!next) throw new Error('deck_empty');
    return next;
  }

  /** Cards still in the deck, next deal last. */
  peek(): readonly Card[] {
    return this.cards;
  }

  private reset(): void {
    this.cards = freshCards();
    this.shuffle();
  }
}
