export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 'A' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9' | '10' | 'J' | 'Q' | 'K';
export type Card = { readonly suit: Suit; readonly rank: Rank };

export const SUITS: readonly Suit[] = ['S', 'H', 'D', 'C'];
export const RANKS: readonly Rank[] = ['2', '3', '4', '5', '6', '7', '8', '9', '10', 'J', 'Q', 'K', 'A'];

const SUIT_GLYPH: Record<Suit, string> = { S: '♠', H: '♥', D: '♦', C: '♣' };

export function card(rank: Rank, suit: Suit): Card {
  return { rank, suit };
}

/** Ace counts 11 here; hand evaluation downgrades it when needed. */
export function cardValue(c: Card): number {
  switch (c.rank) {
    case 'A': return 11;
    case 'K':
    case 'Q':
    case 'J': return 10;
    default: return parseInt(c.rank, 10);
  }
}

export function formatCard(c: Card): string {
  return `${c.rank}${SUIT_GLYPH[c.suit]}`;
}

export function formatHand(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}
