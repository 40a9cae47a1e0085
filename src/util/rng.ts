import { randomInt as cryptoRandomInt } from 'node:crypto';

export type RNG = (maxExclusive: number) => number;

function checkBound(maxExclusive: number): void {
  if (!Number.isSafeInteger(maxExclusive) || maxExclusive <= 0) {
    throw new RangeError(`RNG bound must be a positive integer, got ${maxExclusive}`);
  }
}

export const cryptoRNG: RNG = (maxExclusive) => {
  checkBound(maxExclusive);
  return cryptoRandomInt(0, maxExclusive);
};

/** Repeatable mulberry32 stream; decks built from the same seed shuffle identically. */
export function seededRNG(seed: number): RNG {
  let state = seed >>> 0;
  return (maxExclusive) => {
    checkBound(maxExclusive);
    state = (state + 0x6d2b79f5) >>> 0;
    let x = Math.imul(state ^ (state >>> 15), state | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    const unit = ((x ^ (x >>> 14)) >>> 0) / 2 ** 32;
    return Math.floor(unit * maxExclusive);
  };
}
