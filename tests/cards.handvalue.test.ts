import { card } from '../src/cards/Card.js';
import { handTotal } from '../src/games/blackjack/engine.js';

describe('hand value (blackjack)', () => {
  test('10♠ + A♦ => 21', () => {
    const v = handTotal([card('10', 'S'), card('A', 'D')]);
    expect(v.total).toBe(21);
    expect(v.soft).toBe(true);
  });
  test('A♠ + A♦ + 9♥ => 21', () => {
    const v = handTotal([card('A', 'S'), card('A', 'D'), card('9', 'H')]);
    expect(v.total).toBe(21);
    expect(v.soft).toBe(true);
  });
  test('A♠ + 9♥ + 5♦ => hard 15', () => {
    const v = handTotal([card('A', 'S'), card('9', 'H'), card('5', 'D')]);
    expect(v).toEqual({ total: 15, soft: false });
  });
  test('four aces and a 7 => 21', () => {
    const v = handTotal([card('A', 'S'), card('A', 'H'), card('A', 'D'), card('A', 'C'), card('7', 'S')]);
    expect(v.total).toBe(21);
  });
  test('K + Q + 5 busts at 25', () => {
    expect(handTotal([card('K', 'S'), card('Q', 'H'), card('5', 'D')]).total).toBe(25);
  });
  test('empty hand is 0', () => {
    expect(handTotal([])).toEqual({ total: 0, soft: false });
  });
});
