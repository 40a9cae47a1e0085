import { card, type Card } from '../../../cards/Card.js';
import { Deck } from '../../../cards/Deck.js';
import { seededRNG } from '../../../util/rng.js';
import { GameSession } from '../session.js';

const HOUR = 60 * 60 * 1000;

/** Session whose rounds are dealt from the given stacks, one per startGame. */
function table(stacks: Card[][], players: string[] = []) {
  const queue = stacks.map((top) => Deck.stacked(top, seededRNG(1)));
  const session = new GameSession({
    channelId: 'chan-1',
    creatorId: 'alice',
    creatorName: 'Alice',
    deckFactory: () => queue.shift() ?? new Deck(seededRNG(2)),
  });
  for (const id of players) session.addPlayer(id, id.toUpperCase());
  return session;
}

describe('game session', () => {
  test('creator is seated first and the table waits', () => {
    const s = table([]);
    expect(s.state).toBe('waiting');
    expect(s.players.map((p) => p.id)).toEqual(['alice']);
    expect(s.getPlayer('alice')).toMatchObject({ name: 'Alice', status: 'waiting', gameScore: 0, totalScore: 0, result: null });
    expect(s.currentPlayerId()).toBeNull();
  });

  test('19 against dealer 17 wins', () => {
    const s = table([[card('10', 'S'), card('9', 'H'), card('7', 'D'), card('K', 'C')]]);
    expect(s.startGame()).toBe(true);
    expect(s.getPlayer('alice')?.hand).toEqual([card('10', 'S'), card('9', 'H')]);
    expect(s.dealerHand).toEqual([card('7', 'D'), card('K', 'C')]);

    expect(s.playerStand('alice')).toBe('stood');
    expect(s.nextPlayer()).toBe('game_over');
    expect(s.state).toBe('finished');
    expect(s.dealerHand).toHaveLength(2);
    expect(s.getPlayer('alice')).toMatchObject({ result: 'win', gameScore: 1, totalScore: 1 });
  });

  test('hitting K+Q into a 5 busts without advancing the turn', () => {
    const s = table([[card('K', 'S'), card('Q', 'H'), card('9', 'C'), card('8', 'D'), card('5', 'D')]]);
    s.startGame();
    expect(s.playerHit('alice')).toBe('bust');
    expect(s.getPlayer('alice')?.status).toBe('busted');
    expect(s.currentPlayerId()).toBe('alice');
    expect(s.state).toBe('in_progress');

    expect(s.nextPlayer()).toBe('game_over');
    expect(s.getPlayer('alice')).toMatchObject({ result: 'bust', gameScore: -1, totalScore: -1 });
  });

  test('a seventh player is turned away', () => {
    const s = table([], ['p2', 'p3', 'p4', 'p5', 'p6']);
    expect(s.playerCount).toBe(6);
    expect(s.addPlayer('p7', 'P7')).toBe(false);
    expect(s.playerCount).toBe(6);
    expect(s.getPlayer('p7')).toBeUndefined();
  });

  test('joining twice is refused', () => {
    const s = table([]);
    expect(s.addPlayer('bob', 'Bob')).toBe(true);
    expect(s.addPlayer('bob', 'Bob again')).toBe(false);
    expect(s.getPlayer('bob')?.name).toBe('Bob');
  });

  test('start deals two cards to every player and the dealer', () => {
    const dealt: Deck[] = [];
    const s = new GameSession({
      channelId: 'chan-1',
      creatorId: 'alice',
      creatorName: 'Alice',
      deckFactory: () => {
        const deck = new Deck(seededRNG(3));
        dealt.push(deck);
        return deck;
      },
    });
    for (const id of ['p2', 'p3', 'p4', 'p5', 'p6']) s.addPlayer(id, id);
    s.startGame();
    for (const p of s.players) {
      expect(p.hand).toHaveLength(2);
      expect(p.status).toBe('playing');
    }
    expect(s.dealerHand).toHaveLength(2);
    expect(dealt).toHaveLength(1);
    expect(dealt[0].remaining).toBe(52 - 14);
  });

  test('only the turn holder may act', () => {
    const s = table(
      [[card('2', 'S'), card('3', 'S'), card('2', 'H'), card('3', 'H'), card('2', 'D'), card('3', 'D'), card('10', 'C'), card('7', 'C'), card('4', 'S')]],
      ['bob', 'carol'],
    );
    s.startGame();
    const order = ['alice', 'bob', 'carol'];
    for (const holder of order) {
      expect(s.currentPlayerId()).toBe(holder);
      for (const other of order.filter((id) => id !== holder)) {
        expect(s.playerHit(other)).toBe('not_your_turn');
        expect(s.playerStand(other)).toBe('not_your_turn');
      }
      expect(s.playerStand(holder)).toBe('stood');
      s.nextPlayer();
    }
    expect(s.state).toBe('finished');
  });

  test('a hit that stays under 21 keeps the turn', () => {
    const s = table(
      [[card('2', 'S'), card('3', 'S'), card('2', 'H'), card('3', 'H'), card('10', 'C'), card('7', 'C'), card('4', 'S')]],
      ['bob'],
    );
    s.startGame();
    expect(s.playerHit('alice')).toBe('continue');
    expect(s.getPlayer('alice')?.hand).toEqual([card('2', 'S'), card('3', 'S'), card('4', 'S')]);
    expect(s.nextPlayer()).toBe('next_player');
    expect(s.currentPlayerId()).toBe('alice');

    s.playerStand('alice');
    expect(s.nextPlayer()).toBe('next_player');
    expect(s.currentPlayerId()).toBe('bob');
  });

  test('busted player is skipped, bust loses even when the dealer busts', () => {
    const s = table(
      [[card('K', 'S'), card('Q', 'H'), card('10', 'C'), card('9', 'C'), card('10', 'D'), card('6', 'C'), card('5', 'D'), card('K', 'H')]],
      ['bob'],
    );
    s.startGame();
    expect(s.playerHit('alice')).toBe('bust');
    expect(s.playerHit('bob')).toBe('not_your_turn');
    expect(s.nextPlayer()).toBe('next_player');
    expect(s.currentPlayerId()).toBe('bob');

    s.playerStand('bob');
    expect(s.nextPlayer()).toBe('game_over');
    expect(s.dealerHand).toEqual([card('10', 'D'), card('6', 'C'), card('K', 'H')]);
    expect(s.getPlayer('alice')).toMatchObject({ result: 'bust', gameScore: -1 });
    expect(s.getPlayer('bob')).toMatchObject({ result: 'dealer_bust', gameScore: 1 });
  });

  test('dealer stands on soft 17', () => {
    const s = table([[card('10', 'S'), card('10', 'H'), card('A', 'D'), card('6', 'C')]]);
    s.startGame();
    s.playerStand('alice');
    s.nextPlayer();
    expect(s.dealerHand).toEqual([card('A', 'D'), card('6', 'C')]);
    expect(s.getPlayer('alice')?.result).toBe('win');
  });

  test('dealer draws until reaching 17', () => {
    const s = table([[card('10', 'S'), card('9', 'H'), card('2', 'C'), card('3', 'C'), card('4', 'D'), card('5', 'D'), card('6', 'D')]]);
    s.startGame();
    s.playerStand('alice');
    s.nextPlayer();
    expect(s.dealerHand).toHaveLength(5);
    expect(s.getPlayer('alice')).toMatchObject({ result: 'lose', gameScore: -1, totalScore: -1 });
  });

  test('rematches carry total scores across rounds', () => {
    const s = table([
      [card('10', 'S'), card('9', 'H'), card('7', 'D'), card('K', 'C')],
      [card('10', 'S'), card('8', 'H'), card('9', 'D'), card('9', 'C')],
      [card('10', 'S'), card('7', 'H'), card('10', 'D'), card('9', 'C')],
    ]);
    const play = () => {
      s.startGame();
      expect(s.getPlayer('alice')).toMatchObject({ status: 'playing', gameScore: 0, result: null });
      s.playerStand('alice');
      s.nextPlayer();
      return s.getPlayer('alice');
    };
    expect(play()).toMatchObject({ result: 'win', gameScore: 1, totalScore: 1 });
    expect(play()).toMatchObject({ result: 'push', gameScore: 0, totalScore: 1 });
    expect(play()).toMatchObject({ result: 'lose', gameScore: -1, totalScore: 0 });
  });

  test('joins are closed during a round and reopen after it', () => {
    const s = table([[card('10', 'S'), card('9', 'H'), card('7', 'D'), card('K', 'C')]]);
    s.startGame();
    expect(s.addPlayer('bob', 'Bob')).toBe(false);
    s.playerStand('alice');
    s.nextPlayer();

    expect(s.addPlayer('bob', 'Bob')).toBe(true);
    expect(s.getPlayer('bob')).toMatchObject({ status: 'waiting', result: null, hand: [] });
    s.startGame();
    expect(s.getPlayer('bob')?.hand).toHaveLength(2);
  });

  test('leaderboard sorts by total, ties keep join order', () => {
    const s = table(
      [[card('10', 'S'), card('9', 'H'), card('10', 'H'), card('7', 'H'), card('K', 'S'), card('Q', 'S'), card('10', 'D'), card('8', 'D')]],
      ['bob', 'carol'],
    );
    s.startGame();
    for (const id of ['alice', 'bob', 'carol']) {
      s.playerStand(id);
      s.nextPlayer();
    }
    // dealer 18: alice 19 wins, bob 17 loses, carol 20 wins
    expect(s.leaderboard().map((p) => [p.id, p.totalScore])).toEqual([
      ['alice', 1],
      ['carol', 1],
      ['bob', -1],
    ]);
  });

  test('player views are snapshots of the seat', () => {
    const s = table([[card('2', 'S'), card('3', 'S'), card('10', 'C'), card('7', 'C'), card('4', 'S')]]);
    s.startGame();
    const before = s.getPlayer('alice');
    const listed = s.players[0];
    s.playerHit('alice');

    expect(before?.hand).toEqual([card('2', 'S'), card('3', 'S')]);
    expect(listed.hand).toHaveLength(2);
    expect(s.getPlayer('alice')?.hand).toEqual([card('2', 'S'), card('3', 'S'), card('4', 'S')]);
    expect(s.getPlayer('alice')).not.toBe(s.getPlayer('alice'));
  });

  test('inactivity is strictly longer than the threshold', () => {
    let now = 1_000_000;
    const s = new GameSession({ channelId: 'c', creatorId: 'a', creatorName: 'A', clock: () => now });
    now += 2 * HOUR;
    expect(s.isInactive(2 * HOUR)).toBe(false);
    now += 1;
    expect(s.isInactive(2 * HOUR)).toBe(true);
    expect(s.idleFor()).toBe(2 * HOUR + 1);
    s.touch();
    expect(s.isInactive(2 * HOUR)).toBe(false);
    expect(s.lastActivityAt).toBe(now);
  });
});
