import { KeyedMutexes } from '../../util/locks.js';
import type { GameSession } from './session.js';

/**
 * Channel id -> live table. Process memory only.
 *
 * Anything that reads and then mutates a channel's table goes through
 * `withChannel`, so button presses, slash commands and the inactivity sweep
 * never interleave on the same channel.
 */
export class SessionStore {
  private readonly sessions = new Map<string, GameSession>();
  private readonly locks = new KeyedMutexes();

  get(channelId: string): GameSession | undefined {
    return this.sessions.get(channelId);
  }

  put(session: GameSession): void {
    this.sessions.set(session.channelId, session);
  }

  remove(channelId: string): boolean {
    return this.sessions.delete(channelId);
  }

  entries(): Array<[string, GameSession]> {
    return [...this.sessions.entries()];
  }

  get size(): number {
    return this.sessions.size;
  }

  withChannel<T>(channelId: string, fn: () => Promise<T> | T): Promise<T> {
    return this.locks.runExclusive(channelId, fn);
  }
}
