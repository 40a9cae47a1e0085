import type { SessionStore } from './sessionStore.js';

/** The slice of a pino logger the sweep writes to. */
export type SweepLog = {
  info(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
};

export const DEFAULT_IDLE_MS = 2 * 60 * 60 * 1000;
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 60 * 1000;
export const DEFAULT_SWEEP_BACKOFF_MS = 5 * 60 * 1000;
/** Longest delay setTimeout honours. */
export const MAX_TIMER_DELAY_MS = 0x7fffffff;

export interface SweepOptions {
  thresholdMs: number;
  log: SweepLog;
  now?: number;
}

/** Drops every table idle for longer than `thresholdMs`; returns the channels removed. */
export async function sweepInactive(store: SessionStore, opts: SweepOptions): Promise<string[]> {
  const removed: string[] = [];
  for (const [channelId] of store.entries()) {
    await store.withChannel(channelId, () => {
      // re-read under the lock: the table may have been played or cancelled meanwhile
      const session = store.get(channelId);
      if (!session || !session.isInactive(opts.thresholdMs, opts.now)) return;
      store.remove(channelId);
      removed.push(channelId);
      opts.log.info({ msg: 'bj_session_swept', channelId, idleMs: session.idleFor(opts.now) });
    });
  }
  return removed;
}

export interface SweepLoopOptions {
  log: SweepLog;
  thresholdMs?: number;
  intervalMs?: number;
  backoffMs?: number;
  initialDelayMs?: number;
  clock?: () => number;
}

export interface SweepHandle {
  stop(): void;
}

/**
 * Background sweep: one pass, then sleep `intervalMs`. A pass that throws is
 * logged and retried after `backoffMs`; the loop only ends through `stop()`.
 */
export function startSweepLoop(store: SessionStore, opts: SweepLoopOptions): SweepHandle {
  const thresholdMs = opts.thresholdMs ?? DEFAULT_IDLE_MS;
  const intervalMs = opts.intervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
  const backoffMs = opts.backoffMs ?? DEFAULT_SWEEP_BACKOFF_MS;
  const clock = opts.clock ?? Date.now;
  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const schedule = (delay: number) => {
    if (stopped) return;
    timer = setTimeout(() => { void tick(); }, Math.min(delay, MAX_TIMER_DELAY_MS));
    timer.unref();
  };

  const tick = async () => {
    let delay = intervalMs;
    try {
      const removed = await sweepInactive(store, { thresholdMs, log: opts.log, now: clock() });
      if (removed.length > 0) opts.log.info({ msg: 'bj_sweep_done', removed: removed.length, remaining: store.size });
    } catch (err) {
      opts.log.error({ msg: 'bj_sweep_error', error: String(err), retryInMs: backoffMs });
      delay = backoffMs;
    }
    schedule(delay);
  };

  schedule(opts.initialDelayMs ?? 1000);
  return {
    stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
    },
  };
}
