import { Logger } from '../src/core/types';

export const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

/**
 * Virtual time: sleeping advances the clock instantly. `random` is pinned at 0.5,
 * which makes jitter a no-op.
 */
export const fakeClock = (start = 1_700_000_000_000) => {
  let t = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => t,
    random: () => 0.5,
    advance: (ms: number) => {
      t += ms;
    },
    sleep: async (ms: number, signal?: AbortSignal) => {
      if (signal?.aborted) throw new Error('aborted');
      sleeps.push(ms);
      t += ms;
    }
  };
};
