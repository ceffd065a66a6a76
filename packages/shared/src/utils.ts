import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Rejects with an AbortError as soon as `signal` fires. */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};
