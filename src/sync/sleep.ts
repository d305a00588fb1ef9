import { setTimeout as delay } from 'node:timers/promises';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export const isAbortError = (err: unknown): boolean => err instanceof Error && err.name === 'AbortError';
