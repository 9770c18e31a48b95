export { setTimeout as sleep } from "node:timers/promises";

export const resolveBitfield = (bits: readonly number[]) => {
  /* tslint:disable-next-line no-bitwise */
  return bits.reduce((acc, bit) => acc | bit, 0);
};

export type Awaitable<T> = T | Promise<T>;

const RECONNECT_BASE_DELAY = 1_000;
const RECONNECT_MAX_DELAY = 60_000;

/** Exponential backoff with up to one second of jitter, capped at a minute */
export const getReconnectDelay = (
  attempt: number,
  random: () => number = Math.random
): number => {
  const delay = Math.min(
    RECONNECT_BASE_DELAY * Math.pow(2, Math.max(attempt - 1, 0)),
    RECONNECT_MAX_DELAY
  );
  return Math.min(delay + Math.floor(random() * 1_000), RECONNECT_MAX_DELAY);
};

/** Resolves on the next turn of the event loop, after pending I/O callbacks */
export const nextTick = () =>
  new Promise<void>((resolve) => {
    setImmediate(resolve);
  });
