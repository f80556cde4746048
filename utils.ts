import { log } from "./deps.ts";
import type { Logger } from "./deps.ts";

const enc = new TextEncoder();

export function getUint8Array(str: string | Uint8Array): Uint8Array {
  return str instanceof Uint8Array ? str : enc.encode(str);
}

export function hasPrefixFrom(
  a: Uint8Array,
  prefix: Uint8Array,
  offset: number,
) {
  for (let i = 0, max = prefix.length; i < max; i++) {
    if (a[i + offset] !== prefix[i]) return false;
  }
  return true;
}

export type SyncAsyncIterable<T> = AsyncIterable<T> | Iterable<T>;

export async function* makeAsyncIterable<T>(
  iter: SyncAsyncIterable<T>,
): AsyncIterable<T> {
  yield* iter;
}

/** Drops keys whose value is `undefined` so they don't shadow defaults. */
export function definedOnly<T extends object>(
  options: T | undefined,
): Partial<T> {
  const result: Partial<T> = {};
  if (!options) return result;
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
}

export function noop(_arg: unknown) {}

function ignore() {}

/** The package logger; set its level to see debug traces. */
export function getLogger(): Logger {
  return log.getLogger("csv");
}

/**
 * Debug hook bound to the `csv` logger; a no-op unless the level is DEBUG
 * when the reader or writer is created.
 */
export function createDebug(): (msg: string) => void {
  const logger = getLogger();
  if (logger.getLevel() <= logger.levels.DEBUG) {
    return (msg) => logger.debug(msg);
  }
  return noop;
}

export async function asyncArrayFrom<T>(
  iter: AsyncIterable<T>,
): Promise<Array<T>> {
  const arr: T[] = [];
  for await (const row of iter) {
    arr.push(row);
  }
  return arr;
}

/**
 * Runs async tasks one after another in call order. A failed task does not
 * prevent the tasks queued behind it from running.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(ignore, ignore);
    return result;
  }
}
