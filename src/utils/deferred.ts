// Promise with an externally callable resolve.
// Used by the session driver to park a turn until an answer (or cancellation) arrives.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
