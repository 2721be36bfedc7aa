// Shared utilities for the Interview Dialogue Engine.
//
// Small deterministic helpers used by the judge boundary, the session driver
// and the transports.

import { JudgeTimeoutError } from "./errors.js";

/** Renders any thrown value as a log-friendly message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs` or when
 * `parentSignal` aborts, whichever comes first.
 *
 * A timeout rejects with JudgeTimeoutError even if the task ignores its signal.
 * A parent abort rejects with the parent's abort reason.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<T> {
  if (parentSignal?.aborted) {
    return Promise.reject(abortReason(parentSignal));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const onParentAbort = () => {
      controller.abort();
      finish(() => reject(abortReason(parentSignal)));
    };

    const timer = setTimeout(() => {
      controller.abort();
      finish(() => reject(new JudgeTimeoutError(timeoutMs)));
    }, timeoutMs);

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parentSignal?.removeEventListener("abort", onParentAbort);
      settle();
    };

    parentSignal?.addEventListener("abort", onParentAbort, { once: true });

    let running: Promise<T>;
    try {
      running = task(controller.signal);
    } catch (err) {
      finish(() => reject(err));
      return;
    }
    running.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error("Operation aborted");
}
