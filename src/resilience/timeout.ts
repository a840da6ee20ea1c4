import { TimeoutError } from '../errors.js';

export interface TimeoutOptions {
  /** Aborting this signal aborts the operation and rejects with the signal's reason. */
  signal?: AbortSignal | undefined;
  label?: string | undefined;
  /** Supplies the last underlying error, attached to the `TimeoutError` as its cause. */
  cause?: (() => unknown) | undefined;
  /** When the `maxWaitMs` budget began, if earlier than this call. Defaults to now. */
  startedAt?: number | undefined;
  now?: (() => number) | undefined;
}

/**
 * Races `operation` against a deadline. On expiry the returned promise rejects
 * with a `TimeoutError` and the signal handed to `operation` is aborted with
 * that same error. Whichever settles first wins; later settlements are ignored.
 */
export function runWithTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  maxWaitMs: number,
  options: TimeoutOptions = {},
): Promise<T> {
  const now = options.now ?? Date.now;
  const label = options.label ?? 'operation';
  const parent = options.signal;
  const controller = new AbortController();
  const startedAt = options.startedAt ?? now();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const settle = (deliver: () => void) => {
      if (settled) {
        return false;
      }
      settled = true;
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      parent?.removeEventListener('abort', onParentAbort);
      deliver();
      return true;
    };

    function onParentAbort() {
      const reason: unknown = parent?.reason;
      if (settle(() => reject(reason))) {
        controller.abort(reason);
      }
    }

    if (parent?.aborted) {
      onParentAbort();
      return;
    }

    timer = setTimeout(() => {
      const cause = options.cause?.();
      const error = new TimeoutError(`${label} timed out after ${maxWaitMs}ms`, {
        limitMs: maxWaitMs,
        elapsedMs: now() - startedAt,
        ...(cause !== undefined ? { cause } : {}),
      });
      if (settle(() => reject(error))) {
        controller.abort(error);
      }
    }, Math.max(0, maxWaitMs - (now() - startedAt)));
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }
    void pending.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    );
  });
}
