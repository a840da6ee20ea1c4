import { CancelledError, TimeoutError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
  detach: () => void;
}

type SlotResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

interface InFlightSlot<T> {
  key: string;
  waiters: Waiter<T>[];
  controller: AbortController;
  result: SlotResult<T> | undefined;
  /** Every waiter left; the call is shutting down and takes no new waiters. */
  abandoned: boolean;
  settled: Promise<void>;
  markSettled: () => void;
}

export interface JoinOptions {
  signal?: AbortSignal | undefined;
  /**
   * How long a caller that joins an existing call is willing to wait. The
   * caller that starts the call is bounded by the call itself instead, unless
   * its call is queued behind one that is still shutting down.
   */
  joinTimeoutMs?: number | undefined;
}

export interface FlightTicket<T> {
  /** True when this caller started the call; false when it joined one. */
  isOwner: boolean;
  result: Promise<T>;
}

export interface SingleFlightOptions {
  logger?: Logger | undefined;
}

/**
 * In-flight call table: at most one call per key runs at a time, and every
 * caller asking for that key while it runs gets its outcome.
 *
 * A waiter that gives up (its signal aborts or its join timeout fires) leaves
 * without affecting the others. The call itself is aborted only when the last
 * waiter has left before it settled. An aborted call keeps its key until it
 * settles; a caller arriving meanwhile claims a new call that starts only once
 * the old one has finished.
 */
export class SingleFlight<T> {
  private readonly slots = new Map<string, InFlightSlot<T>>();
  private readonly logger: Logger | undefined;

  constructor(options: SingleFlightOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Claims `key` and starts `execute`, or joins the call already running for
   * it. Claim-or-join happens synchronously, so two callers can never both
   * start a call for the same key.
   */
  join(key: string, execute: (signal: AbortSignal) => Promise<T>, options: JoinOptions = {}): FlightTicket<T> {
    options.signal?.throwIfAborted();
    const existing = this.slots.get(key);
    if (existing && !existing.abandoned) {
      this.logger?.(`Joining in-flight call for ${key.slice(0, 12)} (${existing.waiters.length} waiting).`);
      return { isOwner: false, result: this.wait(existing, options.signal, options.joinTimeoutMs) };
    }

    const slot = createSlot<T>(key);
    this.slots.set(key, slot);
    const result = this.wait(slot, options.signal, existing ? options.joinTimeoutMs : undefined);
    if (existing) {
      this.logger?.(`Call for ${key.slice(0, 12)} is still shutting down. Starting the next one after it.`);
      void existing.settled.then(() => this.start(slot, execute));
    } else {
      this.start(slot, execute);
    }
    return { isOwner: true, result };
  }

  has(key: string): boolean {
    return this.slots.has(key);
  }

  get size(): number {
    return this.slots.size;
  }

  private start(slot: InFlightSlot<T>, execute: (signal: AbortSignal) => Promise<T>): void {
    if (slot.controller.signal.aborted) {
      this.settle(slot, { ok: false, error: slot.controller.signal.reason });
      return;
    }

    let pending: Promise<T>;
    try {
      pending = execute(slot.controller.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }

    void pending.then(
      (value) => this.settle(slot, { ok: true, value }),
      (error: unknown) => this.settle(slot, { ok: false, error }),
    );
  }

  private settle(slot: InFlightSlot<T>, result: SlotResult<T>): void {
    slot.result = result;
    if (this.slots.get(slot.key) === slot) {
      this.slots.delete(slot.key);
    }
    slot.markSettled();

    const waiters = slot.waiters.splice(0);
    if (waiters.length === 0 && !result.ok) {
      this.logger?.(`Abandoned call for ${slot.key.slice(0, 12)} ended with: ${String(result.error)}`);
    }
    for (const waiter of waiters) {
      waiter.detach();
      if (result.ok) {
        waiter.resolve(result.value);
      } else {
        waiter.reject(result.error);
      }
    }
  }

  private wait(slot: InFlightSlot<T>, signal: AbortSignal | undefined, timeoutMs: number | undefined): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const startedAt = Date.now();
      let timer: ReturnType<typeof setTimeout> | undefined;

      const detach = () => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
      };
      const waiter: Waiter<T> = { resolve, reject, detach };

      const leave = (reason: unknown) => {
        const index = slot.waiters.indexOf(waiter);
        if (index === -1) {
          return;
        }
        slot.waiters.splice(index, 1);
        detach();
        reject(reason);
        this.abandonIfUnwatched(slot);
      };
      const onAbort = () => leave(signal?.reason);

      slot.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          leave(
            new TimeoutError(`Waiting on shared call timed out after ${timeoutMs}ms`, {
              limitMs: timeoutMs,
              elapsedMs: Date.now() - startedAt,
            }),
          );
        }, timeoutMs);
      }
    });
  }

  private abandonIfUnwatched(slot: InFlightSlot<T>): void {
    if (slot.waiters.length > 0 || slot.result !== undefined) {
      return;
    }

    slot.abandoned = true;
    this.logger?.(`Every waiter left the call for ${slot.key.slice(0, 12)}. Cancelling it.`);
    slot.controller.abort(new CancelledError('Every waiter abandoned the shared call.'));
  }
}

function createSlot<T>(key: string): InFlightSlot<T> {
  let markSettled: () => void = () => undefined;
  const settled = new Promise<void>((resolve) => {
    markSettled = resolve;
  });
  return { key, waiters: [], controller: new AbortController(), result: undefined, abandoned: false, settled, markSettled };
}
