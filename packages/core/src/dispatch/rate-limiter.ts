/**
 * RateLimiter: counting semaphore that bounds concurrent upstream requests.
 *
 * `acquire()` grants a permit while fewer than `capacity` are held and
 * otherwise queues the caller. Releasing a permit hands the slot straight to
 * the head of the queue, so waiters are served strictly in arrival order and
 * a newcomer can never overtake them.
 */

import { ConfigError } from "@relaykit/sdk";
import type { MetricsCollector } from "../observability/metrics.js";

export interface Permit {
  /** Idempotent: only the first call frees the slot. */
  release(): void;
  readonly released: boolean;
}

export interface RateLimiter {
  readonly capacity: number;
  readonly inFlight: number;
  readonly waiting: number;
  /** Resolves with a permit; rejects with the signal's reason if aborted while queued. */
  acquire(signal?: AbortSignal): Promise<Permit>;
  /** Hold a permit for the duration of `fn`. */
  run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T>;
  /** Hold a permit from the first `next()` until the iterable finishes, fails or is returned early. */
  stream<T>(open: () => AsyncIterable<T>, signal?: AbortSignal): AsyncGenerator<T, void, undefined>;
}

export interface RateLimiterOptions {
  metrics?: MetricsCollector;
  /** Metric name prefix. Default: "dispatcher" */
  name?: string;
}

interface Waiter {
  grant(permit: Permit): void;
  detach(): void;
}

export function createRateLimiter(capacity: number, options: RateLimiterOptions = {}): RateLimiter {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new ConfigError(`Rate limiter capacity must be a positive integer, got ${capacity}`);
  }

  const metrics = options.metrics;
  const prefix = options.name ?? "dispatcher";
  const waiters: Waiter[] = [];
  let inFlight = 0;

  function report(): void {
    metrics?.gauge(`${prefix}.in_flight`, inFlight);
    metrics?.gauge(`${prefix}.waiting`, waiters.length);
  }

  function createPermit(): Permit {
    let released = false;
    metrics?.increment(`${prefix}.granted`);
    return {
      get released() {
        return released;
      },
      release(): void {
        if (released) return;
        released = true;
        metrics?.increment(`${prefix}.released`);

        const next = waiters.shift();
        if (next) {
          // Slot changes hands; inFlight stays the same.
          next.detach();
          next.grant(createPermit());
        } else {
          inFlight--;
        }
        report();
      },
    };
  }

  function acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (inFlight < capacity) {
      inFlight++;
      const permit = createPermit();
      report();
      return Promise.resolve(permit);
    }

    return new Promise<Permit>((resolve, reject) => {
      const onAbort = (): void => {
        const index = waiters.indexOf(waiter);
        if (index !== -1) waiters.splice(index, 1);
        report();
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        grant: resolve,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      waiters.push(waiter);
      report();
    });
  }

  return {
    capacity,
    get inFlight() {
      return inFlight;
    },
    get waiting() {
      return waiters.length;
    },
    acquire,

    async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
      const permit = await acquire(signal);
      try {
        return await fn();
      } finally {
        permit.release();
      }
    },

    async *stream<T>(open: () => AsyncIterable<T>, signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
      const permit = await acquire(signal);
      try {
        yield* open();
      } finally {
        permit.release();
      }
    },
  };
}
