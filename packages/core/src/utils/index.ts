/**
 * @relaygate/core - Common utilities
 *
 * Shared helper functions used across the routing, verification and
 * escalation packages.
 */

import { nanoid } from 'nanoid';

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/**
 * Create an AbortController that also aborts when `parent` aborts.
 * Call `dispose()` once the child is no longer needed to detach the listener.
 */
export function linkAbortSignal(parent?: AbortSignal): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();

  if (!parent) {
    return { controller, dispose: () => {} };
  }

  if (parent.aborted) {
    controller.abort(parent.reason);
    return { controller, dispose: () => {} };
  }

  const onAbort = (): void => controller.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });

  return {
    controller,
    dispose: () => parent.removeEventListener('abort', onAbort),
  };
}

/** Reason attached to an AbortSignal aborted by `runWithTimeout`. */
export class TimeoutReason {
  constructor(public readonly timeoutMs: number) {}
}

/**
 * Run `fn` with a child signal that aborts after `ms` or when `parent` aborts.
 *
 * Settles as soon as either the work finishes or the signal aborts, so a
 * callee that ignores its signal cannot hold the caller past the deadline.
 * Rejects with the abort reason (a `TimeoutReason` on timeout).
 */
export function runWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  parent?: AbortSignal,
): Promise<T> {
  const { controller, dispose } = linkAbortSignal(parent);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      dispose();
      reject(controller.signal.reason);
    };

    const timer = setTimeout(() => {
      controller.abort(new TimeoutReason(ms));
    }, ms);

    if (controller.signal.aborted) {
      onAbort();
      return;
    }
    controller.signal.addEventListener('abort', onAbort, { once: true });

    let work: Promise<T>;
    try {
      work = fn(controller.signal);
    } catch (err) {
      work = Promise.reject(err);
    }

    work.then(
      (value) => {
        clearTimeout(timer);
        controller.signal.removeEventListener('abort', onAbort);
        dispose();
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        controller.signal.removeEventListener('abort', onAbort);
        dispose();
        reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// Numeric helpers
// ---------------------------------------------------------------------------

/**
 * Clamp `value` into [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Nearest-rank percentile over an unsorted sample. Returns 0 for no samples.
 */
export function percentile(samples: readonly number[], p: number): number {
  if (samples.length === 0) return 0;
  const sorted = [...samples].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length);
  const index = clamp(rank - 1, 0, sorted.length - 1);
  return sorted[index] ?? 0;
}

// ---------------------------------------------------------------------------
// String helpers
// ---------------------------------------------------------------------------

/**
 * Truncate a string to a maximum length, appending an ellipsis if truncated.
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= suffix.length) return suffix.slice(0, maxLength);
  return str.slice(0, maxLength - suffix.length) + suffix;
}

// ---------------------------------------------------------------------------
// ID generation
// ---------------------------------------------------------------------------

/**
 * Generate a unique identifier: `{prefix}_{nanoid}`.
 */
export function generateId(prefix = 'req'): string {
  return `${prefix}_${nanoid(16)}`;
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Exhaustiveness guard for closed unions.
 */
export function assertNever(value: never, label = 'value'): never {
  throw new Error(`Unhandled ${label}: ${JSON.stringify(value)}`);
}
