/**
 * Single-assignment future backing every operation's outcome.
 *
 * A cell is created pending and resolved at most once; later resolutions are
 * ignored. Continuations attached with `subscribe` always run asynchronously,
 * after resolution.
 */

import type { AsyncResult, Result } from "./result";

// =============================================================================
// Types
// =============================================================================

export interface ResultCell<T, E> {
  /** Whether `resolve` has taken effect. */
  readonly isResolved: boolean;

  /** The resolved outcome, or `undefined` while pending. */
  readonly snapshot: Result<T, E> | undefined;

  /** Settles with the outcome. Never rejects. */
  readonly settled: AsyncResult<T, E>;

  /**
   * Fulfils with the value or rejects with the error.
   * Created on first access, so an unobserved failure is not reported as an
   * unhandled rejection.
   */
  readonly promise: Promise<T>;

  /**
   * Resolve the cell.
   * @returns `true` for the resolution that took effect, `false` afterwards
   */
  resolve(result: Result<T, E>): boolean;

  /**
   * Attach continuations. The returned promise settles once the matching
   * continuation has run.
   */
  subscribe(
    onSuccess?: (value: T) => void,
    onFailure?: (error: E) => void
  ): Promise<void>;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a pending result cell.
 *
 * @example
 * ```typescript
 * const cell = createResultCell<number, string>();
 *
 * cell.resolve(ok(1));      // true
 * cell.resolve(err('late')); // false, ignored
 * await cell.promise;        // 1
 * ```
 */
export function createResultCell<T, E>(): ResultCell<T, E> {
  let snapshot: Result<T, E> | undefined;
  let settle: ((result: Result<T, E>) => void) | undefined;
  let promise: Promise<T> | undefined;

  const settled = new Promise<Result<T, E>>((resolve) => {
    settle = resolve;
  });

  return {
    get isResolved() {
      return snapshot !== undefined;
    },

    get snapshot() {
      return snapshot;
    },

    settled,

    get promise() {
      promise ??= settled.then((result) =>
        result.ok ? result.value : Promise.reject(result.error)
      );
      return promise;
    },

    resolve(result: Result<T, E>): boolean {
      if (snapshot !== undefined) {
        return false;
      }
      snapshot = result;
      settle?.(result);
      return true;
    },

    subscribe(onSuccess, onFailure) {
      return settled.then((result) => {
        if (result.ok) {
          onSuccess?.(result.value);
        } else {
          onFailure?.(result.error);
        }
      });
    },
  };
}
