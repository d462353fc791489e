/**
 * opqueue/progress
 *
 * Observable unit counter tracking an operation's advance.
 *
 * @example
 * ```typescript
 * import { Progress, mirrorProgress } from 'opqueue';
 *
 * const download = new Progress(100);
 * const operation = new Progress();
 *
 * const stop = mirrorProgress(download, operation);
 * download.completedUnitCount = 40;
 * operation.fractionCompleted; // 0.4
 * stop();
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Point-in-time view of a progress.
 */
export interface ProgressSnapshot {
  total: number;
  completed: number;
  /** `completed / total`, clamped to [0, 1]; 0 while total is 0 */
  fraction: number;
}

export type ProgressListener = (snapshot: ProgressSnapshot) => void;

function assertUnitCount(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(
      `Progress: ${field} must be a finite, non-negative number, got ${value}`
    );
  }
}

// =============================================================================
// Progress
// =============================================================================

export class Progress {
  private _total: number;
  private _completed: number;
  private readonly listeners = new Set<ProgressListener>();

  constructor(totalUnitCount = 0, completedUnitCount = 0) {
    assertUnitCount("totalUnitCount", totalUnitCount);
    assertUnitCount("completedUnitCount", completedUnitCount);
    this._total = totalUnitCount;
    this._completed = completedUnitCount;
  }

  get totalUnitCount(): number {
    return this._total;
  }

  set totalUnitCount(value: number) {
    assertUnitCount("totalUnitCount", value);
    if (value === this._total) return;
    this._total = value;
    this.notify();
  }

  get completedUnitCount(): number {
    return this._completed;
  }

  set completedUnitCount(value: number) {
    assertUnitCount("completedUnitCount", value);
    if (value === this._completed) return;
    this._completed = value;
    this.notify();
  }

  get fractionCompleted(): number {
    if (this._total === 0) return 0;
    return Math.min(1, this._completed / this._total);
  }

  /** True once a non-empty total has been fully completed. */
  get isFinished(): boolean {
    return this._total > 0 && this._completed >= this._total;
  }

  /** Sets completed to total. */
  complete(): void {
    this.completedUnitCount = this._total;
  }

  snapshot(): ProgressSnapshot {
    return {
      total: this._total,
      completed: this._completed,
      fraction: this.fractionCompleted,
    };
  }

  /**
   * Listen to counter changes. Listeners run synchronously after each change.
   * @returns Function removing the listener
   */
  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    const snapshot = this.snapshot();
    for (const listener of [...this.listeners]) {
      listener(snapshot);
    }
  }
}

// =============================================================================
// Mirroring
// =============================================================================

/**
 * Bind `target`'s counters to `source`'s. Counters are copied immediately and
 * then on every change of `source`, until the returned function is called.
 */
export function mirrorProgress(source: Progress, target: Progress): () => void {
  const copy = (snapshot: ProgressSnapshot) => {
    target.totalUnitCount = snapshot.total;
    target.completedUnitCount = snapshot.completed;
  };
  copy(source.snapshot());
  return source.subscribe(copy);
}
