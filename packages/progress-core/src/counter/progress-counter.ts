/**
 * Per-phase progress aggregate with a persisted baseline.
 */

import { ProgressInactiveError } from '../types.js';
import { HiddenProgress, Progress } from '../progress/progress.js';
import type { Contribution, ProgressSink } from '../progress/contribution.js';
import { COUNTER_BUFFER_BYTES, ProgressRecorder, Slot } from './progress-recorder.js';

export interface ProgressBaseline {
  visible: Progress;
  hidden: Progress;
}

/**
 * Overall progress of the tasks tracked during one phase.
 *
 * Running totals live in a shared buffer and are written through a
 * {@link ProgressRecorder}; the persisted baseline is owned here and only
 * touched from the context that resets cycles.
 */
export class ProgressCounter implements ProgressSink {
  private readonly slots: Uint32Array;
  private readonly shared: ProgressRecorder;
  private persisted: Progress = Progress.ZERO;
  private persistedHidden: Progress = Progress.ZERO;

  constructor(readonly phase = 'unknown') {
    const buffer = new SharedArrayBuffer(COUNTER_BUFFER_BYTES);
    this.slots = new Uint32Array(buffer);
    Atomics.store(this.slots, Slot.Live, 1);
    this.shared = ProgressRecorder.attach(buffer, phase);
  }

  /** The buffer to post to worker threads; see `ProgressRecorder.attach`. */
  get buffer(): SharedArrayBuffer {
    return this.shared.buffer;
  }

  get disposed(): boolean {
    return !this.shared.live;
  }

  get baseline(): ProgressBaseline {
    return { visible: this.persisted, hidden: this.persistedHidden };
  }

  /** The accumulate-only view to hand to tasks. */
  recorder(): ProgressRecorder {
    return this.shared;
  }

  record(progress: Progress): void {
    this.shared.record(progress);
  }

  recordHidden(hidden: HiddenProgress): void {
    this.shared.recordHidden(hidden);
  }

  apply(contribution: Contribution): void {
    this.shared.apply(contribution);
  }

  /**
   * Latest visible progress, excluding hidden work.
   *
   * Only accurate after every tracked task of the cycle has finished.
   */
  readVisible(): Progress {
    return this.shared.readVisible();
  }

  /**
   * Latest progress including hidden work.
   *
   * Only accurate after every tracked task of the cycle has finished.
   */
  readComplete(): Progress {
    return this.shared.readComplete();
  }

  /**
   * Record progress now and keep counting it in every later cycle of the
   * phase. Must not run concurrently with recording or a cycle reset.
   *
   * The baseline keeps the value as given; only `record` clamps, so a
   * persisted `done > total` is restored unclamped on every reset.
   */
  persist(progress: Progress): void {
    this.record(progress);
    this.persisted = this.persisted.add(progress);
  }

  persistHidden(hidden: HiddenProgress): void {
    this.recordHidden(hidden);
    this.persistedHidden = this.persistedHidden.add(hidden.progress);
  }

  /** Start a new cycle: running totals go back to the persisted baseline. */
  resetToBaseline(): void {
    this.assertLive('resetToBaseline');
    Atomics.store(this.slots, Slot.Done, this.persisted.done);
    Atomics.store(this.slots, Slot.Total, this.persisted.total);
    Atomics.store(this.slots, Slot.DoneHidden, this.persistedHidden.done);
    Atomics.store(this.slots, Slot.TotalHidden, this.persistedHidden.total);
  }

  /** Invalidate this counter and every recorder attached to its buffer. */
  dispose(): void {
    Atomics.store(this.slots, Slot.Live, 0);
  }

  private assertLive(operation: string): void {
    if (this.disposed) {
      throw new ProgressInactiveError(
        `Cannot ${operation}: progress counter for phase "${this.phase}" is no longer active`,
        this.phase,
        operation,
      );
    }
  }
}
