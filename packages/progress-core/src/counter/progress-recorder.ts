/**
 * Lock-free accumulation over the running counters of one cycle.
 */

import { ProgressInactiveError } from '../types.js';
import { HiddenProgress, Progress } from '../progress/progress.js';
import { applyProgress, type Contribution, type ProgressSink } from '../progress/contribution.js';

/** Slot layout of the shared running-counter buffer. */
export const Slot = {
  Done: 0,
  Total: 1,
  DoneHidden: 2,
  TotalHidden: 3,
  Live: 4,
} as const;

export const SLOT_COUNT = 5;
export const COUNTER_BUFFER_BYTES = SLOT_COUNT * Uint32Array.BYTES_PER_ELEMENT;

/**
 * The shared read-and-accumulate capability handed to tasks.
 *
 * Every update is a single `Atomics.add`, so recorders attached to the same
 * buffer from several worker threads never lose a contribution. Reads are
 * only meaningful once the host knows no more records will happen this cycle.
 */
export class ProgressRecorder implements ProgressSink {
  private readonly slots: Uint32Array;

  private constructor(
    readonly buffer: SharedArrayBuffer,
    private readonly phase: string,
  ) {
    this.slots = new Uint32Array(buffer);
  }

  /**
   * Build a recorder over a buffer obtained from `ProgressCounter.buffer`,
   * typically after posting it to a worker thread.
   */
  static attach(buffer: SharedArrayBuffer, phase = 'unknown'): ProgressRecorder {
    if (buffer.byteLength !== COUNTER_BUFFER_BYTES) {
      throw new RangeError(
        `Progress buffer must be ${COUNTER_BUFFER_BYTES} bytes, got ${buffer.byteLength}`,
      );
    }
    return new ProgressRecorder(buffer, phase);
  }

  /** False once the owning counter has been disposed. */
  get live(): boolean {
    return Atomics.load(this.slots, Slot.Live) === 1;
  }

  /** Add visible progress, clamping `done` to this contribution's `total`. */
  record(progress: Progress): void {
    this.assertLive('record');
    Atomics.add(this.slots, Slot.Total, progress.total);
    Atomics.add(this.slots, Slot.Done, Math.min(progress.done, progress.total));
  }

  /** Add hidden progress, clamping like {@link record}. */
  recordHidden(hidden: HiddenProgress): void {
    this.assertLive('recordHidden');
    Atomics.add(this.slots, Slot.TotalHidden, hidden.total);
    Atomics.add(this.slots, Slot.DoneHidden, Math.min(hidden.done, hidden.total));
  }

  apply(contribution: Contribution): void {
    applyProgress(contribution, this);
  }

  /** Visible progress only; use this for progress bars. */
  readVisible(): Progress {
    this.assertLive('readVisible');
    return new Progress(
      Atomics.load(this.slots, Slot.Done),
      Atomics.load(this.slots, Slot.Total),
    );
  }

  readHidden(): Progress {
    this.assertLive('readHidden');
    return new Progress(
      Atomics.load(this.slots, Slot.DoneHidden),
      Atomics.load(this.slots, Slot.TotalHidden),
    );
  }

  /** Visible plus hidden progress; this is what gates the transition. */
  readComplete(): Progress {
    return this.readVisible().add(this.readHidden());
  }

  private assertLive(operation: string): void {
    if (!this.live) {
      throw new ProgressInactiveError(
        `Cannot ${operation}: progress counter for phase "${this.phase}" is no longer active`,
        this.phase,
        operation,
      );
    }
  }
}
