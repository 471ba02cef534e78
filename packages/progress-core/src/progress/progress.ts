/**
 * Progress values reported by tracked tasks.
 */

export const U32_MAX = 0xffff_ffff;

/** Coerce any number into the u32 range. */
export function toU32(value: number): number {
  if (!Number.isFinite(value)) {
    return value === Infinity ? U32_MAX : 0;
  }
  const truncated = Math.trunc(value);
  if (truncated <= 0) return 0;
  return truncated > U32_MAX ? U32_MAX : truncated;
}

/**
 * Units of work completed (`done`) out of the units expected (`total`).
 *
 * A task is "ready" once `done >= total`. Tasks may report `done > total`;
 * the value keeps it as given and the counter clamps it when recording.
 *
 * Use {@link HiddenProgress} for work that must gate completion without
 * showing up in user-facing indicators.
 */
export class Progress {
  static readonly ZERO = new Progress(0, 0);

  readonly done: number;
  readonly total: number;

  constructor(done: number, total: number) {
    this.done = toU32(done);
    this.total = toU32(total);
  }

  /** `true` is one finished unit, `false` one pending unit. */
  static from(ready: boolean): Progress {
    return new Progress(ready ? 1 : 0, 1);
  }

  static of(value: { done: number; total: number }): Progress {
    return new Progress(value.done, value.total);
  }

  isReady(): boolean {
    return this.done >= this.total;
  }

  add(other: Progress): Progress {
    return new Progress(this.done + other.done, this.total + other.total);
  }

  /**
   * Completed share in the 0..1 range (above 1 when `done > total`).
   * A zero total yields NaN; check `total > 0` before rendering.
   */
  toFraction(): number {
    return this.done / this.total;
  }

  equals(other: Progress): boolean {
    return this.done === other.done && this.total === other.total;
  }

  toJSON(): { done: number; total: number } {
    return { done: this.done, total: this.total };
  }

  toString(): string {
    return `${this.done}/${this.total}`;
  }
}

/**
 * Progress that counts towards completion but not towards the visible
 * aggregate.
 */
export class HiddenProgress {
  readonly progress: Progress;

  constructor(progress: Progress) {
    this.progress = progress;
  }

  static from(ready: boolean): HiddenProgress {
    return new HiddenProgress(Progress.from(ready));
  }

  static of(done: number, total: number): HiddenProgress {
    return new HiddenProgress(new Progress(done, total));
  }

  get done(): number {
    return this.progress.done;
  }

  get total(): number {
    return this.progress.total;
  }

  isReady(): boolean {
    return this.progress.isReady();
  }

  add(other: HiddenProgress): HiddenProgress {
    return new HiddenProgress(this.progress.add(other.progress));
  }
}
