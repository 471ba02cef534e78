/**
 * Everything a tracked task may return, and how it is folded into a counter.
 */

import { HiddenProgress, Progress } from './progress.js';

/** A visible value, a hidden value, or a pair of either. */
export type Contribution = Progress | HiddenProgress | readonly [Contribution, Contribution];

/** Anything that accepts visible and hidden contributions. */
export interface ProgressSink {
  record(progress: Progress): void;
  recordHidden(progress: HiddenProgress): void;
}

export function isContribution(value: unknown): value is Contribution {
  if (value instanceof Progress || value instanceof HiddenProgress) return true;
  return Array.isArray(value) && value.length === 2 && value.every(isContribution);
}

/**
 * Account a contribution into the sink's running totals for this cycle.
 */
export function applyProgress(contribution: Contribution, sink: ProgressSink): void {
  if (contribution instanceof Progress) {
    sink.record(contribution);
  } else if (contribution instanceof HiddenProgress) {
    sink.recordHidden(contribution);
  } else {
    applyProgress(contribution[0], sink);
    applyProgress(contribution[1], sink);
  }
}
