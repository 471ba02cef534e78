/**
 * Placeholder tasks that hold a phase open for a while.
 *
 * Useful for testing and debugging loading flows.
 */

import { HiddenProgress } from '../../packages/progress-core/src/index.js';

/**
 * Task reporting hidden progress that completes after `cycles` cycles.
 * The first run reports 0/cycles.
 */
export function waitCycles(cycles: number): () => HiddenProgress {
  let count = 0;
  return () => {
    if (count <= cycles) count += 1;
    return HiddenProgress.of(count - 1, cycles);
  };
}

/**
 * Task reporting hidden progress that completes once `millis` have elapsed
 * since its first run.
 */
export function waitMillis(millis: number, now: () => number = Date.now): () => HiddenProgress {
  let deadline: number | null = null;
  return () => {
    const end = deadline ?? now() + millis;
    deadline = end;
    return HiddenProgress.from(now() > end);
  };
}
