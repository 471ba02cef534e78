import type { Progress } from '../../packages/progress-core/src/index.js';

export interface TransitionDecision<S> {
  /** `done >= total` on the complete (visible + hidden) aggregate. */
  ready: boolean;
  /** The aggregate the decision was taken on. */
  progress: Progress;
  /** Phase to move to; only set when ready and a next phase is configured. */
  target?: S;
}

/**
 * Decide whether a phase may move on, given its complete progress.
 *
 * An empty aggregate (0/0) is ready.
 */
export function decideTransition<S>(progress: Progress, nextPhase?: S): TransitionDecision<S> {
  const ready = progress.isReady();
  if (ready && nextPhase !== undefined) {
    return { ready, progress, target: nextPhase };
  }
  return { ready, progress };
}
