// @phasetally/progress-core entry point

// Shared types
export { ProgressInactiveError } from './types.js';

// Progress values
export { Progress, HiddenProgress, U32_MAX, toU32 } from './progress/progress.js';

// Contributions
export type { Contribution, ProgressSink } from './progress/contribution.js';
export { applyProgress, isContribution } from './progress/contribution.js';

// Counter
export type { ProgressBaseline } from './counter/progress-counter.js';
export { ProgressCounter } from './counter/progress-counter.js';
export {
  ProgressRecorder,
  Slot,
  SLOT_COUNT,
  COUNTER_BUFFER_BYTES,
} from './counter/progress-recorder.js';
