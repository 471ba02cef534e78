// phasetally public API

export {
  Progress,
  HiddenProgress,
  ProgressCounter,
  ProgressRecorder,
  applyProgress,
  isContribution,
  U32_MAX,
} from '../packages/progress-core/src/index.js';
export type { Contribution, ProgressSink, ProgressBaseline } from '../packages/progress-core/src/index.js';

export {
  ProgressTracker,
  ProgressStage,
  type ProgressTrackerOptions,
  type TrackedTask,
} from './core/progress-tracker.js';
export { decideTransition, type TransitionDecision } from './core/transition.js';
export { PhasetallyRuntime } from './core/runtime.js';

export { PhaseMachine, phaseLabel, type PhaseHost, type PhaseHandler } from './phase/phase-machine.js';
export { AssetsLoading, type AssetLoadState, type AssetStatus } from './assets/assets-loading.js';
export { waitCycles, waitMillis } from './tasks/wait.js';

export {
  ProgressInactiveError,
  AssetsTrackingDisabledError,
  PhaseMachineStateError,
  TrackerInstallError,
} from './errors.js';

export {
  loadConfig,
  parseConfig,
  createTrackers,
  ConfigLoadError,
  type InstalledTrackers,
} from './config/loader.js';
export {
  PhasetallyConfigSchema,
  TrackerConfigSchema,
  type PhasetallyConfig,
  type TrackerConfig,
  type LoggingConfig,
} from './config/schema.js';

export { Logger, type LoggerOptions, type LogContext } from './logging/logger.js';
export type { LogLevel, LogEntry, TrackerEvent } from './logging/events.js';
