/**
 * Typed event definitions for structured progress logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  phase?: string;
  cycle?: number;
  message: string;
  data?: Record<string, unknown>;
}

// ── Phase machine events ──

export interface PhaseEnteredEvent {
  type: 'phase-entered';
  phase: string;
  previous?: string;
}

export interface PhaseExitedEvent {
  type: 'phase-exited';
  phase: string;
  next: string;
}

// ── Tracker events ──

export interface TrackerActivatedEvent {
  type: 'tracker-activated';
  phase: string;
  nextPhase?: string;
  trackAssets: boolean;
}

export interface TrackerDeactivatedEvent {
  type: 'tracker-deactivated';
  phase: string;
  cycles: number;
  done: number;
  total: number;
}

export interface CycleStartedEvent {
  type: 'cycle-started';
  phase: string;
  cycle: number;
  baselineDone: number;
  baselineTotal: number;
}

export interface ProgressPersistedEvent {
  type: 'progress-persisted';
  phase: string;
  hidden: boolean;
  done: number;
  total: number;
}

export interface ProgressCheckedEvent {
  type: 'progress-checked';
  phase: string;
  cycle: number;
  done: number;
  total: number;
  ready: boolean;
}

export interface TransitionRequestedEvent {
  type: 'transition-requested';
  phase: string;
  target: string;
  cycle: number;
}

export type TrackerEvent =
  | PhaseEnteredEvent
  | PhaseExitedEvent
  | TrackerActivatedEvent
  | TrackerDeactivatedEvent
  | CycleStartedEvent
  | ProgressPersistedEvent
  | ProgressCheckedEvent
  | TransitionRequestedEvent;
