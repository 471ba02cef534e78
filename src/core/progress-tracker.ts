/**
 * Lifecycle of the progress counter for one tracked phase.
 */

import {
  ProgressCounter,
  ProgressInactiveError,
  type Contribution,
  type HiddenProgress,
  type Progress,
} from '../../packages/progress-core/src/index.js';
import { AssetsLoading } from '../assets/assets-loading.js';
import { AssetsTrackingDisabledError, TrackerInstallError } from '../errors.js';
import { Logger } from '../logging/logger.js';
import { phaseLabel, type PhaseHost } from '../phase/phase-machine.js';
import { decideTransition, type TransitionDecision } from './transition.js';

/** Where within a cycle the tracker currently is. */
export const ProgressStage = {
  /** Before `beginCycle`: counters hold last cycle's totals or the fresh zero. */
  Preparation: 'preparation',
  /** After `beginCycle`: tracked tasks report. */
  Tracking: 'tracking',
  /** After `checkProgress`: the cycle's decision is taken. */
  CheckProgress: 'check-progress',
} as const;

export type ProgressStage = (typeof ProgressStage)[keyof typeof ProgressStage];

export interface ProgressTrackerOptions<S> {
  /** Phase during which progress is tracked. */
  phase: S;
  /** Phase to move to once all progress completes. */
  nextPhase?: S;
  /** Track assets registered on `assets()` as visible progress. */
  trackAssets?: boolean;
}

export type TrackedTask<A extends unknown[]> = (...args: A) => Contribution | PromiseLike<Contribution>;

interface ActiveState<S> {
  host: PhaseHost<S>;
  counter: ProgressCounter;
  assets: AssetsLoading | null;
  cycle: number;
  stage: ProgressStage;
  decision: TransitionDecision<S> | null;
  transitionRequested: boolean;
}

/**
 * Creates a {@link ProgressCounter} when its phase is entered, resets it to
 * the persisted baseline at the start of every cycle, decides the transition
 * once tasks have reported, and disposes the counter when the phase exits.
 *
 * The host drives each cycle as: `beginCycle()`, run tracked tasks and await
 * them, `checkProgress()`.
 */
export class ProgressTracker<S> {
  private readonly opts: { phase: S; nextPhase?: S; trackAssets: boolean };
  private readonly label: string;
  private installed: PhaseHost<S> | null = null;
  private state: ActiveState<S> | null = null;

  constructor(
    options: ProgressTrackerOptions<S>,
    private readonly logger: Logger = Logger.silent('progress'),
  ) {
    this.opts = {
      phase: options.phase,
      nextPhase: options.nextPhase,
      trackAssets: options.trackAssets ?? false,
    };
    this.label = phaseLabel(options.phase);
  }

  /** Tracker for `phase` with no automatic transition. */
  static for<S>(phase: S, logger?: Logger): ProgressTracker<S> {
    return new ProgressTracker({ phase }, logger);
  }

  /** Move on to `next` as soon as all progress in the phase completes. */
  continueTo(next: S): this {
    this.opts.nextPhase = next;
    return this;
  }

  withAssets(): this {
    this.opts.trackAssets = true;
    return this;
  }

  get phase(): S {
    return this.opts.phase;
  }

  get nextPhase(): S | undefined {
    return this.opts.nextPhase;
  }

  get trackAssets(): boolean {
    return this.opts.trackAssets;
  }

  get active(): boolean {
    return this.state !== null;
  }

  /** Cycles begun since the phase was entered; 0 when inactive. */
  get cycle(): number {
    return this.state?.cycle ?? 0;
  }

  get stage(): ProgressStage | null {
    return this.state?.stage ?? null;
  }

  /**
   * Subscribe to the host's enter/exit events for the tracked phase.
   * Activates immediately if the host is already in that phase.
   */
  install(host: PhaseHost<S>): () => void {
    if (this.installed) {
      throw new TrackerInstallError(`Tracker for phase "${this.label}" is already installed`, this.label);
    }
    this.installed = host;

    const offEnter = host.onEnter(this.opts.phase, () => this.activate(host));
    const offExit = host.onExit(this.opts.phase, () => this.deactivate());
    if (host.current === this.opts.phase) {
      this.activate(host);
    }

    return () => {
      offEnter();
      offExit();
      this.deactivate();
      this.installed = null;
    };
  }

  /** The live counter; throws when the phase is not active. */
  counter(): ProgressCounter {
    return this.require('counter').counter;
  }

  assets(): AssetsLoading {
    const state = this.require('assets');
    if (!state.assets) {
      throw new AssetsTrackingDisabledError(
        `Assets tracking is not enabled for phase "${this.label}"`,
        this.label,
      );
    }
    return state.assets;
  }

  /**
   * Start a cycle: running totals return to the persisted baseline.
   * Call once per cycle before any tracked task runs.
   */
  beginCycle(): void {
    const state = this.require('beginCycle');
    state.counter.resetToBaseline();
    state.cycle += 1;
    state.stage = ProgressStage.Tracking;
    state.decision = null;

    const { visible, hidden } = state.counter.baseline;
    const baseline = visible.add(hidden);
    this.logger.event(
      {
        type: 'cycle-started',
        phase: this.label,
        cycle: state.cycle,
        baselineDone: baseline.done,
        baselineTotal: baseline.total,
      },
      'debug',
    );
  }

  record(progress: Progress): void {
    this.forRecording('record').record(progress);
  }

  recordHidden(hidden: HiddenProgress): void {
    this.forRecording('recordHidden').recordHidden(hidden);
  }

  apply(contribution: Contribution): void {
    this.forRecording('apply').apply(contribution);
  }

  /**
   * Wrap a task so whatever it returns is applied to the counter that was
   * active when the task was called. A task settling after that activation
   * ended throws, even if the phase has been entered again since.
   */
  track<A extends unknown[]>(task: TrackedTask<A>): (...args: A) => Promise<Contribution> {
    return async (...args: A) => {
      const state = this.require('track');
      const contribution = await task(...args);
      this.warnIfDecided(state, 'track');
      state.counter.apply(contribution);
      return contribution;
    };
  }

  /**
   * Count `progress` now and in every later cycle of this phase.
   * Call between cycles, never while tasks are recording.
   */
  persist(progress: Progress): void {
    const state = this.require('persist');
    state.counter.persist(progress);
    this.logger.event({
      type: 'progress-persisted',
      phase: this.label,
      hidden: false,
      done: progress.done,
      total: progress.total,
    });
  }

  persistHidden(hidden: HiddenProgress): void {
    const state = this.require('persistHidden');
    state.counter.persistHidden(hidden);
    this.logger.event({
      type: 'progress-persisted',
      phase: this.label,
      hidden: true,
      done: hidden.done,
      total: hidden.total,
    });
  }

  /**
   * Visible progress, for progress bars. Tracked assets are included
   * whatever the stage; `checkProgress` folds them into the counter.
   */
  progress(): Progress {
    const state = this.require('progress');
    return this.withPendingAssets(state, state.counter.readVisible());
  }

  /** Visible plus hidden progress, assets included as for `progress()`. */
  progressComplete(): Progress {
    const state = this.require('progressComplete');
    return this.withPendingAssets(state, state.counter.readComplete());
  }

  /**
   * Decide the cycle's transition. Call after every tracked task of the
   * cycle has finished. The first ready decision with a configured next
   * phase requests the transition; later calls in the same cycle return the
   * same decision.
   */
  checkProgress(): TransitionDecision<S> {
    const state = this.require('checkProgress');
    if (state.decision) return state.decision;

    if (state.assets) {
      state.counter.record(state.assets.progress());
    }

    const decision = decideTransition(state.counter.readComplete(), this.opts.nextPhase);
    state.decision = decision;
    state.stage = ProgressStage.CheckProgress;

    this.logger.event(
      {
        type: 'progress-checked',
        phase: this.label,
        cycle: state.cycle,
        done: decision.progress.done,
        total: decision.progress.total,
        ready: decision.ready,
      },
      'debug',
    );

    if (decision.target !== undefined && !state.transitionRequested) {
      state.transitionRequested = true;
      this.logger.event({
        type: 'transition-requested',
        phase: this.label,
        target: phaseLabel(decision.target),
        cycle: state.cycle,
      });
      state.host.requestTransition(decision.target);
    }

    return decision;
  }

  private activate(host: PhaseHost<S>): void {
    if (this.state) return;
    this.state = {
      host,
      counter: new ProgressCounter(this.label),
      assets: this.opts.trackAssets ? new AssetsLoading(this.label, this.logger.child('assets')) : null,
      cycle: 0,
      stage: ProgressStage.Preparation,
      decision: null,
      transitionRequested: false,
    };
    this.logger.event({
      type: 'tracker-activated',
      phase: this.label,
      nextPhase: this.opts.nextPhase !== undefined ? phaseLabel(this.opts.nextPhase) : undefined,
      trackAssets: this.opts.trackAssets,
    });
  }

  private deactivate(): void {
    const state = this.state;
    if (!state) return;
    const last = state.counter.readComplete();
    state.counter.dispose();
    state.assets?.clear();
    this.state = null;
    this.logger.event({
      type: 'tracker-deactivated',
      phase: this.label,
      cycles: state.cycle,
      done: last.done,
      total: last.total,
    });
  }

  private withPendingAssets(state: ActiveState<S>, read: Progress): Progress {
    if (!state.assets || state.stage === ProgressStage.CheckProgress) return read;
    return read.add(state.assets.progress());
  }

  private forRecording(operation: string): ProgressCounter {
    const state = this.require(operation);
    this.warnIfDecided(state, operation);
    return state.counter;
  }

  private warnIfDecided(state: ActiveState<S>, operation: string): void {
    if (state.stage === ProgressStage.CheckProgress && this.state === state) {
      this.logger.warn(`${operation} after checkProgress; it is dropped at the next cycle reset`, {
        phase: this.label,
        cycle: state.cycle,
      });
    }
  }

  private require(operation: string): ActiveState<S> {
    if (!this.state) {
      throw new ProgressInactiveError(
        `Cannot ${operation}: phase "${this.label}" is not active`,
        this.label,
        operation,
      );
    }
    return this.state;
  }
}
