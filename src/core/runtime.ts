import type { PhasetallyConfig } from '../config/schema.js';
import { createTrackers, loadConfig } from '../config/loader.js';
import { Logger } from '../logging/logger.js';
import { PhaseMachine } from '../phase/phase-machine.js';
import type { ProgressTracker } from './progress-tracker.js';
import type { TransitionDecision } from './transition.js';

/**
 * Phase machine plus one installed tracker per configured phase.
 *
 * The application still runs its own tasks; the runtime only marks the
 * cycle boundaries: `beginCycle()` before tasks, `finishCycle()` after
 * all of them have settled.
 */
export class PhasetallyRuntime {
  readonly logger: Logger;
  readonly machine: PhaseMachine<string>;
  private readonly trackers: Map<string, ProgressTracker<string>>;
  private readonly uninstallTrackers: () => void;

  constructor(config: PhasetallyConfig) {
    this.logger = new Logger({
      source: 'phasetally',
      level: config.logging.level,
      console: config.logging.console,
      logDir: config.logging.logDir,
    });
    this.machine = new PhaseMachine(config.initialPhase, this.logger.child('phase-machine'));

    const installed = createTrackers(config, this.machine, this.logger);
    this.trackers = installed.trackers;
    this.uninstallTrackers = installed.uninstall;
  }

  static async fromFile(configPath: string): Promise<PhasetallyRuntime> {
    return new PhasetallyRuntime(await loadConfig(configPath));
  }

  get phase(): string | undefined {
    return this.machine.current;
  }

  tracker(phase: string): ProgressTracker<string> | undefined {
    return this.trackers.get(phase);
  }

  /** The tracker of the current phase, if that phase is tracked. */
  activeTracker(): ProgressTracker<string> | undefined {
    const current = this.machine.current;
    return current === undefined ? undefined : this.trackers.get(current);
  }

  start(): void {
    this.machine.start();
  }

  beginCycle(): void {
    this.activeTracker()?.beginCycle();
  }

  /**
   * Take the cycle's decision for the active tracker, then apply any
   * requested transition. Returns the decision, or null when the current
   * phase is untracked.
   */
  finishCycle(): TransitionDecision<string> | null {
    const decision = this.activeTracker()?.checkProgress() ?? null;
    this.machine.applyPending();
    return decision;
  }

  shutdown(): void {
    this.uninstallTrackers();
  }
}
