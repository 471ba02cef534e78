/**
 * Minimal phase state machine driving tracker lifecycles.
 */

import { PhaseMachineStateError } from '../errors.js';
import { Logger } from '../logging/logger.js';

export type PhaseHandler<S> = (phase: S) => void;

/**
 * What a progress tracker needs from the application's state machine.
 *
 * Phases are compared by identity (`===`), so use primitives or enum members.
 */
export interface PhaseHost<S> {
  /** Active phase, or undefined before the host has started. */
  readonly current: S | undefined;
  /** Subscribe to entering `phase`. Returns an unsubscribe function. */
  onEnter(phase: S, handler: PhaseHandler<S>): () => void;
  /** Subscribe to leaving `phase`. Returns an unsubscribe function. */
  onExit(phase: S, handler: PhaseHandler<S>): () => void;
  /** Ask for a move to `phase` at the host's next safe point. */
  requestTransition(phase: S): void;
}

export function phaseLabel(phase: unknown): string {
  return typeof phase === 'symbol' ? (phase.description ?? 'symbol') : String(phase);
}

/**
 * Phase machine with deferred transitions.
 *
 * `requestTransition` only queues the move; the owner calls `applyPending`
 * between cycles, which fires exit handlers of the old phase and then enter
 * handlers of the new one. `override` moves immediately.
 */
export class PhaseMachine<S> implements PhaseHost<S> {
  private active: { phase: S } | null = null;
  private queued: { phase: S } | null = null;
  private readonly enterHandlers = new Map<S, Set<PhaseHandler<S>>>();
  private readonly exitHandlers = new Map<S, Set<PhaseHandler<S>>>();

  constructor(
    private readonly initial: S,
    private readonly logger: Logger = Logger.silent('phase-machine'),
  ) {}

  get current(): S | undefined {
    return this.active?.phase;
  }

  get started(): boolean {
    return this.active !== null;
  }

  get pending(): S | undefined {
    return this.queued?.phase;
  }

  onEnter(phase: S, handler: PhaseHandler<S>): () => void {
    return subscribe(this.enterHandlers, phase, handler);
  }

  onExit(phase: S, handler: PhaseHandler<S>): () => void {
    return subscribe(this.exitHandlers, phase, handler);
  }

  /** Enter the initial phase. */
  start(): void {
    if (this.active) {
      throw new PhaseMachineStateError('Phase machine already started', 'start');
    }
    this.active = { phase: this.initial };
    this.logger.event({ type: 'phase-entered', phase: phaseLabel(this.initial) });
    fire(this.enterHandlers, this.initial);
  }

  requestTransition(phase: S): void {
    this.queued = { phase };
    this.logger.debug(`Transition to ${phaseLabel(phase)} queued`, {
      phase: phaseLabel(this.current),
    });
  }

  /**
   * Apply the queued transition, if any. Returns whether the phase changed.
   */
  applyPending(): boolean {
    const queued = this.queued;
    if (!queued) return false;
    this.queued = null;
    this.moveTo(queued.phase, 'applyPending');
    return true;
  }

  /** Move to `phase` now, discarding any queued transition. */
  override(phase: S): void {
    this.queued = null;
    this.moveTo(phase, 'override');
  }

  /**
   * Exit handlers run before the move is committed. If one throws, the
   * machine is still left in `next` and the error propagates without
   * running the enter handlers.
   */
  private moveTo(next: S, operation: string): void {
    const active = this.active;
    if (!active) {
      throw new PhaseMachineStateError(`Cannot ${operation} before the phase machine has started`, operation);
    }
    const previous = active.phase;
    this.logger.event({ type: 'phase-exited', phase: phaseLabel(previous), next: phaseLabel(next) });
    try {
      fire(this.exitHandlers, previous);
    } finally {
      this.active = { phase: next };
      this.logger.event({ type: 'phase-entered', phase: phaseLabel(next), previous: phaseLabel(previous) });
    }
    fire(this.enterHandlers, next);
  }
}

function subscribe<S>(
  handlers: Map<S, Set<PhaseHandler<S>>>,
  phase: S,
  handler: PhaseHandler<S>,
): () => void {
  const set = handlers.get(phase) ?? new Set<PhaseHandler<S>>();
  handlers.set(phase, set);
  set.add(handler);
  return () => {
    set.delete(handler);
  };
}

function fire<S>(handlers: Map<S, Set<PhaseHandler<S>>>, phase: S): void {
  const set = handlers.get(phase);
  if (!set) return;
  for (const handler of [...set]) {
    handler(phase);
  }
}
