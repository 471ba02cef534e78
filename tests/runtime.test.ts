import { describe, it, expect, beforeEach } from 'vitest';
import { PhasetallyRuntime } from '../src/core/runtime.js';
import { parseConfig } from '../src/config/loader.js';
import { HiddenProgress, Progress } from '../packages/progress-core/src/index.js';
import { waitCycles } from '../src/tasks/wait.js';

describe('PhasetallyRuntime', () => {
  let runtime: PhasetallyRuntime;

  beforeEach(() => {
    runtime = new PhasetallyRuntime(
      parseConfig({
        initialPhase: 'splash',
        trackers: [
          { phase: 'splash', nextPhase: 'loading' },
          { phase: 'loading', nextPhase: 'in-game', trackAssets: true },
        ],
        logging: { console: false },
      }),
    );
  });

  it('installs one tracker per configured phase', () => {
    expect(runtime.tracker('splash')?.nextPhase).toBe('loading');
    expect(runtime.tracker('loading')?.trackAssets).toBe(true);
    expect(runtime.tracker('in-game')).toBeUndefined();
  });

  it('activates the tracker of the initial phase on start', () => {
    runtime.start();
    expect(runtime.phase).toBe('splash');
    expect(runtime.activeTracker()).toBe(runtime.tracker('splash'));
    expect(runtime.tracker('splash')?.active).toBe(true);
    expect(runtime.tracker('loading')?.active).toBe(false);
  });

  it('walks through phases as their progress completes', async () => {
    runtime.start();
    const splashWait = waitCycles(1);

    runtime.beginCycle();
    runtime.tracker('splash')?.apply(splashWait());
    expect(runtime.finishCycle()?.ready).toBe(false);
    expect(runtime.phase).toBe('splash');

    runtime.beginCycle();
    runtime.tracker('splash')?.apply(splashWait());
    expect(runtime.finishCycle()?.target).toBe('loading');
    expect(runtime.phase).toBe('loading');

    const loading = runtime.activeTracker();
    expect(loading?.phase).toBe('loading');
    loading?.assets().addLoaded('level');
    loading?.persist(new Progress(1, 1));

    runtime.beginCycle();
    await loading?.track(async () => [new Progress(1, 1), HiddenProgress.from(true)] as const)();
    const decision = runtime.finishCycle();
    expect(decision?.progress.toJSON()).toEqual({ done: 4, total: 4 });
    expect(runtime.phase).toBe('in-game');
    expect(loading?.active).toBe(false);
  });

  it('returns null for an untracked phase', () => {
    runtime.start();
    runtime.machine.override('in-game');
    runtime.beginCycle();
    expect(runtime.finishCycle()).toBeNull();
  });

  it('deactivates every tracker on shutdown', () => {
    runtime.start();
    runtime.shutdown();
    expect(runtime.tracker('splash')?.active).toBe(false);
  });
});
