import { describe, it, expect, vi } from 'vitest';
import { createTrackers, parseConfig } from '../src/config/loader.js';
import { PhaseMachine } from '../src/phase/phase-machine.js';
import { Progress, ProgressInactiveError } from '../packages/progress-core/src/index.js';
import { Logger } from '../src/logging/logger.js';

const config = parseConfig({
  initialPhase: 'splash',
  trackers: [
    { phase: 'splash', nextPhase: 'loading' },
    { phase: 'loading', nextPhase: 'in-game', trackAssets: true },
  ],
});

describe('createTrackers', () => {
  it('builds one tracker per entry with its configured options', () => {
    const machine = new PhaseMachine<string>('splash');
    const { trackers } = createTrackers(config, machine, Logger.silent());

    expect([...trackers.keys()]).toEqual(['splash', 'loading']);
    expect(trackers.get('splash')?.nextPhase).toBe('loading');
    expect(trackers.get('splash')?.trackAssets).toBe(false);
    expect(trackers.get('loading')?.nextPhase).toBe('in-game');
    expect(trackers.get('loading')?.trackAssets).toBe(true);
  });

  it('installs the trackers on the host', () => {
    const machine = new PhaseMachine<string>('splash');
    const { trackers } = createTrackers(config, machine, Logger.silent());

    machine.start();
    expect(trackers.get('splash')?.active).toBe(true);
    expect(trackers.get('loading')?.active).toBe(false);

    machine.override('loading');
    expect(trackers.get('splash')?.active).toBe(false);
    expect(trackers.get('loading')?.active).toBe(true);
  });

  it('names each tracker logger after its phase', () => {
    const logger = Logger.silent();
    const child = vi.spyOn(logger, 'child');
    createTrackers(config, new PhaseMachine<string>('splash'), logger);
    expect(child.mock.calls).toEqual([['progress-splash'], ['progress-loading']]);
  });

  it('uninstalls every tracker', () => {
    const machine = new PhaseMachine<string>('splash');
    const { trackers, uninstall } = createTrackers(config, machine, Logger.silent());
    machine.start();
    const counter = trackers.get('splash')?.counter();

    uninstall();

    expect(trackers.get('splash')?.active).toBe(false);
    expect(counter?.disposed).toBe(true);
    expect(() => counter?.record(new Progress(1, 1))).toThrow(ProgressInactiveError);
    machine.override('loading');
    expect(trackers.get('loading')?.active).toBe(false);
  });
});
