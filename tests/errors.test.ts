import { describe, it, expect } from 'vitest';
import {
  AssetsTrackingDisabledError,
  PhaseMachineStateError,
  ProgressInactiveError,
  TrackerInstallError,
} from '../src/errors.js';

describe('ProgressInactiveError', () => {
  it('instantiates with correct name, message, and properties', () => {
    const err = new ProgressInactiveError('inactive', 'loading', 'record');
    expect(err.name).toBe('ProgressInactiveError');
    expect(err.message).toBe('inactive');
    expect(err.phase).toBe('loading');
    expect(err.operation).toBe('record');
    expect(err instanceof Error).toBe(true);
  });
});

describe('AssetsTrackingDisabledError', () => {
  it('instantiates with correct name and phase', () => {
    const err = new AssetsTrackingDisabledError('disabled', 'loading');
    expect(err.name).toBe('AssetsTrackingDisabledError');
    expect(err.phase).toBe('loading');
  });
});

describe('PhaseMachineStateError', () => {
  it('instantiates with correct name and operation', () => {
    const err = new PhaseMachineStateError('not started', 'override');
    expect(err.name).toBe('PhaseMachineStateError');
    expect(err.operation).toBe('override');
  });
});

describe('TrackerInstallError', () => {
  it('can be caught as a generic Error', () => {
    const throwIt = () => {
      throw new TrackerInstallError('installed twice', 'loading');
    };
    expect(throwIt).toThrowError('installed twice');
  });
});
