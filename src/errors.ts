export { ProgressInactiveError } from '../packages/progress-core/src/index.js';

export class AssetsTrackingDisabledError extends Error {
  phase: string;

  constructor(message: string, phase: string) {
    super(message);
    this.name = 'AssetsTrackingDisabledError';
    this.phase = phase;
  }
}

export class PhaseMachineStateError extends Error {
  operation: string;

  constructor(message: string, operation: string) {
    super(message);
    this.name = 'PhaseMachineStateError';
    this.operation = operation;
  }
}

export class TrackerInstallError extends Error {
  phase: string;

  constructor(message: string, phase: string) {
    super(message);
    this.name = 'TrackerInstallError';
    this.phase = phase;
  }
}
