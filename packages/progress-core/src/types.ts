/**
 * Shared type definitions for the progress core.
 */

/** Error thrown when a counter is used outside the phase that owns it. */
export class ProgressInactiveError extends Error {
  phase: string;
  operation: string;

  constructor(message: string, phase: string, operation: string) {
    super(message);
    this.name = 'ProgressInactiveError';
    this.phase = phase;
    this.operation = operation;
  }
}
