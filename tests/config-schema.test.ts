import { describe, it, expect } from 'vitest';
import { PhasetallyConfigSchema, TrackerConfigSchema } from '../src/config/schema.js';

describe('TrackerConfigSchema', () => {
  it('defaults trackAssets to false', () => {
    const parsed = TrackerConfigSchema.parse({ phase: 'loading' });
    expect(parsed).toEqual({ phase: 'loading', trackAssets: false });
  });

  it('accepts a next phase', () => {
    const parsed = TrackerConfigSchema.parse({ phase: 'loading', nextPhase: 'in-game', trackAssets: true });
    expect(parsed.nextPhase).toBe('in-game');
    expect(parsed.trackAssets).toBe(true);
  });

  it('rejects an empty phase', () => {
    expect(TrackerConfigSchema.safeParse({ phase: '' }).success).toBe(false);
  });

  it('rejects a next phase equal to the tracked phase', () => {
    const result = TrackerConfigSchema.safeParse({ phase: 'loading', nextPhase: 'loading' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['nextPhase']);
      expect(result.error.issues[0].message).toBe('nextPhase must differ from phase');
    }
  });
});

describe('PhasetallyConfigSchema', () => {
  const base = {
    initialPhase: 'splash',
    trackers: [{ phase: 'loading', nextPhase: 'in-game' }],
  };

  it('applies logging defaults', () => {
    const parsed = PhasetallyConfigSchema.parse(base);
    expect(parsed.logging).toEqual({ level: 'info', console: true });
  });

  it('requires at least one tracker', () => {
    expect(PhasetallyConfigSchema.safeParse({ ...base, trackers: [] }).success).toBe(false);
  });

  it('rejects an unknown log level', () => {
    expect(PhasetallyConfigSchema.safeParse({ ...base, logging: { level: 'trace' } }).success).toBe(false);
  });

  it('rejects a phase tracked twice', () => {
    const result = PhasetallyConfigSchema.safeParse({
      ...base,
      trackers: [{ phase: 'loading' }, { phase: 'loading', nextPhase: 'menu' }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['trackers', 1, 'phase']);
      expect(result.error.issues[0].message).toBe('phase "loading" is tracked more than once');
    }
  });
});
