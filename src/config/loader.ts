import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';
import { PhasetallyConfigSchema, type PhasetallyConfig } from './schema.js';
import { ProgressTracker } from '../core/progress-tracker.js';
import type { Logger } from '../logging/logger.js';
import type { PhaseHost } from '../phase/phase-machine.js';
import { exists } from '../util/fs.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Validate an already-parsed config object.
 */
export function parseConfig(raw: unknown, source = 'config'): PhasetallyConfig {
  const result = PhasetallyConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigLoadError(`Invalid ${source}:\n${issues}`, result.error);
  }
  return result.data;
}

/**
 * Load, parse, and validate a phasetally.config.json file.
 * A relative `logging.logDir` is resolved against the config file's directory.
 */
export async function loadConfig(configPath: string): Promise<PhasetallyConfig> {
  const absPath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  if (!(await exists(absPath))) {
    throw new ConfigLoadError(`Config file not found: ${absPath}`);
  }

  let raw: unknown;
  try {
    const content = await readFile(absPath, 'utf-8');
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigLoadError(`Failed to parse config file: ${absPath}`, err);
  }

  const config = parseConfig(raw, `config ${absPath}`);
  const { logDir } = config.logging;
  if (logDir !== undefined && !isAbsolute(logDir)) {
    return {
      ...config,
      logging: { ...config.logging, logDir: resolve(dirname(absPath), logDir) },
    };
  }
  return config;
}

export interface InstalledTrackers {
  /** Trackers keyed by the phase they track. */
  trackers: Map<string, ProgressTracker<string>>;
  /** Uninstall every tracker, disposing any active counter. */
  uninstall(): void;
}

/**
 * Build one tracker per configured entry and install it on `host`.
 * Each tracker logs through a child of `logger` named after its phase.
 */
export function createTrackers(
  config: PhasetallyConfig,
  host: PhaseHost<string>,
  logger: Logger,
): InstalledTrackers {
  const trackers = new Map<string, ProgressTracker<string>>();
  const uninstallers: Array<() => void> = [];

  for (const entry of config.trackers) {
    const tracker = new ProgressTracker<string>(
      { phase: entry.phase, nextPhase: entry.nextPhase, trackAssets: entry.trackAssets },
      logger.child(`progress-${entry.phase}`),
    );
    trackers.set(entry.phase, tracker);
    uninstallers.push(tracker.install(host));
  }

  return {
    trackers,
    uninstall: () => {
      for (const uninstall of uninstallers.splice(0)) {
        uninstall();
      }
    },
  };
}
