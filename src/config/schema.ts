import { z } from 'zod';

export const TrackerConfigSchema = z
  .object({
    /** Phase during which progress is tracked. */
    phase: z.string().min(1),
    /** Phase to move to once all progress completes. Omit to only observe readiness. */
    nextPhase: z.string().min(1).optional(),
    /** Count registered assets as visible progress. */
    trackAssets: z.boolean().default(false),
  })
  .refine((t) => t.nextPhase !== t.phase, {
    message: 'nextPhase must differ from phase',
    path: ['nextPhase'],
  });

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>;

const LoggingConfigSchema = z
  .object({
    /** Minimum log level. */
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    /** Print log lines to the console. */
    console: z.boolean().default(true),
    /** Directory for JSON-lines log files, relative to the config file. */
    logDir: z.string().optional(),
  })
  .default({});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const PhasetallyConfigSchema = z
  .object({
    /** Phase the machine starts in. */
    initialPhase: z.string().min(1),
    /** One entry per tracked phase. */
    trackers: z.array(TrackerConfigSchema).min(1),
    logging: LoggingConfigSchema,
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.trackers.forEach((tracker, i) => {
      if (seen.has(tracker.phase)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `phase "${tracker.phase}" is tracked more than once`,
          path: ['trackers', i, 'phase'],
        });
      }
      seen.add(tracker.phase);
    });
  });

export type PhasetallyConfig = z.infer<typeof PhasetallyConfigSchema>;
