import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, TrackerEvent } from './events.js';

export interface LoggerOptions {
  /** Directory for JSON-lines log files. No file is written when unset. */
  logDir?: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

export type LogContext = {
  phase?: string;
  cycle?: number;
  data?: Record<string, unknown>;
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string | null;
  private initPromise: Promise<unknown> | null = null;
  private fileErrorReported = false;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir,
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
    };
    this.logFile = this.opts.logDir ? join(this.opts.logDir, `${this.opts.source}.log`) : null;
  }

  /** A logger that prints nothing and writes no file. */
  static silent(source = 'phasetally'): Logger {
    return new Logger({ source, level: 'error', console: false });
  }

  get source(): string {
    return this.opts.source;
  }

  get level(): LogLevel {
    return this.opts.level;
  }

  private async ensureDir(file: string): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(file), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = format(new Date(entry.timestamp), 'HH:mm:ss.SSS');
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [entry.phase ?? null, entry.cycle != null ? `c${entry.cycle}` : null]
      .filter(Boolean)
      .join(' ');
    const ctxStr = ctx ? ` [${ctx}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    if (this.opts.console) {
      const formatted = this.formatConsole(entry);
      if (entry.level === 'error') {
        console.error(formatted);
      } else if (entry.level === 'warn') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (this.logFile === null) return;

    try {
      await this.ensureDir(this.logFile);
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      // report once; logging must not take the tracked phase down with it
      if (!this.fileErrorReported) {
        this.fileErrorReported = true;
        console.error(`[Logger] Failed to write ${this.logFile}:`, err);
      }
    }
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('error', message, context));
  }

  /**
   * Log a structured event.
   */
  event(event: TrackerEvent, level: LogLevel = 'info'): void {
    void this.writeEntry(
      this.buildEntry(level, event.type, {
        phase: event.phase,
        cycle: 'cycle' in event ? event.cycle : undefined,
        data: { ...event },
      }),
    );
  }

  /**
   * Create a logger for another source sharing this logger's settings.
   */
  child(source: string): Logger {
    return new Logger({
      logDir: this.opts.logDir,
      level: this.opts.level,
      console: this.opts.console,
      source,
    });
  }
}
