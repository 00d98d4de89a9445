import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, LogContext, RunEvent } from './events.js';

export interface LoggerOptions {
  /** Base directory for log files. */
  logDir: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONTEXT_KEYS = new Set(['issueKey', 'clusterKey', 'reportId']);

export class Logger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string;
  private initPromise: Promise<unknown> | null = null;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? join(homedir(), '.cluster-relay', 'logs'),
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      source: opts.source,
    };
    // One file per source and day, like a rotating daily log.
    this.logFile = join(this.opts.logDir, `${this.opts.source}-${format(new Date(), 'yyyy-MM-dd')}.log`);
  }

  get filePath(): string {
    return this.logFile;
  }

  private async ensureDir(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(this.logFile), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [
      entry.issueKey ?? null,
      entry.clusterKey != null ? `cluster=${entry.clusterKey}` : null,
      entry.reportId != null ? `report=${entry.reportId}` : null,
    ]
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

    try {
      await this.ensureDir();
      const line = JSON.stringify(entry) + '\n';
      await appendFile(this.logFile, line, 'utf-8');
    } catch (err) {
      if (this.opts.console) {
        console.error(`${entry.timestamp.slice(11, 23)} ERROR [${this.opts.source}] log file write failed: ${String(err)}`);
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
   * Log a structured event. Issue, cluster and report ids go to the entry context.
   */
  event(event: RunEvent, level: LogLevel = 'info'): void {
    const { type, ...rest } = event;
    const context: LogContext = {
      data: Object.fromEntries(Object.entries(rest).filter(([key]) => !CONTEXT_KEYS.has(key))),
    };
    if ('issueKey' in event) context.issueKey = event.issueKey;
    if ('clusterKey' in event && event.clusterKey !== null) context.clusterKey = event.clusterKey;
    if ('reportId' in event) context.reportId = event.reportId;
    void this.writeEntry(this.buildEntry(level, type, context));
  }

  /**
   * Create a child logger for one pipeline stage, sharing directory and level.
   */
  child(stage: string): Logger {
    return new Logger({
      logDir: this.opts.logDir,
      level: this.opts.level,
      console: this.opts.console,
      source: `${this.opts.source}.${stage}`,
    });
  }
}
