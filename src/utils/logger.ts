import { appendFileSync } from 'fs';
import { Logger, LogLevel } from '../types/index.js';

const LEVEL_ORDER = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export interface LoggerOptions {
  /** Minimum level echoed to the console */
  level?: LogLevel;
  /** Log file receiving every event regardless of level */
  file?: string | null;
  /** Echo to the console at all; the file sink is unaffected */
  console?: boolean;
}

/**
 * Level-filtered logger with a per-run log file.
 *
 * The file sink records every level so the log is a full transcript of the
 * run; the console only sees messages at or above the configured level.
 * Writes are synchronous so nothing is lost when a fatal error exits.
 */
class SetupLogger implements Logger {
  private level: LogLevel;
  private file: string | null;
  private echo: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.ERROR;
    this.file = options.file ?? null;
    this.echo = options.console ?? true;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
  }

  private formatMessage(level: LogLevel, message: string, meta?: unknown): string {
    const timestamp = new Date().toISOString();
    let formatted = `${timestamp} ${this.getPrefix(level)} ${message}`;

    if (meta && typeof meta === 'object') {
      // JSON.stringify(new Error()) is {}
      const metaToLog = meta instanceof Error ? {
        name: meta.name,
        message: meta.message,
        stack: meta.stack
      } : meta;
      formatted += `\n${JSON.stringify(metaToLog, errorReplacer, 2)}`;
    } else if (meta !== undefined && meta !== null && meta !== '') {
      formatted += ` ${String(meta)}`;
    }

    return formatted;
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '[DEBUG]';
      case LogLevel.INFO:
        return '[INFO] ';
      case LogLevel.WARN:
        return '[WARN] ';
      case LogLevel.ERROR:
        return '[ERROR]';
      default:
        return '[LOG]  ';
    }
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    const formatted = this.formatMessage(level, message, meta);
    if (this.file) {
      appendFileSync(this.file, formatted + '\n', 'utf8');
    }
    if (!this.echo || !this.shouldLog(level)) {
      return;
    }
    switch (level) {
      case LogLevel.DEBUG:
        console.debug(formatted);
        break;
      case LogLevel.INFO:
        console.info(formatted);
        break;
      case LogLevel.WARN:
        console.warn(formatted);
        break;
      default:
        console.error(formatted);
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  /** Append a raw line (no timestamp or level), used for section headers */
  raw(line: string): void {
    if (this.file) {
      appendFileSync(this.file, line + '\n', 'utf8');
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setConsole(enabled: boolean): void {
    this.echo = enabled;
  }

  setFile(file: string | null): void {
    this.file = file;
  }

  getFile(): string | null {
    return this.file;
  }
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

// Create and export a default logger instance
export const logger = new SetupLogger({
  level: process.env.RIVERSPIDER_VERBOSE === '1' ? LogLevel.DEBUG : LogLevel.ERROR
});

/**
 * Rebind the shared logger for this run (level from CLI flags, file from the
 * per-run log path).
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    logger.setLevel(options.level);
  }
  if (options.file !== undefined) {
    logger.setFile(options.file);
  }
  if (options.console !== undefined) {
    logger.setConsole(options.console);
  }
}

export { SetupLogger };
