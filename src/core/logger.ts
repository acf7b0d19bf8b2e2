/**
 * logger.ts — Natural-language progress logger for the tender pipeline.
 *
 * Every line carries an ISO timestamp, an upper-case level and the module
 * that emitted it:
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [ChangeTracker] 3 new, 1 status_changed…
 *
 * The minimum level is set once at process start (`Logger.setLevel`), usually
 * from LOG_LEVEL.  Callers never format timestamps themselves.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('ListingHarvester');
 *   logger.info('Found 12 Works tenders on page 3');
 */
export class Logger {
  private static minimumLevel: LogLevel = 'info';

  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  static setLevel(level: LogLevel): void {
    Logger.minimumLevel = level;
  }

  static getLevel(): LogLevel {
    return Logger.minimumLevel;
  }

  // ── Public API ─────────────────────────────────────────

  /** Fine-grained tracing: rejected cell values, skipped rows. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page harvested, session reused, snapshot saved. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: missing detail control, stale cache. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: login exhausted, browser crash, export rejected. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    // The message is for operators; the raw error keeps the stack for debugging.
    if (err !== undefined && LEVEL_ORDER[Logger.minimumLevel] <= LEVEL_ORDER.error) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private emit(level: LogLevel, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[Logger.minimumLevel]) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}

/** Keep the first two characters of a secret (OTP, mobile number) and mask the rest. */
export function maskSecret(value: string): string {
  if (value.length <= 2) return '*'.repeat(value.length);
  return `${value.slice(0, 2)}${'*'.repeat(Math.min(value.length - 2, 6))}`;
}

/** Render an unknown thrown value as a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
