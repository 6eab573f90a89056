/**
 * logger.ts — Timestamped, context-labelled progress logger.
 *
 * Every module creates its own instance so each line says *who* is talking:
 *
 *   [2026-02-10T18:30:00.000Z] [INFO ] [SessionPool] Session #3 ready with 12 cookie(s)
 *
 * The threshold comes from LOG_LEVEL and can be changed at runtime with
 * `Logger.setLevel()` (the tests silence everything below `error`).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export class Logger {
  private static threshold: LogLevel = levelFromEnv();

  /** A label prepended to every message. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  static setLevel(level: LogLevel): void {
    Logger.threshold = level;
  }

  static getLevel(): LogLevel {
    return Logger.threshold;
  }

  // ── Public API ─────────────────────────────────────────

  /** Per-request detail: cookie merges, lease hand-offs. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: slot hydrated, comparison complete. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Unexpected but recovered: fast path rejected, slot degraded. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure. The raw error is written on its own line. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err !== undefined && Logger.enabled('error')) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger.threshold];
  }

  private emit(level: LogLevel, message: string): void {
    if (!Logger.enabled(level)) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5);
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
