/**
 * errors.ts — Typed failures surfaced by the pool, dispatcher and comparer.
 *
 * `kind` is all the HTTP layer needs: `client` errors become 400s,
 * `upstream` errors become 502s.
 */

export type ErrorKind = 'client' | 'upstream';

export class ComparerError extends Error {
  readonly kind: ErrorKind;

  constructor(message: string, kind: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

// ─── Client errors ─────────────────────────────────────────

/** Bad or unsupported input. Never retried. */
export class ValidationError extends ComparerError {
  constructor(message: string) {
    super(message, 'client');
  }
}

export class UnsupportedCabinClass extends ValidationError {
  readonly cabinClass: string;

  constructor(cabinClass: string, supported: readonly string[]) {
    super(
      `Invalid cabin class: ${cabinClass}. Must be one of ${supported.join(', ')}`,
    );
    this.cabinClass = cabinClass;
  }
}

// ─── Upstream errors ───────────────────────────────────────

/** Authentication / rate signal on the fast path. Recovered by the fallback. */
export class UpstreamRejected extends ComparerError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number, options?: { cause?: unknown }) {
    super(message, 'upstream', options);
    this.statusCode = statusCode;
  }
}

/** Both the fast path and the fallback failed, or the upstream answered with an error. */
export class UpstreamUnavailable extends ComparerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'upstream', options);
  }
}

/** A dispatcher call ran past its deadline. The session itself is kept. */
export class UpstreamTimeout extends ComparerError {
  readonly deadlineMs: number;

  constructor(deadlineMs: number, message?: string) {
    super(message ?? `Upstream search exceeded its ${deadlineMs} ms deadline`, 'upstream');
    this.deadlineMs = deadlineMs;
  }
}

/** The pool could not establish a browser session. Retried internally. */
export class HydrationFailed extends ComparerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'upstream', options);
  }
}

/** No session became available in time. */
export class PoolExhausted extends ComparerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'upstream', options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
