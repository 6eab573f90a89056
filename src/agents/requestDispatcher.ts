/**
 * requestDispatcher.ts — Run one upstream search on a leased session.
 *
 * FETCH STRATEGY
 * ──────────────
 *   attempting-fast ──ok──────────► done
 *          │ rejected (401/403/419/429, transport error, challenge page)
 *          ▼
 *   attempting-fallback ──ok──────► done
 *          └──────error───────────► failed
 *
 * The fast path posts the search straight from Node with the session's
 * cookie jar and fingerprint headers. The fallback runs the same request
 * inside the session's browser page, which refreshes the jar as a side
 * effect; the refreshed cookies are merged back into the pool so later
 * fast-path calls inherit them. There is exactly one fallback attempt.
 */

import { Logger } from '../core/logger';
import {
  describeError,
  UpstreamRejected,
  UpstreamTimeout,
  UpstreamUnavailable,
} from '../core/errors';
import {
  buildSearchPayload,
  parseSearchResponse,
  SEARCH_URL,
  searchHeaders,
} from '../services/itineraryContract';
import type {
  BrowserProvider,
  RawOffer,
  ReleaseOutcome,
  SearchRequest,
  SearchType,
  SessionHandle,
  SyntheticClient,
} from '../core/types';
import type { SessionPool } from './sessionPool';

const logger = new Logger('RequestDispatcher');

export type DispatchPhase = 'attempting-fast' | 'attempting-fallback' | 'done' | 'failed';

const TRANSITIONS: Record<DispatchPhase, readonly DispatchPhase[]> = {
  'attempting-fast': ['done', 'attempting-fallback', 'failed'],
  'attempting-fallback': ['done', 'failed'],
  done: [],
  failed: [],
};

/**
 * Two-step fast-then-fallback attempt for one search on one leased session.
 * `history` records every phase entered, so the retry policy is observable.
 */
export class FallbackStrategy {
  private current: DispatchPhase = 'attempting-fast';
  readonly history: DispatchPhase[] = ['attempting-fast'];

  constructor(
    private readonly pool: SessionPool,
    private readonly handle: SessionHandle,
    private readonly syntheticClient: SyntheticClient,
    private readonly browser: BrowserProvider,
    private readonly request: SearchRequest,
    private readonly searchType: SearchType,
    /** Aborted when the caller's deadline passes; no handle writes after that. */
    private readonly signal: AbortSignal,
  ) {}

  get phase(): DispatchPhase {
    return this.current;
  }

  async run(): Promise<RawOffer[]> {
    const payload = buildSearchPayload(this.request, this.searchType);

    try {
      const offers = await this.attemptFast(payload);
      this.enter('done');
      return offers;
    } catch (err) {
      if (!(err instanceof UpstreamRejected) || this.signal.aborted) {
        this.enter('failed');
        throw err;
      }
      logger.warn(
        `${this.label()} fast path rejected (${err.message}) — retrying through the browser`,
      );
    }

    this.enter('attempting-fallback');
    try {
      const offers = await this.attemptFallback(payload);
      this.enter('done');
      return offers;
    } catch (err) {
      this.enter('failed');
      throw new UpstreamRejected(
        `${this.label()} browser fallback failed: ${describeError(err)}`,
        undefined,
        { cause: err },
      );
    }
  }

  // ── Steps ──────────────────────────────────────────────

  private async attemptFast(payload: unknown): Promise<RawOffer[]> {
    const result = await this.syntheticClient.send({
      url: SEARCH_URL,
      payload,
      headers: searchHeaders(),
      cookies: this.handle.cookies,
      fingerprint: this.handle.fingerprint,
      signal: this.signal,
    });

    switch (result.kind) {
      case 'rejected':
        throw new UpstreamRejected(result.reason, result.statusCode);
      case 'failed':
        throw new UpstreamUnavailable(
          `${this.label()} upstream responded with HTTP ${result.statusCode}: ${result.reason}`,
        );
      case 'ok':
        break;
    }

    try {
      return parseSearchResponse(result.body, this.request, this.searchType);
    } catch (err) {
      // A 2xx that is not a pricing payload is a challenge page.
      throw new UpstreamRejected(`malformed pricing payload (${describeError(err)})`, result.statusCode);
    }
  }

  private async attemptFallback(payload: unknown): Promise<RawOffer[]> {
    const session = this.handle.browserSession;
    const response = await this.browser.executeInPage(
      session,
      {
        url: SEARCH_URL,
        method: 'POST',
        headers: searchHeaders(),
        body: JSON.stringify(payload),
      },
      'include',
    );

    if (response.status >= 400) {
      throw new Error(`upstream responded with HTTP ${response.status}`);
    }
    if (!response.body) {
      throw new Error('upstream returned an empty body');
    }

    const offers = parseSearchResponse(response.body, this.request, this.searchType);

    const refreshed = await this.browser.readCookies(session);
    if (!this.signal.aborted) {
      this.pool.mergeCookies(this.handle, refreshed);
    }
    return offers;
  }

  // ── Helpers ────────────────────────────────────────────

  private enter(next: DispatchPhase): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal dispatch transition ${this.current} → ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }

  private label(): string {
    return `[${this.searchType} #${this.handle.id}]`;
  }
}

// ─── Dispatcher ─────────────────────────────────────────────

export interface RequestDispatcherOptions {
  pool: SessionPool;
  syntheticClient: SyntheticClient;
  browser: BrowserProvider;
  /** Default per-call deadline. */
  deadlineMs: number;
}

export interface ExecuteOptions {
  deadlineMs?: number;
  /** Receives the strategy once it is created (phase history, for diagnostics). */
  onStrategy?: (strategy: FallbackStrategy) => void;
}

export class RequestDispatcher {
  private readonly pool: SessionPool;
  private readonly syntheticClient: SyntheticClient;
  private readonly browser: BrowserProvider;
  private readonly deadlineMs: number;

  constructor(options: RequestDispatcherOptions) {
    this.pool = options.pool;
    this.syntheticClient = options.syntheticClient;
    this.browser = options.browser;
    this.deadlineMs = options.deadlineMs;
  }

  /**
   * Lease a session, run the fast-then-fallback strategy and release the
   * session with the outcome. Raises UpstreamUnavailable when both paths
   * fail and UpstreamTimeout when the deadline passes first (the session
   * then goes back to ready).
   */
  async execute(
    request: SearchRequest,
    searchType: SearchType,
    options: ExecuteOptions = {},
  ): Promise<RawOffer[]> {
    const deadlineMs = options.deadlineMs ?? this.deadlineMs;
    const handle = await this.pool.lease();
    const controller = new AbortController();

    const strategy = new FallbackStrategy(
      this.pool,
      handle,
      this.syntheticClient,
      this.browser,
      request,
      searchType,
      controller.signal,
    );
    options.onStrategy?.(strategy);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new UpstreamTimeout(deadlineMs));
      }, deadlineMs);
    });

    const started = Date.now();
    const attempt = strategy.run();
    let outcome: ReleaseOutcome = 'ok';
    try {
      const offers = await Promise.race([attempt, deadline]);
      logger.info(
        `${searchType} search ${request.origin}→${request.destination} on ${request.date}: ` +
          `${offers.length} offer(s) via session #${handle.id} ` +
          `(${strategy.history.join(' → ')}, ${Date.now() - started} ms)`,
      );
      return offers;
    } catch (err) {
      if (err instanceof UpstreamTimeout) {
        outcome = 'timeout';
        logger.warn(`${searchType} search on session #${handle.id} timed out after ${deadlineMs} ms`);
        throw err;
      }
      if (err instanceof UpstreamRejected) {
        outcome = 'rejected';
        throw new UpstreamUnavailable(err.message, { cause: err });
      }
      throw err instanceof UpstreamUnavailable
        ? err
        : new UpstreamUnavailable(describeError(err), { cause: err });
    } finally {
      clearTimeout(timer);
      if (outcome === 'timeout') {
        // The abandoned attempt keeps running; only its failure is noted.
        void attempt.catch((lateErr: unknown) =>
          logger.debug(`Abandoned ${searchType} attempt failed late: ${describeError(lateErr)}`),
        );
      }
      this.pool.release(handle, outcome);
    }
  }
}
