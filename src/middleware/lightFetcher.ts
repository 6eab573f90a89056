/**
 * lightFetcher.ts — The fast path: a direct HTTPS request that reuses a
 * pooled session's cookies and fingerprint, no browser involved.
 *
 * got-scraping generates a Chrome-like TLS Client Hello and header set; the
 * session's own user-agent and accept-language are layered on top so the
 * request matches the browser page that earned the cookies. Requests to the
 * same host go through one Bottleneck limiter.
 */

import Bottleneck from 'bottleneck';
import { gotScraping } from 'got-scraping';
import { Logger } from '../core/logger';
import { describeError } from '../core/errors';
import { REJECTION_STATUS_CODES } from '../services/itineraryContract';
import type {
  StoredCookie,
  SyntheticClient,
  SyntheticOutcome,
  SyntheticRequest,
} from '../core/types';

const logger = new Logger('LightFetcher');

export interface LightFetcherOptions {
  /** Per-request network timeout. */
  timeoutMs: number;
  /** Minimum spacing between requests to one host. */
  rateLimitMs: number;
  maxConcurrentPerHost?: number;
}

export class LightFetcher implements SyntheticClient {
  private readonly options: LightFetcherOptions;
  private readonly limiters = new Map<string, Bottleneck>();

  constructor(options: LightFetcherOptions) {
    this.options = options;
  }

  async send(request: SyntheticRequest): Promise<SyntheticOutcome> {
    const target = new URL(request.url);
    const limiter = this.limiterFor(target.hostname);

    const headers: Record<string, string> = {
      ...request.headers,
      'user-agent': request.fingerprint.userAgent,
      'accept-language': request.fingerprint.acceptLanguage,
      'sec-fetch-site': 'same-origin',
      'sec-fetch-mode': 'cors',
      'sec-fetch-dest': 'empty',
    };
    const cookieHeader = buildCookieHeader(request.cookies, target);
    if (cookieHeader) headers.cookie = cookieHeader;

    logger.debug(`POST ${request.url} with ${request.cookies.length} session cookie(s)`);

    try {
      const response = await limiter.schedule(() =>
        gotScraping({
          url: request.url,
          method: 'POST',
          headers,
          body: JSON.stringify(request.payload),
          signal: request.signal,
          throwHttpErrors: false,
          retry: { limit: 0 },
          timeout: { request: this.options.timeoutMs },
          headerGeneratorOptions: {
            browsers: [{ name: 'chrome', minVersion: 130 }],
            devices: ['desktop'],
            operatingSystems: [
              request.fingerprint.hardware.platform === 'MacIntel' ? 'macos' : 'windows',
            ],
          },
        }),
      );

      const statusCode = response.statusCode;
      logger.debug(`Light-fetch complete — HTTP ${statusCode} for ${request.url}`);
      return classifyResponse(statusCode, String(response.body));
    } catch (err) {
      // Connection resets and TLS aborts are how the upstream drops flagged clients.
      return { kind: 'rejected', reason: `transport error: ${describeError(err)}` };
    }
  }

  /** Stop every per-host limiter. */
  async stop(): Promise<void> {
    await Promise.all([...this.limiters.values()].map((l) => l.stop({ dropWaitingJobs: true })));
    this.limiters.clear();
  }

  private limiterFor(hostname: string): Bottleneck {
    let limiter = this.limiters.get(hostname);
    if (!limiter) {
      limiter = new Bottleneck({
        maxConcurrent: this.options.maxConcurrentPerHost ?? 4,
        minTime: this.options.rateLimitMs,
      });
      this.limiters.set(hostname, limiter);
    }
    return limiter;
  }
}

// ─── Helpers ────────────────────────────────────────────────

/**
 * Sort a fast-path response into ok / rejected / failed.
 *
 * Authentication and rate statuses, an empty 2xx and a 2xx that is not
 * JSON (an interstitial challenge page) are rejections; the browser
 * fallback can recover those. Any other HTTP error is a plain failure.
 */
export function classifyResponse(statusCode: number, body: string): SyntheticOutcome {
  if (REJECTION_STATUS_CODES.has(statusCode)) {
    return { kind: 'rejected', statusCode, reason: `HTTP ${statusCode}` };
  }
  if (statusCode >= 400) {
    return { kind: 'failed', statusCode, reason: body.slice(0, 200) || `HTTP ${statusCode}` };
  }
  if (body.trim() === '') {
    return { kind: 'rejected', statusCode, reason: 'empty body' };
  }
  try {
    JSON.parse(body);
  } catch {
    return { kind: 'rejected', statusCode, reason: 'non-JSON body (challenge page)' };
  }
  return { kind: 'ok', statusCode, body };
}

/** `name=value; …` for the jar entries that apply to `target`. */
export function buildCookieHeader(cookies: readonly StoredCookie[], target: URL): string {
  const host = target.hostname.toLowerCase();
  const path = target.pathname || '/';

  return cookies
    .filter((c) => domainMatches(host, c.domain) && path.startsWith(c.path || '/'))
    .map((c) => `${c.name}=${c.value}`)
    .join('; ');
}

function domainMatches(host: string, cookieDomain: string): boolean {
  const domain = cookieDomain.toLowerCase().replace(/^\./, '');
  if (domain === '') return true;
  return host === domain || host.endsWith(`.${domain}`);
}
