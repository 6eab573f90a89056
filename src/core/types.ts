/**
 * types.ts — Shared type definitions for the pool, dispatcher and comparer,
 * plus the contracts of the two external collaborators (browser provider
 * and synthetic HTTP client).
 */

import type { HardwareProfile } from './hardwareProfiles';

// ─── Search request ────────────────────────────────────────

/** Cabin buckets that both the Award and the Revenue responses price consistently. */
export const CROSS_REFERENCE_BUCKETS = ['MAIN', 'PREMIUM_ECONOMY'] as const;

export type CabinClass = (typeof CROSS_REFERENCE_BUCKETS)[number];

export function isCabinClass(value: string): value is CabinClass {
  return (CROSS_REFERENCE_BUCKETS as readonly string[]).includes(value);
}

/** The upstream's `tripOptions.searchType`. */
export type SearchType = 'Award' | 'Revenue';

export interface SearchRequest {
  readonly origin: string;
  readonly destination: string;
  /** Departure date, `YYYY-MM-DD`. */
  readonly date: string;
  readonly passengerCount: number;
  readonly cabinClass: CabinClass;
}

// ─── Offers ────────────────────────────────────────────────

/** Totals for the request's passenger count. Any component may be missing. */
export interface PriceComponents {
  pointsRequired?: number;
  cashAmount?: number;
  taxesFees?: number;
}

/** One priced flight option from one search type. Lives for one comparison only. */
export interface RawOffer {
  searchType: SearchType;
  /** Upstream identity shared by the Award and Revenue view of one flight option. */
  hash?: string;
  flightNumber?: string;
  /** ISO-8601 timestamp with the airport's offset. */
  departureAt?: string;
  arrivalAt?: string;
  /** The cabin bucket `price` was read for. */
  productGroup: CabinClass;
  price: PriceComponents;
}

export interface MatchedFlight {
  flightNumber: string;
  /** `HH:mm` at the departure airport. */
  departureTime: string;
  arrivalTime: string;
  pointsRequired: number;
  cashPriceUsd: number;
  taxesFeesUsd: number;
  /** Cents per point, 2 decimals. */
  cpp: number;
}

export interface SearchMetadata {
  origin: string;
  destination: string;
  date: string;
  passengers: number;
  cabinClass: CabinClass;
}

export interface ComparisonResult {
  searchMetadata: SearchMetadata;
  flights: MatchedFlight[];
  totalResults: number;
}

// ─── Sessions ──────────────────────────────────────────────

export type SessionState = 'warming' | 'ready' | 'busy' | 'degraded' | 'retired';

/** How a leased session came back. Only `rejected` and `crashed` degrade it. */
export type ReleaseOutcome = 'ok' | 'timeout' | 'rejected' | 'crashed';

export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds; `-1` or absent for a session cookie. */
  expires?: number;
}

export interface FingerprintDescriptor {
  userAgent: string;
  /** BCP-47 locale, e.g. "en-US". */
  locale: string;
  /** Accept-Language header value. */
  acceptLanguage: string;
  viewport: { width: number; height: number };
  hardware: HardwareProfile;
}

/** Opaque reference to a live browser page owned by a BrowserProvider. */
export interface BrowserSession {
  readonly id: string;
}

/**
 * Read-only view of a pooled session. Only the pool mutates the slot behind it.
 */
export interface SessionHandle {
  readonly id: number;
  readonly state: SessionState;
  readonly usageCount: number;
  readonly cookies: readonly StoredCookie[];
  readonly fingerprint: FingerprintDescriptor;
  readonly browserSession: BrowserSession;
  readonly createdAt: number;
}

export interface PoolStats {
  capacity: number;
  warming: number;
  ready: number;
  busy: number;
  degraded: number;
  waiting: number;
}

// ─── External collaborators ────────────────────────────────

export type CredentialsMode = 'include' | 'same-origin' | 'omit';

export interface InPageRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
}

export interface InPageResponse {
  status: number;
  body: string;
}

/** Rendering a page is opaque to the core: navigate, run a fetch, read cookies. */
export interface BrowserProvider {
  navigate(url: string, fingerprint: FingerprintDescriptor): Promise<BrowserSession>;
  executeInPage(
    session: BrowserSession,
    request: InPageRequest,
    credentials: CredentialsMode,
  ): Promise<InPageResponse>;
  readCookies(session: BrowserSession): Promise<StoredCookie[]>;
  /** Fires once when the page crashes, closes or the browser disconnects. Returns an unsubscribe. */
  onDisconnect(session: BrowserSession, listener: (reason: string) => void): () => void;
  close(session: BrowserSession): Promise<void>;
}

export interface SyntheticRequest {
  url: string;
  payload: unknown;
  headers: Record<string, string>;
  cookies: readonly StoredCookie[];
  fingerprint: FingerprintDescriptor;
  signal?: AbortSignal;
}

export type SyntheticOutcome =
  | { kind: 'ok'; statusCode: number; body: string }
  | { kind: 'rejected'; statusCode?: number; reason: string }
  | { kind: 'failed'; statusCode: number; reason: string };

/** Direct HTTP request carrying a session's cookie jar and fingerprint headers. */
export interface SyntheticClient {
  send(request: SyntheticRequest): Promise<SyntheticOutcome>;
}

// ─── Configuration ─────────────────────────────────────────

export interface PoolConfig {
  capacity: number;
  rotationThreshold: number;
  leaseTimeoutMs: number;
  hydrationRetries: number;
  hydrationBackoffMs: number;
}

export interface AppConfig {
  port: number;
  pool: PoolConfig;
  requestDeadlineMs: number;
  fastPathTimeoutMs: number;
  rateLimitMs: number;
  browser: {
    headless: boolean;
    executablePath?: string;
  };
}

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/** Build an AppConfig from process.env with defaults. */
export function loadAppConfig(): AppConfig {
  return {
    port: intFromEnv('PORT', 8000),
    pool: {
      capacity: Math.max(1, intFromEnv('POOL_CAPACITY', 2)),
      rotationThreshold: Math.max(1, intFromEnv('ROTATION_THRESHOLD', 75)),
      leaseTimeoutMs: intFromEnv('LEASE_TIMEOUT_MS', 45_000),
      hydrationRetries: Math.max(1, intFromEnv('HYDRATION_RETRIES', 3)),
      hydrationBackoffMs: intFromEnv('HYDRATION_BACKOFF_MS', 1_000),
    },
    requestDeadlineMs: intFromEnv('REQUEST_DEADLINE_MS', 60_000),
    fastPathTimeoutMs: intFromEnv('FAST_PATH_TIMEOUT_MS', 30_000),
    rateLimitMs: intFromEnv('RATE_LIMIT_MS', 250),
    browser: {
      headless: process.env.BROWSER_HEADLESS !== 'false',
      executablePath: process.env.CHROME_EXECUTABLE_PATH || undefined,
    },
  };
}
