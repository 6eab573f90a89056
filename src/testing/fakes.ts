/**
 * fakes.ts — In-process stand-ins for the browser provider and the
 * synthetic HTTP client, shared by the unit tests.
 */

import { pickFingerprint } from '../core/hardwareProfiles';
import type {
  BrowserProvider,
  BrowserSession,
  CredentialsMode,
  FingerprintDescriptor,
  InPageRequest,
  InPageResponse,
  PoolConfig,
  SearchRequest,
  StoredCookie,
  SyntheticClient,
  SyntheticOutcome,
  SyntheticRequest,
} from '../core/types';

export const TEST_REQUEST: SearchRequest = {
  origin: 'DFW',
  destination: 'LAX',
  date: '2025-12-15',
  passengerCount: 1,
  cabinClass: 'MAIN',
};

export function poolConfig(overrides: Partial<PoolConfig> = {}): PoolConfig {
  return {
    capacity: 1,
    rotationThreshold: 75,
    leaseTimeoutMs: 1_000,
    hydrationRetries: 2,
    hydrationBackoffMs: 1,
    ...overrides,
  };
}

export function fixedFingerprint(): FingerprintDescriptor {
  return pickFingerprint(() => 0);
}

/** Award or Revenue response body with one slice, priced for MAIN. */
export function searchBody(kind: 'Award' | 'Revenue', hash = 'slice-1'): string {
  const base = {
    hash,
    departureDateTime: '2025-12-15T08:00:00.000-06:00',
    arrivalDateTime: '2025-12-15T09:45:00.000-08:00',
    segments: [{ flight: { carrierCode: 'AA', flightNumber: '123' } }],
  };
  const slice =
    kind === 'Award'
      ? {
          ...base,
          productPricing: [
            {
              productType: 'MAIN',
              regularPrice: {
                slicePricing: {
                  perPassengerAwardPoints: 12500,
                  allPassengerDisplayTotal: { amount: 5.6 },
                },
              },
            },
          ],
        }
      : {
          ...base,
          productGroups: {
            MAIN: [{ slicePricing: { allPassengerDisplayTotal: { amount: 289 } } }],
          },
        };
  return JSON.stringify({ slices: [slice] });
}

export interface InPageCall {
  session: BrowserSession;
  request: InPageRequest;
  credentials: CredentialsMode;
}

/**
 * BrowserProvider whose pages are plain ids (`page-1`, `page-2`, …).
 * `failNavigations` makes the next N navigations throw; navigations wait on
 * `navigationGate` while one is set.
 */
export class FakeBrowser implements BrowserProvider {
  navigations = 0;
  failNavigations = 0;
  cookies: StoredCookie[] = [{ name: 'sid', value: 's1', domain: '.aa.com', path: '/' }];
  /** Per-page cookie jar; `cookies` is used when unset. */
  cookiesFor: ((session: BrowserSession) => StoredCookie[]) | undefined;
  navigationGate: Promise<void> | undefined;
  respondInPage: (request: InPageRequest) => InPageResponse = () => ({ status: 200, body: '' });

  readonly inPageCalls: InPageCall[] = [];
  readonly closed: string[] = [];
  private readonly listeners = new Map<string, (reason: string) => void>();

  async navigate(_url: string, _fingerprint: FingerprintDescriptor): Promise<BrowserSession> {
    const page = `page-${++this.navigations}`;
    if (this.navigationGate) await this.navigationGate;
    if (this.failNavigations > 0) {
      this.failNavigations--;
      throw new Error('navigation blocked');
    }
    return { id: page };
  }

  async executeInPage(
    session: BrowserSession,
    request: InPageRequest,
    credentials: CredentialsMode,
  ): Promise<InPageResponse> {
    this.inPageCalls.push({ session, request, credentials });
    return this.respondInPage(request);
  }

  async readCookies(session: BrowserSession): Promise<StoredCookie[]> {
    const jar = this.cookiesFor?.(session) ?? this.cookies;
    return jar.map((c) => ({ ...c }));
  }

  onDisconnect(session: BrowserSession, listener: (reason: string) => void): () => void {
    this.listeners.set(session.id, listener);
    return () => {
      this.listeners.delete(session.id);
    };
  }

  async close(session: BrowserSession): Promise<void> {
    this.closed.push(session.id);
  }

  /** Fire the disconnect signal for one page. */
  crash(sessionId: string): void {
    this.listeners.get(sessionId)?.('page crashed');
  }
}

export class FakeSyntheticClient implements SyntheticClient {
  readonly requests: SyntheticRequest[] = [];

  constructor(
    private readonly respond: (request: SyntheticRequest) => SyntheticOutcome | Promise<SyntheticOutcome>,
  ) {}

  async send(request: SyntheticRequest): Promise<SyntheticOutcome> {
    this.requests.push(request);
    return this.respond(request);
  }
}

/** Search type a synthetic request's payload asks for. */
export function searchTypeOf(request: SyntheticRequest | InPageRequest): 'Award' | 'Revenue' {
  const text = 'payload' in request ? JSON.stringify(request.payload) : request.body;
  return text.includes('"searchType":"Award"') ? 'Award' : 'Revenue';
}

/** A promise plus the function that settles it. */
export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}
