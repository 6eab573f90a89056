/**
 * sessionPool.ts — Arena of warmed, fingerprint-consistent upstream sessions.
 *
 * LIFECYCLE
 * ─────────
 *   hydrate ──► ready ──lease──► busy ──release(ok|timeout)──► ready
 *                                   └─release(rejected|crashed)
 *                                     or usage ≥ rotation threshold ──► degraded ──► retired
 *
 * Slots are indexed by a monotonically increasing id. A degraded slot is
 * never repaired in place: its replacement hydrates into a fresh slot, and
 * the old one is retired (browser session closed) once that settles. Other
 * ready slots keep serving leases meanwhile.
 *
 * Lease, release and mergeCookies are the only places a slot changes. None
 * of them awaits between reading and writing slot state, so a slot cannot
 * be handed out twice while busy.
 */

import { Logger } from '../core/logger';
import { describeError, HydrationFailed, PoolExhausted } from '../core/errors';
import { pickFingerprint } from '../core/hardwareProfiles';
import { BOOKING_URL } from '../services/itineraryContract';
import type {
  BrowserProvider,
  BrowserSession,
  FingerprintDescriptor,
  PoolConfig,
  PoolStats,
  ReleaseOutcome,
  SessionHandle,
  SessionState,
  StoredCookie,
} from '../core/types';

const logger = new Logger('SessionPool');

interface Slot extends SessionHandle {
  state: SessionState;
  usageCount: number;
  cookies: StoredCookie[];
  /** Set by the browser's disconnect signal; the slot degrades on its next release. */
  crashed: boolean;
  unsubscribe: () => void;
}

interface Waiter {
  resolve: (handle: SessionHandle) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export interface SessionPoolOptions {
  browser: BrowserProvider;
  config: PoolConfig;
  /** Page navigated during hydration. Defaults to the booking surface. */
  warmupUrl?: string;
  pickFingerprint?: () => FingerprintDescriptor;
}

export class SessionPool {
  private readonly browser: BrowserProvider;
  private readonly config: PoolConfig;
  private readonly warmupUrl: string;
  private readonly nextFingerprint: () => FingerprintDescriptor;

  private readonly slots = new Map<number, Slot>();
  private readonly waiters: Waiter[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private nextSlotId = 1;
  /** Hydrations in progress, retries and backoff included. */
  private hydrating = 0;
  private closed = false;

  constructor(options: SessionPoolOptions) {
    this.browser = options.browser;
    this.config = options.config;
    this.warmupUrl = options.warmupUrl ?? BOOKING_URL;
    this.nextFingerprint = options.pickFingerprint ?? (() => pickFingerprint());
  }

  // ── Public API ─────────────────────────────────────────

  /** Hydrate up to capacity. Resolves once every initial hydration has settled. */
  async start(): Promise<void> {
    logger.info(`Warming ${this.config.capacity} session(s)…`);
    this.ensureCapacity();
    await Promise.all([...this.inflight]);

    const { ready } = this.stats();
    if (ready === 0) {
      logger.warn('No session could be warmed at startup — leases will retry hydration');
    } else {
      logger.info(`Pool ready with ${ready}/${this.config.capacity} session(s)`);
    }
  }

  /**
   * One hydration attempt: open a browser session with a fresh fingerprint,
   * load the booking surface, capture its cookies and admit the slot as
   * ready. The slot goes straight to the oldest queued caller, if any.
   */
  async hydrate(): Promise<SessionHandle> {
    this.hydrating++;
    try {
      return await this.hydrateOnce();
    } finally {
      this.hydrating--;
    }
  }

  /**
   * Borrow a ready session. Callers queue FIFO when none is ready; a
   * queued caller rejects with PoolExhausted after `leaseTimeoutMs`.
   */
  lease(): Promise<SessionHandle> {
    if (this.closed) {
      return Promise.reject(new PoolExhausted('Session pool is closed'));
    }

    if (this.waiters.length === 0) {
      const slot = this.firstReady();
      if (slot) {
        const handle = this.checkout(slot);
        this.ensureCapacity();
        return Promise.resolve(handle);
      }
    }

    return new Promise<SessionHandle>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.removeWaiter(waiter);
          reject(
            new PoolExhausted(
              `No session became available within ${this.config.leaseTimeoutMs} ms`,
            ),
          );
        }, this.config.leaseTimeoutMs),
      };
      this.waiters.push(waiter);
      logger.debug(`Lease queued (${this.waiters.length} waiting)`);
      this.ensureCapacity();
    });
  }

  /**
   * Return a leased session. Throws if the handle is not currently leased.
   * Leases and releases both top the pool back up to capacity.
   */
  release(handle: SessionHandle, outcome: ReleaseOutcome): void {
    if (this.closed) {
      logger.debug(`Session #${handle.id} released after shutdown — ignoring`);
      return;
    }

    const slot = this.leasedSlot(handle, 'release');
    slot.usageCount++;

    if (outcome === 'rejected' || outcome === 'crashed' || slot.crashed) {
      this.degrade(slot, slot.crashed ? 'browser crashed' : `released as ${outcome}`);
      return;
    }

    if (slot.usageCount >= this.config.rotationThreshold) {
      this.degrade(slot, `rotation after ${slot.usageCount} uses`);
      return;
    }

    slot.state = 'ready';
    this.dispatch();
    this.ensureCapacity();
  }

  /**
   * Fold cookies refreshed by the browser fallback into a leased session's
   * jar. Upserts by (name, domain, path), keeps the jar's order and drops
   * anything already expired.
   */
  mergeCookies(handle: SessionHandle, incoming: readonly StoredCookie[]): void {
    const slot = this.leasedSlot(handle, 'mergeCookies');
    const nowSeconds = Date.now() / 1000;
    const isExpired = (c: StoredCookie) =>
      c.expires !== undefined && c.expires > 0 && c.expires < nowSeconds;
    const keyOf = (c: StoredCookie) => `${c.name}\u0000${c.domain}\u0000${c.path}`;

    const merged = new Map<string, StoredCookie>();
    for (const cookie of slot.cookies) merged.set(keyOf(cookie), cookie);
    for (const cookie of incoming) merged.set(keyOf(cookie), { ...cookie });

    const jar = [...merged.values()].filter((c) => !isExpired(c));
    logger.debug(
      `Session #${slot.id} cookie jar: ${slot.cookies.length} → ${jar.length} ` +
        `(${incoming.length} refreshed)`,
    );
    slot.cookies = jar;
  }

  /** At least one session is ready or being warmed. */
  isReady(): boolean {
    if (this.closed) return false;
    return this.hydrating > 0 || this.firstReady() !== undefined;
  }

  stats(): PoolStats {
    const stats: PoolStats = {
      capacity: this.config.capacity,
      warming: this.hydrating,
      ready: 0,
      busy: 0,
      degraded: 0,
      waiting: this.waiters.length,
    };
    for (const slot of this.slots.values()) {
      if (slot.state === 'ready') stats.ready++;
      else if (slot.state === 'busy') stats.busy++;
      else if (slot.state === 'degraded') stats.degraded++;
    }
    return stats;
  }

  /** Reject queued callers, retire every session and wait for pending hydrations. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    logger.info('Closing session pool…');

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new PoolExhausted('Session pool is closed'));
    }

    await Promise.all([...this.slots.values()].map((slot) => this.retire(slot)));
    await Promise.all([...this.inflight]);
  }

  // ── Hydration ──────────────────────────────────────────

  private async hydrateOnce(): Promise<Slot> {
    const id = this.nextSlotId++;
    const fingerprint = this.nextFingerprint();
    logger.info(
      `Hydrating session #${id} (${fingerprint.hardware.platform}, ` +
        `${fingerprint.viewport.width}x${fingerprint.viewport.height}, ${fingerprint.locale})…`,
    );

    const { browserSession, cookies } = await this.openBrowserSession(id, fingerprint);

    if (this.closed) {
      await this.closeQuietly(browserSession);
      throw new HydrationFailed(`Session #${id} finished hydrating after shutdown`);
    }

    const slot: Slot = {
      id,
      state: 'ready',
      usageCount: 0,
      cookies,
      fingerprint,
      browserSession,
      createdAt: Date.now(),
      crashed: false,
      unsubscribe: () => {},
    };
    slot.unsubscribe = this.browser.onDisconnect(browserSession, (reason) =>
      this.onDisconnect(slot, reason),
    );
    this.slots.set(id, slot);

    logger.info(`Session #${id} ready with ${cookies.length} cookie(s)`);
    this.dispatch();
    return slot;
  }

  private async openBrowserSession(
    id: number,
    fingerprint: FingerprintDescriptor,
  ): Promise<{ browserSession: BrowserSession; cookies: StoredCookie[] }> {
    let browserSession: BrowserSession | undefined;
    try {
      browserSession = await this.browser.navigate(this.warmupUrl, fingerprint);
      const cookies = await this.browser.readCookies(browserSession);
      return { browserSession, cookies };
    } catch (err) {
      if (browserSession) await this.closeQuietly(browserSession);
      throw new HydrationFailed(`Session #${id} could not be hydrated: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  private async hydrateWithRetry(): Promise<void> {
    const { hydrationRetries, hydrationBackoffMs } = this.config;

    for (let attempt = 1; ; attempt++) {
      try {
        await this.hydrateOnce();
        return;
      } catch (err) {
        if (attempt >= hydrationRetries || this.closed) throw err;

        const delay = hydrationBackoffMs * 2 ** (attempt - 1);
        logger.warn(
          `Hydration attempt ${attempt}/${hydrationRetries} failed (${describeError(err)}) — ` +
            `retrying in ${delay} ms`,
        );
        await sleep(delay);
        if (this.closed) throw err;
      }
    }
  }

  /**
   * Start a background hydration. `afterSettled` runs whether it succeeded
   * or not (used to retire the slot being replaced).
   */
  private spawnHydration(afterSettled?: () => Promise<void>): void {
    this.hydrating++;

    const task = (async () => {
      let failure: unknown;
      try {
        await this.hydrateWithRetry();
      } catch (err) {
        failure = err;
      } finally {
        this.hydrating--;
      }

      if (failure !== undefined) this.onHydrationExhausted(failure);
      if (afterSettled) await afterSettled();
    })();

    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
  }

  private onHydrationExhausted(err: unknown): void {
    logger.error(`Hydration gave up: ${describeError(err)}`);
    if (this.closed) return;

    const { ready, busy } = this.stats();
    if (ready + busy + this.hydrating > 0) return;

    // Nothing live and nothing warming: no queued caller can ever be served.
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new PoolExhausted('No upstream session could be established', { cause: err }));
    }
  }

  private ensureCapacity(): void {
    if (this.closed) return;

    const { ready, busy } = this.stats();
    const live = ready + busy + this.hydrating;
    for (let i = live; i < this.config.capacity; i++) {
      this.spawnHydration();
    }
  }

  // ── State transitions ──────────────────────────────────

  private checkout(slot: Slot): SessionHandle {
    slot.state = 'busy';
    logger.debug(`Session #${slot.id} leased (use ${slot.usageCount + 1})`);
    return slot;
  }

  /** Hand ready slots to queued callers, oldest first. */
  private dispatch(): void {
    while (this.waiters.length > 0) {
      const slot = this.firstReady();
      if (!slot) return;

      const waiter = this.waiters.shift();
      if (!waiter) return;
      clearTimeout(waiter.timer);
      waiter.resolve(this.checkout(slot));
    }
  }

  private degrade(slot: Slot, reason: string): void {
    slot.state = 'degraded';
    slot.unsubscribe();
    logger.warn(`Session #${slot.id} degraded (${reason}) — scheduling replacement`);

    if (this.closed) {
      void this.retire(slot);
      return;
    }
    this.spawnHydration(() => this.retire(slot));
  }

  private async retire(slot: Slot): Promise<void> {
    if (slot.state === 'retired') return;
    slot.state = 'retired';
    slot.unsubscribe();
    this.slots.delete(slot.id);
    await this.closeQuietly(slot.browserSession);
    logger.info(`Session #${slot.id} retired after ${slot.usageCount} use(s)`);
  }

  private onDisconnect(slot: Slot, reason: string): void {
    if (slot.state === 'degraded' || slot.state === 'retired') return;

    slot.crashed = true;
    logger.warn(`Session #${slot.id} lost its browser page (${reason})`);
    if (slot.state === 'ready') {
      this.degrade(slot, 'browser crashed');
    }
  }

  // ── Helpers ────────────────────────────────────────────

  private firstReady(): Slot | undefined {
    for (const slot of this.slots.values()) {
      if (slot.state === 'ready') return slot;
    }
    return undefined;
  }

  private leasedSlot(handle: SessionHandle, operation: string): Slot {
    const slot = this.slots.get(handle.id);
    if (!slot || slot !== handle || slot.state !== 'busy') {
      throw new Error(`${operation}: session #${handle.id} is not currently leased`);
    }
    return slot;
  }

  private removeWaiter(waiter: Waiter): void {
    const idx = this.waiters.indexOf(waiter);
    if (idx !== -1) this.waiters.splice(idx, 1);
  }

  private async closeQuietly(session: BrowserSession): Promise<void> {
    try {
      await this.browser.close(session);
    } catch (err) {
      logger.warn(`Closing browser session ${session.id} failed: ${describeError(err)}`);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
