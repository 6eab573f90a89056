/**
 * browserManager.ts — Puppeteer implementation of the BrowserProvider
 * contract used by the session pool and the dispatcher's fallback path.
 *
 * One Chromium process is shared; each pooled session gets its own
 * incognito BrowserContext with one page, so cookies and fingerprints never
 * leak between sessions. The page stays open for the session's lifetime:
 * the fallback path runs its fetch inside it, and its crash/close events
 * feed the pool's disconnect signal.
 */

import { randomUUID } from 'node:crypto';
import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, BrowserContext, Page } from 'puppeteer';
import { applyFingerprint } from '../middleware/fingerprintNoise';
import { createHumanCursor, randomIdle } from '../middleware/humanBehavior';
import { describeError } from './errors';
import { Logger } from './logger';
import type {
  AppConfig,
  BrowserProvider,
  BrowserSession,
  CredentialsMode,
  FingerprintDescriptor,
  InPageRequest,
  InPageResponse,
  StoredCookie,
} from './types';

const logger = new Logger('BrowserManager');

// Plugins must be registered before the first launch().
puppeteer.use(StealthPlugin());

interface LivePage {
  context: BrowserContext;
  page: Page;
}

type InPageResult = InPageResponse | { error: string };

export class BrowserManager implements BrowserProvider {
  private browser: Browser | null = null;
  private launching: Promise<Browser> | null = null;
  private readonly pages = new Map<string, LivePage>();
  private readonly config: AppConfig['browser'];

  constructor(config: AppConfig['browser']) {
    this.config = config;
  }

  // ── BrowserProvider ────────────────────────────────────

  async navigate(url: string, fingerprint: FingerprintDescriptor): Promise<BrowserSession> {
    const browser = await this.ensureBrowser();
    const context = await browser.createBrowserContext();

    try {
      const page = await context.newPage();
      await applyFingerprint(page, fingerprint);

      const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: 45_000 });
      const status = response?.status() ?? 0;
      if (status >= 400) {
        throw new Error(`booking page answered HTTP ${status}`);
      }
      await page.waitForSelector('h1', { timeout: 30_000 });

      try {
        await randomIdle(page, createHumanCursor(page));
      } catch (err) {
        logger.warn(`Idle simulation failed: ${describeError(err)}`);
      }

      const session: BrowserSession = { id: randomUUID() };
      this.pages.set(session.id, { context, page });
      logger.info(`Browser session ${session.id.slice(0, 8)} loaded ${url} (HTTP ${status})`);
      return session;
    } catch (err) {
      await context.close().catch((closeErr: unknown) =>
        logger.warn(`Closing failed context: ${describeError(closeErr)}`),
      );
      throw err;
    }
  }

  async executeInPage(
    session: BrowserSession,
    request: InPageRequest,
    credentials: CredentialsMode,
  ): Promise<InPageResponse> {
    const { page } = this.livePage(session);

    const result: InPageResult = await page.evaluate(
      async (args: { request: InPageRequest; credentials: CredentialsMode }) => {
        try {
          const res = await fetch(args.request.url, {
            method: args.request.method,
            credentials: args.credentials,
            headers: args.request.headers,
            body: args.request.body,
          });
          return { status: res.status, body: await res.text() };
        } catch (error) {
          return { error: String(error) };
        }
      },
      { request, credentials },
    );

    if ('error' in result) {
      throw new Error(`in-page fetch failed: ${result.error}`);
    }
    return result;
  }

  async readCookies(session: BrowserSession): Promise<StoredCookie[]> {
    const { page } = this.livePage(session);
    const cookies = await page.cookies();
    return cookies.map((c) => ({
      name: c.name,
      value: c.value,
      domain: c.domain,
      path: c.path,
      expires: c.expires,
    }));
  }

  onDisconnect(session: BrowserSession, listener: (reason: string) => void): () => void {
    const { page } = this.livePage(session);
    const browser = this.browser;
    let fired = false;

    const fire = (reason: string) => {
      if (fired) return;
      fired = true;
      unsubscribe();
      listener(reason);
    };
    const onPageError = (err: Error) => fire(`page crashed: ${err.message}`);
    const onClose = () => fire('page closed');
    const onBrowserGone = () => fire('browser disconnected');
    const unsubscribe = () => {
      page.off('error', onPageError);
      page.off('close', onClose);
      browser?.off('disconnected', onBrowserGone);
    };

    page.on('error', onPageError);
    page.on('close', onClose);
    browser?.on('disconnected', onBrowserGone);
    return unsubscribe;
  }

  async close(session: BrowserSession): Promise<void> {
    const live = this.pages.get(session.id);
    if (!live) return;
    this.pages.delete(session.id);
    await live.context.close();
  }

  // ── Lifecycle ──────────────────────────────────────────

  /** Close every context and the browser process. */
  async shutdown(): Promise<void> {
    this.pages.clear();
    if (this.browser) {
      const browser = this.browser;
      this.browser = null;
      await browser.close();
    }
  }

  // ── Internals ──────────────────────────────────────────

  private livePage(session: BrowserSession): LivePage {
    const live = this.pages.get(session.id);
    if (!live || live.page.isClosed()) {
      throw new Error(`Browser session ${session.id} is no longer open`);
    }
    return live;
  }

  private async ensureBrowser(): Promise<Browser> {
    if (this.browser?.connected) return this.browser;

    // Concurrent hydrations share one launch.
    if (!this.launching) {
      this.launching = puppeteer
        .launch({
          headless: this.config.headless,
          executablePath: this.config.executablePath,
          args: ['--no-sandbox', '--disable-setuid-sandbox', '--disable-dev-shm-usage'],
        })
        .then((browser) => {
          logger.info('Chromium launched');
          this.browser = browser;
          return browser;
        })
        .finally(() => {
          this.launching = null;
        });
    }
    return this.launching;
  }
}
