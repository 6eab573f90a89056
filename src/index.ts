/**
 * index.ts — Entry point: load configuration, wire the layers together and
 * serve HTTP until SIGINT/SIGTERM.
 *
 *   BrowserManager ─┐
 *                   ├─► SessionPool ─┐
 *   LightFetcher ───┼────────────────┼─► RequestDispatcher ─► AwardComparer ─► server
 *                   └────────────────┘
 */

import 'dotenv/config';
import { AwardComparer } from './awardComparer';
import { RequestDispatcher, SessionPool } from './agents';
import { BrowserManager } from './core/browserManager';
import { describeError } from './core/errors';
import { Logger } from './core/logger';
import { loadAppConfig } from './core/types';
import { LightFetcher } from './middleware';
import { createServer } from './server';

const logger = new Logger('Main');

function main(): void {
  const config = loadAppConfig();

  const browser = new BrowserManager(config.browser);
  const pool = new SessionPool({ browser, config: config.pool });
  const fetcher = new LightFetcher({
    timeoutMs: config.fastPathTimeoutMs,
    rateLimitMs: config.rateLimitMs,
  });
  const dispatcher = new RequestDispatcher({
    pool,
    syntheticClient: fetcher,
    browser,
    deadlineMs: config.requestDeadlineMs,
  });
  const comparer = new AwardComparer(dispatcher);

  // Warm in the background; /health reports readiness meanwhile.
  pool.start().catch((err: unknown) => {
    logger.error(`Session pool failed to start: ${describeError(err)}`, err);
  });

  const server = createServer({ comparer, pool }).listen(config.port, () => {
    logger.info(`Listening on port ${config.port}`);
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received — shutting down…`);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await pool.close();
    await fetcher.stop();
    await browser.shutdown();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error(`Shutdown failed: ${describeError(err)}`, err);
          process.exit(1);
        });
    });
  }
}

main();
