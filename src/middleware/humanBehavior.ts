/**
 * humanBehavior.ts — Idle mouse and scroll telemetry for freshly loaded
 * pages, driven by ghost-cursor.
 *
 * Hydration runs this once on the booking surface before the session's
 * cookies are captured.
 */

import { createCursor, type GhostCursor } from 'ghost-cursor';
import type { Page } from 'puppeteer';
import { Logger } from '../core/logger';

const logger = new Logger('HumanBehavior');

export function createHumanCursor(page: Page): GhostCursor {
  return createCursor(page);
}

/**
 * Scroll with variable-speed wheel increments: slow start, faster middle,
 * slow finish.
 */
export async function humanScroll(page: Page, distance: number): Promise<void> {
  const direction = distance > 0 ? 1 : -1;
  const total = Math.abs(distance);
  let remaining = total;

  while (remaining > 0) {
    const progress = 1 - remaining / total;
    const bellFactor = Math.sin(progress * Math.PI);
    const jitter = (Math.random() - 0.5) * 10;
    const delta = Math.min(remaining, Math.max(5, 20 + bellFactor * 80 + jitter));

    await page.mouse.wheel({ deltaY: delta * direction });
    remaining -= delta;
    await sleep(randomBetween(30, 80));
  }
}

/** A few cursor drifts, maybe a gentle scroll, then a reading pause. */
export async function randomIdle(page: Page, cursor: GhostCursor): Promise<void> {
  logger.debug('Simulating idle reading on the booking page…');

  const viewport = page.viewport();
  const width = viewport?.width ?? 1366;
  const height = viewport?.height ?? 768;

  const drifts = randomBetween(2, 4);
  for (let i = 0; i < drifts; i++) {
    await cursor.moveTo({
      x: randomBetween(100, width - 100),
      y: randomBetween(100, height - 100),
    });
    await sleep(randomBetween(200, 800));
  }

  if (Math.random() > 0.5) {
    await humanScroll(page, randomBetween(100, 400));
  }

  await sleep(randomBetween(500, 1500));
}

// ─── Utility functions ──────────────────────────────────────

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function randomBetween(min: number, max: number): number {
  return Math.floor(Math.random() * (max - min + 1)) + min;
}
