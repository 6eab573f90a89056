/**
 * middleware/index.ts — Barrel export for the request-level layer.
 */

// ── Fetch layer ─────────────────────────────────────────────
export { LightFetcher, buildCookieHeader, classifyResponse } from './lightFetcher';
export type { LightFetcherOptions } from './lightFetcher';

// ── Fingerprint ─────────────────────────────────────────────
export { applyFingerprint } from './fingerprintNoise';

// ── Human behaviour ─────────────────────────────────────────
export { createHumanCursor, humanScroll, randomIdle } from './humanBehavior';
