/**
 * agents/index.ts — Barrel export for the stateful layer: the session pool
 * and the dispatcher that runs searches on its sessions.
 */

export { SessionPool } from './sessionPool';
export type { SessionPoolOptions } from './sessionPool';

export { FallbackStrategy, RequestDispatcher } from './requestDispatcher';
export type {
  DispatchPhase,
  ExecuteOptions,
  RequestDispatcherOptions,
} from './requestDispatcher';
