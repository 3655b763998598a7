/**
 * @health-metrics/connector
 *
 * Incremental local cache of health metrics synced from a remote tracking service.
 * Local store, sync planner, merge engine, sync coordinator, analytics and status.
 */

// Re-export the remote source as a namespace to keep its helpers out of the root
export * as garminConnect from "./services/garmin-connect/index.js";

export * from "./types.js";

// Re-export lib utilities
export * from "./lib/logger.js";
export * from "./lib/errors.js";
export * from "./lib/config.js";
export * from "./lib/dates.js";
export { acquireFileLock, DEFAULT_STALE_LOCK_MS } from "./lib/file-lock.js";
export type { AcquireLockOptions, FileLock } from "./lib/file-lock.js";

// Store and sync
export * from "./db/local-store.js";
export * from "./sync/planner.js";
export * from "./sync/merge.js";
export * from "./sync/orchestrator.js";

// Analytics and status
export * from "./analytics/analytics.js";
export * from "./analytics/goals.js";
export * from "./status/status.js";
