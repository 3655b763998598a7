/**
 * Sync Planner
 *
 * Decides, per metric kind, the date range to request from the remote.
 *
 * - No freshness (or an unreadable series): bootstrap over the kind's retention window
 * - A download that stopped part way: [resumeFrom, today]
 * - Otherwise: [lastRemoteTimestampSeen - safetyOverlapDays, today]
 * - Skip when the kind was synced less than intervalMinutes ago (never during bootstrap)
 */

import { setupLogger } from "../lib/logger.js";
import { addDays, datePart, formatDate, minutesSince } from "../lib/dates.js";
import type { SyncConfig } from "../lib/config.js";
import type { LocalStore } from "../db/local-store.js";
import type { Clock, FreshnessState, MetricKind, SyncPlan } from "../types.js";
import { systemClock } from "../types.js";

const logger = setupLogger("sync-planner");

/**
 * Pure planning rule, exposed for tests.
 */
export function planSync(
  kind: MetricKind,
  freshness: FreshnessState | null,
  sync: Readonly<SyncConfig>,
  now: Date
): SyncPlan {
  const today = formatDate(now);
  const retentionStart = addDays(today, -(sync.bootstrapDays[kind] - 1));

  if (freshness === null) {
    return { kind, action: "fetch", range: { start: retentionStart, end: today }, bootstrap: true };
  }

  const age = minutesSince(freshness.lastSyncedAt, now);
  // A future lastSyncedAt (clock moved back) does not hold the kind off
  if (age >= 0 && age < sync.intervalMinutes) {
    return {
      kind,
      action: "skip",
      reason: `synced ${age}m ago (interval ${sync.intervalMinutes}m)`,
    };
  }

  if (freshness.resumeFrom !== undefined) {
    const resumeFrom = freshness.resumeFrom < retentionStart ? retentionStart : freshness.resumeFrom;
    const start = resumeFrom > today ? today : resumeFrom;
    return { kind, action: "fetch", range: { start, end: today }, bootstrap: false };
  }

  if (freshness.lastRemoteTimestampSeen === null) {
    // Checked before, but the remote never returned data: look over the whole window again
    return { kind, action: "fetch", range: { start: retentionStart, end: today }, bootstrap: false };
  }

  const overlapStart = addDays(datePart(freshness.lastRemoteTimestampSeen), -sync.safetyOverlapDays);
  const start = overlapStart > today ? today : overlapStart;
  return { kind, action: "fetch", range: { start, end: today }, bootstrap: false };
}

export class SyncPlanner {
  private readonly store: LocalStore;
  private readonly sync: Readonly<SyncConfig>;
  private readonly clock: Clock;

  constructor(store: LocalStore, sync: Readonly<SyncConfig>, clock: Clock = systemClock) {
    this.store = store;
    this.sync = sync;
    this.clock = clock;
  }

  async plan(kind: MetricKind): Promise<SyncPlan> {
    // A corrupt series drops the kind's freshness, so it is planned as a bootstrap
    await this.store.verify(kind);
    const freshness = await this.store.freshness(kind);
    const plan = planSync(kind, freshness, this.sync, this.clock());

    if (plan.action === "skip") {
      logger.debug(`${kind}: skip (${plan.reason})`);
    } else {
      logger.debug(
        `${kind}: fetch ${plan.range.start} to ${plan.range.end}${plan.bootstrap ? " (bootstrap)" : ""}`
      );
    }
    return plan;
  }
}
