/**
 * Merge Engine
 *
 * Reconciles fetched records with the Local Store and advances freshness.
 * The series is committed before freshness, so a crash in between leaves
 * freshness behind the data and the next plan re-covers the range.
 *
 * When the upsert had to quarantine a corrupt series, freshness is left
 * cleared so the next plan downloads the whole retention window again.
 */

import { setupLogger } from "../lib/logger.js";
import type { LocalStore, RecordChange } from "../db/local-store.js";
import type { Clock, FreshnessState, MetricKind, MetricRecord } from "../types.js";
import { systemClock } from "../types.js";

const logger = setupLogger("merge-engine");

export interface MergeResult {
  kind: MetricKind;
  changedCount: number;
  changes: RecordChange[];
  /** null when the series was recovered from corruption and freshness stays cleared */
  freshness: FreshnessState | null;
  recovered: boolean;
}

export interface MergeOptions {
  /** First date of the planned range not fetched yet, when more chunks follow */
  resumeFrom?: string;
}

/**
 * Highest timestamp among the previous marker and the fetched records.
 */
export function advanceLastSeen(previous: string | null, records: MetricRecord[]): string | null {
  let latest = previous;
  for (const record of records) {
    if (latest === null || record.timestamp > latest) {
      latest = record.timestamp;
    }
  }
  return latest;
}

export class MergeEngine {
  private readonly store: LocalStore;
  private readonly clock: Clock;

  constructor(store: LocalStore, clock: Clock = systemClock) {
    this.store = store;
    this.clock = clock;
  }

  /**
   * Only called after a successful fetch; an empty batch still records the check.
   */
  async merge(kind: MetricKind, fetched: MetricRecord[], options: MergeOptions = {}): Promise<MergeResult> {
    const result = await this.store.upsert(kind, fetched);

    if (result.recovered) {
      logger.warn(`${kind}: series was recovered from corruption; the next sync downloads it again`);
      return { kind, changedCount: result.changed, changes: result.changes, freshness: null, recovered: true };
    }

    const previous = await this.store.freshness(kind);
    const freshness: FreshnessState = {
      lastSyncedAt: this.clock().toISOString(),
      lastRemoteTimestampSeen: advanceLastSeen(
        previous?.lastRemoteTimestampSeen ?? null,
        fetched.filter((r) => r.kind === kind)
      ),
      ...(options.resumeFrom !== undefined ? { resumeFrom: options.resumeFrom } : {}),
    };
    await this.store.setFreshness(kind, freshness);

    logger.debug(
      `${kind}: ${fetched.length} fetched, ${result.inserted} new, ${result.updated} replaced, last seen ${freshness.lastRemoteTimestampSeen ?? "none"}`
    );

    return { kind, changedCount: result.changed, changes: result.changes, freshness, recovered: false };
  }
}
