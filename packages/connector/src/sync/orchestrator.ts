/**
 * Sync Coordinator
 *
 * One invocation: for each metric kind, plan -> fetch -> merge.
 * Runs kinds sequentially (one remote call in flight at a time).
 *
 * - Single-flight: a second invocation while one runs is rejected with
 *   SyncInProgressError, both in-process and across processes (sync.lock)
 * - A fetch failure is reported for its kind only; other kinds still run
 * - Nothing is retried here; the next scheduled invocation is the retry
 * - A planned range is fetched in chunks of `fetchChunkDays`, oldest first,
 *   and each chunk is merged before the next is requested. The fetch timeout
 *   applies per chunk. A failed chunk leaves `resumeFrom` in freshness so the
 *   next invocation continues where this one stopped.
 */

import { setupLogger } from "../lib/logger.js";
import { isWakingHour, type SyncConfig } from "../lib/config.js";
import { FetchTimeoutError, SyncInProgressError, toFetchError } from "../lib/errors.js";
import { addDays, splitRange } from "../lib/dates.js";
import { acquireFileLock, DEFAULT_STALE_LOCK_MS, type FileLock } from "../lib/file-lock.js";
import type { LocalStore, RecordChange } from "../db/local-store.js";
import { SyncPlanner } from "./planner.js";
import { MergeEngine } from "./merge.js";
import {
  METRIC_KINDS,
  systemClock,
  type Clock,
  type DateRange,
  type KindOutcome,
  type MetricKind,
  type MetricRecord,
  type RemoteMetricSource,
  type SyncResult,
  type SyncState,
} from "../types.js";

const logger = setupLogger("sync-orchestrator");

// Types
export interface SyncCoordinatorOptions {
  store: LocalStore;
  source: RemoteMetricSource;
  sync: Readonly<SyncConfig>;
  clock?: Clock;
  staleLockMs?: number;
}

export interface SyncOptions {
  /** Restrict the run to these kinds (still in the fixed order) */
  kinds?: MetricKind[];
}

/**
 * Whether a batch of steps changes crosses the notification threshold.
 * A day with no previous record counts as a change from 0.
 */
export function isMaterialStepsChange(changes: RecordChange[], thresholdSteps: number): boolean {
  return changes.some(({ previous, current }) => {
    if (current.kind !== "steps") return false;
    const before = previous !== null && previous.kind === "steps" ? previous.payload.totalSteps : 0;
    return Math.abs(current.payload.totalSteps - before) > thresholdSteps;
  });
}

export class SyncCoordinator {
  private readonly store: LocalStore;
  private readonly source: RemoteMetricSource;
  private readonly sync: Readonly<SyncConfig>;
  private readonly clock: Clock;
  private readonly staleLockMs: number;
  private readonly planner: SyncPlanner;
  private readonly mergeEngine: MergeEngine;

  private state: SyncState = "idle";
  private running = false;

  constructor(options: SyncCoordinatorOptions) {
    this.store = options.store;
    this.source = options.source;
    this.sync = options.sync;
    this.clock = options.clock ?? systemClock;
    this.staleLockMs = options.staleLockMs ?? DEFAULT_STALE_LOCK_MS;
    this.planner = new SyncPlanner(this.store, this.sync, this.clock);
    this.mergeEngine = new MergeEngine(this.store, this.clock);
  }

  getState(): SyncState {
    return this.state;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run one sync invocation.
   *
   * @throws SyncInProgressError when another sync holds the gate; the store is not touched
   */
  async run(options: SyncOptions = {}): Promise<SyncResult> {
    if (this.running) {
      throw new SyncInProgressError();
    }
    this.running = true;

    let lock: FileLock | null = null;
    try {
      lock = await acquireFileLock(this.store.lockPath, {
        staleAfterMs: this.staleLockMs,
        now: this.clock(),
      });
      if (lock === null) {
        throw new SyncInProgressError(`Another process holds ${this.store.lockPath}`);
      }
      return await this.runLocked(options);
    } catch (error) {
      if (!(error instanceof SyncInProgressError)) {
        this.transition("failed");
      }
      throw error;
    } finally {
      if (lock !== null) {
        await lock.release();
      }
      this.running = false;
    }
  }

  private async runLocked(options: SyncOptions): Promise<SyncResult> {
    const startedAt = this.clock();
    const requested: readonly MetricKind[] = options.kinds ?? METRIC_KINDS;
    const kinds = METRIC_KINDS.filter((kind) => requested.includes(kind));

    logger.info(`Starting sync (${kinds.join(", ")})`);

    const waking = isWakingHour(this.sync, startedAt.getHours());
    if (!waking) {
      logger.info("Outside waking hours: changes will not be flagged for notification");
    }

    const outcomes: Partial<Record<MetricKind, KindOutcome>> = {};
    const changedKinds: MetricKind[] = [];
    const notificationWorthyKinds: MetricKind[] = [];
    let attempted = 0;
    let failed = 0;

    for (const kind of kinds) {
      const outcome = await this.syncKind(kind, waking);
      outcomes[kind] = outcome;

      if (outcome.status !== "skipped") attempted++;
      if (outcome.status === "failed") failed++;
      if (outcome.status === "changed") {
        changedKinds.push(kind);
        if (outcome.notificationWorthy) {
          notificationWorthyKinds.push(kind);
        }
      }
    }

    const allFailed = attempted > 0 && failed === attempted;
    this.transition(allFailed ? "failed" : "done");

    const result: SyncResult = {
      startedAt: startedAt.toISOString(),
      finishedAt: this.clock().toISOString(),
      state: allFailed ? "failed" : "done",
      kinds: outcomes,
      changedKinds,
      notificationWorthyKinds,
      freshness: await this.store.allFreshness(),
    };
    await this.store.writeLastSync(result);

    const elapsedMs = Date.parse(result.finishedAt) - startedAt.getTime();
    logger.info(
      `Sync ${result.state} in ${(elapsedMs / 1000).toFixed(2)}s: ${changedKinds.length} changed, ${failed} failed`
    );
    return result;
  }

  private async syncKind(kind: MetricKind, waking: boolean): Promise<KindOutcome> {
    this.transition("planning", kind);
    const plan = await this.planner.plan(kind);
    if (plan.action === "skip") {
      return { status: "skipped", reason: plan.reason };
    }

    const chunks = splitRange(plan.range, this.sync.fetchChunkDays);
    const changes: RecordChange[] = [];
    let fetchedCount = 0;

    for (const [index, chunk] of chunks.entries()) {
      this.transition("fetching", kind);
      let fetched: MetricRecord[];
      try {
        fetched = await this.fetchWithTimeout(kind, chunk);
      } catch (error) {
        const failure = toFetchError(error);
        logger.warn(`${kind}: fetch of ${chunk.start}..${chunk.end} failed (${failure.kind}): ${failure.message}`);
        return {
          status: "failed",
          error: { kind: failure.kind, message: failure.message, retriable: failure.retriable },
        };
      }

      this.transition("merging", kind);
      const last = index === chunks.length - 1;
      try {
        const merged = await this.mergeEngine.merge(
          kind,
          fetched,
          last ? {} : { resumeFrom: addDays(chunk.end, 1) }
        );
        fetchedCount += fetched.length;
        changes.push(...merged.changes);
        if (merged.recovered) {
          break;
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`${kind}: merge failed: ${message}`);
        return { status: "failed", error: { kind: "store", message, retriable: true } };
      }
    }

    logger.info(`${kind}: ${fetchedCount} fetched, ${changes.length} changed`);
    if (changes.length === 0) {
      return { status: "unchanged", range: plan.range, fetched: fetchedCount };
    }
    return {
      status: "changed",
      range: plan.range,
      fetched: fetchedCount,
      changedCount: changes.length,
      notificationWorthy: waking && this.isNotificationWorthy(kind, changes),
    };
  }

  private isNotificationWorthy(kind: MetricKind, changes: RecordChange[]): boolean {
    if (kind === "steps") {
      return isMaterialStepsChange(changes, this.sync.changeThresholdSteps);
    }
    return changes.length > 0;
  }

  private async fetchWithTimeout(kind: MetricKind, range: DateRange): Promise<MetricRecord[]> {
    const timeoutMs = this.sync.fetchTimeoutSeconds * 1000;
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new FetchTimeoutError(timeoutMs);
        reject(error);
        controller.abort(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.source.fetch(kind, range.start, range.end, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private transition(next: SyncState, kind?: MetricKind): void {
    logger.debug(`${this.state} -> ${next}${kind ? ` (${kind})` : ""}`);
    this.state = next;
  }
}
