/**
 * Local Store
 *
 * Durable per-kind record sets plus one freshness file under the data dir:
 *
 *   <dataDir>/series/<kind>.json   { version, kind, records }
 *   <dataDir>/freshness.json       { version, kinds: { <kind>: FreshnessState } }
 *   <dataDir>/last-sync.json       latest SyncResult
 *
 * Each write replaces the whole file atomically. Writes to one kind are
 * serialized in-process; reads never wait on writes (they see the previous
 * or the next committed file). Unparsable files are quarantined and read
 * as empty; a corrupt series also drops the kind's freshness so the next
 * plan bootstraps it.
 */

import { join } from "node:path";
import { setupLogger } from "../lib/logger.js";
import { StoreCorruptError } from "../lib/errors.js";
import { datePart } from "../lib/dates.js";
import { quarantineFile, readJsonFile, writeJsonAtomic, isNotFound } from "../lib/json-file.js";
import {
  SERIES_FILE_VERSION,
  freshnessFileSchema,
  seriesFileSchema,
  syncResultSchema,
} from "./schemas.js";
import type {
  Clock,
  DateRange,
  FreshnessState,
  MetricKind,
  MetricRecord,
  SyncResult,
} from "../types.js";
import { systemClock } from "../types.js";

const logger = setupLogger("local-store");

// Types
export interface RecordChange {
  previous: MetricRecord | null;
  current: MetricRecord;
}

export interface UpsertResult {
  kind: MetricKind;
  inserted: number;
  updated: number;
  /** inserted + updated */
  changed: number;
  changes: RecordChange[];
  /** The stored series was corrupt and has been quarantined; freshness for the kind was cleared */
  recovered: boolean;
}

export type FreshnessMap = Partial<Record<MetricKind, FreshnessState>>;

export interface LocalStoreOptions {
  dataDir: string;
  clock?: Clock;
}

interface RecoveredSeries {
  records: MetricRecord[];
  recovered: boolean;
}

type SeriesLoad =
  | { status: "ok"; records: MetricRecord[] }
  | { status: "corrupt"; error: StoreCorruptError };

type FreshnessLoad =
  | { status: "ok"; kinds: FreshnessMap }
  | { status: "corrupt"; error: StoreCorruptError };

const FRESHNESS_LOCK = "__freshness__";

export function byTimestamp(a: MetricRecord, b: MetricRecord): number {
  return a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0;
}

export function inRange(record: MetricRecord, range: DateRange): boolean {
  const date = datePart(record.timestamp);
  return range.start <= date && date <= range.end;
}

export class LocalStore {
  readonly dataDir: string;
  private readonly clock: Clock;
  private readonly queues = new Map<string, Promise<unknown>>();

  constructor(options: LocalStoreOptions) {
    this.dataDir = options.dataDir;
    this.clock = options.clock ?? systemClock;
  }

  seriesPath(kind: MetricKind): string {
    return join(this.dataDir, "series", `${kind}.json`);
  }

  get freshnessPath(): string {
    return join(this.dataDir, "freshness.json");
  }

  get lastSyncPath(): string {
    return join(this.dataDir, "last-sync.json");
  }

  get lockPath(): string {
    return join(this.dataDir, "sync.lock");
  }

  // ===========================================================================
  // Series
  // ===========================================================================

  /**
   * Records of one kind, ordered by timestamp, optionally limited to an
   * inclusive date range. Never throws on corrupt data.
   */
  async read(kind: MetricKind, range?: DateRange): Promise<MetricRecord[]> {
    const load = await this.loadSeries(kind);
    const records =
      load.status === "ok"
        ? load.records
        : (await this.withLock(kind, () => this.loadOrRecover(kind))).records;

    return range ? records.filter((r) => inRange(r, range)) : records;
  }

  /**
   * Check that the kind's series is readable, quarantining it (and clearing
   * its freshness) when it is not.
   *
   * @returns false when the series had to be recovered
   */
  async verify(kind: MetricKind): Promise<boolean> {
    const load = await this.loadSeries(kind);
    if (load.status === "ok") {
      return true;
    }
    const { recovered } = await this.withLock(kind, () => this.loadOrRecover(kind));
    return !recovered;
  }

  /**
   * Insert or replace records by timestamp. A record whose sourceRevision
   * matches the stored one is left untouched.
   */
  async upsert(kind: MetricKind, records: MetricRecord[]): Promise<UpsertResult> {
    return this.withLock(kind, async () => {
      const { records: existing, recovered } = await this.loadOrRecover(kind);
      const byKey = new Map<string, MetricRecord>(existing.map((r) => [r.timestamp, r]));

      const changes: RecordChange[] = [];
      let inserted = 0;
      let updated = 0;

      for (const record of records) {
        if (record.kind !== kind) {
          logger.warn(`Ignoring ${record.kind} record passed to ${kind} series (${record.timestamp})`);
          continue;
        }

        const previous = byKey.get(record.timestamp) ?? null;
        if (previous !== null && previous.sourceRevision === record.sourceRevision) {
          continue;
        }

        if (previous === null) {
          inserted++;
        } else {
          updated++;
        }
        byKey.set(record.timestamp, record);
        changes.push({ previous, current: record });
      }

      const changed = inserted + updated;
      if (changed > 0) {
        const next = [...byKey.values()].sort(byTimestamp);
        await writeJsonAtomic(this.seriesPath(kind), {
          version: SERIES_FILE_VERSION,
          kind,
          records: next,
        });
        logger.debug(`Wrote ${kind} series: ${inserted} inserted, ${updated} updated, ${next.length} total`);
      }

      return { kind, inserted, updated, changed, changes, recovered };
    });
  }

  private async loadSeries(kind: MetricKind): Promise<SeriesLoad> {
    const path = this.seriesPath(kind);
    const file = await readJsonFile(path);

    if (file.status === "missing") {
      return { status: "ok", records: [] };
    }
    if (file.status === "invalid") {
      return { status: "corrupt", error: new StoreCorruptError(path, file.reason) };
    }

    const parsed = seriesFileSchema.safeParse(file.data);
    if (!parsed.success) {
      return { status: "corrupt", error: new StoreCorruptError(path, parsed.error.issues[0]?.message ?? "schema mismatch") };
    }
    if (parsed.data.kind !== kind) {
      return { status: "corrupt", error: new StoreCorruptError(path, `holds ${parsed.data.kind} records`) };
    }

    // Last entry wins if a hand-edited file repeats a timestamp
    const unique = new Map<string, MetricRecord>();
    for (const record of parsed.data.records) {
      if (record.kind === kind) {
        unique.set(record.timestamp, record);
      }
    }
    return { status: "ok", records: [...unique.values()].sort(byTimestamp) };
  }

  /**
   * Load under the kind lock, quarantining a corrupt file.
   */
  private async loadOrRecover(kind: MetricKind): Promise<RecoveredSeries> {
    const load = await this.loadSeries(kind);
    if (load.status === "ok") {
      return { records: load.records, recovered: false };
    }

    const target = await this.quarantine(load.error.path);
    logger.warn(`${load.error.message}; moved to ${target}, ${kind} will be fully re-synced`);
    await this.clearFreshness(kind);
    return { records: [], recovered: true };
  }

  private async quarantine(path: string): Promise<string> {
    try {
      return await quarantineFile(path, this.clock());
    } catch (error) {
      if (isNotFound(error)) {
        return "(already removed)";
      }
      throw error;
    }
  }

  // ===========================================================================
  // Freshness
  // ===========================================================================

  async freshness(kind: MetricKind): Promise<FreshnessState | null> {
    const kinds = await this.allFreshness();
    return kinds[kind] ?? null;
  }

  async allFreshness(): Promise<FreshnessMap> {
    const load = await this.loadFreshness();
    if (load.status === "ok") {
      return load.kinds;
    }
    return this.withLock(FRESHNESS_LOCK, () => this.loadFreshnessOrRecover());
  }

  /**
   * Commit freshness for one kind. Callers write the series first.
   */
  async setFreshness(kind: MetricKind, state: FreshnessState): Promise<void> {
    await this.withLock(FRESHNESS_LOCK, async () => {
      const kinds = await this.loadFreshnessOrRecover();
      await this.writeFreshness({ ...kinds, [kind]: state });
    });
  }

  async clearFreshness(kind: MetricKind): Promise<void> {
    await this.withLock(FRESHNESS_LOCK, async () => {
      const kinds = await this.loadFreshnessOrRecover();
      if (!(kind in kinds)) return;
      const rest: FreshnessMap = { ...kinds };
      delete rest[kind];
      await this.writeFreshness(rest);
    });
  }

  private async writeFreshness(kinds: FreshnessMap): Promise<void> {
    await writeJsonAtomic(this.freshnessPath, { version: SERIES_FILE_VERSION, kinds });
  }

  private async loadFreshness(): Promise<FreshnessLoad> {
    const path = this.freshnessPath;
    const file = await readJsonFile(path);

    if (file.status === "missing") {
      return { status: "ok", kinds: {} };
    }
    if (file.status === "invalid") {
      return { status: "corrupt", error: new StoreCorruptError(path, file.reason) };
    }

    const parsed = freshnessFileSchema.safeParse(file.data);
    if (!parsed.success) {
      return { status: "corrupt", error: new StoreCorruptError(path, parsed.error.issues[0]?.message ?? "schema mismatch") };
    }
    return { status: "ok", kinds: parsed.data.kinds };
  }

  private async loadFreshnessOrRecover(): Promise<FreshnessMap> {
    const load = await this.loadFreshness();
    if (load.status === "ok") {
      return load.kinds;
    }

    const target = await this.quarantine(load.error.path);
    logger.warn(`${load.error.message}; moved to ${target}, all kinds will be fully re-synced`);
    return {};
  }

  // ===========================================================================
  // Last sync result
  // ===========================================================================

  async writeLastSync(result: SyncResult): Promise<void> {
    await writeJsonAtomic(this.lastSyncPath, result);
  }

  /**
   * Latest persisted SyncResult. An unreadable file is reported as absent;
   * the next sync overwrites it.
   */
  async readLastSync(): Promise<SyncResult | null> {
    const file = await readJsonFile(this.lastSyncPath);
    if (file.status === "missing") {
      return null;
    }
    if (file.status === "invalid") {
      logger.warn(`Ignoring unreadable ${this.lastSyncPath}: ${file.reason}`);
      return null;
    }

    const parsed = syncResultSchema.safeParse(file.data);
    if (!parsed.success) {
      logger.warn(`Ignoring unreadable ${this.lastSyncPath}: ${parsed.error.issues[0]?.message ?? "schema mismatch"}`);
      return null;
    }
    return parsed.data;
  }

  // ===========================================================================
  // Serialization
  // ===========================================================================

  private withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The tail only orders tasks; failures reach the caller through `run`
    this.queues.set(key, run.catch(() => undefined));
    return run;
  }
}
