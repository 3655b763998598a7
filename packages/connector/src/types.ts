/**
 * Shared domain types
 *
 * One payload shape per metric kind; records are a discriminated union on `kind`.
 * Timestamps are local calendar dates (YYYY-MM-DD) for daily kinds and
 * local start times (YYYY-MM-DDTHH:MM:SS) for activities.
 */

import type { FetchFailureKind } from "./lib/errors.js";

export const METRIC_KINDS = [
  "steps",
  "sleep",
  "weight",
  "activity",
  "body-battery",
  "stress",
] as const;

export type MetricKind = (typeof METRIC_KINDS)[number];

export function isMetricKind(value: string): value is MetricKind {
  return (METRIC_KINDS as readonly string[]).includes(value);
}

// =============================================================================
// Payloads
// =============================================================================

export interface StepsPayload {
  totalSteps: number;
  totalCalories: number;
  activeCalories: number;
  distanceMeters: number;
  floorsClimbed: number;
  restingHeartRate: number | null;
}

export interface SleepPayload {
  durationSeconds: number;
  score: number;
  deepSeconds: number;
  lightSeconds: number;
  remSeconds: number;
  awakeSeconds: number;
}

export interface WeightPayload {
  weightKg: number;
  bmi: number | null;
  bodyFatPct: number | null;
  muscleMassKg: number | null;
}

export interface ActivityPayload {
  activityId: string;
  name: string;
  activityType: string;
  durationSeconds: number;
  distanceMeters: number | null;
  calories: number | null;
}

export interface BodyBatteryPayload {
  charged: number;
  drained: number;
  highest: number | null;
  lowest: number | null;
}

export interface StressPayload {
  avgLevel: number;
  maxLevel: number;
}

interface RecordBase<K extends MetricKind, P> {
  kind: K;
  timestamp: string;
  payload: P;
  /** Remote change marker, or a content hash when the remote has none */
  sourceRevision: string;
}

export type StepsRecord = RecordBase<"steps", StepsPayload>;
export type SleepRecord = RecordBase<"sleep", SleepPayload>;
export type WeightRecord = RecordBase<"weight", WeightPayload>;
export type ActivityRecord = RecordBase<"activity", ActivityPayload>;
export type BodyBatteryRecord = RecordBase<"body-battery", BodyBatteryPayload>;
export type StressRecord = RecordBase<"stress", StressPayload>;

export type MetricRecord =
  | StepsRecord
  | SleepRecord
  | WeightRecord
  | ActivityRecord
  | BodyBatteryRecord
  | StressRecord;

export type RecordOf<K extends MetricKind> = Extract<MetricRecord, { kind: K }>;

// =============================================================================
// Sync state
// =============================================================================

/** Inclusive range of local calendar dates (YYYY-MM-DD) */
export interface DateRange {
  start: string;
  end: string;
}

export interface FreshnessState {
  /** ISO-8601 instant of the last successful merge (including no-op merges) */
  lastSyncedAt: string;
  /** Highest record timestamp ever returned by the remote, null if none yet */
  lastRemoteTimestampSeen: string | null;
  /**
   * Set while a chunked download stopped part way: the first date not yet
   * fetched. The next plan resumes from here instead of the overlap window.
   */
  resumeFrom?: string;
}

export type SyncPlan =
  | { kind: MetricKind; action: "fetch"; range: DateRange; bootstrap: boolean }
  | { kind: MetricKind; action: "skip"; reason: string };

/** Lifecycle of one coordinator invocation */
export type SyncState = "idle" | "planning" | "fetching" | "merging" | "done" | "failed";

/** Why a kind failed: a remote fetch failure, or a local write failure */
export type KindFailureKind = FetchFailureKind | "store";

export type KindOutcome =
  | { status: "skipped"; reason: string }
  | { status: "unchanged"; range: DateRange; fetched: number }
  | { status: "changed"; range: DateRange; fetched: number; changedCount: number; notificationWorthy: boolean }
  | { status: "failed"; error: { kind: KindFailureKind; message: string; retriable: boolean } };

export interface SyncResult {
  startedAt: string;
  finishedAt: string;
  /** "failed" only when every attempted kind failed */
  state: "done" | "failed";
  kinds: Partial<Record<MetricKind, KindOutcome>>;
  changedKinds: MetricKind[];
  notificationWorthyKinds: MetricKind[];
  freshness: Partial<Record<MetricKind, FreshnessState>>;
}

// =============================================================================
// Goals
// =============================================================================

export interface GoalSet {
  dailySteps?: number;
  sleepHours?: number;
  weightKg?: number;
  workoutsPerWeek?: number;
}

export type GoalName = keyof GoalSet;

// =============================================================================
// External collaborators
// =============================================================================

export interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Remote Metric Source contract.
 *
 * Implementations reject with one of the fetch errors in lib/errors.ts.
 */
export interface RemoteMetricSource {
  fetch(
    kind: MetricKind,
    start: string,
    end: string,
    options?: FetchOptions
  ): Promise<MetricRecord[]>;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
