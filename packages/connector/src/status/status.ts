/**
 * Presentation Sink
 *
 * What a status display reads: per-kind freshness ages, goal progress and
 * the last persisted SyncResult. Rendering is left to the consumer.
 */

import { appendFile, mkdir, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { minutesSince } from "../lib/dates.js";
import { isNotFound } from "../lib/json-file.js";
import type { StatusConfig } from "../lib/config.js";
import type { LocalStore } from "../db/local-store.js";
import type { AnalyticsEngine, DailySummary, GoalProgress } from "../analytics/analytics.js";
import { METRIC_KINDS, systemClock, type Clock, type MetricKind, type SyncResult } from "../types.js";

// Types
export interface KindFreshness {
  kind: MetricKind;
  lastSyncedAt: string | null;
  lastRemoteTimestampSeen: string | null;
  ageMinutes: number | null;
  /** "now", "5m", "2h", "3d", or "?" when unknown */
  ageLabel: string;
  stale: boolean;
}

export interface StatusSnapshot {
  generatedAt: string;
  freshness: KindFreshness[];
  goals: GoalProgress;
  lastSync: SyncResult | null;
}

export function formatTimeAgo(minutes: number | null): string {
  if (minutes === null || minutes < 0) return "?";
  if (minutes < 1) return "now";
  if (minutes < 60) return `${minutes}m`;
  if (minutes < 1440) return `${Math.floor(minutes / 60)}h`;
  return `${Math.floor(minutes / 1440)}d`;
}

export class StatusReporter {
  private readonly store: LocalStore;
  private readonly analytics: AnalyticsEngine;
  private readonly status: Readonly<StatusConfig>;
  private readonly clock: Clock;

  constructor(store: LocalStore, analytics: AnalyticsEngine, status: Readonly<StatusConfig>, clock: Clock = systemClock) {
    this.store = store;
    this.analytics = analytics;
    this.status = status;
    this.clock = clock;
  }

  async freshnessStatus(): Promise<KindFreshness[]> {
    const now = this.clock();
    const all = await this.store.allFreshness();

    return METRIC_KINDS.map((kind) => {
      const state = all[kind];
      const ageMinutes = state ? minutesSince(state.lastSyncedAt, now) : null;
      return {
        kind,
        lastSyncedAt: state?.lastSyncedAt ?? null,
        lastRemoteTimestampSeen: state?.lastRemoteTimestampSeen ?? null,
        ageMinutes,
        ageLabel: formatTimeAgo(ageMinutes),
        stale: ageMinutes === null || ageMinutes >= this.status.freshnessWarningMinutes,
      };
    });
  }

  async snapshot(): Promise<StatusSnapshot> {
    return {
      generatedAt: this.clock().toISOString(),
      freshness: await this.freshnessStatus(),
      goals: await this.analytics.goalProgress(),
      lastSync: await this.store.readLastSync(),
    };
  }
}

// =============================================================================
// Daily summary log
// =============================================================================

const LOG_HEADER = "# Daily Health Summaries\n\n---\n\n";

function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}

function percentStatus(current: number, goal: number): string {
  return current >= goal ? "✓" : `${Math.floor((current / goal) * 100)}%`;
}

/**
 * Markdown entry for one day.
 */
export function formatSummaryEntry(summary: DailySummary): string {
  const lines = [
    `## ${summary.date}`,
    "",
    "| Metric | Value | Goal | Status |",
    "|--------|-------|------|--------|",
  ];

  const { stepsGoal, sleepGoal, weightGoal } = summary;
  lines.push(
    stepsGoal !== null && stepsGoal > 0
      ? `| Steps | ${formatCount(summary.steps)} | ${formatCount(stepsGoal)} | ${percentStatus(summary.steps, stepsGoal)} |`
      : `| Steps | ${formatCount(summary.steps)} | - | - |`
  );

  if (summary.sleepHours !== null) {
    lines.push(
      sleepGoal !== null && sleepGoal > 0
        ? `| Sleep | ${summary.sleepHours.toFixed(1)}h | ${sleepGoal}h | ${percentStatus(summary.sleepHours, sleepGoal)} |`
        : `| Sleep | ${summary.sleepHours.toFixed(1)}h | - | - |`
    );
  }

  if (summary.weightKg !== null) {
    if (weightGoal !== null) {
      const diff = summary.weightKg - weightGoal;
      const status = diff <= 0 ? "✓" : `↓${diff.toFixed(1)}kg`;
      lines.push(`| Weight | ${summary.weightKg.toFixed(1)}kg | ${weightGoal}kg | ${status} |`);
    } else {
      lines.push(`| Weight | ${summary.weightKg.toFixed(1)}kg | - | - |`);
    }
  }

  if (summary.bodyBattery !== null) {
    lines.push(`| Body Battery | ${summary.bodyBattery}% | - | - |`);
  }

  lines.push("", `**Status:** ${summary.status}`, "", "---");
  return lines.join("\n") + "\n\n";
}

/**
 * Append a day's summary to a markdown log, writing the header on first use.
 */
export async function appendDailySummaryLog(path: string, summary: DailySummary): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  let exists = true;
  try {
    await stat(path);
  } catch (error) {
    if (!isNotFound(error)) throw error;
    exists = false;
  }

  await appendFile(path, (exists ? "" : LOG_HEADER) + formatSummaryEntry(summary), "utf8");
}
