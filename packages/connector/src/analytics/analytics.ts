/**
 * Analytics Engine
 *
 * Derived views over the Local Store: goal progress, trends, weekday and
 * monthly patterns. Read-only; never touches the remote.
 *
 * Every kind reduces to one number per calendar day first:
 *   steps         sum of totalSteps
 *   activity      number of sessions
 *   sleep         mean hours
 *   weight        mean kg
 *   body-battery  mean of charged - drained
 *   stress        mean avgLevel
 * Windows and patterns then average those daily values.
 */

import { setupLogger } from "../lib/logger.js";
import {
  addDays,
  datePart,
  formatDate,
  MONTHS,
  monthOf,
  WEEKDAYS,
  weekdayOf,
  type Month,
  type Weekday,
} from "../lib/dates.js";
import type { LocalStore } from "../db/local-store.js";
import type { GoalSource } from "./goals.js";
import {
  systemClock,
  type Clock,
  type DateRange,
  type GoalName,
  type MetricKind,
  type MetricRecord,
  type SleepPayload,
} from "../types.js";

const logger = setupLogger("analytics");

/** Fewer daily points than this is reported as insufficient data */
export const MIN_POINTS = 2;

// Types
export interface DailyPoint {
  date: string;
  value: number;
}

export interface InsufficientData {
  status: "insufficient-data";
  kind: MetricKind;
  points: number;
}

export type TrendResult =
  | { status: "ok"; kind: MetricKind; window: DateRange; points: DailyPoint[] }
  | InsufficientData;

export type WeeklyPatternResult =
  | { status: "ok"; kind: MetricKind; days: Array<{ weekday: Weekday; value: number | null }> }
  | InsufficientData;

export type MonthlyPatternResult =
  | { status: "ok"; kind: MetricKind; year: number; months: Array<{ month: Month; value: number | null }> }
  | InsufficientData;

export interface GoalProgressEntry {
  /** null when no applicable record exists */
  current: number | null;
  target: number;
  percent: number;
  reached: boolean;
}

export type GoalProgress =
  | { status: "no-goals" }
  | { status: "ok"; goals: Partial<Record<GoalName, GoalProgressEntry>> };

export interface Averages {
  days: number;
  steps: number | null;
  sleepHours: number | null;
}

export type WeightChange =
  | { status: "ok"; first: DailyPoint; last: DailyPoint; change: number }
  | InsufficientData;

export interface StepDay {
  date: string;
  steps: number;
}

export interface BestAndWorstDays {
  best: StepDay | null;
  worst: StepDay | null;
}

export interface DailySummary {
  date: string;
  steps: number;
  stepsGoal: number | null;
  sleepHours: number | null;
  sleepScore: number | null;
  sleepGoal: number | null;
  weightKg: number | null;
  weightGoal: number | null;
  weightChange7d: number | null;
  bodyBattery: number | null;
  goalsMet: number;
  status: string;
}

export interface SleepStages {
  deepPct: number;
  remPct: number;
}

// =============================================================================
// Pure helpers
// =============================================================================

const DAILY_REDUCER: Record<MetricKind, "sum" | "mean"> = {
  steps: "sum",
  activity: "sum",
  sleep: "mean",
  weight: "mean",
  "body-battery": "mean",
  stress: "mean",
};

export function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function mean(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * The number one record contributes to its day.
 */
export function recordValue(record: MetricRecord): number {
  switch (record.kind) {
    case "steps":
      return record.payload.totalSteps;
    case "sleep":
      return record.payload.durationSeconds / 3600;
    case "weight":
      return record.payload.weightKg;
    case "activity":
      return 1;
    case "body-battery":
      return record.payload.charged - record.payload.drained;
    case "stress":
      return record.payload.avgLevel;
  }
}

/**
 * One value per calendar day, ordered by date.
 */
export function aggregateDaily(kind: MetricKind, records: MetricRecord[]): DailyPoint[] {
  const byDate = new Map<string, number[]>();
  for (const record of records) {
    if (record.kind !== kind) continue;
    const date = datePart(record.timestamp);
    const values = byDate.get(date) ?? [];
    values.push(recordValue(record));
    byDate.set(date, values);
  }

  const reducer = DAILY_REDUCER[kind];
  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, values]) => {
      const total = values.reduce((a, b) => a + b, 0);
      return { date, value: round(reducer === "sum" ? total : total / values.length) };
    });
}

export function sleepStages(payload: SleepPayload): SleepStages {
  if (payload.durationSeconds === 0) {
    return { deepPct: 0, remPct: 0 };
  }
  return {
    deepPct: round((payload.deepSeconds / payload.durationSeconds) * 100, 1),
    remPct: round((payload.remSeconds / payload.durationSeconds) * 100, 1),
  };
}

/**
 * Percent of a target weight: 100 at the target, falling off linearly with distance.
 */
export function weightPercent(current: number, target: number): number {
  const pct = 100 - (Math.abs(current - target) / target) * 100;
  return Math.floor(Math.min(100, Math.max(0, pct)));
}

function meanOrNull(values: number[] | undefined): number | null {
  const avg = mean(values ?? []);
  return avg === null ? null : round(avg);
}

function insufficient(kind: MetricKind, points: number): InsufficientData {
  return { status: "insufficient-data", kind, points };
}

function latest<T>(items: T[]): T | null {
  return items.length > 0 ? items[items.length - 1] : null;
}

// =============================================================================
// Engine
// =============================================================================

export class AnalyticsEngine {
  private readonly store: LocalStore;
  private readonly goalSource: GoalSource;
  private readonly clock: Clock;

  constructor(store: LocalStore, goalSource: GoalSource, clock: Clock = systemClock) {
    this.store = store;
    this.goalSource = goalSource;
    this.clock = clock;
  }

  private today(): string {
    return formatDate(this.clock());
  }

  /** Inclusive window of `days` calendar days ending today */
  private window(days: number): DateRange {
    const end = this.today();
    return { start: addDays(end, -(Math.max(1, days) - 1)), end };
  }

  // ===========================================================================
  // Goals
  // ===========================================================================

  async goalProgress(): Promise<GoalProgress> {
    const goals = await this.goalSource.load();
    if (goals === null) {
      return { status: "no-goals" };
    }

    const today = this.today();
    const progress: Partial<Record<GoalName, GoalProgressEntry>> = {};

    if (goals.dailySteps !== undefined && goals.dailySteps > 0) {
      const target = goals.dailySteps;
      const record = latest(await this.store.read("steps", { start: today, end: today }));
      const current = record?.kind === "steps" ? record.payload.totalSteps : 0;
      progress.dailySteps = {
        current,
        target,
        percent: Math.floor((current / target) * 100),
        reached: current >= target,
      };
    }

    if (goals.sleepHours !== undefined && goals.sleepHours > 0) {
      const target = goals.sleepHours;
      const record = latest(await this.store.read("sleep"));
      const current = record?.kind === "sleep" ? round(record.payload.durationSeconds / 3600) : null;
      progress.sleepHours = {
        current,
        target,
        percent: current === null ? 0 : Math.floor((current / target) * 100),
        reached: current !== null && current >= target,
      };
    }

    if (goals.weightKg !== undefined && goals.weightKg > 0) {
      const target = goals.weightKg;
      const record = latest(await this.store.read("weight"));
      const current = record?.kind === "weight" ? record.payload.weightKg : null;
      progress.weightKg = {
        current,
        target,
        percent: current === null ? 0 : weightPercent(current, target),
        reached: current !== null && current <= target,
      };
    }

    if (goals.workoutsPerWeek !== undefined && goals.workoutsPerWeek > 0) {
      const target = goals.workoutsPerWeek;
      const current = (await this.store.read("activity", this.window(7))).length;
      progress.workoutsPerWeek = {
        current,
        target,
        percent: Math.floor((current / target) * 100),
        reached: current >= target,
      };
    }

    if (Object.keys(progress).length === 0) {
      return { status: "no-goals" };
    }
    return { status: "ok", goals: progress };
  }

  /**
   * Consecutive days, ending at the most recent steps record, that meet the goal.
   *
   * @returns null when neither `goal` nor a configured daily steps goal exists
   */
  async stepStreak(goal?: number): Promise<number | null> {
    const target = goal ?? (await this.goalSource.load())?.dailySteps;
    if (target === undefined) {
      return null;
    }

    const days = aggregateDaily("steps", await this.store.read("steps"));
    let streak = 0;
    let expected: string | null = null;
    for (let i = days.length - 1; i >= 0; i--) {
      const day = days[i];
      if (expected !== null && day.date !== expected) break;
      if (day.value < target) break;
      streak++;
      expected = addDays(day.date, -1);
    }
    return streak;
  }

  // ===========================================================================
  // Trends and patterns
  // ===========================================================================

  async trend(kind: MetricKind, days: number): Promise<TrendResult> {
    const window = this.window(days);
    const points = aggregateDaily(kind, await this.store.read(kind, window));

    if (points.length < MIN_POINTS) {
      logger.debug(`trend ${kind}: ${points.length} point(s) in ${window.start}..${window.end}`);
      return insufficient(kind, points.length);
    }
    return { status: "ok", kind, window, points };
  }

  /**
   * Mean daily value per weekday over all history. Zero-step days are
   * dropped for steps (device not worn).
   */
  async weeklyPattern(kind: MetricKind): Promise<WeeklyPatternResult> {
    const points = this.patternPoints(kind, await this.store.read(kind));
    if (points.length < MIN_POINTS) {
      return insufficient(kind, points.length);
    }

    const groups = new Map<Weekday, number[]>();
    for (const point of points) {
      const weekday = weekdayOf(point.date);
      groups.set(weekday, [...(groups.get(weekday) ?? []), point.value]);
    }

    const days = WEEKDAYS.map((weekday) => ({ weekday, value: meanOrNull(groups.get(weekday)) }));
    return { status: "ok", kind, days };
  }

  async monthlyPattern(kind: MetricKind, year: number): Promise<MonthlyPatternResult> {
    const range = { start: `${year}-01-01`, end: `${year}-12-31` };
    const points = this.patternPoints(kind, await this.store.read(kind, range));
    if (points.length < MIN_POINTS) {
      return insufficient(kind, points.length);
    }

    const groups = new Map<Month, number[]>();
    for (const point of points) {
      const month = monthOf(point.date);
      groups.set(month, [...(groups.get(month) ?? []), point.value]);
    }

    const months = MONTHS.map((month) => ({ month, value: meanOrNull(groups.get(month)) }));
    return { status: "ok", kind, year, months };
  }

  private patternPoints(kind: MetricKind, records: MetricRecord[]): DailyPoint[] {
    const points = aggregateDaily(kind, records);
    return kind === "steps" ? points.filter((p) => p.value > 0) : points;
  }

  // ===========================================================================
  // Summaries
  // ===========================================================================

  async averages(days = 7): Promise<Averages> {
    const window = this.window(days);
    const steps = mean(aggregateDaily("steps", await this.store.read("steps", window)).map((p) => p.value));
    const sleep = mean(aggregateDaily("sleep", await this.store.read("sleep", window)).map((p) => p.value));

    return {
      days,
      steps: steps === null ? null : Math.round(steps),
      sleepHours: sleep === null ? null : round(sleep),
    };
  }

  /**
   * Last minus first weight in the window (negative = lost).
   */
  async weightChange(days = 7): Promise<WeightChange> {
    const points = aggregateDaily("weight", await this.store.read("weight", this.window(days)));
    if (points.length < MIN_POINTS) {
      return insufficient("weight", points.length);
    }

    const first = points[0];
    const last = points[points.length - 1];
    return { status: "ok", first, last, change: round(last.value - first.value) };
  }

  async bestAndWorstDays(): Promise<BestAndWorstDays> {
    const days = aggregateDaily("steps", await this.store.read("steps")).filter((p) => p.value > 0);

    let best: DailyPoint | null = null;
    let worst: DailyPoint | null = null;
    for (const day of days) {
      if (best === null || day.value > best.value) best = day;
      if (worst === null || day.value < worst.value) worst = day;
    }

    return {
      best: best && { date: best.date, steps: best.value },
      worst: worst && { date: worst.date, steps: worst.value },
    };
  }

  async dailySummary(): Promise<DailySummary> {
    const today = this.today();
    const goals = (await this.goalSource.load()) ?? {};

    const stepsToday = latest(await this.store.read("steps", { start: today, end: today }));
    const sleep = latest(await this.store.read("sleep"));
    const weight = latest(await this.store.read("weight"));
    const bodyBattery = latest(await this.store.read("body-battery"));
    const weightChange = await this.weightChange(7);

    const steps = stepsToday?.kind === "steps" ? stepsToday.payload.totalSteps : 0;
    const sleepHours = sleep?.kind === "sleep" ? round(sleep.payload.durationSeconds / 3600) : null;

    const stepsMet = goals.dailySteps !== undefined && steps >= goals.dailySteps;
    const sleepMet = goals.sleepHours !== undefined && sleepHours !== null && sleepHours >= goals.sleepHours;
    const goalsMet = Number(stepsMet) + Number(sleepMet);

    return {
      date: today,
      steps,
      stepsGoal: goals.dailySteps ?? null,
      sleepHours,
      sleepScore: sleep?.kind === "sleep" ? sleep.payload.score : null,
      sleepGoal: goals.sleepHours ?? null,
      weightKg: weight?.kind === "weight" ? weight.payload.weightKg : null,
      weightGoal: goals.weightKg ?? null,
      weightChange7d: weightChange.status === "ok" ? weightChange.change : null,
      bodyBattery: bodyBattery?.kind === "body-battery" ? bodyBattery.payload.charged : null,
      goalsMet,
      status: goalsMet === 2 ? "Great day! All goals met" : goalsMet === 1 ? "Good effort today" : "Tomorrow is a new day",
    };
  }
}
