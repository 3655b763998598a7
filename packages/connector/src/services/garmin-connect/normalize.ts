/**
 * Garmin Connect - Response normalization
 *
 * Raw API bodies -> MetricRecord. The API returns null for most fields on
 * days without device data; missing counters become 0, missing optional
 * measurements become null. Weight and muscle mass arrive in grams.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import type {
  ActivityRecord,
  BodyBatteryRecord,
  SleepRecord,
  StepsRecord,
  StressRecord,
  WeightRecord,
} from "../../types.js";

// =============================================================================
// Raw response schemas
// =============================================================================

const num = z.number().nullish();

export const dailySummarySchema = z.object({
  calendarDate: z.string().nullish(),
  totalSteps: num,
  totalKilocalories: num,
  activeKilocalories: num,
  totalDistanceMeters: num,
  floorsAscended: num,
  restingHeartRate: num,
});

export const dailySleepSchema = z.object({
  dailySleepDTO: z
    .object({
      calendarDate: z.string().nullish(),
      sleepTimeSeconds: num,
      deepSleepSeconds: num,
      lightSleepSeconds: num,
      remSleepSeconds: num,
      awakeSleepSeconds: num,
      sleepScores: z
        .object({ overall: z.object({ value: num }).nullish() })
        .nullish(),
    })
    .nullish(),
});

const weighInSchema = z.object({
  weight: num,
  bmi: num,
  bodyFat: num,
  muscleMass: num,
});

export const weightRangeSchema = z.object({
  dailyWeightSummaries: z
    .array(
      z.object({
        summaryDate: z.string(),
        maxWeight: num,
        latestWeight: weighInSchema.nullish(),
      })
    )
    .nullish(),
});

export const activitySchema = z.object({
  activityId: z.union([z.number(), z.string()]),
  activityName: z.string().nullish(),
  startTimeLocal: z.string(),
  activityType: z.object({ typeKey: z.string().nullish() }).nullish(),
  duration: num,
  distance: num,
  calories: num,
});

export const activityListSchema = z.array(activitySchema);

export const bodyBatteryReportSchema = z.array(
  z.object({
    date: z.string().nullish(),
    calendarDate: z.string().nullish(),
    charged: num,
    drained: num,
    bodyBatteryValuesArray: z.array(z.array(z.number().nullable())).nullish(),
  })
);

export const dailyStressSchema = z.object({
  calendarDate: z.string().nullish(),
  avgStressLevel: num,
  maxStressLevel: num,
});

// =============================================================================
// Helpers
// =============================================================================

/**
 * Content hash of a normalized payload (the API exposes no change marker).
 */
export function contentRevision(payload: object): string {
  return createHash("sha256").update(JSON.stringify(payload)).digest("hex").slice(0, 16);
}

function gramsToKg(grams: number | null | undefined): number | null {
  return grams === null || grams === undefined ? null : Math.round(grams) / 1000;
}

/**
 * "2025-03-09 18:30:00" -> "2025-03-09T18:30:00"
 */
export function toLocalTimestamp(value: string): string {
  return value.replace(" ", "T").slice(0, 19);
}

// =============================================================================
// Normalizers
// =============================================================================

/**
 * @returns null when the day has no step data
 */
export function normalizeSteps(date: string, raw: unknown): StepsRecord | null {
  const parsed = dailySummarySchema.parse(raw);
  if (parsed.totalSteps === null || parsed.totalSteps === undefined) {
    return null;
  }

  const payload = {
    totalSteps: parsed.totalSteps,
    totalCalories: parsed.totalKilocalories ?? 0,
    activeCalories: parsed.activeKilocalories ?? 0,
    distanceMeters: parsed.totalDistanceMeters ?? 0,
    floorsClimbed: parsed.floorsAscended ?? 0,
    restingHeartRate: parsed.restingHeartRate ?? null,
  };
  return { kind: "steps", timestamp: date, payload, sourceRevision: contentRevision(payload) };
}

export function normalizeSleep(date: string, raw: unknown): SleepRecord | null {
  const dto = dailySleepSchema.parse(raw).dailySleepDTO;
  if (!dto || !dto.sleepTimeSeconds) {
    return null;
  }

  const payload = {
    durationSeconds: dto.sleepTimeSeconds,
    score: dto.sleepScores?.overall?.value ?? 0,
    deepSeconds: dto.deepSleepSeconds ?? 0,
    lightSeconds: dto.lightSleepSeconds ?? 0,
    remSeconds: dto.remSleepSeconds ?? 0,
    awakeSeconds: dto.awakeSleepSeconds ?? 0,
  };
  return { kind: "sleep", timestamp: date, payload, sourceRevision: contentRevision(payload) };
}

export function normalizeWeight(raw: unknown): WeightRecord[] {
  const summaries = weightRangeSchema.parse(raw).dailyWeightSummaries ?? [];
  const records: WeightRecord[] = [];

  for (const summary of summaries) {
    const latest = summary.latestWeight;
    const weightKg = gramsToKg(summary.maxWeight ?? latest?.weight);
    if (weightKg === null || weightKg <= 0) continue;

    const payload = {
      weightKg,
      bmi: latest?.bmi ?? null,
      bodyFatPct: latest?.bodyFat ?? null,
      muscleMassKg: gramsToKg(latest?.muscleMass),
    };
    records.push({
      kind: "weight",
      timestamp: summary.summaryDate.slice(0, 10),
      payload,
      sourceRevision: contentRevision(payload),
    });
  }
  return records;
}

export function normalizeActivities(raw: unknown): ActivityRecord[] {
  return activityListSchema.parse(raw).map((activity) => {
    const payload = {
      activityId: String(activity.activityId),
      name: activity.activityName ?? "",
      activityType: activity.activityType?.typeKey ?? "other",
      durationSeconds: Math.round(activity.duration ?? 0),
      distanceMeters: activity.distance ?? null,
      calories: activity.calories ?? null,
    };
    return {
      kind: "activity",
      timestamp: toLocalTimestamp(activity.startTimeLocal),
      payload,
      sourceRevision: contentRevision(payload),
    };
  });
}

export function normalizeBodyBattery(raw: unknown): BodyBatteryRecord[] {
  const records: BodyBatteryRecord[] = [];

  for (const day of bodyBatteryReportSchema.parse(raw)) {
    const date = day.date ?? day.calendarDate;
    if (!date) continue;
    if ((day.charged === null || day.charged === undefined) && (day.drained === null || day.drained === undefined)) {
      continue;
    }

    // Each entry is [timestampMs, level]
    const levels = (day.bodyBatteryValuesArray ?? [])
      .map((entry) => entry[1])
      .filter((level): level is number => typeof level === "number");

    const payload = {
      charged: day.charged ?? 0,
      drained: day.drained ?? 0,
      highest: levels.length > 0 ? Math.max(...levels) : null,
      lowest: levels.length > 0 ? Math.min(...levels) : null,
    };
    records.push({
      kind: "body-battery",
      timestamp: date.slice(0, 10),
      payload,
      sourceRevision: contentRevision(payload),
    });
  }
  return records;
}

/**
 * @returns null when the day has no stress data (the API reports negative levels then)
 */
export function normalizeStress(date: string, raw: unknown): StressRecord | null {
  const parsed = dailyStressSchema.parse(raw);
  const avg = parsed.avgStressLevel;
  if (avg === null || avg === undefined || avg < 0) {
    return null;
  }

  const payload = { avgLevel: avg, maxLevel: Math.max(0, parsed.maxStressLevel ?? 0) };
  return { kind: "stress", timestamp: date, payload, sourceRevision: contentRevision(payload) };
}
