/**
 * Persisted file schemas
 *
 * Anything on disk that does not match these is treated as corrupt.
 */

import { z } from "zod";
import { METRIC_KINDS, type MetricKind } from "../types.js";

const count = z.number().finite();
const nullableNumber = z.number().finite().nullable();

export const stepsPayloadSchema = z.object({
  totalSteps: count,
  totalCalories: count,
  activeCalories: count,
  distanceMeters: count,
  floorsClimbed: count,
  restingHeartRate: nullableNumber,
});

export const sleepPayloadSchema = z.object({
  durationSeconds: count,
  score: count,
  deepSeconds: count,
  lightSeconds: count,
  remSeconds: count,
  awakeSeconds: count,
});

export const weightPayloadSchema = z.object({
  weightKg: count,
  bmi: nullableNumber,
  bodyFatPct: nullableNumber,
  muscleMassKg: nullableNumber,
});

export const activityPayloadSchema = z.object({
  activityId: z.string(),
  name: z.string(),
  activityType: z.string(),
  durationSeconds: count,
  distanceMeters: nullableNumber,
  calories: nullableNumber,
});

export const bodyBatteryPayloadSchema = z.object({
  charged: count,
  drained: count,
  highest: nullableNumber,
  lowest: nullableNumber,
});

export const stressPayloadSchema = z.object({
  avgLevel: count,
  maxLevel: count,
});

function recordSchema<K extends MetricKind, P extends z.ZodTypeAny>(kind: K, payload: P) {
  return z.object({
    kind: z.literal(kind),
    timestamp: z.string().min(10),
    payload,
    sourceRevision: z.string(),
  });
}

export const metricRecordSchema = z.discriminatedUnion("kind", [
  recordSchema("steps", stepsPayloadSchema),
  recordSchema("sleep", sleepPayloadSchema),
  recordSchema("weight", weightPayloadSchema),
  recordSchema("activity", activityPayloadSchema),
  recordSchema("body-battery", bodyBatteryPayloadSchema),
  recordSchema("stress", stressPayloadSchema),
]);

export const SERIES_FILE_VERSION = 1;

export const seriesFileSchema = z.object({
  version: z.literal(SERIES_FILE_VERSION),
  kind: z.enum(METRIC_KINDS),
  records: z.array(metricRecordSchema),
});

export const freshnessStateSchema = z.object({
  lastSyncedAt: z.string().datetime({ offset: true }),
  lastRemoteTimestampSeen: z.string().nullable(),
  resumeFrom: z.string().optional(),
});

function perKind<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    steps: schema.optional(),
    sleep: schema.optional(),
    weight: schema.optional(),
    activity: schema.optional(),
    "body-battery": schema.optional(),
    stress: schema.optional(),
  });
}

export const freshnessFileSchema = z.object({
  version: z.literal(SERIES_FILE_VERSION),
  kinds: perKind(freshnessStateSchema),
});

// =============================================================================
// Last sync result
// =============================================================================

const dateRangeSchema = z.object({ start: z.string(), end: z.string() });

const kindOutcomeSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("skipped"), reason: z.string() }),
  z.object({ status: z.literal("unchanged"), range: dateRangeSchema, fetched: z.number() }),
  z.object({
    status: z.literal("changed"),
    range: dateRangeSchema,
    fetched: z.number(),
    changedCount: z.number(),
    notificationWorthy: z.boolean(),
  }),
  z.object({
    status: z.literal("failed"),
    error: z.object({
      kind: z.enum(["auth", "rate-limited", "network", "timeout", "store"]),
      message: z.string(),
      retriable: z.boolean(),
    }),
  }),
]);

export const syncResultSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  state: z.enum(["done", "failed"]),
  kinds: perKind(kindOutcomeSchema),
  changedKinds: z.array(z.enum(METRIC_KINDS)),
  notificationWorthyKinds: z.array(z.enum(METRIC_KINDS)),
  freshness: perKind(freshnessStateSchema),
});
