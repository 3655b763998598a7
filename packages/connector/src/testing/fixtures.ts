/**
 * Record builders for tests
 */

import type {
  ActivityRecord,
  BodyBatteryRecord,
  SleepRecord,
  StepsRecord,
  StressRecord,
  WeightRecord,
} from "../types.js";

export function stepsRecord(date: string, totalSteps: number, revision = `steps-${totalSteps}`): StepsRecord {
  return {
    kind: "steps",
    timestamp: date,
    payload: {
      totalSteps,
      totalCalories: 2000,
      activeCalories: 300,
      distanceMeters: totalSteps * 0.75,
      floorsClimbed: 4,
      restingHeartRate: 58,
    },
    sourceRevision: revision,
  };
}

export function sleepRecord(date: string, hours: number, score = 80): SleepRecord {
  const durationSeconds = Math.round(hours * 3600);
  return {
    kind: "sleep",
    timestamp: date,
    payload: {
      durationSeconds,
      score,
      deepSeconds: Math.round(durationSeconds * 0.2),
      lightSeconds: Math.round(durationSeconds * 0.55),
      remSeconds: Math.round(durationSeconds * 0.25),
      awakeSeconds: 600,
    },
    sourceRevision: `sleep-${durationSeconds}-${score}`,
  };
}

export function weightRecord(date: string, weightKg: number): WeightRecord {
  return {
    kind: "weight",
    timestamp: date,
    payload: { weightKg, bmi: null, bodyFatPct: null, muscleMassKg: null },
    sourceRevision: `weight-${weightKg}`,
  };
}

export function activityRecord(timestamp: string, activityId: string, activityType = "running"): ActivityRecord {
  return {
    kind: "activity",
    timestamp,
    payload: {
      activityId,
      name: `Morning ${activityType}`,
      activityType,
      durationSeconds: 1800,
      distanceMeters: 5000,
      calories: 350,
    },
    sourceRevision: `activity-${activityId}`,
  };
}

export function bodyBatteryRecord(date: string, charged: number, drained: number): BodyBatteryRecord {
  return {
    kind: "body-battery",
    timestamp: date,
    payload: { charged, drained, highest: null, lowest: null },
    sourceRevision: `bb-${charged}-${drained}`,
  };
}

export function stressRecord(date: string, avgLevel: number, maxLevel = avgLevel + 40): StressRecord {
  return {
    kind: "stress",
    timestamp: date,
    payload: { avgLevel, maxLevel },
    sourceRevision: `stress-${avgLevel}-${maxLevel}`,
  };
}
