/**
 * Goal source
 *
 * Reads the user's goals.json from the data directory on every call:
 *
 * { "daily_steps": 10000, "sleep_hours": 7, "weight_kg": 75, "workouts_per_week": 3 }
 */

import { join } from "node:path";
import { z } from "zod";
import { setupLogger } from "../lib/logger.js";
import { readJsonFile } from "../lib/json-file.js";
import type { GoalSet } from "../types.js";

const logger = setupLogger("goals");

export interface GoalSource {
  /** null when no goals are configured */
  load(): Promise<GoalSet | null>;
}

const goalFileSchema = z.object({
  daily_steps: z.number().finite().optional(),
  sleep_hours: z.number().finite().optional(),
  weight_kg: z.number().finite().optional(),
  workouts_per_week: z.number().finite().optional(),
});

export function goalsPath(dataDir: string): string {
  return join(dataDir, "goals.json");
}

export class FileGoalSource implements GoalSource {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async load(): Promise<GoalSet | null> {
    const file = await readJsonFile(this.path);
    if (file.status === "missing") {
      return null;
    }
    if (file.status === "invalid") {
      logger.warn(`Ignoring ${this.path}: ${file.reason}`);
      return null;
    }

    const parsed = goalFileSchema.safeParse(file.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      logger.warn(`Ignoring ${this.path}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`);
      return null;
    }

    const raw = parsed.data;
    const goals: GoalSet = {};
    if (raw.daily_steps !== undefined) goals.dailySteps = raw.daily_steps;
    if (raw.sleep_hours !== undefined) goals.sleepHours = raw.sleep_hours;
    if (raw.weight_kg !== undefined) goals.weightKg = raw.weight_kg;
    if (raw.workouts_per_week !== undefined) goals.workoutsPerWeek = raw.workouts_per_week;
    return goals;
  }
}

/**
 * Fixed goals, for library callers that keep goals elsewhere.
 */
export class StaticGoalSource implements GoalSource {
  private readonly goals: GoalSet | null;

  constructor(goals: GoalSet | null) {
    this.goals = goals;
  }

  async load(): Promise<GoalSet | null> {
    return this.goals;
  }
}
