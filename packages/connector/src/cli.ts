#!/usr/bin/env npx tsx
/**
 * health-sync CLI
 *
 * Usage:
 *   npx tsx packages/connector/src/cli.ts <command> [options]
 *
 * Commands:
 *   sync [--kinds a,b]        Sync metric kinds from Garmin Connect (default: all)
 *   status                    Freshness per kind, goal progress and the last sync result
 *   goals                     Goal progress and the current step streak
 *   trend <kind> [--days N]   Daily values over the last N days (default: 30)
 *   patterns <kind> [--year Y] Weekday and month averages
 *   summary [--append-log]    Today's summary, optionally appended to the daily log
 *
 * Options:
 *   --log-level      Set log level (debug|info|warn|error, or LOG_LEVEL)
 *
 * Output is JSON on stdout. Exit codes: 0 success, 1 failure, 2 sync already running.
 */

import { join } from "node:path";
import { parseArgs, UsageError, type CliArgs, type CliCommand } from "./cli-args.js";
import { loadConfig, type AppConfig } from "./lib/config.js";
import { SyncInProgressError } from "./lib/errors.js";
import { setLogLevel, setupLogger } from "./lib/logger.js";
import { LocalStore } from "./db/local-store.js";
import { SyncCoordinator } from "./sync/orchestrator.js";
import { AnalyticsEngine } from "./analytics/analytics.js";
import { FileGoalSource, goalsPath } from "./analytics/goals.js";
import { appendDailySummaryLog, StatusReporter } from "./status/status.js";
import { EnvTokenProvider, GarminConnectSource } from "./services/garmin-connect/index.js";

const logger = setupLogger("cli");

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_IN_PROGRESS = 2;

const DAILY_LOG_FILE = "daily-summaries.md";

function printUsage(): void {
  console.log("Usage: health-sync <command> [options]");
  console.log("");
  console.log("Commands:");
  console.log("  sync [--kinds a,b]          Sync metric kinds (default: all)");
  console.log("  status                      Freshness, goal progress and last sync result");
  console.log("  goals                       Goal progress and step streak");
  console.log("  trend <kind> [--days N]     Daily values over the last N days (default: 30)");
  console.log("  patterns <kind> [--year Y]  Weekday and month averages");
  console.log("  summary [--append-log]      Today's summary");
  console.log("");
  console.log("Kinds: steps, sleep, weight, activity, body-battery, stress");
  console.log("");
  console.log("Options:");
  console.log("  --log-level                 Set log level (debug|info|warn|error)");
  console.log("  --help, -h                  Show this help message");
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

async function runCommand(command: CliCommand, cfg: AppConfig): Promise<number> {
  const store = new LocalStore({ dataDir: cfg.storage.dataDir });
  const analytics = new AnalyticsEngine(store, new FileGoalSource(goalsPath(cfg.storage.dataDir)));

  switch (command.command) {
    case "help":
      printUsage();
      return EXIT_OK;

    case "sync": {
      const displayName = process.env.GARMIN_DISPLAY_NAME;
      if (!displayName) {
        logger.error("GARMIN_DISPLAY_NAME is not set");
        return EXIT_FAILED;
      }
      const coordinator = new SyncCoordinator({
        store,
        source: new GarminConnectSource({ tokenProvider: new EnvTokenProvider(), displayName }),
        sync: cfg.sync,
      });
      const result = await coordinator.run(command.kinds ? { kinds: command.kinds } : {});
      printJson(result);
      return result.state === "failed" ? EXIT_FAILED : EXIT_OK;
    }

    case "status": {
      const reporter = new StatusReporter(store, analytics, cfg.status);
      printJson(await reporter.snapshot());
      return EXIT_OK;
    }

    case "goals":
      printJson({ progress: await analytics.goalProgress(), stepStreak: await analytics.stepStreak() });
      return EXIT_OK;

    case "trend":
      printJson(await analytics.trend(command.kind, command.days));
      return EXIT_OK;

    case "patterns": {
      const year = command.year ?? new Date().getFullYear();
      printJson({
        weekly: await analytics.weeklyPattern(command.kind),
        monthly: await analytics.monthlyPattern(command.kind, year),
      });
      return EXIT_OK;
    }

    case "summary": {
      const summary = await analytics.dailySummary();
      if (command.appendLog) {
        await appendDailySummaryLog(join(cfg.storage.dataDir, DAILY_LOG_FILE), summary);
      }
      printJson(summary);
      return EXIT_OK;
    }
  }
}

function parseOrExit(): CliArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      printUsage();
      process.exit(EXIT_FAILED);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const parsed = parseOrExit();

  // Set log level before loading config so config warnings respect it
  setLogLevel(parsed.logLevel);
  const cfg = loadConfig();

  try {
    process.exitCode = await runCommand(parsed.command, cfg);
  } catch (error) {
    if (error instanceof SyncInProgressError) {
      printJson({ error: "sync-in-progress", message: error.message });
      process.exitCode = EXIT_IN_PROGRESS;
      return;
    }
    throw error;
  }
}

main().catch((error: unknown) => {
  logger.error(`Command failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_FAILED);
});
