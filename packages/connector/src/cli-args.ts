/**
 * Argument parsing for the health-sync CLI
 */

import { isLogLevel, type LogLevel } from "./lib/logger.js";
import { isMetricKind, METRIC_KINDS, type MetricKind } from "./types.js";

export type CliCommand =
  | { command: "sync"; kinds?: MetricKind[] }
  | { command: "status" }
  | { command: "goals" }
  | { command: "trend"; kind: MetricKind; days: number }
  | { command: "patterns"; kind: MetricKind; year?: number }
  | { command: "summary"; appendLog: boolean }
  | { command: "help" };

export interface CliArgs {
  command: CliCommand;
  logLevel: LogLevel;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const DEFAULT_TREND_DAYS = 30;

function parseKind(value: string | undefined): MetricKind {
  if (value === undefined || !isMetricKind(value)) {
    throw new UsageError(`Invalid kind "${value ?? ""}". Must be one of: ${METRIC_KINDS.join(", ")}`);
  }
  return value;
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new UsageError(`Invalid ${flag} value. Must be a positive integer.`);
  }
  return parsed;
}

/**
 * @param args argv without the node and script entries
 */
export function parseArgs(args: string[], env: Record<string, string | undefined> = process.env): CliArgs {
  const envLevel = env.LOG_LEVEL;
  let logLevel: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : "info";

  const positional: string[] = [];
  let kinds: MetricKind[] | undefined;
  let days = DEFAULT_TREND_DAYS;
  let year: number | undefined;
  let appendLog = false;
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }

    if (arg === "--log-level") {
      const level = args[i + 1];
      if (level === undefined || !isLogLevel(level)) {
        throw new UsageError("Invalid --log-level value. Must be one of: debug, info, warn, error");
      }
      logLevel = level;
      i++;
      continue;
    }

    if (arg === "--kinds") {
      const value = args[i + 1] ?? "";
      kinds = value.split(",").filter((k) => k !== "").map(parseKind);
      if (kinds.length === 0) {
        throw new UsageError("--kinds needs at least one kind");
      }
      i++;
      continue;
    }

    if (arg === "--days") {
      days = parsePositiveInt("--days", args[i + 1]);
      i++;
      continue;
    }

    if (arg === "--year") {
      year = parsePositiveInt("--year", args[i + 1]);
      i++;
      continue;
    }

    if (arg === "--append-log") {
      appendLog = true;
      continue;
    }

    if (arg.startsWith("--")) {
      throw new UsageError(`Unknown option ${arg}`);
    }
    positional.push(arg);
  }

  const [name, target] = positional;
  if (help || name === undefined) {
    return { command: { command: "help" }, logLevel };
  }

  switch (name) {
    case "sync":
      return { command: kinds ? { command: "sync", kinds } : { command: "sync" }, logLevel };
    case "status":
    case "goals":
      return { command: { command: name }, logLevel };
    case "trend":
      return { command: { command: "trend", kind: parseKind(target), days }, logLevel };
    case "patterns":
      return {
        command: year === undefined ? { command: "patterns", kind: parseKind(target) } : { command: "patterns", kind: parseKind(target), year },
        logLevel,
      };
    case "summary":
      return { command: { command: "summary", appendLog }, logLevel };
    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
}
