/**
 * Garmin Connect API Client
 *
 * Remote Metric Source backed by the Garmin Connect web API.
 * Data fetching only, no store operations.
 *
 * Credentials:
 * - Bearer token from an injected TokenProvider
 * - EnvTokenProvider reads GARMIN_ACCESS_TOKEN (login and token refresh stay outside)
 */

import { config } from "dotenv";
import { ZodError } from "zod";
import { setupLogger } from "../../lib/logger.js";
import {
  AuthError,
  NetworkError,
  RateLimitedError,
  toFetchError,
} from "../../lib/errors.js";
import { eachDate, splitRange } from "../../lib/dates.js";
import type {
  DateRange,
  FetchOptions,
  MetricKind,
  MetricRecord,
  RemoteMetricSource,
} from "../../types.js";
import {
  normalizeActivities,
  normalizeBodyBattery,
  normalizeSleep,
  normalizeSteps,
  normalizeStress,
  normalizeWeight,
} from "./normalize.js";

// Load .env for local development
config();

const logger = setupLogger("garmin-api");

// Configuration
export const GARMIN_API_BASE = "https://connectapi.garmin.com";
const DEFAULT_RETRY_AFTER_SEC = 60;
const ACTIVITY_PAGE_SIZE = 100;
const MAX_DAYS_PER_REQUEST = 90;

// Types
export interface TokenProvider {
  getAccessToken(): Promise<string>;
}

export interface GarminConnectOptions {
  tokenProvider: TokenProvider;
  displayName: string;
  baseUrl?: string;
}

type Params = Record<string, string | number>;

/**
 * Token from GARMIN_ACCESS_TOKEN
 */
export class EnvTokenProvider implements TokenProvider {
  private readonly env: Record<string, string | undefined>;

  constructor(env: Record<string, string | undefined> = process.env) {
    this.env = env;
  }

  async getAccessToken(): Promise<string> {
    const token = this.env.GARMIN_ACCESS_TOKEN;
    if (!token) {
      throw new AuthError("GARMIN_ACCESS_TOKEN is not set");
    }
    return token;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Seconds from Retry-After, or the default when absent or not a number
 */
function handleRateLimit(response: Response): number {
  const retryAfter = response.headers.get("Retry-After");
  if (retryAfter) {
    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds) && seconds >= 0) {
      return seconds;
    }
  }
  return DEFAULT_RETRY_AFTER_SEC;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw toFetchError(signal.reason);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Client
// =============================================================================

export class GarminConnectSource implements RemoteMetricSource {
  private readonly tokenProvider: TokenProvider;
  private readonly displayName: string;
  private readonly baseUrl: string;

  constructor(options: GarminConnectOptions) {
    this.tokenProvider = options.tokenProvider;
    this.displayName = options.displayName;
    this.baseUrl = options.baseUrl ?? GARMIN_API_BASE;
  }

  async fetch(kind: MetricKind, start: string, end: string, options: FetchOptions = {}): Promise<MetricRecord[]> {
    const signal = options.signal;
    const range = { start, end };

    try {
      switch (kind) {
        case "steps":
          return await this.perDay(range, signal, (date, body) => normalizeSteps(date, body), (date) => [
            `/usersummary-service/usersummary/daily/${encodeURIComponent(this.displayName)}`,
            { calendarDate: date },
          ]);
        case "sleep":
          return await this.perDay(range, signal, (date, body) => normalizeSleep(date, body), (date) => [
            `/wellness-service/wellness/dailySleepData/${encodeURIComponent(this.displayName)}`,
            { date, nonSleepBufferMinutes: 60 },
          ]);
        case "stress":
          return await this.perDay(range, signal, (date, body) => normalizeStress(date, body), (date) => [
            `/wellness-service/wellness/dailyStress/${date}`,
            {},
          ]);
        case "weight":
          return await this.chunked(range, signal, normalizeWeight, "/weight-service/weight/dateRange");
        case "body-battery":
          return await this.chunked(
            range,
            signal,
            normalizeBodyBattery,
            "/wellness-service/wellness/bodyBattery/reports/daily"
          );
        case "activity":
          return await this.activities(range, signal);
      }
    } catch (error) {
      if (error instanceof ZodError) {
        const issue = error.issues[0];
        throw new NetworkError(`Unexpected ${kind} response: ${issue?.path.join(".")} ${issue?.message}`);
      }
      throw error;
    }
  }

  private async perDay<R extends MetricRecord>(
    range: DateRange,
    signal: AbortSignal | undefined,
    normalize: (date: string, body: unknown) => R | null,
    endpoint: (date: string) => [string, Params]
  ): Promise<R[]> {
    const records: R[] = [];
    for (const date of eachDate(range.start, range.end)) {
      throwIfAborted(signal);
      const [path, params] = endpoint(date);
      const body = await this.request(path, params, signal);
      if (body === null) continue;

      const record = normalize(date, body);
      if (record) records.push(record);
    }
    return records;
  }

  private async chunked<R extends MetricRecord>(
    range: DateRange,
    signal: AbortSignal | undefined,
    normalize: (body: unknown) => R[],
    path: string
  ): Promise<R[]> {
    const records: R[] = [];
    for (const chunk of splitRange(range, MAX_DAYS_PER_REQUEST)) {
      throwIfAborted(signal);
      const body = await this.request(path, { startDate: chunk.start, endDate: chunk.end }, signal);
      if (body === null) continue;

      for (const record of normalize(body)) {
        if (record.timestamp >= range.start && record.timestamp <= range.end) {
          records.push(record);
        }
      }
    }
    return records;
  }

  private async activities(range: DateRange, signal: AbortSignal | undefined): Promise<MetricRecord[]> {
    const records: MetricRecord[] = [];
    let start = 0;

    while (true) {
      throwIfAborted(signal);
      const body = await this.request(
        "/activitylist-service/activities/search/activities",
        { startDate: range.start, endDate: range.end, start, limit: ACTIVITY_PAGE_SIZE },
        signal
      );
      if (body === null) break;

      const page = normalizeActivities(body);
      records.push(...page);
      if (page.length < ACTIVITY_PAGE_SIZE) break;
      start += ACTIVITY_PAGE_SIZE;
    }

    logger.debug(`Fetched ${records.length} activities (${range.start} to ${range.end})`);
    return records;
  }

  /**
   * GET a JSON body.
   * @returns null for 204, 404 and empty bodies
   */
  private async request(path: string, params: Params, signal: AbortSignal | undefined): Promise<unknown> {
    const token = await this.tokenProvider.getAccessToken();
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, String(value));
    }

    logger.debug(`GET ${url.pathname}${url.search}`);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json",
          NK: "NT",
        },
        signal,
      });
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw toFetchError(signal.reason);
      }
      throw new NetworkError(`GET ${url.pathname} failed: ${errorMessage(error)}`);
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthError(`Garmin Connect rejected the token (HTTP ${response.status})`);
    }
    if (response.status === 429) {
      const waitSeconds = handleRateLimit(response);
      logger.warn(`Rate limited (429). Retry after ${waitSeconds}s`);
      throw new RateLimitedError(waitSeconds);
    }
    if (response.status === 204 || response.status === 404) {
      return null;
    }
    if (!response.ok) {
      throw new NetworkError(`HTTP ${response.status}: ${text.slice(0, 200)}`);
    }

    if (!text.trim()) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new NetworkError(`Invalid JSON from ${url.pathname}: ${errorMessage(error)}`);
    }
  }
}
