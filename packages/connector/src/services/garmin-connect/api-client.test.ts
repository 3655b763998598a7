import { describe, it, expect, vi, beforeAll, afterAll, afterEach, beforeEach } from "vitest";
import { setupServer } from "msw/node";
import { http, HttpResponse } from "msw";
import { EnvTokenProvider, GarminConnectSource } from "./api-client.js";
import { AuthError, FetchTimeoutError, NetworkError, RateLimitedError } from "../../lib/errors.js";

const BASE = "https://connect.test";

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

function source(): GarminConnectSource {
  return new GarminConnectSource({
    tokenProvider: new EnvTokenProvider({ GARMIN_ACCESS_TOKEN: "test-token" }),
    displayName: "runner",
    baseUrl: BASE,
  });
}

function activity(id: number) {
  return {
    activityId: id,
    activityName: `Walk ${id}`,
    startTimeLocal: `2025-03-0${(id % 9) + 1} 08:00:${String(id % 60).padStart(2, "0")}`,
    activityType: { typeKey: "walking" },
    duration: 600,
    distance: 800,
    calories: 50,
  };
}

describe("EnvTokenProvider", () => {
  it("should reject when the token is missing", async () => {
    await expect(new EnvTokenProvider({}).getAccessToken()).rejects.toBeInstanceOf(AuthError);
  });
});

describe("GarminConnectSource", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("should request one daily summary per day with the bearer token", async () => {
    const seen: Array<{ date: string | null; auth: string | null; name: unknown }> = [];
    server.use(
      http.get(`${BASE}/usersummary-service/usersummary/daily/:name`, ({ request, params }) => {
        const date = new URL(request.url).searchParams.get("calendarDate");
        seen.push({ date, auth: request.headers.get("Authorization"), name: params.name });
        if (date === "2025-03-10") {
          return new HttpResponse(null, { status: 204 });
        }
        return HttpResponse.json({ calendarDate: date, totalSteps: 5000, totalKilocalories: 2100 });
      })
    );

    const records = await source().fetch("steps", "2025-03-09", "2025-03-10");

    expect(seen).toEqual([
      { date: "2025-03-09", auth: "Bearer test-token", name: "runner" },
      { date: "2025-03-10", auth: "Bearer test-token", name: "runner" },
    ]);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ kind: "steps", timestamp: "2025-03-09" });
  });

  it("should treat a missing day as no record", async () => {
    server.use(
      http.get(`${BASE}/wellness-service/wellness/dailyStress/:date`, ({ params }) => {
        if (params.date === "2025-03-09") {
          return new HttpResponse("not found", { status: 404 });
        }
        return HttpResponse.json({ avgStressLevel: 30, maxStressLevel: 75 });
      })
    );

    const records = await source().fetch("stress", "2025-03-09", "2025-03-10");

    expect(records.map((r) => r.timestamp)).toEqual(["2025-03-10"]);
  });

  it("should treat an empty body as no record", async () => {
    server.use(
      http.get(`${BASE}/wellness-service/wellness/dailySleepData/:name`, () => new HttpResponse("", { status: 200 }))
    );

    expect(await source().fetch("sleep", "2025-03-10", "2025-03-10")).toEqual([]);
  });

  it("should fetch weight by date range and drop samples outside it", async () => {
    const ranges: Array<[string | null, string | null]> = [];
    server.use(
      http.get(`${BASE}/weight-service/weight/dateRange`, ({ request }) => {
        const params = new URL(request.url).searchParams;
        ranges.push([params.get("startDate"), params.get("endDate")]);
        return HttpResponse.json({
          dailyWeightSummaries: [
            { summaryDate: "2025-03-01", maxWeight: 81000, latestWeight: null },
            { summaryDate: "2025-03-05", maxWeight: 80500, latestWeight: null },
          ],
        });
      })
    );

    const records = await source().fetch("weight", "2025-03-04", "2025-03-10");

    expect(ranges).toEqual([["2025-03-04", "2025-03-10"]]);
    expect(records.map((r) => r.timestamp)).toEqual(["2025-03-05"]);
  });

  it("should fetch body battery reports", async () => {
    server.use(
      http.get(`${BASE}/wellness-service/wellness/bodyBattery/reports/daily`, () =>
        HttpResponse.json([{ date: "2025-03-10", charged: 40, drained: 35 }])
      )
    );

    const records = await source().fetch("body-battery", "2025-03-10", "2025-03-10");

    expect(records.map((r) => r.payload)).toEqual([{ charged: 40, drained: 35, highest: null, lowest: null }]);
  });

  it("should page through activities", async () => {
    const offsets: Array<string | null> = [];
    server.use(
      http.get(`${BASE}/activitylist-service/activities/search/activities`, ({ request }) => {
        const params = new URL(request.url).searchParams;
        offsets.push(params.get("start"));
        const first = Number(params.get("start"));
        const count = first === 0 ? 100 : 3;
        return HttpResponse.json(Array.from({ length: count }, (_, i) => activity(first + i)));
      })
    );

    const records = await source().fetch("activity", "2025-03-01", "2025-03-10");

    expect(offsets).toEqual(["0", "100"]);
    expect(records).toHaveLength(103);
  });

  describe("errors", () => {
    function respondWith(response: () => Response): void {
      server.use(http.get(`${BASE}/wellness-service/wellness/dailyStress/:date`, response));
    }

    it("should map 401 to an auth error", async () => {
      respondWith(() => new HttpResponse("unauthorized", { status: 401 }));

      await expect(source().fetch("stress", "2025-03-10", "2025-03-10")).rejects.toBeInstanceOf(AuthError);
    });

    it("should map 429 to a rate limit with the Retry-After delay", async () => {
      respondWith(() => new HttpResponse("slow down", { status: 429, headers: { "Retry-After": "120" } }));

      const error = await source().fetch("stress", "2025-03-10", "2025-03-10").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error instanceof RateLimitedError && error.retryAfterSeconds).toBe(120);
    });

    it("should default the rate limit delay to 60 seconds", async () => {
      respondWith(() => new HttpResponse("slow down", { status: 429 }));

      const error = await source().fetch("stress", "2025-03-10", "2025-03-10").catch((e: unknown) => e);

      expect(error instanceof RateLimitedError && error.retryAfterSeconds).toBe(60);
    });

    it("should map server errors to network errors", async () => {
      respondWith(() => new HttpResponse("maintenance", { status: 503 }));

      await expect(source().fetch("stress", "2025-03-10", "2025-03-10")).rejects.toThrow(
        new NetworkError("HTTP 503: maintenance")
      );
    });

    it("should map connection failures to network errors", async () => {
      respondWith(() => HttpResponse.error());

      await expect(source().fetch("stress", "2025-03-10", "2025-03-10")).rejects.toBeInstanceOf(NetworkError);
    });

    it("should reject invalid JSON", async () => {
      respondWith(() => new HttpResponse("{not json", { status: 200 }));

      await expect(source().fetch("stress", "2025-03-10", "2025-03-10")).rejects.toBeInstanceOf(NetworkError);
    });

    it("should reject a body of the wrong shape", async () => {
      respondWith(() => HttpResponse.json({ avgStressLevel: "high" }));

      await expect(source().fetch("stress", "2025-03-10", "2025-03-10")).rejects.toThrow(
        "Unexpected stress response: avgStressLevel Expected number, received string"
      );
    });

    it("should surface the abort reason without requesting", async () => {
      const requested = vi.fn();
      server.use(
        http.get(`${BASE}/wellness-service/wellness/dailyStress/:date`, () => {
          requested();
          return HttpResponse.json({});
        })
      );

      const signal = AbortSignal.abort(new FetchTimeoutError(50));

      await expect(source().fetch("stress", "2025-03-10", "2025-03-10", { signal })).rejects.toBeInstanceOf(
        FetchTimeoutError
      );
      expect(requested).not.toHaveBeenCalled();
    });

    it("should report a missing token as an auth error", async () => {
      const unauthenticated = new GarminConnectSource({
        tokenProvider: new EnvTokenProvider({}),
        displayName: "runner",
        baseUrl: BASE,
      });

      await expect(unauthenticated.fetch("weight", "2025-03-10", "2025-03-10")).rejects.toThrow(
        "GARMIN_ACCESS_TOKEN is not set"
      );
    });
  });
});
