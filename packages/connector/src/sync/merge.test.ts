import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { advanceLastSeen, MergeEngine } from "./merge.js";
import { LocalStore } from "../db/local-store.js";
import { activityRecord, sleepRecord, stepsRecord, weightRecord } from "../testing/fixtures.js";

describe("advanceLastSeen", () => {
  it("should take the highest timestamp", () => {
    expect(
      advanceLastSeen("2025-03-01", [weightRecord("2025-03-04", 80), weightRecord("2025-03-02", 81)])
    ).toBe("2025-03-04");
  });

  it("should never move backwards", () => {
    expect(advanceLastSeen("2025-03-05", [weightRecord("2025-03-02", 81)])).toBe("2025-03-05");
    expect(advanceLastSeen("2025-03-05", [])).toBe("2025-03-05");
  });

  it("should stay null when nothing was ever seen", () => {
    expect(advanceLastSeen(null, [])).toBeNull();
  });

  it("should compare activity start times", () => {
    expect(
      advanceLastSeen("2025-03-05T07:00:00", [activityRecord("2025-03-05T18:30:00", "a2")])
    ).toBe("2025-03-05T18:30:00");
  });
});

describe("MergeEngine", () => {
  let dataDir: string;
  let store: LocalStore;
  let engine: MergeEngine;
  let current: Date;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), "health-merge-"));
    current = new Date("2025-03-10T12:00:00Z");
    store = new LocalStore({ dataDir });
    engine = new MergeEngine(store, () => current);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it("should store a bootstrap batch and record the latest timestamp", async () => {
    const result = await engine.merge("weight", [
      weightRecord("2025-03-01", 80.5),
      weightRecord("2025-03-03", 80.1),
      weightRecord("2025-03-02", 80.3),
    ]);

    expect(result.changedCount).toBe(3);
    expect(result.freshness).toEqual({
      lastSyncedAt: "2025-03-10T12:00:00.000Z",
      lastRemoteTimestampSeen: "2025-03-03",
    });
    expect(await store.read("weight")).toHaveLength(3);
    expect(await store.freshness("weight")).toEqual(result.freshness);
  });

  it("should be idempotent for the same batch", async () => {
    const batch = [stepsRecord("2025-03-09", 8000), stepsRecord("2025-03-10", 4000)];
    await engine.merge("steps", batch);
    const before = await readFile(store.seriesPath("steps"), "utf8");

    current = new Date("2025-03-10T12:15:00Z");
    const second = await engine.merge("steps", batch);

    expect(second.changedCount).toBe(0);
    expect(second.changes).toEqual([]);
    expect(await readFile(store.seriesPath("steps"), "utf8")).toBe(before);
    expect(second.freshness?.lastSyncedAt).toBe("2025-03-10T12:15:00.000Z");
  });

  it("should replace a record whose revision changed", async () => {
    await engine.merge("steps", [stepsRecord("2025-03-10", 4000)]);

    const result = await engine.merge("steps", [stepsRecord("2025-03-10", 4050)]);

    expect(result.changedCount).toBe(1);
    expect(result.changes[0].previous?.timestamp).toBe("2025-03-10");
    const stored = await store.read("steps");
    expect(stored).toHaveLength(1);
    expect(stored[0].sourceRevision).toBe("steps-4050");
  });

  it("should keep the last seen timestamp when a later fetch is empty", async () => {
    await engine.merge("weight", [weightRecord("2025-03-08", 80)]);

    current = new Date("2025-03-10T13:00:00Z");
    const result = await engine.merge("weight", []);

    expect(result.changedCount).toBe(0);
    expect(result.freshness).toEqual({
      lastSyncedAt: "2025-03-10T13:00:00.000Z",
      lastRemoteTimestampSeen: "2025-03-08",
    });
  });

  it("should keep the last seen timestamp when a later fetch covers only older dates", async () => {
    await engine.merge("weight", [weightRecord("2025-03-08", 80)]);

    const result = await engine.merge("weight", [weightRecord("2025-03-06", 80.4)]);

    expect(result.changedCount).toBe(1);
    expect(result.freshness?.lastRemoteTimestampSeen).toBe("2025-03-08");
  });

  it("should record a check with no data as null last seen", async () => {
    const result = await engine.merge("stress", []);

    expect(result.freshness?.lastRemoteTimestampSeen).toBeNull();
    expect(await store.freshness("stress")).not.toBeNull();
  });

  it("should record where an unfinished download resumes", async () => {
    const result = await engine.merge("weight", [weightRecord("2025-01-05", 80)], { resumeFrom: "2025-01-11" });

    expect(await store.freshness("weight")).toEqual({
      lastSyncedAt: "2025-03-10T12:00:00.000Z",
      lastRemoteTimestampSeen: "2025-01-05",
      resumeFrom: "2025-01-11",
    });
    expect(result.recovered).toBe(false);
  });

  it("should drop the resume point once the last chunk is merged", async () => {
    await engine.merge("weight", [weightRecord("2025-01-05", 80)], { resumeFrom: "2025-01-11" });

    await engine.merge("weight", [weightRecord("2025-03-08", 79.5)]);

    expect(await store.freshness("weight")).toEqual({
      lastSyncedAt: "2025-03-10T12:00:00.000Z",
      lastRemoteTimestampSeen: "2025-03-08",
    });
  });

  it("should leave freshness cleared when the series had to be recovered", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    await engine.merge("sleep", [sleepRecord("2025-03-09", 7.5)]);
    await store.setFreshness("sleep", {
      lastSyncedAt: "2025-03-10T11:00:00.000Z",
      lastRemoteTimestampSeen: "2025-03-09",
    });
    await writeFile(store.seriesPath("sleep"), "{ not json");

    const result = await engine.merge("sleep", []);

    expect(result.recovered).toBe(true);
    expect(result.freshness).toBeNull();
    expect(await store.freshness("sleep")).toBeNull();
  });
});
