import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LocalStore } from "./local-store.js";
import { setLogLevel } from "../lib/logger.js";
import { sleepRecord, stepsRecord, stressRecord, weightRecord } from "../testing/fixtures.js";

describe("LocalStore", () => {
  let dataDir: string;
  let store: LocalStore;

  beforeEach(async () => {
    setLogLevel("info");
    dataDir = await mkdtemp(join(tmpdir(), "health-store-"));
    store = new LocalStore({ dataDir, clock: () => new Date("2025-03-10T12:00:00Z") });
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  describe("read", () => {
    it("should return an empty series for a kind never written", async () => {
      expect(await store.read("weight")).toEqual([]);
    });

    it("should return records ordered by timestamp", async () => {
      await store.upsert("weight", [
        weightRecord("2025-03-03", 80.1),
        weightRecord("2025-03-01", 80.5),
        weightRecord("2025-03-02", 80.3),
      ]);

      const records = await store.read("weight");

      expect(records.map((r) => r.timestamp)).toEqual(["2025-03-01", "2025-03-02", "2025-03-03"]);
    });

    it("should filter by an inclusive date range", async () => {
      await store.upsert("weight", [
        weightRecord("2025-03-01", 80.5),
        weightRecord("2025-03-02", 80.3),
        weightRecord("2025-03-03", 80.1),
        weightRecord("2025-03-04", 79.9),
      ]);

      const records = await store.read("weight", { start: "2025-03-02", end: "2025-03-03" });

      expect(records.map((r) => r.timestamp)).toEqual(["2025-03-02", "2025-03-03"]);
    });
  });

  describe("upsert", () => {
    it("should count inserted and updated records", async () => {
      await store.upsert("steps", [stepsRecord("2025-03-01", 4000)]);

      const result = await store.upsert("steps", [
        stepsRecord("2025-03-01", 4500),
        stepsRecord("2025-03-02", 7000),
      ]);

      expect(result.inserted).toBe(1);
      expect(result.updated).toBe(1);
      expect(result.changed).toBe(2);
      expect(result.changes[0].previous?.sourceRevision).toBe("steps-4000");
      expect(result.changes[0].current.sourceRevision).toBe("steps-4500");
      expect(result.changes[1].previous).toBeNull();
    });

    it("should skip records whose revision is unchanged", async () => {
      await store.upsert("steps", [stepsRecord("2025-03-01", 4000)]);

      const result = await store.upsert("steps", [stepsRecord("2025-03-01", 4000)]);

      expect(result.changed).toBe(0);
      expect(result.changes).toEqual([]);
    });

    it("should keep one record per timestamp", async () => {
      await store.upsert("steps", [stepsRecord("2025-03-01", 100)]);
      await store.upsert("steps", [stepsRecord("2025-03-01", 200)]);
      await store.upsert("steps", [stepsRecord("2025-03-01", 300)]);

      const records = await store.read("steps");

      expect(records).toHaveLength(1);
      expect(records[0].sourceRevision).toBe("steps-300");
    });

    it("should ignore records of another kind", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});

      const result = await store.upsert("steps", [weightRecord("2025-03-01", 80)]);

      expect(result.changed).toBe(0);
      expect(await store.read("steps")).toEqual([]);
    });

    it("should leave no temporary files behind", async () => {
      await store.upsert("sleep", [sleepRecord("2025-03-01", 7.5)]);

      const files = await readdir(join(dataDir, "series"));

      expect(files).toEqual(["sleep.json"]);
    });

    it("should serialize concurrent upserts to the same kind", async () => {
      await Promise.all([
        store.upsert("steps", [stepsRecord("2025-03-01", 1000)]),
        store.upsert("steps", [stepsRecord("2025-03-02", 2000)]),
        store.upsert("steps", [stepsRecord("2025-03-03", 3000)]),
      ]);

      const records = await store.read("steps");

      expect(records.map((r) => r.timestamp)).toEqual(["2025-03-01", "2025-03-02", "2025-03-03"]);
    });
  });

  describe("freshness", () => {
    it("should be null before the first merge", async () => {
      expect(await store.freshness("steps")).toBeNull();
    });

    it("should persist per-kind state", async () => {
      await store.setFreshness("steps", {
        lastSyncedAt: "2025-03-10T12:00:00.000Z",
        lastRemoteTimestampSeen: "2025-03-10",
      });
      await store.setFreshness("sleep", {
        lastSyncedAt: "2025-03-10T11:00:00.000Z",
        lastRemoteTimestampSeen: null,
      });

      const reopened = new LocalStore({ dataDir });

      expect(await reopened.freshness("steps")).toEqual({
        lastSyncedAt: "2025-03-10T12:00:00.000Z",
        lastRemoteTimestampSeen: "2025-03-10",
      });
      expect((await reopened.allFreshness()).sleep?.lastRemoteTimestampSeen).toBeNull();
    });

    it("should clear one kind and keep the others", async () => {
      await store.setFreshness("steps", { lastSyncedAt: "2025-03-10T12:00:00.000Z", lastRemoteTimestampSeen: "2025-03-10" });
      await store.setFreshness("sleep", { lastSyncedAt: "2025-03-10T12:00:00.000Z", lastRemoteTimestampSeen: "2025-03-09" });

      await store.clearFreshness("steps");

      expect(await store.freshness("steps")).toBeNull();
      expect(await store.freshness("sleep")).not.toBeNull();
    });
  });

  describe("corruption recovery", () => {
    it("should quarantine a corrupt series, read it as empty and force a full re-sync", async () => {
      const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
      await store.upsert("sleep", [sleepRecord("2025-03-01", 7)]);
      await store.setFreshness("sleep", { lastSyncedAt: "2025-03-10T12:00:00.000Z", lastRemoteTimestampSeen: "2025-03-01" });
      await writeFile(store.seriesPath("sleep"), "{\"version\": 1, \"kind\": \"sleep\", \"records\": [");

      const records = await store.read("sleep");

      expect(records).toEqual([]);
      expect(await store.freshness("sleep")).toBeNull();
      const files = await readdir(join(dataDir, "series"));
      expect(files).toEqual([`sleep.json.corrupt-${Date.parse("2025-03-10T12:00:00Z")}`]);
      const warnings = consoleSpy.mock.calls.map((call) => String(call[0])).filter((line) => line.includes("WARN"));
      expect(warnings).toHaveLength(1);
      expect(warnings[0]).toContain("sleep will be fully re-synced");
    });

    it("should treat a schema mismatch as corrupt", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      await mkdir(join(dataDir, "series"), { recursive: true });
      await writeFile(
        store.seriesPath("weight"),
        JSON.stringify({ version: 1, kind: "weight", records: [{ kind: "weight", timestamp: "2025-03-01" }] })
      );

      expect(await store.read("weight")).toEqual([]);
    });

    it("should accept new data after recovery", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      await mkdir(join(dataDir, "series"), { recursive: true });
      await writeFile(store.seriesPath("weight"), "garbage");

      const result = await store.upsert("weight", [weightRecord("2025-03-05", 79)]);

      expect(result.inserted).toBe(1);
      expect(result.recovered).toBe(true);
      expect(await store.read("weight")).toHaveLength(1);
    });

    it("should report whether a series needed recovery", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      await store.upsert("stress", [stressRecord("2025-03-01", 30)]);
      await store.setFreshness("stress", { lastSyncedAt: "2025-03-10T12:00:00.000Z", lastRemoteTimestampSeen: "2025-03-01" });

      expect(await store.verify("stress")).toBe(true);
      expect(await store.verify("weight")).toBe(true);

      await writeFile(store.seriesPath("stress"), "{ not json");

      expect(await store.verify("stress")).toBe(false);
      expect(await store.freshness("stress")).toBeNull();
      expect(await store.verify("stress")).toBe(true);
    });

    it("should quarantine a corrupt freshness file and read every kind as absent", async () => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      await writeFile(store.freshnessPath, "[]");

      expect(await store.allFreshness()).toEqual({});
      const files = (await readdir(dataDir)).filter((f) => f.startsWith("freshness.json"));
      expect(files).toEqual([`freshness.json.corrupt-${Date.parse("2025-03-10T12:00:00Z")}`]);
    });

    it("should write freshness in the versioned layout", async () => {
      await store.setFreshness("stress", { lastSyncedAt: "2025-03-10T12:00:00.000Z", lastRemoteTimestampSeen: "2025-03-10" });

      const raw: unknown = JSON.parse(await readFile(store.freshnessPath, "utf8"));

      expect(raw).toEqual({
        version: 1,
        kinds: { stress: { lastSyncedAt: "2025-03-10T12:00:00.000Z", lastRemoteTimestampSeen: "2025-03-10" } },
      });
    });
  });
});
