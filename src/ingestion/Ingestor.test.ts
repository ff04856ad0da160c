/**
 * Ingestor Unit Tests
 *
 * Deduplicated admission against a temporary vault.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { AuditLog } from "../audit/AuditLog.js";
import { StateStore } from "../store/StateStore.js";
import { Ingestor } from "./Ingestor.js";
import { compactTimestamp, computeDedupKey, retryTaskName, taskName } from "./identity.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");

describe("identity", () => {
  it("derives a stable 16-character key from source and content", () => {
    const key = computeDedupKey("manual", "Water the plants");

    expect(key).toMatch(/^[0-9a-f]{16}$/);
    expect(computeDedupKey("manual", "Water the plants")).toBe(key);
    expect(computeDedupKey("inbox", "Water the plants")).not.toBe(key);
  });

  it("formats compact timestamps", () => {
    expect(compactTimestamp(new Date("2026-10-19T10:15:00.000Z"))).toBe("20261019T101500");
  });

  it("names tasks and retries from the key prefix", () => {
    expect(taskName("0123456789abcdef", NOW)).toBe("TASK_20260302T090000_01234567");
    expect(retryTaskName("0123456789abcdef", 2, NOW)).toBe("RETRY2_20260302T090000_01234567");
  });
});

describe("Ingestor", () => {
  let root: string;
  let store: StateStore;
  let audit: AuditLog;
  let ingestor: Ingestor;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "taskvault-ingest-"));
    const clock = () => NOW;
    store = new StateStore(root, { clock });
    audit = new AuditLog(store.paths.audit, { clock });
    ingestor = new Ingestor(store, audit, { clock });
    await store.init();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe("admit", () => {
    it("creates a pending task with defaults", async () => {
      const result = await ingestor.admit({
        source: "manual",
        content: "Water the plants",
        metadata: { title: "Garden" },
        origin: "plants.md",
      });

      expect(result.status).toBe("accepted");
      if (result.status !== "accepted") return;

      const key = computeDedupKey("manual", "Water the plants");
      expect(result.task).toEqual({
        name: taskName(key, NOW),
        dedupKey: key,
        status: "pending",
        source: "manual",
        domain: "personal",
        sensitive: false,
        priority: "medium",
        retryCount: 0,
        retryAfter: null,
        planRefs: [],
        category: "",
        ruleApplied: "",
        metadata: { title: "Garden" },
        timestamps: { received: NOW.toISOString(), lastUpdated: NOW.toISOString() },
        content: "Water the plants",
      });
      expect(await store.getTask(result.task.name)).toEqual(result.task);
    });

    it("skips an item already in flight", async () => {
      await ingestor.admit({ source: "manual", content: "Water the plants" });
      const second = await ingestor.admit({ source: "manual", content: "Water the plants", origin: "again.md" });

      expect(second).toEqual({
        status: "skipped",
        reason: "in_flight",
        dedupKey: computeDedupKey("manual", "Water the plants"),
      });
      expect(await store.listActiveTasks()).toHaveLength(1);
    });

    it("skips an item whose task was archived", async () => {
      const first = await ingestor.admit({ source: "manual", content: "Water the plants" });
      if (first.status !== "accepted") throw new Error("expected admission");
      await store.archiveTask({ ...first.task, status: "complete" });

      const second = await ingestor.admit({ source: "manual", content: "Water the plants" });

      expect(second.status).toBe("skipped");
      if (second.status === "skipped") {
        expect(second.reason).toBe("archived");
      }
      expect(await store.listActiveTasks()).toEqual([]);
    });

    it("admits the same content from a different source", async () => {
      await ingestor.admit({ source: "manual", content: "Water the plants" });
      const other = await ingestor.admit({ source: "inbox", content: "Water the plants" });

      expect(other.status).toBe("accepted");
      expect(await store.listActiveTasks()).toHaveLength(2);
    });

    it("audits admissions and skips", async () => {
      await ingestor.admit({ source: "manual", content: "Water the plants", origin: "a.md" });
      await ingestor.admit({ source: "manual", content: "Water the plants", origin: "b.md" });

      const entries = await audit.readSegment("2026-03-02");
      expect(entries.map((e) => [e.actionType, e.result])).toEqual([
        ["file_write", "success"],
        ["dedup_skip", "skip"],
      ]);
      expect(entries[1]?.target).toBe("b.md");
      expect(entries[1]?.parameters).toMatchObject({ reason: "in_flight", source: "manual" });
    });
  });
});
