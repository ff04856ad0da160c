/**
 * DeferredQueue Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import type { DeferredEntry } from "../types/index.js";
import { StateStoreError } from "../utils/errors.js";
import { DeferredQueue } from "./DeferredQueue.js";

function entry(id: string): DeferredEntry {
  return {
    id,
    action: "payment",
    service: "payments",
    error: "credentials revoked",
    errorClass: "auth",
    actor: "escalation",
    payload: {
      action: "payment",
      service: "payments",
      critical: true,
      taskRef: "TASK_A",
      planRef: "PLAN_TASK_A",
      domain: "business",
      source: "business-messaging",
      priority: "high",
      content: "Please wire $500 to vendor X",
      draft: "Please wire $500 to vendor X",
      metadata: {},
    },
    queuedAt: "2026-03-02T09:00:00.000Z",
    updatedAt: "2026-03-02T09:00:00.000Z",
    status: "deferred",
    alertRef: `ALERT_${id}`,
  };
}

describe("DeferredQueue", () => {
  let dir: string;
  let file: string;
  let now: Date;
  let queue: DeferredQueue;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "taskvault-deferred-"));
    file = path.join(dir, "deferred_queue.json");
    now = new Date("2026-03-02T09:00:00.000Z");
    queue = new DeferredQueue(file, { clock: () => now });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file does not exist", async () => {
    expect(await queue.list()).toEqual([]);
  });

  it("persists entries as a single document", async () => {
    await queue.add(entry("D1"));
    await queue.add(entry("D2"));

    const doc: unknown = JSON.parse(await fs.readFile(file, "utf-8"));
    expect(doc).toEqual({ entries: [entry("D1"), entry("D2")] });
    expect(await new DeferredQueue(file).get("D2")).toEqual(entry("D2"));
  });

  it("refuses a duplicate id", async () => {
    await queue.add(entry("D1"));

    await expect(queue.add(entry("D1"))).rejects.toBeInstanceOf(StateStoreError);
    expect(await queue.list()).toHaveLength(1);
  });

  it("updates status and stamps updatedAt", async () => {
    await queue.add(entry("D1"));
    now = new Date("2026-03-02T10:00:00.000Z");

    const updated = await queue.update("D1", { status: "retried" });

    expect(updated.status).toBe("retried");
    expect(updated.updatedAt).toBe("2026-03-02T10:00:00.000Z");
    expect(updated.payload).toEqual(entry("D1").payload);
    expect(await queue.listByStatus("retried")).toEqual([updated]);
  });

  it("serializes concurrent mutations", async () => {
    await Promise.all([queue.add(entry("D1")), queue.add(entry("D2")), queue.add(entry("D3"))]);

    expect((await queue.list()).map((e) => e.id)).toEqual(["D1", "D2", "D3"]);
  });

  it("fails to update an unknown entry", async () => {
    await expect(queue.update("missing", { status: "resolved" })).rejects.toBeInstanceOf(StateStoreError);
  });
});
