/**
 * withTimeout / LocalExecutor Unit Tests
 */

import { describe, it, expect } from "vitest";
import { ActionError, ExecutionTimeoutError } from "../utils/errors.js";
import type { ActionPayload } from "../types/index.js";
import { LocalExecutor } from "./LocalExecutor.js";
import { actionForCategory } from "./payload.js";
import { withTimeout } from "./withTimeout.js";

describe("withTimeout", () => {
  it("resolves with the call's result", async () => {
    await expect(withTimeout("lookup", 1000, async () => "ok")).resolves.toBe("ok");
  });

  it("rejects with ExecutionTimeoutError and aborts the call's signal", async () => {
    let seen: AbortSignal | undefined;
    const pending = withTimeout("send_message", 20, (signal) => {
      seen = signal;
      return new Promise<void>(() => undefined);
    });

    await expect(pending).rejects.toBeInstanceOf(ExecutionTimeoutError);
    await expect(pending).rejects.toMatchObject({ errorClass: "timeout", timeoutMs: 20 });
    expect(seen?.aborted).toBe(true);
  });

  it("passes through the call's own failure", async () => {
    const failure = new ActionError("denied", "auth");

    await expect(withTimeout("payment", 1000, async () => Promise.reject(failure))).rejects.toBe(failure);
  });
});

describe("actionForCategory", () => {
  it("maps categories onto actions", () => {
    expect(actionForCategory("payment")).toBe("payment");
    expect(actionForCategory("external-communication")).toBe("send_message");
    expect(actionForCategory("research")).toBe("record_task");
  });
});

describe("LocalExecutor", () => {
  const base: ActionPayload = {
    action: "record_task",
    service: "vault",
    critical: false,
    taskRef: "TASK_A",
    planRef: "PLAN_TASK_A",
    domain: "personal",
    source: "manual",
    priority: "medium",
    content: "Water the plants",
    draft: "Water the plants",
    metadata: {},
  };

  it("completes vault-local actions", async () => {
    await expect(new LocalExecutor().execute(base, { signal: new AbortController().signal })).resolves.toBeUndefined();
  });

  it("refuses actions that need an external service", async () => {
    const execution = new LocalExecutor().execute(
      { ...base, action: "payment", service: "payments", critical: true },
      { signal: new AbortController().signal }
    );

    await expect(execution).rejects.toMatchObject({
      errorClass: "missing_credential",
      message: "No integration configured for payments",
    });
  });
});
