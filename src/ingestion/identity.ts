import { createHash } from "node:crypto";
import type { TaskSource } from "../types/index.js";

/**
 * Stable identity of an item: the same source and content always hash to the same key.
 */
export function computeDedupKey(source: TaskSource, content: string): string {
  return createHash("sha256").update(`${source}\n${content}`).digest("hex").substring(0, 16);
}

/**
 * `2026-10-19T10:15:00.000Z` -> `20261019T101500`
 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").substring(0, 15);
}

export function taskName(dedupKey: string, received: Date): string {
  return `TASK_${compactTimestamp(received)}_${dedupKey.substring(0, 8)}`;
}

export function retryTaskName(dedupKey: string, retryCount: number, created: Date): string {
  return `RETRY${retryCount}_${compactTimestamp(created)}_${dedupKey.substring(0, 8)}`;
}
