// Append-only audit log, one JSON-lines segment per UTC day

import fs from "fs/promises";
import path from "path";
import { Value } from "@sinclair/typebox/value";
import { AuditEntrySchema } from "../types/schemas.js";
import type { AuditActionType, AuditEntry, ApprovalStatus, Clock } from "../types/index.js";
import { StateStoreError } from "../utils/errors.js";
import { listDir, readTextIfExists } from "../utils/fs.js";
import type { LayerLogger } from "../utils/logger.js";

const SEGMENT_SUFFIX = ".jsonl";

export interface AuditInput {
  actionType: AuditActionType;
  actor: string;
  target: string;
  parameters?: Record<string, unknown>;
  approvalStatus?: ApprovalStatus | "n_a";
  result?: AuditEntry["result"];
  error?: string | null;
}

/**
 * Writes are serialized through a single promise chain so entries land in
 * call order, and timestamps never go backwards within a segment.
 */
export class AuditLog {
  private auditDir: string;
  private clock: Clock;
  private logger?: LayerLogger;
  private lastTimestamp = "";
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(auditDir: string, deps: { clock?: Clock; logger?: LayerLogger } = {}) {
    this.auditDir = auditDir;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;
  }

  async append(input: AuditInput): Promise<AuditEntry> {
    const run = this.writeChain.then(() => this.write(input));
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private async write(input: AuditInput): Promise<AuditEntry> {
    let timestamp = this.clock().toISOString();
    if (timestamp < this.lastTimestamp) {
      timestamp = this.lastTimestamp;
    }

    const entry: AuditEntry = {
      timestamp,
      actionType: input.actionType,
      actor: input.actor,
      target: input.target,
      parameters: input.parameters ?? {},
      approvalStatus: input.approvalStatus ?? "n_a",
      result: input.result ?? "success",
      error: input.error ?? null,
    };

    const segmentPath = this.segmentPath(timestamp.slice(0, 10));
    try {
      await fs.mkdir(this.auditDir, { recursive: true });
      await fs.appendFile(segmentPath, JSON.stringify(entry) + "\n", "utf-8");
    } catch (error) {
      throw new StateStoreError(
        `Failed to append audit entry (${error instanceof Error ? error.message : String(error)})`,
        segmentPath
      );
    }

    this.lastTimestamp = timestamp;
    this.logger?.debug(`audit ${entry.actionType} ${entry.target}`, { result: entry.result });
    return entry;
  }

  /**
   * Record a task status change with its from/to states.
   */
  async statusTransition(actor: string, target: string, from: string, to: string): Promise<AuditEntry> {
    return this.append({
      actionType: "status_transition",
      actor,
      target,
      parameters: { from, to },
    });
  }

  /**
   * Segment dates present on disk, oldest first (YYYY-MM-DD).
   */
  async listSegments(): Promise<string[]> {
    const files = await listDir(this.auditDir);
    return files
      .filter((f) => f.endsWith(SEGMENT_SUFFIX))
      .map((f) => f.slice(0, -SEGMENT_SUFFIX.length))
      .sort();
  }

  async readSegment(date: string): Promise<AuditEntry[]> {
    const segmentPath = this.segmentPath(date);
    const raw = await readTextIfExists(segmentPath);
    if (raw === null) {
      return [];
    }

    const entries: AuditEntry[] = [];
    const lines = raw.split("\n");
    for (const [index, line] of lines.entries()) {
      if (!line.trim()) {
        continue;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        throw new StateStoreError(`Malformed audit line ${index + 1}`, segmentPath);
      }
      if (!Value.Check(AuditEntrySchema, parsed)) {
        throw new StateStoreError(`Invalid audit entry on line ${index + 1}`, segmentPath);
      }
      entries.push(parsed);
    }
    return entries;
  }

  /**
   * The last `n` entries across all segments, newest first.
   */
  async recent(n: number): Promise<AuditEntry[]> {
    const segments = (await this.listSegments()).reverse();
    const collected: AuditEntry[] = [];

    for (const date of segments) {
      const entries = await this.readSegment(date);
      collected.push(...entries.reverse());
      if (collected.length >= n) {
        break;
      }
    }

    return collected.slice(0, n);
  }

  private segmentPath(date: string): string {
    return path.join(this.auditDir, `${date}${SEGMENT_SUFFIX}`);
  }
}
