// Run lock: mutual exclusion on the State Store across cycles

import fs from "fs/promises";
import path from "path";
import { LockHeldError, StateStoreError } from "../utils/errors.js";
import { isNotFound, removeIfExists } from "../utils/fs.js";
import type { LayerLogger } from "../utils/logger.js";

interface LockInfo {
  pid: number;
  startedAt: string;
}

interface LockHolder {
  /** null when the file could not be parsed */
  info: LockInfo | null;
  ageMs: number;
}

/** An unparseable lock younger than this is treated as held */
const UNREADABLE_GRACE_MS = 60_000;

function hasCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Check whether a process is still alive.
 */
function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else
    return hasCode(error, "EPERM");
  }
}

function parseLockInfo(raw: string): LockInfo | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "pid" in parsed &&
      typeof parsed.pid === "number" &&
      "startedAt" in parsed &&
      typeof parsed.startedAt === "string"
    ) {
      return { pid: parsed.pid, startedAt: parsed.startedAt };
    }
    return null;
  } catch {
    return null;
  }
}

export class RunLock {
  private held = false;

  constructor(
    private lockPath: string,
    private logger?: LayerLogger
  ) {}

  /**
   * Take the lock, or throw LockHeldError when a live process holds it.
   * A lock left behind by a dead process is taken over.
   */
  async acquire(): Promise<void> {
    const info: LockInfo = { pid: process.pid, startedAt: new Date().toISOString() };
    try {
      await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    } catch (error) {
      throw new StateStoreError(`Failed to create vault root (${String(error)})`, this.lockPath);
    }

    for (let attempt = 0; attempt < 2; attempt++) {
      if (await this.publish(info)) {
        this.held = true;
        this.logger?.debug("Run lock acquired", { lockPath: this.lockPath });
        return;
      }

      const holder = await this.readHolder();
      if (!holder) {
        continue;
      }
      if (holder.info && isProcessRunning(holder.info.pid)) {
        throw new LockHeldError(this.lockPath, `pid ${holder.info.pid} since ${holder.info.startedAt}`);
      }
      if (!holder.info && holder.ageMs < UNREADABLE_GRACE_MS) {
        throw new LockHeldError(this.lockPath, "a holder still writing its lock");
      }

      this.logger?.warn("Removing stale run lock", { lockPath: this.lockPath, holder: holder.info });
      await removeIfExists(this.lockPath);
    }

    throw new LockHeldError(this.lockPath, "a concurrent cycle");
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    await removeIfExists(this.lockPath);
    this.held = false;
    this.logger?.debug("Run lock released", { lockPath: this.lockPath });
  }

  isHeld(): boolean {
    return this.held;
  }

  /**
   * Write the holder info to a temp file and hard-link it into place, so the
   * lock file never exists without its content. False when already taken.
   */
  private async publish(info: LockInfo): Promise<boolean> {
    const tempPath = `${this.lockPath}.${process.pid}.${Date.now()}.tmp`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(info));
      await fs.link(tempPath, this.lockPath);
      return true;
    } catch (error) {
      if (hasCode(error, "EEXIST")) {
        return false;
      }
      throw new StateStoreError(`Failed to create run lock (${String(error)})`, this.lockPath);
    } finally {
      await removeIfExists(tempPath);
    }
  }

  private async readHolder(): Promise<LockHolder | null> {
    try {
      const [raw, stat] = await Promise.all([fs.readFile(this.lockPath, "utf-8"), fs.stat(this.lockPath)]);
      return { info: parseLockInfo(raw), ageMs: Date.now() - stat.mtimeMs };
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new StateStoreError(`Failed to read run lock (${String(error)})`, this.lockPath);
    }
  }
}
