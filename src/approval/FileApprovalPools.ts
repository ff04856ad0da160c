// Approval pools as three directories: pending/, approved/, rejected/

import fs from "fs/promises";
import path from "path";
import { ApprovalRequestSchema } from "../types/schemas.js";
import type { ApprovalRequest } from "../types/index.js";
import type { VaultPaths } from "../store/StateStore.js";
import { isNotFound, listDir, readJsonDocument, writeFileAtomic, writeJsonAtomic } from "../utils/fs.js";
import { StateStoreError } from "../utils/errors.js";
import { APPROVAL_POOLS, type ApprovalPool, type ApprovalSignalSource } from "./types.js";

const ARTIFACT_SUFFIX = ".md";

export class FileApprovalPools implements ApprovalSignalSource {
  constructor(private dirs: VaultPaths["approvals"]) {}

  async listIds(pool: ApprovalPool): Promise<string[]> {
    const files = await listDir(this.dirs[pool]);
    return files.filter((f) => f.endsWith(ARTIFACT_SUFFIX)).map((f) => f.slice(0, -ARTIFACT_SUFFIX.length));
  }

  async readRequest(id: string, pool: ApprovalPool): Promise<ApprovalRequest | null> {
    return readJsonDocument(path.join(this.dirs[pool], `${id}.json`), ApprovalRequestSchema);
  }

  async locate(id: string): Promise<ApprovalPool | null> {
    for (const pool of APPROVAL_POOLS) {
      const artifact = path.join(this.dirs[pool], `${id}${ARTIFACT_SUFFIX}`);
      try {
        await fs.access(artifact);
        return pool;
      } catch (error) {
        if (!isNotFound(error)) {
          throw new StateStoreError(`Failed to stat approval artifact (${String(error)})`, artifact);
        }
      }
    }
    return null;
  }

  /**
   * Sidecar first, then the markdown artifact whose presence marks the request.
   */
  async publish(request: ApprovalRequest, rendered: string): Promise<void> {
    await writeJsonAtomic(path.join(this.dirs.pending, `${request.id}.json`), request);
    await writeFileAtomic(path.join(this.dirs.pending, `${request.id}${ARTIFACT_SUFFIX}`), rendered);
  }
}
