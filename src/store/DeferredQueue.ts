// Persistent queue of actions that could not be completed

import { DeferredQueueDocumentSchema } from "../types/schemas.js";
import type { Clock, DeferredEntry, DeferredQueueDocument, DeferredStatus } from "../types/index.js";
import { readJsonDocument, writeJsonAtomic } from "../utils/fs.js";
import { StateStoreError } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";

export type DeferredEntryUpdate = Partial<Pick<DeferredEntry, "status" | "error" | "errorClass" | "alertRef">>;

/**
 * Single JSON document `{ entries: [...] }`. Every mutation reads the whole
 * document, changes it and writes it back atomically; mutations are serialized.
 */
export class DeferredQueue {
  private filePath: string;
  private clock: Clock;
  private logger?: LayerLogger;
  private mutationChain: Promise<unknown> = Promise.resolve();

  constructor(filePath: string, deps: { clock?: Clock; logger?: LayerLogger } = {}) {
    this.filePath = filePath;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;
  }

  async list(): Promise<DeferredEntry[]> {
    return (await this.load()).entries;
  }

  async listByStatus(status: DeferredStatus): Promise<DeferredEntry[]> {
    return (await this.list()).filter((e) => e.status === status);
  }

  async get(id: string): Promise<DeferredEntry | null> {
    return (await this.list()).find((e) => e.id === id) ?? null;
  }

  async add(entry: DeferredEntry): Promise<void> {
    await this.mutate((doc) => {
      if (doc.entries.some((e) => e.id === entry.id)) {
        throw new StateStoreError(`Deferred entry ${entry.id} already exists`, this.filePath);
      }
      doc.entries.push(entry);
      return entry;
    });
    this.logger?.info("Deferred entry queued", { id: entry.id, action: entry.action, service: entry.service });
  }

  async update(id: string, changes: DeferredEntryUpdate): Promise<DeferredEntry> {
    return this.mutate((doc) => {
      const index = doc.entries.findIndex((e) => e.id === id);
      const current = doc.entries[index];
      if (index < 0 || !current) {
        throw new StateStoreError(`Deferred entry not found: ${id}`, this.filePath);
      }
      const updated: DeferredEntry = { ...current, ...changes, updatedAt: this.clock().toISOString() };
      doc.entries[index] = updated;
      return updated;
    });
  }

  private async mutate<T>(fn: (doc: DeferredQueueDocument) => T): Promise<T> {
    const run = this.mutationChain.then(async () => {
      const doc = await this.load();
      const result = fn(doc);
      await writeJsonAtomic(this.filePath, doc);
      return result;
    });
    this.mutationChain = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<DeferredQueueDocument> {
    return (await readJsonDocument(this.filePath, DeferredQueueDocumentSchema)) ?? { entries: [] };
  }
}
