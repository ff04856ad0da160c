// Reads raw items dropped into the vault inbox

import path from "path";
import { z } from "zod";
import type { IngestItem, TaskSource } from "../types/index.js";
import { listDir, readTextIfExists, removeIfExists } from "../utils/fs.js";
import { errorMessage } from "../utils/errors.js";
import { formatIssues } from "../config/index.js";
import type { LayerLogger } from "../utils/logger.js";

const META_SUFFIX = ".meta.json";
const CONTENT_EXTENSIONS = [".md", ".txt"];

const InboxMetaSchema = z
  .object({
    source: z
      .enum(["inbox", "external-email", "external-social", "business-messaging", "personal-messaging", "manual"])
      .default("inbox"),
  })
  .catchall(z.union([z.string(), z.number(), z.boolean()]));

export interface InboxItem extends IngestItem {
  origin: string;
}

/**
 * An inbox item is `<name>.md` or `<name>.txt`, optionally with a
 * `<name>.meta.json` carrying its source and header fields.
 */
export class InboxReader {
  constructor(
    private inboxDir: string,
    private logger?: LayerLogger
  ) {}

  async read(): Promise<InboxItem[]> {
    const files = await listDir(this.inboxDir);
    const items: InboxItem[] = [];

    for (const file of files) {
      const ext = path.extname(file);
      if (!CONTENT_EXTENSIONS.includes(ext)) {
        continue;
      }
      const content = await readTextIfExists(path.join(this.inboxDir, file));
      if (content === null) {
        continue;
      }
      const base = file.slice(0, -ext.length);
      const meta = await this.readMeta(base);
      if (!meta) {
        // Left in the inbox until its metadata is fixed
        continue;
      }
      items.push({ origin: file, source: meta.source, content, metadata: meta.metadata });
    }

    this.logger?.debug("Inbox scanned", { items: items.length });
    return items;
  }

  /**
   * Remove a processed item and its metadata from the inbox.
   */
  async acknowledge(item: InboxItem): Promise<void> {
    const ext = path.extname(item.origin);
    await removeIfExists(path.join(this.inboxDir, item.origin));
    await removeIfExists(path.join(this.inboxDir, `${item.origin.slice(0, -ext.length)}${META_SUFFIX}`));
  }

  private async readMeta(base: string): Promise<{ source: TaskSource; metadata: Record<string, string> } | null> {
    const metaPath = path.join(this.inboxDir, `${base}${META_SUFFIX}`);
    const raw = await readTextIfExists(metaPath);
    if (raw === null) {
      return { source: "inbox", metadata: {} };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger?.warn("Malformed inbox metadata", { file: metaPath, error: errorMessage(error) });
      return null;
    }

    const result = InboxMetaSchema.safeParse(parsed);
    if (!result.success) {
      this.logger?.warn("Invalid inbox metadata", { file: metaPath, issues: formatIssues(result.error.issues) });
      return null;
    }

    const { source, ...fields } = result.data;
    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(fields)) {
      metadata[key] = String(value);
    }
    return { source, metadata };
  }
}
