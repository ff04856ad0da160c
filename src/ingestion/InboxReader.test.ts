/**
 * InboxReader Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { InboxReader } from "./InboxReader.js";

describe("InboxReader", () => {
  let inbox: string;
  let reader: InboxReader;

  beforeEach(async () => {
    inbox = await fs.mkdtemp(path.join(os.tmpdir(), "taskvault-inbox-"));
    reader = new InboxReader(inbox);
  });

  afterEach(async () => {
    await fs.rm(inbox, { recursive: true, force: true });
  });

  it("reads markdown and text items, defaulting the source to inbox", async () => {
    await fs.writeFile(path.join(inbox, "a.md"), "Water the plants");
    await fs.writeFile(path.join(inbox, "b.txt"), "Call the plumber");
    await fs.writeFile(path.join(inbox, "ignored.pdf"), "binary");

    const items = await reader.read();

    expect(items).toEqual([
      { origin: "a.md", source: "inbox", content: "Water the plants", metadata: {} },
      { origin: "b.txt", source: "inbox", content: "Call the plumber", metadata: {} },
    ]);
  });

  it("takes source and header fields from the metadata file", async () => {
    await fs.writeFile(path.join(inbox, "mail.md"), "See attached");
    await fs.writeFile(
      path.join(inbox, "mail.meta.json"),
      JSON.stringify({ source: "external-email", subject: "Invoice #42", attachments: 2 })
    );

    const [item] = await reader.read();

    expect(item).toEqual({
      origin: "mail.md",
      source: "external-email",
      content: "See attached",
      metadata: { subject: "Invoice #42", attachments: "2" },
    });
  });

  it("leaves items with invalid metadata in the inbox", async () => {
    await fs.writeFile(path.join(inbox, "bad.md"), "Hello");
    await fs.writeFile(path.join(inbox, "bad.meta.json"), JSON.stringify({ source: "carrier-pigeon" }));
    await fs.writeFile(path.join(inbox, "broken.md"), "Hello again");
    await fs.writeFile(path.join(inbox, "broken.meta.json"), "{not json");

    expect(await reader.read()).toEqual([]);
    expect((await fs.readdir(inbox)).sort()).toEqual(["bad.md", "bad.meta.json", "broken.md", "broken.meta.json"]);
  });

  it("removes an acknowledged item and its metadata", async () => {
    await fs.writeFile(path.join(inbox, "mail.md"), "See attached");
    await fs.writeFile(path.join(inbox, "mail.meta.json"), JSON.stringify({ source: "manual" }));
    const [item] = await reader.read();
    if (!item) throw new Error("no item read");

    await reader.acknowledge(item);

    expect(await fs.readdir(inbox)).toEqual([]);
  });

  it("returns nothing for a missing inbox", async () => {
    const missing = new InboxReader(path.join(inbox, "nope"));

    expect(await missing.read()).toEqual([]);
  });
});
