// File helpers shared by the stores: atomic writes and schema-checked reads

import fs from "fs/promises";
import path from "path";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { StateStoreError } from "./errors.js";

/**
 * Write a file by writing a temp sibling and renaming it over the target,
 * so readers never observe a half-written document.
 */
export async function writeFileAtomic(targetPath: string, content: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.tmp.${process.pid}.${Date.now()}`;
    await fs.writeFile(tempPath, content, "utf-8");
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    throw new StateStoreError(`Failed to write (${describe(error)})`, targetPath);
  }
}

export async function writeJsonAtomic(targetPath: string, data: unknown): Promise<void> {
  await writeFileAtomic(targetPath, JSON.stringify(data, null, 2) + "\n");
}

/**
 * Read and validate a JSON document. Returns null when the file does not exist;
 * any other read, parse or schema failure is a StateStoreError.
 */
export async function readJsonDocument<T extends TSchema>(
  filePath: string,
  schema: T
): Promise<Static<T> | null> {
  const raw = await readTextIfExists(filePath);
  if (raw === null) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StateStoreError(`Malformed JSON (${describe(error)})`, filePath);
  }

  if (!Value.Check(schema, parsed)) {
    const first = Value.Errors(schema, parsed).First();
    const detail = first ? `${first.path || "/"} ${first.message}` : "schema mismatch";
    throw new StateStoreError(`Invalid document (${detail})`, filePath);
  }

  return parsed;
}

export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw new StateStoreError(`Failed to read (${describe(error)})`, filePath);
  }
}

/**
 * List file names in a directory; a missing directory lists as empty.
 */
export async function listDir(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.filter((e) => e.isFile()).map((e) => e.name).sort();
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw new StateStoreError(`Failed to list (${describe(error)})`, dirPath);
  }
}

export async function removeIfExists(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isNotFound(error)) {
      throw new StateStoreError(`Failed to remove (${describe(error)})`, filePath);
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
