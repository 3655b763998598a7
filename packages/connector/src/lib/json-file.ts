/**
 * JSON file helpers
 *
 * Writes go to a temporary sibling and are renamed over the live file, so
 * readers see either the previous or the new content, never a partial one.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { dirname } from "node:path";

export type JsonReadResult =
  | { status: "missing" }
  | { status: "ok"; data: unknown }
  | { status: "invalid"; reason: string };

/**
 * Read and parse a JSON file without throwing on absence or bad syntax.
 */
export async function readJsonFile(path: string): Promise<JsonReadResult> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      return { status: "missing" };
    }
    throw error;
  }

  try {
    return { status: "ok", data: JSON.parse(text) };
  } catch (error) {
    return { status: "invalid", reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Replace a JSON file atomically (write temporary, then rename).
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });

  const tmpPath = `${path}.tmp-${process.pid}-${randomBytes(4).toString("hex")}`;
  try {
    await writeFile(tmpPath, JSON.stringify(data, null, 2) + "\n", "utf8");
    await rename(tmpPath, path);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Move a bad file aside so the next read starts empty.
 *
 * @returns Path of the quarantined file
 */
export async function quarantineFile(path: string, now: Date = new Date()): Promise<string> {
  const target = `${path}.corrupt-${now.getTime()}`;
  await rename(path, target);
  return target;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
