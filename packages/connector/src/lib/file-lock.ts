/**
 * Cross-process lock file
 *
 * Created with O_EXCL; holds the owner pid, acquisition time and a token.
 * A lock older than `staleAfterMs` is assumed abandoned and replaced. A lock
 * whose content cannot be read yet (its owner is still writing it) is aged
 * by its mtime instead. Release only removes the file while it still
 * carries the holder's token.
 */

import { randomUUID } from "node:crypto";
import { open, readFile, rm, mkdir, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { setupLogger } from "./logger.js";
import { isNotFound } from "./json-file.js";

const logger = setupLogger("file-lock");

export const DEFAULT_STALE_LOCK_MS = 30 * 60 * 1000;

const lockContentSchema = z.object({
  pid: z.number(),
  acquiredAt: z.string(),
  token: z.string(),
});

type LockContent = z.infer<typeof lockContentSchema>;

export interface FileLock {
  readonly path: string;
  release(): Promise<void>;
}

export interface AcquireLockOptions {
  staleAfterMs?: number;
  now?: Date;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function tryCreate(path: string, content: LockContent): Promise<boolean> {
  try {
    const handle = await open(path, "wx");
    try {
      await handle.writeFile(JSON.stringify(content));
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isAlreadyExists(error)) {
      return false;
    }
    throw error;
  }
}

async function readLock(path: string): Promise<LockContent | null> {
  const text = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  const content = lockContentSchema.safeParse(parsed);
  return content.success ? content.data : null;
}

async function isStale(path: string, now: Date, staleAfterMs: number): Promise<boolean> {
  try {
    const content = await readLock(path);
    if (content !== null) {
      const acquiredAt = Date.parse(content.acquiredAt);
      if (!isNaN(acquiredAt)) {
        return now.getTime() - acquiredAt > staleAfterMs;
      }
    }
    // Empty or partly written: judge by when the file was last touched
    const { mtimeMs } = await stat(path);
    return now.getTime() - mtimeMs > staleAfterMs;
  } catch (error) {
    // Released between our open and read
    if (isNotFound(error)) return true;
    throw error;
  }
}

async function releaseIfOwned(path: string, token: string): Promise<void> {
  let content: LockContent | null;
  try {
    content = await readLock(path);
  } catch (error) {
    if (isNotFound(error)) return;
    throw error;
  }
  if (content === null || content.token !== token) {
    logger.warn(`Lock ${path} was taken over by another holder; leaving it in place`);
    return;
  }
  await rm(path, { force: true });
}

/**
 * Try to take the lock.
 *
 * @returns The held lock, or null when another holder owns it
 */
export async function acquireFileLock(
  path: string,
  options: AcquireLockOptions = {}
): Promise<FileLock | null> {
  const { staleAfterMs = DEFAULT_STALE_LOCK_MS, now = new Date() } = options;

  await mkdir(dirname(path), { recursive: true });

  const content: LockContent = { pid: process.pid, acquiredAt: now.toISOString(), token: randomUUID() };

  let acquired = await tryCreate(path, content);
  if (!acquired && (await isStale(path, now, staleAfterMs))) {
    logger.warn(`Replacing stale lock ${path}`);
    await rm(path, { force: true });
    acquired = await tryCreate(path, content);
  }

  if (!acquired) {
    logger.debug(`Lock ${path} is held by another process`);
    return null;
  }

  return {
    path,
    release: () => releaseIfOwned(path, content.token),
  };
}
