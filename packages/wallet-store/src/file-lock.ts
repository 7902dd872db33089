/**
 * Advisory, file-scoped exclusive lock.
 *
 * The lock is a sibling `<path>.lock` file created with O_CREAT|O_EXCL and
 * stamped with a random owner token. Acquisition never waits: a held lock
 * is reported as a ConflictError and the caller retries the whole
 * operation from a fresh load.
 *
 * A lock older than `staleMs` belonged to a crashed process. It is broken
 * by renaming it aside, never by unlinking the shared path, and its age
 * is checked again on the renamed copy: a lock that turned out to be
 * fresh is linked back. Release only removes a lock file that still
 * carries the holder's token.
 */

import { randomUUID } from "node:crypto";
import {
  closeSync,
  linkSync,
  openSync,
  readFileSync,
  renameSync,
  statSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { z } from "zod";
import { ConflictError } from "@linkvault/types";

export interface FileLockOptions {
  /** Age after which an existing lock is treated as abandoned */
  readonly staleMs: number;
  readonly now: () => Date;
  /** Called when an abandoned lock is about to be broken */
  readonly onStale?: ((lockPath: string, ageMs: number) => void) | undefined;
  /** Called on release when the lock file no longer carries our token */
  readonly onLost?: ((lockPath: string) => void) | undefined;
}

export interface FileLock {
  readonly lockPath: string;
  /** Written into the lock file; identifies this holder */
  readonly token: string;
  release(): void;
}

const LockOwnerSchema = z.object({ token: z.string() });

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function tryCreate(lockPath: string, token: string, now: Date): boolean {
  let fd: number;
  try {
    fd = openSync(lockPath, "wx", 0o600);
  } catch (err: unknown) {
    if (errnoCode(err) === "EEXIST") {
      return false;
    }
    throw err;
  }
  try {
    writeSync(fd, JSON.stringify({ pid: process.pid, token, acquiredAt: now.toISOString() }));
  } finally {
    closeSync(fd);
  }
  return true;
}

function removeIfPresent(path: string): void {
  try {
    unlinkSync(path);
  } catch (err: unknown) {
    if (errnoCode(err) !== "ENOENT") {
      throw err;
    }
  }
}

/** Milliseconds since the file was last written; undefined once it is gone. */
function ageOf(path: string, now: Date): number | undefined {
  try {
    return now.getTime() - statSync(path).mtimeMs;
  } catch (err: unknown) {
    if (errnoCode(err) !== "ENOENT") throw err;
    return undefined;
  }
}

/** Token recorded in a lock file, undefined if it is missing or unreadable. */
function ownerToken(lockPath: string): string | undefined {
  let text: string;
  try {
    text = readFileSync(lockPath, "utf-8");
  } catch (err: unknown) {
    if (errnoCode(err) !== "ENOENT") throw err;
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  const owner = LockOwnerSchema.safeParse(parsed);
  return owner.success ? owner.data.token : undefined;
}

/**
 * Move a stale lock out of the way.
 *
 * @returns false when the moved file was fresh after all and went back
 */
function breakStaleLock(lockPath: string, token: string, options: FileLockOptions): boolean {
  const aside = `${lockPath}.${token}.stale`;
  try {
    renameSync(lockPath, aside);
  } catch (err: unknown) {
    // Another writer broke it first
    if (errnoCode(err) === "ENOENT") return true;
    throw err;
  }

  const ageMs = ageOf(aside, options.now());
  if (ageMs !== undefined && ageMs <= options.staleMs) {
    try {
      linkSync(aside, lockPath);
    } catch (err: unknown) {
      if (errnoCode(err) !== "EEXIST") throw err;
    }
    removeIfPresent(aside);
    return false;
  }

  removeIfPresent(aside);
  return true;
}

/**
 * Acquire the lock guarding `targetPath`.
 *
 * @throws ConflictError if another writer holds a fresh lock
 */
export function acquireFileLock(targetPath: string, options: FileLockOptions): FileLock {
  const lockPath = `${targetPath}.lock`;
  const token = randomUUID();
  const now = options.now();
  const busy = () => new ConflictError(`Wallet ${targetPath} is locked by another writer`);

  if (!tryCreate(lockPath, token, now)) {
    // Released between our attempt and the stat
    const ageMs = ageOf(lockPath, now) ?? Number.POSITIVE_INFINITY;
    if (ageMs <= options.staleMs) {
      throw busy();
    }

    options.onStale?.(lockPath, ageMs);
    if (!breakStaleLock(lockPath, token, options) || !tryCreate(lockPath, token, now)) {
      throw busy();
    }
  }

  let released = false;
  return {
    lockPath,
    token,
    release: () => {
      if (released) return;
      released = true;
      if (ownerToken(lockPath) !== token) {
        options.onLost?.(lockPath);
        return;
      }
      removeIfPresent(lockPath);
    },
  };
}

export { errnoCode };
