/**
 * Crash-safe file replacement: write a sibling temp file, fsync it, then
 * rename it over the target. Readers see either the old or the new file,
 * never a torn one.
 */

import { closeSync, fsyncSync, openSync, renameSync, rmSync, writeSync } from "node:fs";
import { randomBytes } from "node:crypto";

export function writeFileAtomic(targetPath: string, data: string): void {
  const tmpPath = `${targetPath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;

  const fd = openSync(tmpPath, "w", 0o600);
  try {
    writeSync(fd, data, null, "utf-8");
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }

  try {
    renameSync(tmpPath, targetPath);
  } catch (err: unknown) {
    rmSync(tmpPath, { force: true });
    throw err;
  }
}
