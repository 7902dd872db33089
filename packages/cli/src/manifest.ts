/**
 * The linkvault.json tool manifest written by `init` and checked by
 * `validate`.
 */

import { randomInt } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { AlreadyExistsError, NotFoundError, SchemaError } from "@linkvault/types";
import { writeFileAtomic } from "@linkvault/wallet-store";

export const DEFAULT_MANIFEST_FILE = "linkvault.json";
export const MANIFEST_VERSION = "1.0.0";

const TOOL_ID_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

export interface Manifest {
  readonly tool_id: string;
  readonly version: string;
  readonly settings: Record<string, unknown>;
  readonly endpoints: readonly unknown[];
}

/** Shape of a manifest that passed validateManifest. */
export const ManifestSchema = z
  .object({
    tool_id: z.string().min(8),
    version: z.string(),
    settings: z.record(z.unknown()).optional(),
    endpoints: z.array(z.unknown()).optional(),
  })
  .passthrough();

export function generateToolId(length = 12): string {
  let id = "";
  for (let i = 0; i < length; i++) {
    id += TOOL_ID_ALPHABET.charAt(randomInt(TOOL_ID_ALPHABET.length));
  }
  return id;
}

export function createManifest(toolId: string): Manifest {
  return { tool_id: toolId, version: MANIFEST_VERSION, settings: {}, endpoints: [] };
}

/**
 * @throws AlreadyExistsError unless `overwrite` is set
 */
export function writeManifest(path: string, manifest: Manifest, overwrite = false): void {
  if (existsSync(path) && !overwrite) {
    throw new AlreadyExistsError(`File already exists: ${path} (use --force to overwrite)`);
  }
  writeFileAtomic(path, `${JSON.stringify(manifest, null, 2)}\n`);
}

/**
 * @throws NotFoundError, SchemaError (not JSON)
 */
export function readManifest(path: string): unknown {
  if (!existsSync(path)) {
    throw new NotFoundError(`File not found: ${path}`);
  }
  try {
    return JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    throw new SchemaError(`File is not valid JSON: ${path}`);
  }
}

function has(obj: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

function isPlainObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Problems with a parsed manifest; empty when it is valid.
 */
export function validateManifest(data: unknown): string[] {
  if (!isPlainObject(data)) {
    return ["Manifest must be a JSON object"];
  }

  const errors: string[] = [];
  for (const field of ["tool_id", "version"]) {
    if (!has(data, field)) {
      errors.push(`Missing required field: '${field}'`);
    }
  }

  const toolId: unknown = Reflect.get(data, "tool_id");
  if (has(data, "tool_id") && (typeof toolId !== "string" || toolId.length < 8)) {
    errors.push("Invalid tool_id: Must be a string of at least 8 characters");
  }
  if (has(data, "version") && typeof Reflect.get(data, "version") !== "string") {
    errors.push("Invalid version: Must be a string");
  }
  if (has(data, "settings") && !isPlainObject(Reflect.get(data, "settings"))) {
    errors.push("Invalid settings: Must be an object");
  }
  if (has(data, "endpoints") && !Array.isArray(Reflect.get(data, "endpoints"))) {
    errors.push("Invalid endpoints: Must be an array");
  }
  return errors;
}
