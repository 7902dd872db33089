/**
 * Project and domain-tool commands: init, validate, lookup, spam-score,
 * toolspec.
 */

import { z } from "zod";
import { ValidationError } from "@linkvault/types";
import { defineOperation, flag } from "./define.js";
import { fieldsTable, info, ok } from "../format.js";
import {
  createManifest,
  DEFAULT_MANIFEST_FILE,
  ManifestSchema,
  readManifest,
  validateManifest,
  writeManifest,
} from "../manifest.js";
import { stripScheme } from "../urls.js";
import { generateOpenAiSpec } from "../toolspec.js";

export const initOperation = defineOperation({
  name: "init",
  command: ["init"],
  description: "Create a linkvault.json tool manifest",
  params: [
    {
      name: "output",
      type: "string",
      description: "Where to write the manifest",
      defaultValue: DEFAULT_MANIFEST_FILE,
    },
    { name: "force", type: "boolean", description: "Overwrite an existing file" },
  ],
  input: z.object({ output: z.string().min(1), force: flag }),
  async run(input, { runtime, style }) {
    const path = runtime.resolvePath(input.output);
    const manifest = createManifest(runtime.newToolId());
    writeManifest(path, manifest, input.force);
    return {
      data: { path, ...manifest },
      text: [
        ok(style, `Created ${input.output}`),
        info(style, "Tool ID", manifest.tool_id),
        info(style, "Version", manifest.version),
      ].join("\n"),
    };
  },
});

export const validateOperation = defineOperation({
  name: "validate",
  command: ["validate"],
  description: "Check a linkvault.json tool manifest",
  params: [
    {
      name: "file",
      type: "string",
      description: "Manifest to check",
      defaultValue: DEFAULT_MANIFEST_FILE,
    },
  ],
  input: z.object({ file: z.string().min(1) }),
  async run(input, { runtime, style }) {
    const manifest = readManifest(runtime.resolvePath(input.file));
    const errors = validateManifest(manifest);
    if (errors.length > 0) {
      throw new ValidationError(`Validation failed for '${input.file}': ${errors.join("; ")}`, "file");
    }
    const { tool_id: toolId, version } = ManifestSchema.parse(manifest);
    return {
      data: { file: input.file, valid: true, toolId, version },
      text: [
        ok(style, `Validation passed for ${input.file}`),
        info(style, "Tool ID", toolId),
        info(style, "Version", version),
      ].join("\n"),
    };
  },
});

export const lookupOperation = defineOperation({
  name: "lookup",
  command: ["lookup"],
  description: "Look up domain metrics for a URL",
  params: [
    { name: "url", type: "string", description: "URL or domain", required: true, positional: true },
  ],
  input: z.object({ url: z.string().min(1) }),
  async run(input, { runtime, style }) {
    const result = await runtime.gateway.lookup(stripScheme(input.url));
    return { data: result, text: fieldsTable(style, result) };
  },
});

export const spamScoreOperation = defineOperation({
  name: "spam_score",
  command: ["spam-score"],
  description: "Get the spam score of a URL",
  params: [
    { name: "url", type: "string", description: "URL or domain", required: true, positional: true },
  ],
  input: z.object({ url: z.string().min(1) }),
  async run(input, { runtime, style }) {
    const result = await runtime.gateway.spamScore(stripScheme(input.url));
    return { data: result, text: fieldsTable(style, result) };
  },
});

export const toolspecOperation = defineOperation({
  name: "toolspec",
  command: ["toolspec"],
  description: "Print the function-calling schema of every command",
  params: [
    { name: "format", type: "string", description: "Schema format", defaultValue: "openai" },
  ],
  input: z.object({ format: z.string() }),
  async run(input, { operations }) {
    if (input.format.toLowerCase() !== "openai") {
      throw new ValidationError(`Unsupported format '${input.format}'`, "format");
    }
    const spec = generateOpenAiSpec(operations);
    return { data: spec, text: JSON.stringify(spec, null, 2) };
  },
});
