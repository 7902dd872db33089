/**
 * @linkvault/cli — Command-line tool.
 */

export { run, buildProgram, VERSION } from "./program.js";
export type { CliIO, RunOptions } from "./program.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { CliConfig } from "./config.js";
export { createRuntime } from "./runtime.js";
export type { CliRuntime, RuntimeOverrides } from "./runtime.js";
export { ExitCode, exitCodeFor } from "./exit-codes.js";
export type { ExitCodeValue } from "./exit-codes.js";
export { KeyedOperationError, unwrapError, withIdempotencyKey } from "./errors.js";
export { OPERATIONS, defineOperation } from "./operations/index.js";
export type { Operation, OperationContext, ParamSpec, CommandOutput } from "./operations/index.js";
export { generateOpenAiSpec } from "./toolspec.js";
export type { ToolSpec, JsonSchemaProperty } from "./toolspec.js";
export { validateManifest, generateToolId, createManifest } from "./manifest.js";
export { stripScheme } from "./urls.js";
