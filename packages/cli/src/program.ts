/**
 * Command-line program.
 *
 * Commands are generated from the operation registry. `run` never exits
 * the process; it returns the exit code so tests can drive it directly.
 */

import { Command, CommanderError, Option } from "commander";
import chalk, { Chalk } from "chalk";
import type { ChalkInstance } from "chalk";
import { InsufficientFundsError, isLinkVaultError, RemoteRejectionError } from "@linkvault/types";
import { loadConfig } from "./config.js";
import { unwrapError } from "./errors.js";
import { ExitCode, exitCodeFor } from "./exit-codes.js";
import type { ExitCodeValue } from "./exit-codes.js";
import { createRuntime } from "./runtime.js";
import type { CliRuntime, RuntimeOverrides } from "./runtime.js";
import { OPERATIONS } from "./operations/index.js";
import type { Operation, ParamSpec } from "./operations/index.js";

export const VERSION = "0.1.0";

// =============================================================================
// Types
// =============================================================================

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface RunOptions {
  readonly env?: Record<string, string | undefined> | undefined;
  readonly io?: CliIO | undefined;
  /** Default: chalk's own terminal detection */
  readonly color?: boolean | undefined;
  readonly runtime?: RuntimeOverrides | undefined;
  readonly operations?: readonly Operation[] | undefined;
}

type Handler = (op: Operation, raw: Record<string, unknown>, json: boolean) => Promise<void>;

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

// =============================================================================
// Program
// =============================================================================

function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}

function optionFor(param: ParamSpec): Option {
  const long = `--${kebab(param.name)}`;
  const spelling = param.flag ?? (param.type === "boolean" ? long : `${long} <${kebab(param.name)}>`);
  const option = new Option(spelling, param.description);
  if (param.defaultValue !== undefined) {
    option.default(param.defaultValue);
  }
  if (param.required === true) {
    option.makeOptionMandatory();
  }
  return option;
}

export function buildProgram(operations: readonly Operation[], handler: Handler, io: CliIO): Command {
  const program = new Command();
  program
    .name("linkvault")
    .description("Encrypted wallet and backlink marketplace client")
    .version(VERSION)
    .option("--json", "Print machine-readable JSON")
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  const groups = new Map<string, Command>();

  for (const op of operations) {
    const [head, leaf] = op.command;
    if (head === undefined) continue;

    let parent = program;
    if (leaf !== undefined) {
      let group = groups.get(head);
      if (group === undefined) {
        group = program.command(head).description(`${head} commands`);
        groups.set(head, group);
      }
      parent = group;
    }

    const cmd = parent.command(leaf ?? head).description(op.description);
    const positional = op.params.filter((p) => p.positional === true);
    for (const param of positional) {
      cmd.argument(param.required === true ? `<${param.name}>` : `[${param.name}]`, param.description);
    }
    for (const param of op.params) {
      if (param.positional !== true) {
        cmd.addOption(optionFor(param));
      }
    }

    cmd.action(async () => {
      const raw: Record<string, unknown> = { ...cmd.opts() };
      positional.forEach((param, i) => {
        raw[param.name] = cmd.args[i];
      });
      await handler(op, raw, program.opts()["json"] === true);
    });
  }

  return program;
}

// =============================================================================
// Runner
// =============================================================================

function errorDetails(err: unknown): Record<string, unknown> | undefined {
  if (err instanceof InsufficientFundsError) {
    return { balance: err.balance, required: err.required };
  }
  if (err instanceof RemoteRejectionError) {
    return { remoteCode: err.remoteCode, status: err.status };
  }
  return undefined;
}

function reportError(err: unknown, json: boolean, io: CliIO, style: ChalkInstance): void {
  const { error: cause, idempotencyKey } = unwrapError(err);
  const code = isLinkVaultError(cause) ? cause.code : "INTERNAL_ERROR";
  const message = cause instanceof Error ? cause.message : String(cause);
  if (json) {
    const details = {
      ...errorDetails(cause),
      ...(idempotencyKey !== undefined ? { idempotencyKey } : {}),
    };
    const error = Object.keys(details).length === 0 ? { code, message } : { code, message, details };
    io.stdout(`${JSON.stringify({ error }, null, 2)}\n`);
    return;
  }
  io.stderr(`${style.red("Error:")} ${message}\n`);
  if (idempotencyKey !== undefined) {
    io.stderr(`${style.dim("Idempotency key:")} ${idempotencyKey}\n`);
  }
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<ExitCodeValue> {
  const io = options.io ?? processIO;
  const style: ChalkInstance =
    options.color === undefined ? chalk : new Chalk({ level: options.color ? 1 : 0 });
  const operations = options.operations ?? OPERATIONS;

  let json = argv.includes("--json");
  let runtime: CliRuntime | undefined;

  const handler: Handler = async (op, raw, wantsJson) => {
    json = wantsJson;
    if (runtime === undefined) {
      runtime = createRuntime(loadConfig(options.env ?? process.env), options.runtime);
    }
    const output = await op.execute(raw, { runtime, style, operations });
    io.stdout(`${json ? JSON.stringify(output.data, null, 2) : output.text}\n`);
  };

  const program = buildProgram(operations, handler, io);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return ExitCode.OK;
  } catch (err: unknown) {
    if (!(err instanceof CommanderError)) {
      runtime?.logger.debug({ err }, "command failed");
      reportError(err, json, io, style);
    }
    return exitCodeFor(err);
  }
}
