/**
 * Operation definitions.
 *
 * One definition drives both the commander command and the tool schema
 * entry, so the two cannot drift apart.
 */

import { z } from "zod";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { ChalkInstance } from "chalk";
import { ValidationError } from "@linkvault/types";
import { parseMinorUnits } from "@linkvault/ledger";
import type { CliRuntime } from "../runtime.js";

// =============================================================================
// Types
// =============================================================================

export type ParamType = "string" | "integer" | "boolean";

export interface ParamSpec {
  /** Input key; commander's camelCase name for the option */
  readonly name: string;
  readonly type: ParamType;
  readonly description: string;
  readonly required?: boolean | undefined;
  /** Positional argument rather than an option */
  readonly positional?: boolean | undefined;
  /** Option spelling when it differs from the kebab-cased name */
  readonly flag?: string | undefined;
  readonly defaultValue?: string | boolean | undefined;
}

export interface CommandOutput {
  /** Printed as JSON under --json */
  readonly data: unknown;
  /** Printed otherwise */
  readonly text: string;
}

export interface OperationContext {
  readonly runtime: CliRuntime;
  readonly style: ChalkInstance;
  readonly operations: readonly Operation[];
}

export interface Operation {
  /** Tool name, e.g. "wallet_create" */
  readonly name: string;
  /** Command path, e.g. ["wallet", "create"] */
  readonly command: readonly string[];
  readonly description: string;
  readonly params: readonly ParamSpec[];
  execute(raw: Readonly<Record<string, unknown>>, ctx: OperationContext): Promise<CommandOutput>;
}

export interface OperationSpec<I> extends Omit<Operation, "execute"> {
  readonly input: ZodType<I, ZodTypeDef, unknown>;
  run(input: I, ctx: OperationContext): Promise<CommandOutput>;
}

// =============================================================================
// Factory
// =============================================================================

function toValidationError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  if (issue === undefined) {
    return new ValidationError("Invalid input");
  }
  const field = issue.path.join(".");
  const message =
    issue.code === "custom" || field.length === 0 ? issue.message : `${field}: ${issue.message}`;
  return new ValidationError(message, field.length > 0 ? field : undefined);
}

export function defineOperation<I>(spec: OperationSpec<I>): Operation {
  const { input, run, ...rest } = spec;
  return {
    ...rest,
    async execute(raw, ctx) {
      const parsed = input.safeParse(raw);
      if (!parsed.success) {
        throw toValidationError(parsed.error);
      }
      return run(parsed.data, ctx);
    },
  };
}

// =============================================================================
// Input helpers
// =============================================================================

/** Whole minor units given as a decimal string. */
export function minorUnits(field: string) {
  return z.string().transform((value, ctx) => {
    try {
      return parseMinorUnits(value, field);
    } catch (err: unknown) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });
}

/** A non-negative number given as a string. */
export function numeric(field: string) {
  return z.string().transform((value, ctx) => {
    const n = Number(value);
    if (value.trim().length === 0 || !Number.isFinite(n) || n < 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${field} must be a non-negative number, got: "${value}"`,
      });
      return z.NEVER;
    }
    return n;
  });
}

/** Commander leaves an absent boolean flag undefined. */
export const flag = z
  .boolean()
  .optional()
  .transform((v) => v === true);
