/**
 * Process exit codes.
 */

import { CommanderError } from "commander";
import { isLinkVaultError } from "@linkvault/types";
import { KeyedOperationError } from "./errors.js";

export const ExitCode = {
  OK: 0,
  UNEXPECTED: 1,
  VALIDATION: 2,
  INSUFFICIENT_FUNDS: 3,
  UNREADABLE: 4,
  REMOTE: 5,
  CONFLICT: 6,
  EXISTENCE: 7,
} as const;

export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(err: unknown): ExitCodeValue {
  if (err instanceof KeyedOperationError) {
    return exitCodeFor(err.cause);
  }
  if (err instanceof CommanderError) {
    return err.exitCode === 0 ? ExitCode.OK : ExitCode.VALIDATION;
  }
  if (!isLinkVaultError(err)) {
    return ExitCode.UNEXPECTED;
  }
  switch (err.code) {
    case "VALIDATION_ERROR":
      return ExitCode.VALIDATION;
    case "INSUFFICIENT_FUNDS":
      return ExitCode.INSUFFICIENT_FUNDS;
    case "DECRYPTION_FAILED":
    case "SCHEMA_INVALID":
      return ExitCode.UNREADABLE;
    case "NETWORK_ERROR":
    case "REMOTE_REJECTED":
      return ExitCode.REMOTE;
    case "CONFLICT":
      return ExitCode.CONFLICT;
    case "ALREADY_EXISTS":
    case "NOT_FOUND":
      return ExitCode.EXISTENCE;
    default:
      return ExitCode.UNEXPECTED;
  }
}
