import { describe, it, expect } from "vitest";
import { CommanderError } from "commander";
import {
  AlreadyExistsError,
  ConflictError,
  DecryptionError,
  InsufficientFundsError,
  InvalidTransitionError,
  NetworkError,
  NotFoundError,
  RemoteRejectionError,
  SchemaError,
  ValidationError,
} from "@linkvault/types";
import { ExitCode, exitCodeFor } from "../src/exit-codes.js";
import { KeyedOperationError, unwrapError, withIdempotencyKey } from "../src/errors.js";

describe("exitCodeFor", () => {
  it.each([
    [new ValidationError("bad"), ExitCode.VALIDATION],
    [new InsufficientFundsError(0, 100), ExitCode.INSUFFICIENT_FUNDS],
    [new DecryptionError(), ExitCode.UNREADABLE],
    [new SchemaError("bad"), ExitCode.UNREADABLE],
    [new NetworkError("down", 3), ExitCode.REMOTE],
    [new RemoteRejectionError("LISTING_NOT_FOUND", "gone", 404), ExitCode.REMOTE],
    [new ConflictError("locked"), ExitCode.CONFLICT],
    [new AlreadyExistsError("exists"), ExitCode.EXISTENCE],
    [new NotFoundError("missing"), ExitCode.EXISTENCE],
    [new InvalidTransitionError("k", "confirmed", "pending"), ExitCode.UNEXPECTED],
    [new Error("boom"), ExitCode.UNEXPECTED],
  ])("maps %s", (err, code) => {
    expect(exitCodeFor(err)).toBe(code);
  });

  it("passes help and version through as success", () => {
    expect(exitCodeFor(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
  });

  it("treats other parse failures as usage errors", () => {
    expect(exitCodeFor(new CommanderError(1, "commander.unknownOption", "error"))).toBe(2);
  });

  it("classifies a keyed failure by its cause", () => {
    const err = new KeyedOperationError("k1", new InsufficientFundsError(0, 100));
    expect(exitCodeFor(err)).toBe(ExitCode.INSUFFICIENT_FUNDS);
    expect(err.message).toBe("Insufficient funds: balance 0, required 100");
  });
});

describe("withIdempotencyKey", () => {
  it("attaches the key to a failure", async () => {
    const cause = new NetworkError("down", 3);
    const err: unknown = await withIdempotencyKey("k1", async () => {
      throw cause;
    }).catch((e: unknown) => e);

    expect(unwrapError(err)).toEqual({ error: cause, idempotencyKey: "k1" });
  });

  it("passes the result through", async () => {
    await expect(withIdempotencyKey("k1", async (key) => `ran ${key}`)).resolves.toBe("ran k1");
  });

  it("leaves other errors unwrapped", () => {
    const err = new Error("boom");
    expect(unwrapError(err)).toEqual({ error: err, idempotencyKey: undefined });
  });
});
