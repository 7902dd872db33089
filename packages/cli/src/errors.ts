/**
 * Errors raised after a command settled on its idempotency key.
 */

/**
 * A money-moving command failed once its key was chosen. The key is
 * reported with the error so the user can retry the same operation.
 */
export class KeyedOperationError extends Error {
  public readonly idempotencyKey: string;

  constructor(idempotencyKey: string, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "KeyedOperationError";
    this.idempotencyKey = idempotencyKey;
  }
}

export async function withIdempotencyKey<T>(
  idempotencyKey: string,
  run: (idempotencyKey: string) => Promise<T>,
): Promise<T> {
  try {
    return await run(idempotencyKey);
  } catch (err: unknown) {
    throw new KeyedOperationError(idempotencyKey, err);
  }
}

/** The error to classify and report, and the key it happened under. */
export function unwrapError(err: unknown): {
  readonly error: unknown;
  readonly idempotencyKey: string | undefined;
} {
  return err instanceof KeyedOperationError
    ? { error: err.cause, idempotencyKey: err.idempotencyKey }
    : { error: err, idempotencyKey: undefined };
}
