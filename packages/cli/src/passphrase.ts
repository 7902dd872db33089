/**
 * Passphrase input.
 *
 * The passphrase comes from LINKVAULT_PASSPHRASE or an interactive prompt
 * with echo turned off. It is never accepted as a command-line flag.
 */

import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";
import { ValidationError } from "@linkvault/types";

export type PromptFn = (question: string) => Promise<string>;

/**
 * Ask on stderr without echoing the answer.
 */
export async function promptHidden(question: string): Promise<string> {
  if (process.stdin.isTTY !== true) {
    throw new ValidationError(
      "No passphrase available: set LINKVAULT_PASSPHRASE or run in a terminal",
      "passphrase",
    );
  }
  process.stderr.write(question);
  const muted = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  const rl = createInterface({ input: process.stdin, output: muted, terminal: true });
  try {
    return await rl.question("");
  } finally {
    rl.close();
    process.stderr.write("\n");
  }
}

/**
 * @throws ValidationError on an empty passphrase or a failed confirmation
 */
export async function resolvePassphrase(
  fromEnv: string | undefined,
  prompt: PromptFn,
  confirm: boolean,
): Promise<string> {
  if (fromEnv !== undefined) {
    return fromEnv;
  }

  const passphrase = await prompt("Wallet passphrase: ");
  if (passphrase.length === 0) {
    throw new ValidationError("Passphrase must not be empty", "passphrase");
  }
  if (confirm) {
    const again = await prompt("Repeat passphrase: ");
    if (again !== passphrase) {
      throw new ValidationError("Passphrases do not match", "passphrase");
    }
  }
  return passphrase;
}
