import { describe, it, expect } from "vitest";
import { ValidationError } from "@linkvault/types";
import { resolvePassphrase } from "../src/passphrase.js";
import type { PromptFn } from "../src/passphrase.js";

function scripted(...answers: string[]): { prompt: PromptFn; questions: string[] } {
  const questions: string[] = [];
  const prompt: PromptFn = async (question) => {
    questions.push(question);
    return answers.shift() ?? "";
  };
  return { prompt, questions };
}

describe("resolvePassphrase", () => {
  it("prefers the environment", async () => {
    const { prompt, questions } = scripted();
    expect(await resolvePassphrase("test-secret", prompt, true)).toBe("test-secret");
    expect(questions).toEqual([]);
  });

  it("asks once when no confirmation is needed", async () => {
    const { prompt, questions } = scripted("test-secret");
    expect(await resolvePassphrase(undefined, prompt, false)).toBe("test-secret");
    expect(questions).toEqual(["Wallet passphrase: "]);
  });

  it("asks twice when creating", async () => {
    const { prompt, questions } = scripted("test-secret", "test-secret");
    expect(await resolvePassphrase(undefined, prompt, true)).toBe("test-secret");
    expect(questions).toEqual(["Wallet passphrase: ", "Repeat passphrase: "]);
  });

  it("rejects a mismatched confirmation", async () => {
    const { prompt } = scripted("test-secret", "other-secret");
    await expect(resolvePassphrase(undefined, prompt, true)).rejects.toThrow(
      "Passphrases do not match",
    );
  });

  it("rejects an empty answer", async () => {
    const { prompt } = scripted("");
    await expect(resolvePassphrase(undefined, prompt, false)).rejects.toThrow(ValidationError);
  });
});
