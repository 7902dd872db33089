/**
 * HTTP Client Tests
 *
 * Verifies:
 * - Headers: API key, request id, idempotency key, content type
 * - Data envelope unwrapping and schema validation
 * - Retry on 5xx, 429, connection errors and timeouts
 * - No retry on other 4xx
 * - Error normalization into NetworkError / RemoteRejectionError
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { NetworkError, RemoteRejectionError } from "@linkvault/types";
import { HttpClient } from "../src/http-client.js";

// =============================================================================
// Mock Fetch Helper
// =============================================================================

interface MockResponse {
  readonly status?: number;
  readonly body?: unknown;
  readonly raw?: string;
  readonly error?: Error;
}

interface RecordedCall {
  readonly url: string;
  readonly method: string;
  readonly headers: Headers;
  readonly body: string | undefined;
}

function createMockFetch(responses: readonly MockResponse[]) {
  const calls: RecordedCall[] = [];

  const fetchFn: typeof fetch = async (input, init) => {
    const config = responses[calls.length];
    calls.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof init?.body === "string" ? init.body : undefined,
    });

    if (config === undefined) {
      throw new Error(`Mock fetch called more times than expected (call ${calls.length})`);
    }
    if (config.error !== undefined) {
      throw config.error;
    }

    const text = config.raw ?? (config.body !== undefined ? JSON.stringify(config.body) : "");
    return new Response(text, { status: config.status ?? 200 });
  };

  return { fetchFn, calls };
}

const noopSleep = async (_ms: number) => {};
const OkSchema = z.object({ ok: z.boolean() });

function client(responses: readonly MockResponse[], overrides: { timeoutMs?: number } = {}) {
  const mock = createMockFetch(responses);
  const http = new HttpClient({
    baseUrl: "http://market.test/",
    apiKey: "test-api-key",
    fetchFn: mock.fetchFn,
    sleepFn: noopSleep,
    retry: { maxAttempts: 3, jitterMs: 0 },
    timeoutMs: overrides.timeoutMs,
  });
  return { http, calls: mock.calls };
}

// =============================================================================
// Requests
// =============================================================================

describe("HttpClient requests", () => {
  it("unwraps and validates the data envelope", async () => {
    const { http, calls } = client([{ body: { data: { ok: true } } }]);

    const result = await http.get("/v1/ping", { schema: OkSchema });

    expect(result).toEqual({ ok: true });
    expect(calls[0]?.url).toBe("http://market.test/v1/ping");
    expect(calls[0]?.method).toBe("GET");
  });

  it("encodes defined query parameters only", async () => {
    const { http, calls } = client([{ body: { data: { ok: true } } }]);

    await http.get("/v1/ping", { schema: OkSchema, query: { a: 1, b: undefined, c: "x y" } });

    expect(calls[0]?.url).toBe("http://market.test/v1/ping?a=1&c=x+y");
  });

  it("sends API key, request id and idempotency key headers", async () => {
    const { http, calls } = client([{ body: { data: { ok: true } } }]);

    await http.post("/v1/deposits", {
      schema: OkSchema,
      body: { amount: 100 },
      idempotencyKey: "dep-1:deposit",
    });

    const headers = calls[0]?.headers;
    expect(headers?.get("x-api-key")).toBe("test-api-key");
    expect(headers?.get("idempotency-key")).toBe("dep-1:deposit");
    expect(headers?.get("content-type")).toBe("application/json");
    expect(headers?.get("x-request-id")).toMatch(/^[0-9a-f-]{36}$/);
    expect(calls[0]?.body).toBe('{"amount":100}');
  });

  it("omits the content type without a body", async () => {
    const { http, calls } = client([{ body: { data: { ok: true } } }]);

    await http.get("/v1/ping", { schema: OkSchema });

    expect(calls[0]?.headers.get("content-type")).toBeNull();
    expect(calls[0]?.headers.get("idempotency-key")).toBeNull();
  });
});

// =============================================================================
// Retries
// =============================================================================

describe("HttpClient retries", () => {
  it("retries a 5xx and keeps request id and idempotency key", async () => {
    const { http, calls } = client([
      { status: 503, body: { error: { code: "UNAVAILABLE", message: "busy" } } },
      { body: { data: { ok: true } } },
    ]);

    const result = await http.post("/v1/payouts", {
      schema: OkSchema,
      body: {},
      idempotencyKey: "wd-1:payout",
    });

    expect(result).toEqual({ ok: true });
    expect(calls).toHaveLength(2);
    expect(calls[1]?.headers.get("x-request-id")).toBe(calls[0]?.headers.get("x-request-id"));
    expect(calls[1]?.headers.get("idempotency-key")).toBe("wd-1:payout");
  });

  it("retries a 429", async () => {
    const { http, calls } = client([{ status: 429 }, { body: { data: { ok: false } } }]);

    await expect(http.get("/v1/ping", { schema: OkSchema })).resolves.toEqual({ ok: false });
    expect(calls).toHaveLength(2);
  });

  it("retries connection errors", async () => {
    const { http, calls } = client([
      { error: new Error("connect ECONNREFUSED") },
      { body: { data: { ok: true } } },
    ]);

    await expect(http.get("/v1/ping", { schema: OkSchema })).resolves.toEqual({ ok: true });
    expect(calls).toHaveLength(2);
  });

  it("surfaces NetworkError after the retry budget", async () => {
    const { http, calls } = client([
      { status: 500, body: { error: { code: "INTERNAL", message: "upstream down" } } },
      { status: 500, body: { error: { code: "INTERNAL", message: "upstream down" } } },
      { status: 500, body: { error: { code: "INTERNAL", message: "upstream down" } } },
    ]);

    const err: unknown = await http
      .post("/v1/payouts", { schema: OkSchema, body: {} })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({
      attempts: 3,
      message: "POST /v1/payouts failed after 3 attempts: upstream down",
    });
    expect(calls).toHaveLength(3);
  });

  it("times out a hanging request", async () => {
    const calls: string[] = [];
    const hanging: typeof fetch = (input, init) =>
      new Promise((_resolve, reject) => {
        calls.push(String(input));
        init?.signal?.addEventListener("abort", () => {
          const abort = new Error("aborted");
          abort.name = "AbortError";
          reject(abort);
        });
      });
    const http = new HttpClient({
      baseUrl: "http://market.test",
      fetchFn: hanging,
      sleepFn: noopSleep,
      timeoutMs: 20,
      retry: { maxAttempts: 2 },
    });

    await expect(http.get("/v1/ping", { schema: OkSchema })).rejects.toThrow(
      "GET /v1/ping failed after 2 attempts: Request timed out after 20ms",
    );
    expect(calls).toHaveLength(2);
  });
});

// =============================================================================
// Definitive failures
// =============================================================================

describe("HttpClient rejections", () => {
  it("does not retry a 410 and keeps the remote code", async () => {
    const { http, calls } = client([
      {
        status: 410,
        body: { error: { code: "RESERVATION_EXPIRED", message: "Reservation rsv_1 has expired" } },
      },
    ]);

    const err: unknown = await http
      .post("/v1/reservations/rsv_1/confirm", { schema: OkSchema, body: {} })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteRejectionError);
    expect(err).toMatchObject({
      remoteCode: "RESERVATION_EXPIRED",
      status: 410,
      message: "Reservation rsv_1 has expired",
    });
    expect(calls).toHaveLength(1);
  });

  it("names bare 4xx responses after the status", async () => {
    const { http } = client([{ status: 404, raw: "not found" }]);

    await expect(http.get("/v1/deposits/x", { schema: OkSchema })).rejects.toMatchObject({
      remoteCode: "HTTP_404",
      message: "HTTP 404",
      status: 404,
    });
  });

  it("rejects a response that fails validation", async () => {
    const { http, calls } = client([{ body: { data: { ok: "yes" } } }]);

    await expect(http.get("/v1/ping", { schema: OkSchema })).rejects.toMatchObject({
      remoteCode: "INVALID_RESPONSE",
      status: 200,
    });
    expect(calls).toHaveLength(1);
  });

  it("rejects a success without a data envelope", async () => {
    const { http } = client([{ raw: "<html>" }]);

    await expect(http.get("/v1/ping", { schema: OkSchema })).rejects.toBeInstanceOf(
      RemoteRejectionError,
    );
  });
});
