/**
 * @linkvault/client — HTTP transport for the marketplace API.
 *
 * Wraps fetch() with:
 * - API key, request id and idempotency key headers
 * - Timeout handling
 * - Retry with exponential backoff for transient failures
 * - Response validation against a zod schema
 * - Error normalization
 *
 * Transient (retried): connection failure, timeout, HTTP 5xx, HTTP 429.
 * Exhausted retries surface as NetworkError.
 * Definitive: any other 4xx, surfaced at once as RemoteRejectionError.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ZodType, ZodTypeDef } from "zod";
import pino from "pino";
import type { Logger } from "pino";
import { NetworkError, RemoteRejectionError } from "@linkvault/types";
import { DEFAULT_RETRY_CONFIG, retrying } from "./retry.js";
import type { RetryConfig, SleepFn } from "./retry.js";
import { ErrorEnvelopeSchema } from "./schemas.js";

// =============================================================================
// Types
// =============================================================================

export interface HttpClientConfig {
  /** Base URL of the marketplace API (e.g. "http://127.0.0.1:8787") */
  readonly baseUrl: string;
  readonly apiKey?: string | undefined;
  /** Per-attempt timeout in milliseconds (default: 15000) */
  readonly timeoutMs?: number | undefined;
  readonly retry?: Partial<RetryConfig> | undefined;
  /** Custom fetch function (for testing or an in-process server) */
  readonly fetchFn?: typeof fetch | undefined;
  readonly sleepFn?: SleepFn | undefined;
  readonly logger?: Logger | undefined;
}

export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface RequestOptions<T> {
  readonly schema: ResponseSchema<T>;
  readonly body?: unknown;
  readonly query?: Readonly<Record<string, string | number | undefined>> | undefined;
  /** Sent as Idempotency-Key; identical on every retry */
  readonly idempotencyKey?: string | undefined;
}

// =============================================================================
// Internal Helpers
// =============================================================================

/** Marks a failure worth another attempt. Never escapes the client. */
class TransientHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = "TransientHttpError";
  }
}

const DataEnvelopeSchema = z.object({ data: z.unknown() });

/**
 * Parse a response body as JSON. Empty or non-JSON bodies yield undefined.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function buildQuery(query: RequestOptions<unknown>["query"]): string {
  if (query === undefined) return "";
  const params = new URLSearchParams();
  for (const [name, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.set(name, String(value));
    }
  }
  const encoded = params.toString();
  return encoded.length > 0 ? `?${encoded}` : "";
}

// =============================================================================
// HTTP Client
// =============================================================================

export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly retryConfig: RetryConfig;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: SleepFn | undefined;
  private readonly logger: Logger;

  constructor(config: HttpClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? 15000;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.sleepFn = config.sleepFn;
    this.logger = config.logger ?? pino({ level: "silent" });
  }

  async get<T>(path: string, options: RequestOptions<T>): Promise<T> {
    return this.request("GET", path, options);
  }

  async post<T>(path: string, options: RequestOptions<T>): Promise<T> {
    return this.request("POST", path, options);
  }

  /**
   * Core request method with retry logic.
   *
   * @throws NetworkError when transient failures outlast the retry budget
   * @throws RemoteRejectionError on a definitive refusal or invalid response
   */
  async request<T>(method: "GET" | "POST", path: string, options: RequestOptions<T>): Promise<T> {
    const url = `${this.baseUrl}${path}${buildQuery(options.query)}`;

    const headers: Record<string, string> = {
      Accept: "application/json",
      "X-Request-Id": randomUUID(),
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }
    if (options.idempotencyKey !== undefined) {
      headers["Idempotency-Key"] = options.idempotencyKey;
    }

    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      init.body = JSON.stringify(options.body);
    }

    return retrying(() => this.attempt(url, init, options.schema), this.retryConfig, {
      retryable: (err) => err instanceof TransientHttpError,
      sleepFn: this.sleepFn,
      onRetry: ({ retry, delayMs, error }) => {
        this.logger.warn(
          { method, path, retry, delayMs: Math.round(delayMs), err: String(error) },
          "retrying marketplace request",
        );
      },
      onExhausted: (lastError, attempts) =>
        new NetworkError(
          `${method} ${path} failed after ${attempts} attempts: ${
            lastError instanceof Error ? lastError.message : String(lastError)
          }`,
          attempts,
        ),
    });
  }

  /**
   * One attempt: fetch, classify, validate.
   */
  private async attempt<T>(url: string, init: RequestInit, schema: ResponseSchema<T>): Promise<T> {
    const response = await this.fetchWithTimeout(url, init);
    const payload = await parseResponseBody(response);

    if (response.ok) {
      const envelope = DataEnvelopeSchema.safeParse(payload);
      const parsed = schema.safeParse(envelope.success ? envelope.data.data : undefined);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new RemoteRejectionError(
          "INVALID_RESPONSE",
          `Marketplace returned an unexpected response${issue !== undefined ? ` (${issue.path.join(".") || "data"}: ${issue.message})` : ""}`,
          response.status,
        );
      }
      return parsed.data;
    }

    const error = ErrorEnvelopeSchema.safeParse(payload);
    const code = error.success ? error.data.error.code : `HTTP_${response.status}`;
    const message = error.success ? error.data.error.message : `HTTP ${response.status}`;

    if (response.status >= 500 || response.status === 429) {
      throw new TransientHttpError(message, response.status);
    }
    throw new RemoteRejectionError(code, message, response.status);
  }

  /**
   * Fetch with a timeout using AbortController.
   * Connection failures and timeouts become TransientHttpError.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error: unknown) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransientHttpError(`Request timed out after ${this.timeoutMs}ms`, 0);
      }
      throw new TransientHttpError(error instanceof Error ? error.message : String(error), 0);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
