/**
 * Format adapter interface: one `send` capability, five wire formats.
 * Adapters never throw: every failure path returns a structured Outcome.
 */

import type { ChatMessage, FormatKind, Outcome, ProviderConfig } from "../gateway/types.js";
import { failure, success } from "../gateway/types.js";

export interface SendOptions {
  /** Overrides the provider's configured model. */
  model?: string;
  /** Caller cancellation; the provider timeout is applied on top. */
  signal?: AbortSignal;
}

export interface FormatAdapter {
  readonly format: FormatKind;
  send(
    provider: ProviderConfig,
    credential: string | undefined,
    messages: ReadonlyArray<ChatMessage>,
    options?: SendOptions,
  ): Promise<Outcome>;
}

export type HttpResult =
  | { ok: true; status: number; text: string; json: unknown }
  | { ok: false; outcome: Outcome };

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Performs one HTTP call bounded by `timeoutMs`. Caller aborts map to
 * `cancelled`, the timer to `timeout`, anything else thrown to `request_exception`.
 */
export async function performRequest(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<HttpResult> {
  if (signal?.aborted) {
    return { ok: false, outcome: failure("cancelled", "Request cancelled by caller") };
  }

  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

  try {
    const response = await fetch(url, { ...init, signal: combined });
    const text = await response.text();
    return { ok: true, status: response.status, text, json: parseJson(text) };
  } catch (err) {
    if (signal?.aborted) {
      return { ok: false, outcome: failure("cancelled", "Request cancelled by caller") };
    }
    if (timeoutSignal.aborted) {
      return { ok: false, outcome: failure("timeout", `Request timeout after ${timeoutMs}ms`) };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, outcome: failure("request_exception", message) };
  }
}

/** Failure outcome for a non-2xx response, carrying the JSON error body when there is one. */
export function httpFailure(result: { status: number; text: string; json: unknown }): Outcome {
  const rawResponse = typeof result.json === "object" && result.json !== null ? result.json : undefined;
  return failure("http_error", result.text || `HTTP ${result.status}`, {
    statusCode: result.status,
    rawResponse,
  });
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Walks `path` through nested objects and arrays; undefined on any miss. */
export function readPath(data: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = data;
  for (const segment of path) {
    if (typeof segment === "number") {
      if (!Array.isArray(current)) return undefined;
      current = current[segment];
    } else {
      if (typeof current !== "object" || current === null || Array.isArray(current)) return undefined;
      current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    }
  }
  return current;
}

export function readText(data: unknown, path: ReadonlyArray<string | number>): string {
  const value = readPath(data, path);
  return typeof value === "string" ? value : "";
}

/** Reads `choices[0].message.content` from an OpenAI-shaped envelope. */
export function extractChoiceContent(data: unknown): string {
  return readText(data, ["choices", 0, "message", "content"]);
}

/** Success outcome, or `empty_response` when the upstream answered with nothing usable. */
export function contentOutcome(
  provider: ProviderConfig,
  content: string,
  status: number,
  rawResponse: unknown,
): Outcome {
  if (content.trim() === "") {
    return failure("empty_response", `Empty response from ${provider.name}`, {
      statusCode: status,
      rawResponse,
    });
  }
  return success(content, { statusCode: status, rawResponse });
}

export function resolveModel(provider: ProviderConfig, options?: SendOptions): string {
  return options?.model ?? provider.model;
}
