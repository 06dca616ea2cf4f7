/**
 * Error classifier: maps an upstream failure (message, status, body) to one
 * kind of the fixed taxonomy. Pattern groups are checked in order, first match wins.
 */

import type { ClassifiedErrorKind } from "./types.js";

const RATE_LIMIT_PATTERNS: ReadonlyArray<string> = [
  "rate limit", "too many requests", "quota exceeded", "requests per minute",
  "rpm exceeded", "rate limited", "throttled", "429", "rate_limit_exceeded",
  "requests_per_minute_limit_exceeded", "rate_limit_reached",
];

const AUTH_ERROR_PATTERNS: ReadonlyArray<string> = [
  "invalid key", "unauthorized", "forbidden", "api key", "invalid_api_key",
  "authentication failed", "invalid token", "access denied", "invalid_request_error",
  "incorrect api key", "api_key_invalid", "authentication_error",
];

const QUOTA_PATTERNS: ReadonlyArray<string> = [
  "daily limit", "monthly quota", "usage limit", "quota_exceeded", "insufficient_quota",
  "billing_hard_limit_reached", "usage_limit_exceeded", "credit limit", "balance insufficient",
];

const SERVICE_PATTERNS: ReadonlyArray<string> = [
  "model not found", "service unavailable", "model_not_found", "invalid_model",
  "model temporarily unavailable", "service_unavailable", "model_overloaded",
  "engine_overloaded", "server_overloaded", "overloaded",
];

const NETWORK_PATTERNS: ReadonlyArray<string> = [
  "timeout", "connection error", "network error", "connection timeout",
  "read timeout", "connect timeout", "connection refused", "network_error",
];

const DAILY_LIMIT_PATTERNS: ReadonlyArray<string> = [
  "daily limit", "per day", "requests per day", "daily quota",
];

function stringifyBody(body: unknown): string {
  if (body === undefined || body === null) return "";
  if (typeof body === "string") return body;
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}

function buildCorpus(message: string, body: unknown): string {
  return `${message} ${stringifyBody(body)}`.toLowerCase();
}

function matchesAny(corpus: string, patterns: ReadonlyArray<string>): boolean {
  return patterns.some((pattern) => corpus.includes(pattern));
}

export function classifyError(message: string, status: number, body?: unknown): ClassifiedErrorKind {
  const corpus = buildCorpus(message, body);

  if (matchesAny(corpus, RATE_LIMIT_PATTERNS) || status === 429) return "rate_limit";
  if (matchesAny(corpus, AUTH_ERROR_PATTERNS) || status === 401 || status === 403) return "auth_error";
  if (matchesAny(corpus, QUOTA_PATTERNS)) return "quota_exceeded";
  if (matchesAny(corpus, SERVICE_PATTERNS) || status === 503) return "service_unavailable";
  // 5xx is decided by status before the network phrase scan
  if (status >= 500 && status < 600) return "server_error";
  if (matchesAny(corpus, NETWORK_PATTERNS)) return "network_error";
  if (status === 400) return "bad_request";
  return "unknown";
}

/**
 * True when the failure text names a per-day allowance, which earns a
 * cooldown until local midnight instead of the fixed one.
 */
export function isDailyLimit(message: string, body?: unknown): boolean {
  return matchesAny(buildCorpus(message, body), DAILY_LIMIT_PATTERNS);
}
