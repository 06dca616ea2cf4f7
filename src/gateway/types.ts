/**
 * Shared gateway types: messages, outcomes, error taxonomy, provider config.
 * All core modules import their types from here.
 */

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/** Kinds produced by the error classifier. */
export type ClassifiedErrorKind =
  | "rate_limit"
  | "auth_error"
  | "quota_exceeded"
  | "service_unavailable"
  | "server_error"
  | "network_error"
  | "bad_request"
  | "unknown";

/** Kinds produced by adapters before classification. */
export type TransportErrorKind =
  | "timeout"
  | "request_exception"
  | "empty_response"
  | "http_error"
  | "cancelled";

/** Kinds produced by the engine itself. */
export type EngineErrorKind =
  | "no_providers"
  | "all_failed"
  | "provider_not_found"
  | "provider_flagged"
  | "config_error"
  | "unsupported_format";

export type ErrorKind =
  | ClassifiedErrorKind
  | TransportErrorKind
  | EngineErrorKind
  | "daily_limit"
  | "none";

/** Why a provider or credential was quarantined. */
export type FlagReason = ClassifiedErrorKind | "daily_limit" | "consecutive_failures";

export interface Outcome {
  success: boolean;
  content: string;
  statusCode: number;
  responseTimeSeconds: number;
  errorMessage: string;
  errorKind: ErrorKind;
  providerUsed: string;
  modelUsed: string;
  rawResponse?: unknown;
}

export const FORMAT_KINDS = [
  "bearer-json",
  "key-in-url",
  "message-array",
  "query-get",
  "templated-path",
] as const;

export type FormatKind = (typeof FORMAT_KINDS)[number];

export interface ProviderConfig {
  name: string;
  /** Lower is tried first. */
  priority: number;
  format: FormatKind;
  /** May contain `{account_id}` for templated-path providers. */
  endpoint: string;
  model: string;
  enabled: boolean;
  timeoutMs: number;
  authRequired: boolean;
  /** Up to three credentials, addressed by position. */
  apiKeys: string[];
  accountId?: string;
  modelEndpoint?: string;
  maxTokens?: number;
  temperature?: number;
  /** Prepend a system turn when the request carries a single message. */
  padSystemMessage?: boolean;
}

export interface EngineSettings {
  keyRotationEnabled: boolean;
  providerRotationEnabled: boolean;
  consecutiveFailureLimit: number;
}

export const DEFAULT_ENGINE_SETTINGS: Readonly<EngineSettings> = {
  keyRotationEnabled: true,
  providerRotationEnabled: true,
  consecutiveFailureLimit: 5,
};

export interface Clock {
  /** Milliseconds since the epoch. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function failure(
  errorKind: ErrorKind,
  errorMessage: string,
  extra: Partial<Outcome> = {},
): Outcome {
  return {
    success: false,
    content: "",
    statusCode: 0,
    responseTimeSeconds: 0,
    errorMessage,
    errorKind,
    providerUsed: "",
    modelUsed: "",
    ...extra,
  };
}

export function success(content: string, extra: Partial<Outcome> = {}): Outcome {
  return {
    success: true,
    content,
    statusCode: 200,
    responseTimeSeconds: 0,
    errorMessage: "",
    errorKind: "none",
    providerUsed: "",
    modelUsed: "",
    ...extra,
  };
}
