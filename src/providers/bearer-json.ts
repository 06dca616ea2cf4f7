/**
 * Bearer-JSON adapter - OpenAI-compatible `/chat/completions` endpoints with
 * `Authorization: Bearer <key>`.
 */

import type { ChatMessage, Outcome, ProviderConfig } from "../gateway/types.js";
import type { FormatAdapter, SendOptions } from "./adapter.js";
import {
  contentOutcome,
  extractChoiceContent,
  httpFailure,
  isSuccessStatus,
  performRequest,
  resolveModel,
} from "./adapter.js";

const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant.";

export interface ChatRequestBody {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
}

export function buildHeaders(apiKey: string | undefined): Record<string, string> {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (apiKey) headers["Authorization"] = `Bearer ${apiKey}`;
  return headers;
}

export function buildChatBody(
  provider: ProviderConfig,
  messages: ReadonlyArray<ChatMessage>,
  model: string,
): ChatRequestBody {
  let turns = [...messages];
  // Some upstreams reject a conversation of one message
  if (provider.padSystemMessage && turns.length === 1) {
    turns = [{ role: "system", content: DEFAULT_SYSTEM_PROMPT }, ...turns];
  }

  const body: ChatRequestBody = { model, messages: turns };
  if (provider.maxTokens !== undefined) body.max_tokens = provider.maxTokens;
  if (provider.temperature !== undefined) body.temperature = provider.temperature;
  return body;
}

export async function sendChatCompletion(
  url: string,
  headers: Record<string, string>,
  provider: ProviderConfig,
  messages: ReadonlyArray<ChatMessage>,
  options?: SendOptions,
): Promise<Outcome> {
  const body = buildChatBody(provider, messages, resolveModel(provider, options));
  const result = await performRequest(
    url,
    { method: "POST", headers, body: JSON.stringify(body) },
    provider.timeoutMs,
    options?.signal,
  );

  if (!result.ok) return result.outcome;
  if (!isSuccessStatus(result.status)) return httpFailure(result);
  return contentOutcome(provider, extractChoiceContent(result.json), result.status, result.json);
}

export const bearerJsonAdapter: FormatAdapter = {
  format: "bearer-json",
  send(provider, credential, messages, options) {
    return sendChatCompletion(provider.endpoint, buildHeaders(credential), provider, messages, options);
  },
};
