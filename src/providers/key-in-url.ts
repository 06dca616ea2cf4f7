/**
 * Key-in-URL adapter: single-turn endpoints that take the credential as a
 * `key` query parameter and a `contents[].parts[]` body.
 */

import type { ChatMessage } from "../gateway/types.js";
import type { FormatAdapter } from "./adapter.js";
import { contentOutcome, httpFailure, isSuccessStatus, performRequest, readText } from "./adapter.js";

interface ContentsBody {
  contents: Array<{ parts: Array<{ text: string }> }>;
}

export function appendKey(endpoint: string, apiKey: string | undefined): string {
  if (!apiKey) return endpoint;
  const separator = endpoint.includes("?") ? "&" : "?";
  return `${endpoint}${separator}key=${encodeURIComponent(apiKey)}`;
}

/** Only user turns are forwarded; there is no system-role translation. */
export function buildContentsBody(messages: ReadonlyArray<ChatMessage>): ContentsBody {
  const parts = messages
    .filter((msg) => msg.role === "user")
    .map((msg) => ({ text: msg.content }));
  return { contents: [{ parts }] };
}

function extractCandidateText(data: unknown): string {
  return readText(data, ["candidates", 0, "content", "parts", 0, "text"]);
}

export const keyInUrlAdapter: FormatAdapter = {
  format: "key-in-url",
  async send(provider, credential, messages, options) {
    const result = await performRequest(
      appendKey(provider.endpoint, credential),
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(buildContentsBody(messages)),
      },
      provider.timeoutMs,
      options?.signal,
    );

    if (!result.ok) return result.outcome;
    if (!isSuccessStatus(result.status)) return httpFailure(result);
    return contentOutcome(provider, extractCandidateText(result.json), result.status, result.json);
  },
};
