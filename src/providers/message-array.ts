/**
 * Message-array adapter: v2-style chat endpoints that expect a lowercase
 * `authorization: bearer <key>` header and answer with `message.content[0].text`.
 */

import type { FormatAdapter } from "./adapter.js";
import {
  contentOutcome,
  httpFailure,
  isSuccessStatus,
  performRequest,
  readText,
  resolveModel,
} from "./adapter.js";

function extractMessageText(data: unknown): string {
  return readText(data, ["message", "content", 0, "text"]);
}

export const messageArrayAdapter: FormatAdapter = {
  format: "message-array",
  async send(provider, credential, messages, options) {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (credential) headers["authorization"] = `bearer ${credential}`;

    const result = await performRequest(
      provider.endpoint,
      {
        method: "POST",
        headers,
        body: JSON.stringify({ model: resolveModel(provider, options), messages }),
      },
      provider.timeoutMs,
      options?.signal,
    );

    if (!result.ok) return result.outcome;
    if (!isSuccessStatus(result.status)) return httpFailure(result);
    return contentOutcome(provider, extractMessageText(result.json), result.status, result.json);
  },
};
