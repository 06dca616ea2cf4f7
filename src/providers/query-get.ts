/**
 * Query-GET adapter: the last message goes out as the `user` query value.
 * Responses are either an OpenAI-shaped JSON envelope or raw text.
 */

import type { FormatAdapter } from "./adapter.js";
import {
  contentOutcome,
  extractChoiceContent,
  httpFailure,
  isSuccessStatus,
  performRequest,
  resolveModel,
} from "./adapter.js";

export function buildQueryUrl(endpoint: string, user: string, model: string): string {
  const url = new URL(endpoint);
  url.searchParams.set("user", user);
  url.searchParams.set("model", model);
  return url.toString();
}

export const queryGetAdapter: FormatAdapter = {
  format: "query-get",
  async send(provider, _credential, messages, options) {
    const user = messages.length > 0 ? messages[messages.length - 1].content : "";
    const result = await performRequest(
      buildQueryUrl(provider.endpoint, user, resolveModel(provider, options)),
      { method: "GET" },
      provider.timeoutMs,
      options?.signal,
    );

    if (!result.ok) return result.outcome;
    if (!isSuccessStatus(result.status)) return httpFailure(result);

    const { json } = result;
    if (json === null) return contentOutcome(provider, "", result.status, result.text);
    if (typeof json === "object") {
      return contentOutcome(provider, extractChoiceContent(json), result.status, json);
    }
    if (typeof json === "string") return contentOutcome(provider, json, result.status, result.text);
    return contentOutcome(provider, result.text, result.status, result.text);
  },
};
