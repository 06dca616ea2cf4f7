/**
 * Templated-path adapter - OpenAI-shaped endpoints whose URL carries an
 * `{account_id}` placeholder filled from provider configuration.
 */

import type { FormatAdapter } from "./adapter.js";
import { failure } from "../gateway/types.js";
import { buildHeaders, sendChatCompletion } from "./bearer-json.js";

const ACCOUNT_PLACEHOLDER = "{account_id}";

export function expandEndpoint(endpoint: string, accountId: string): string {
  return endpoint.split(ACCOUNT_PLACEHOLDER).join(encodeURIComponent(accountId));
}

export const templatedPathAdapter: FormatAdapter = {
  format: "templated-path",
  async send(provider, credential, messages, options) {
    if (!provider.accountId) {
      return failure("config_error", `${provider.name}: account_id not configured`);
    }
    const url = expandEndpoint(provider.endpoint, provider.accountId);
    return sendChatCompletion(url, buildHeaders(credential), provider, messages, options);
  },
};
