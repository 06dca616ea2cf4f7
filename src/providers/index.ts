import type { FormatKind } from "../gateway/types.js";
import type { FormatAdapter } from "./adapter.js";
import { bearerJsonAdapter } from "./bearer-json.js";
import { keyInUrlAdapter } from "./key-in-url.js";
import { messageArrayAdapter } from "./message-array.js";
import { queryGetAdapter } from "./query-get.js";
import { templatedPathAdapter } from "./templated-path.js";

export type AdapterTable = Readonly<Partial<Record<FormatKind, FormatAdapter>>>;

export const DEFAULT_ADAPTERS: Readonly<Record<FormatKind, FormatAdapter>> = {
  "bearer-json": bearerJsonAdapter,
  "key-in-url": keyInUrlAdapter,
  "message-array": messageArrayAdapter,
  "query-get": queryGetAdapter,
  "templated-path": templatedPathAdapter,
};

/** Adapter for `format`, with `overrides` taking precedence. */
export function resolveAdapter(format: FormatKind, overrides: AdapterTable = {}): FormatAdapter | undefined {
  return overrides[format] ?? DEFAULT_ADAPTERS[format];
}

export type { FormatAdapter, SendOptions } from "./adapter.js";
