/**
 * Model discovery: asks each provider's "list models" endpoint what it
 * serves. Providers without an endpoint, or whose call fails, contribute
 * their configured model so the cache always knows about them.
 */

import type { ProviderConfig } from "../gateway/types.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { appendKey } from "../providers/key-in-url.js";
import { expandEndpoint } from "../providers/templated-path.js";
import { performRequest, isSuccessStatus, readPath } from "../providers/adapter.js";
import type { CachedModel } from "./model-cache.js";

const DISCOVERY_TIMEOUT_MS = 10_000;

function modelIdOf(entry: unknown): string | undefined {
  if (typeof entry === "string") return entry;
  const id = readPath(entry, ["id"]) ?? readPath(entry, ["name"]);
  return typeof id === "string" && id !== "" ? id : undefined;
}

/**
 * Accepts `{data: [{id}]}`, `{models: [...]}` (strings, objects or a map keyed
 * by id) and a bare array.
 */
export function parseModelList(data: unknown): string[] {
  const list = readPath(data, ["data"]);
  if (Array.isArray(list)) {
    return list.map(modelIdOf).filter((id): id is string => id !== undefined);
  }

  const models = readPath(data, ["models"]);
  if (Array.isArray(models)) {
    return models.map(modelIdOf).filter((id): id is string => id !== undefined);
  }
  if (typeof models === "object" && models !== null) {
    return Object.keys(models);
  }

  if (Array.isArray(data)) {
    return data.map(modelIdOf).filter((id): id is string => id !== undefined);
  }
  return [];
}

function buildDiscoveryRequest(
  provider: ProviderConfig,
  endpoint: string,
): { url: string; headers: Record<string, string> } {
  const key = provider.apiKeys[0];
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  const url = provider.accountId ? expandEndpoint(endpoint, provider.accountId) : endpoint;

  switch (provider.format) {
    case "key-in-url":
      return { url: appendKey(url, key), headers };
    case "message-array":
      if (key) headers["authorization"] = `bearer ${key}`;
      return { url, headers };
    case "query-get":
      return { url, headers };
    default:
      if (key) headers["Authorization"] = `Bearer ${key}`;
      return { url, headers };
  }
}

/** Models served by one provider, or undefined when discovery is unavailable or failed. */
export async function discoverProviderModels(
  provider: ProviderConfig,
  timeoutMs = DISCOVERY_TIMEOUT_MS,
): Promise<string[] | undefined> {
  if (!provider.modelEndpoint) return undefined;

  const { url, headers } = buildDiscoveryRequest(provider, provider.modelEndpoint);
  const result = await performRequest(url, { method: "GET", headers }, timeoutMs);
  if (!result.ok || !isSuccessStatus(result.status)) return undefined;

  const models = parseModelList(result.json);
  return models.length > 0 ? models : undefined;
}

export async function discoverAllModels(
  providers: ReadonlyArray<ProviderConfig>,
  logger: Logger = createLogger("discovery"),
): Promise<CachedModel[]> {
  const enabled = providers.filter((provider) => provider.enabled);
  const results = await Promise.allSettled(enabled.map((provider) => discoverProviderModels(provider)));

  const models: CachedModel[] = [];
  results.forEach((result, i) => {
    const provider = enabled[i];
    const discovered = result.status === "fulfilled" ? result.value : undefined;

    if (discovered) {
      for (const model of discovered) models.push({ provider: provider.name, model });
      logger.debug("Models discovered", { provider: provider.name, count: discovered.length });
    } else {
      models.push({ provider: provider.name, model: provider.model });
      if (provider.modelEndpoint) {
        logger.warn("Model discovery failed, using configured model", { provider: provider.name });
      }
    }
  });

  return models;
}
