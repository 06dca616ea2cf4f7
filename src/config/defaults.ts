import { readFileSync } from "node:fs";
import { ZodError } from "zod";
import type { ProviderConfig } from "../gateway/types.js";
import { configSchema, type Config, type ProviderEntry } from "./schema.js";

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

// Map Zod schema paths to environment variable names
const pathToEnvVar: Record<string, string> = {
  "providersFile": "GATEWAY_PROVIDERS_FILE",
  "engine.keyRotationEnabled": "KEY_ROTATION_ENABLED",
  "engine.providerRotationEnabled": "PROVIDER_ROTATION_ENABLED",
  "engine.consecutiveFailureLimit": "CONSECUTIVE_FAILURE_LIMIT",
  "server.port": "GATEWAY_PORT",
  "server.host": "GATEWAY_HOST",
  "server.token": "GATEWAY_TOKEN",
  "modelCache.file": "MODEL_CACHE_FILE",
  "modelCache.ttlMs": "MODEL_CACHE_TTL_MS",
};

function describePath(path: ReadonlyArray<string | number>): string {
  const joined = path.join(".");
  const envVar = pathToEnvVar[joined];
  if (envVar) return envVar;
  if (path[0] !== "providers") return joined;

  // providers.2.format -> providers[2].format
  return path.reduce<string>((label, segment) => {
    if (typeof segment === "number") return `${label}[${segment}]`;
    return label === "" ? segment : `${label}.${segment}`;
  }, "");
}

export function formatZodError(error: ZodError): string {
  const errorMessages: string[] = [];

  for (const issue of error.issues) {
    const target = describePath(issue.path);

    switch (issue.code) {
      case "too_small":
        if (issue.type === "string" && issue.minimum === 1) {
          errorMessages.push(`Missing ${target}`);
        } else {
          errorMessages.push(`Invalid ${target}: ${issue.message.toLowerCase()}`);
        }
        break;
      case "invalid_type":
        if (issue.received === "undefined") {
          errorMessages.push(`Missing ${target}`);
        } else {
          errorMessages.push(`Invalid ${target}: expected ${issue.expected}, got ${issue.received}`);
        }
        break;
      case "invalid_string":
        if (issue.validation === "url") {
          errorMessages.push(`Invalid ${target}: must be a valid URL (e.g. https://api.example.com/v1/models)`);
        } else {
          errorMessages.push(`Invalid ${target}: ${issue.message.toLowerCase()}`);
        }
        break;
      case "invalid_enum_value":
        errorMessages.push(`Invalid ${target}: must be one of: ${issue.options.join(", ")}`);
        break;
      case "custom":
        errorMessages.push(issue.message);
        break;
      default:
        errorMessages.push(`Invalid ${target}: ${issue.message.toLowerCase()}`);
    }
  }

  return errorMessages.join("\n");
}

function envFlag(value: string | undefined): boolean | undefined {
  return value !== undefined ? value === "true" : undefined;
}

/** Reads the providers file. Accepts a bare array or `{ "providers": [...] }`. */
export function readProvidersFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read providers file ${path}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Providers file ${path} is not valid JSON: ${reason}`);
  }

  if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed) && "providers" in parsed) {
    return parsed.providers;
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const providersFile = env.GATEWAY_PROVIDERS_FILE || "./config/providers.json";

  try {
    return configSchema.parse({
      providersFile,
      providers: readProvidersFile(providersFile),
      engine: {
        keyRotationEnabled: envFlag(env.KEY_ROTATION_ENABLED),
        providerRotationEnabled: envFlag(env.PROVIDER_ROTATION_ENABLED),
        consecutiveFailureLimit: env.CONSECUTIVE_FAILURE_LIMIT,
      },
      server: {
        port: env.GATEWAY_PORT,
        host: env.GATEWAY_HOST,
        token: env.GATEWAY_TOKEN || undefined,
      },
      modelCache: {
        file: env.MODEL_CACHE_FILE,
        ttlMs: env.MODEL_CACHE_TTL_MS,
      },
    });
  } catch (error) {
    if (error instanceof ZodError) {
      const formatted = formatZodError(error);
      throw new ConfigError(`Invalid configuration:\n${formatted}`, formatted.split("\n"));
    }
    throw error;
  }
}

/**
 * Turns validated entries into engine provider configs. Inline keys come
 * first, then keys named by `apiKeyEnv`; blank values are dropped.
 */
export function resolveProviders(
  entries: ReadonlyArray<ProviderEntry>,
  env: NodeJS.ProcessEnv = process.env,
): ProviderConfig[] {
  return entries.map((entry) => {
    const fromEnv = entry.apiKeyEnv.map((name) => env[name] ?? "");
    const apiKeys = [...entry.apiKeys, ...fromEnv].filter((key) => key.trim() !== "");
    const accountId = entry.accountId ?? (entry.accountIdEnv ? env[entry.accountIdEnv] : undefined);

    return {
      name: entry.name,
      priority: entry.priority,
      format: entry.format,
      endpoint: entry.endpoint,
      model: entry.model,
      enabled: entry.enabled,
      timeoutMs: entry.timeoutMs,
      authRequired: entry.authRequired,
      apiKeys,
      accountId: accountId || undefined,
      modelEndpoint: entry.modelEndpoint,
      maxTokens: entry.maxTokens,
      temperature: entry.temperature,
      padSystemMessage: entry.padSystemMessage,
    };
  });
}
