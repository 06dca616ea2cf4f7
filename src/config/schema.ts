import { z } from "zod";
import { FORMAT_KINDS } from "../gateway/types.js";

export const providerEntrySchema = z.object({
  name: z.string().min(1),
  priority: z.coerce.number().int().default(100),
  format: z.enum(FORMAT_KINDS),
  endpoint: z.string().min(1),
  model: z.string().min(1),
  enabled: z.boolean().default(true),
  timeoutMs: z.coerce.number().int().positive().default(60_000),
  authRequired: z.boolean().default(true),
  // Names of env vars holding the keys, tried in order
  apiKeyEnv: z.array(z.string().min(1)).max(3).default([]),
  apiKeys: z.array(z.string()).max(3).default([]),
  accountId: z.string().optional(),
  accountIdEnv: z.string().optional(),
  modelEndpoint: z.string().url().optional(),
  maxTokens: z.coerce.number().int().positive().optional(),
  temperature: z.coerce.number().min(0).max(2).optional(),
  padSystemMessage: z.boolean().default(false),
});

export type ProviderEntry = z.infer<typeof providerEntrySchema>;

export const configSchema = z.object({
  providersFile: z.string().default("./config/providers.json"),
  providers: z.array(providerEntrySchema),
  engine: z.object({
    keyRotationEnabled: z.boolean().default(true),
    providerRotationEnabled: z.boolean().default(true),
    consecutiveFailureLimit: z.coerce.number().int().positive().default(5),
  }).default({}),
  server: z.object({
    port: z.coerce.number().int().min(0).max(65_535).default(8787),
    host: z.string().default("127.0.0.1"),
    token: z.string().optional(),
  }).default({}),
  modelCache: z.object({
    file: z.string().default("./data/model-cache.json"),
    ttlMs: z.coerce.number().int().positive().default(1_800_000),
  }).default({}),
}).refine((data) => {
  const names = data.providers.map((p) => p.name);
  return new Set(names).size === names.length;
}, {
  message: "Provider names must be unique",
  path: ["providers"],
});

export type Config = z.infer<typeof configSchema>;
