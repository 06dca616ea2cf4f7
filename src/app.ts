import type { Config } from "./config/schema.js";
import { resolveProviders } from "./config/defaults.js";
import { GatewayEngine } from "./gateway/engine.js";
import type { Logger } from "./logging/logger.js";
import { createLogger } from "./logging/logger.js";
import { discoverAllModels } from "./models/discovery.js";
import { ModelCache, type DiscoveryFn } from "./models/model-cache.js";

export interface Gateway {
  engine: GatewayEngine;
  discover: DiscoveryFn;
}

export function buildGateway(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = createLogger("switchyard"),
): Gateway {
  const providers = resolveProviders(config.providers, env);
  const modelCache = new ModelCache({
    ttlMs: config.modelCache.ttlMs,
    persistPath: config.modelCache.file,
    logger: logger.child({ component: "model-cache" }),
  });
  const engine = new GatewayEngine({
    providers,
    settings: config.engine,
    modelCache,
    logger: logger.child({ component: "engine" }),
  });

  // Excluded providers (no usable keys) are not probed for models
  const discover: DiscoveryFn = () =>
    discoverAllModels(engine.registry.all(), logger.child({ component: "discovery" }));

  return { engine, discover };
}

/** Loads the persisted model cache, or discovers a fresh one. */
export async function warmModelCache(gateway: Gateway, cacheFile: string): Promise<void> {
  const { modelCache } = gateway.engine;
  if (await modelCache.load(cacheFile)) return;
  await modelCache.refresh(gateway.discover);
}
