import { buildGateway, warmModelCache } from "./app.js";
import { ConfigError, loadConfig } from "./config/defaults.js";
import { log } from "./logging/logger.js";
import { startGatewayServer } from "./server/gateway-server.js";

async function main() {
  log.info("switchyard starting");

  const config = loadConfig();
  const gateway = buildGateway(config, process.env, log);
  const { engine } = gateway;

  const status = engine.getStatus();
  log.info("Providers loaded", {
    total: status.totalProviders,
    available: status.availableProviders,
    keyRotation: engine.settings.keyRotationEnabled,
    providerRotation: engine.settings.providerRotationEnabled,
  });
  if (status.totalProviders === 0) {
    log.warn("No usable providers configured", { file: config.providersFile });
  }

  await warmModelCache(gateway, config.modelCache.file);
  engine.modelCache.startAutoRefresh(gateway.discover);

  const server = startGatewayServer({
    port: config.server.port,
    host: config.server.host,
    token: config.server.token,
    engine,
    logger: log.child({ component: "server" }),
  });
  await server.start();

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down", { signal });
    engine.modelCache.stopAutoRefresh();
    await server.stop();
    log.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

process.on("unhandledRejection", (reason) => {
  log.error("Unhandled rejection", { reason: reason instanceof Error ? reason.message : String(reason) });
});

main().catch((err) => {
  if (err instanceof ConfigError) {
    log.error("Invalid configuration", { issues: err.issues.length > 0 ? err.issues : [err.message] });
  } else {
    log.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  }
  process.exit(1);
});
