import { createServer, type IncomingMessage, type ServerResponse, type Server } from "node:http";
import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { CompleteOptions, GatewayEngine } from "../gateway/engine.js";
import type { ErrorKind, Outcome } from "../gateway/types.js";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";

const MAX_BODY_SIZE = 1_048_576; // 1 MB

/** Engine surface the HTTP layer needs. */
export type GatewayService = Pick<
  GatewayEngine,
  | "complete"
  | "getStatus"
  | "getStatistics"
  | "listProviders"
  | "getKeyReport"
  | "setProviderEnabled"
  | "rotateCredential"
  | "findModelProviders"
  | "getModels"
>;

export interface GatewayServerOptions {
  port: number;
  host?: string;
  /** When set, every route except /health requires `Authorization: Bearer <token>`. */
  token?: string;
  engine: GatewayService;
  logger?: Logger;
}

export interface GatewayServer {
  server: Server;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  /** Bound port; differs from the requested one when that was 0. */
  readonly port: number;
}

const chatRequestSchema = z.object({
  model: z.string().optional(),
  messages: z.array(z.object({
    role: z.enum(["system", "user", "assistant"]),
    content: z.string(),
  })).min(1),
});

const toggleSchema = z.object({ enabled: z.boolean().optional() });

const PROVIDER_ROUTE = /^\/api\/providers\/([^/]+)\/(keys|toggle|roll-key)$/;
const AUTODECIDE_ROUTE = /^\/api\/autodecide\/(.+)$/;

export function statusForOutcome(kind: ErrorKind): number {
  switch (kind) {
    case "no_providers":
    case "all_failed":
    case "provider_flagged":
      return 503;
    case "provider_not_found":
      return 404;
    case "cancelled":
      return 499;
    case "config_error":
    case "unsupported_format":
      return 500;
    default:
      return 502;
  }
}

function parseBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_SIZE) {
        req.destroy();
        reject(new Error("Body too large"));
        return;
      }
      chunks.push(chunk);
    });

    req.on("end", () => {
      resolve(Buffer.concat(chunks).toString("utf-8"));
    });

    req.on("error", reject);
  });
}

function parseJson(raw: string): unknown {
  if (raw.trim() === "") return {};
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function respond(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/** Percent-decodes a path segment; undefined when the escape is malformed. */
function decodeSegment(raw: string): string | undefined {
  try {
    return decodeURIComponent(raw);
  } catch {
    return undefined;
  }
}

function isTruthyHeader(value: string | undefined): boolean {
  return value === "true" || value === "1";
}

function completionBody(outcome: Outcome): Record<string, unknown> {
  return {
    id: `chatcmpl-${randomUUID()}`,
    object: "chat.completion",
    created: Math.floor(Date.now() / 1000),
    model: outcome.modelUsed,
    provider: outcome.providerUsed,
    choices: [{
      index: 0,
      message: { role: "assistant", content: outcome.content },
      finish_reason: "stop",
    }],
  };
}

function errorBody(outcome: Outcome): Record<string, unknown> {
  return {
    error: {
      message: outcome.errorMessage,
      type: outcome.errorKind,
      provider: outcome.providerUsed || null,
    },
  };
}

export function startGatewayServer(options: GatewayServerOptions): GatewayServer {
  const { engine, token } = options;
  const host = options.host ?? "127.0.0.1";
  const log = options.logger ?? createLogger("server");

  /**
   * A requested model that the cache resolves is tried on its provider first;
   * when that fails (and the caller did not force a provider) the request
   * falls back to normal failover with each provider's configured model.
   */
  async function dispatch(
    body: z.infer<typeof chatRequestSchema>,
    base: CompleteOptions,
  ): Promise<Outcome> {
    const requested = body.model && body.model !== "auto" ? body.model : undefined;
    if (!requested) return engine.complete(body.messages, base);

    if (base.preferredProvider) {
      return engine.complete(body.messages, { ...base, model: requested });
    }

    const match = engine.findModelProviders(requested)[0];
    if (!match) {
      log.debug("Requested model not in cache, using provider defaults", { model: requested });
      return engine.complete(body.messages, base);
    }

    const routed = await engine.complete(body.messages, {
      ...base,
      model: match.model,
      preferredProvider: match.provider,
      forceProvider: true,
    });
    if (routed.success || routed.errorKind === "cancelled") return routed;
    return engine.complete(body.messages, base);
  }

  async function handleChat(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let raw: string;
    try {
      raw = await parseBody(req);
    } catch {
      respond(res, 400, { error: { message: "Invalid request body", type: "bad_request" } });
      return;
    }

    const parsed = chatRequestSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
      respond(res, 400, { error: { message, type: "bad_request" } });
      return;
    }

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    const outcome = await dispatch(parsed.data, {
      preferredProvider: headerValue(req, "x-preferred-provider") || undefined,
      forceProvider: isTruthyHeader(headerValue(req, "x-force-provider")),
      signal: controller.signal,
    });

    if (outcome.errorKind === "cancelled") {
      log.info("Client disconnected, request abandoned", { provider: outcome.providerUsed });
      if (!res.destroyed) respond(res, 499, errorBody(outcome));
      return;
    }

    if (outcome.success) {
      respond(res, 200, completionBody(outcome));
    } else {
      respond(res, statusForOutcome(outcome.errorKind), errorBody(outcome));
    }
  }

  async function handleToggle(req: IncomingMessage, res: ServerResponse, name: string): Promise<void> {
    let raw: string;
    try {
      raw = await parseBody(req);
    } catch {
      respond(res, 400, { error: "Invalid request body" });
      return;
    }

    const parsed = toggleSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      respond(res, 400, { error: "Expected {\"enabled\": boolean}" });
      return;
    }

    const current = engine.listProviders().find((p) => p.name === name);
    if (!current) {
      respond(res, 404, { error: `Provider '${name}' not found` });
      return;
    }

    const enabled = parsed.data.enabled ?? !current.enabled;
    engine.setProviderEnabled(name, enabled);
    respond(res, 200, { provider: name, enabled });
  }

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${host}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    if (method === "GET" && pathname === "/health") {
      respond(res, 200, { status: "ok" });
      return;
    }

    if (token && headerValue(req, "authorization") !== `Bearer ${token}`) {
      respond(res, 401, { error: "Unauthorized" });
      return;
    }

    if (method === "POST" && pathname === "/v1/chat/completions") {
      await handleChat(req, res);
      return;
    }

    if (method === "GET" && pathname === "/v1/models") {
      const data = engine.getModels().map((m) => ({ id: m.model, object: "model", owned_by: m.provider }));
      respond(res, 200, { object: "list", data });
      return;
    }

    if (method === "GET" && pathname === "/api/status") {
      respond(res, 200, engine.getStatus());
      return;
    }

    if (method === "GET" && pathname === "/api/statistics") {
      respond(res, 200, { providers: engine.getStatistics() });
      return;
    }

    if (method === "GET" && pathname === "/api/providers") {
      respond(res, 200, { providers: engine.listProviders() });
      return;
    }

    const autodecide = AUTODECIDE_ROUTE.exec(pathname);
    if (method === "GET" && autodecide) {
      const model = decodeSegment(autodecide[1]);
      if (model === undefined) {
        respond(res, 400, { error: "Malformed path" });
        return;
      }
      respond(res, 200, { model, providers: engine.findModelProviders(model) });
      return;
    }

    const providerRoute = PROVIDER_ROUTE.exec(pathname);
    if (providerRoute) {
      const name = decodeSegment(providerRoute[1]);
      if (name === undefined) {
        respond(res, 400, { error: "Malformed path" });
        return;
      }
      const action = providerRoute[2];

      if (method === "GET" && action === "keys") {
        const report = engine.getKeyReport(name);
        if (report) respond(res, 200, report);
        else respond(res, 404, { error: `Provider '${name}' not found` });
        return;
      }
      if (method === "POST" && action === "toggle") {
        await handleToggle(req, res, name);
        return;
      }
      if (method === "POST" && action === "roll-key") {
        const index = engine.rotateCredential(name);
        if (index === undefined) respond(res, 404, { error: `Provider '${name}' not found` });
        else respond(res, 200, { provider: name, currentKey: index });
        return;
      }
    }

    respond(res, 404, { error: "Not found" });
  }

  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    route(req, res).catch((err: unknown) => {
      log.error("Request handler failed", {
        path: req.url,
        error: err instanceof Error ? err.message : String(err),
      });
      if (!res.headersSent) respond(res, 500, { error: "Internal server error" });
      else res.end();
    });
  });

  function start(): Promise<void> {
    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(options.port, host, () => {
        server.removeListener("error", reject);
        log.info("Gateway listening", { host, port: boundPort() });
        resolve();
      });
    });
  }

  function stop(): Promise<void> {
    return new Promise((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }

  function boundPort(): number {
    const address = server.address();
    return typeof address === "object" && address !== null ? address.port : options.port;
  }

  return {
    server,
    start,
    stop,
    get port() {
      return boundPort();
    },
  };
}
