import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { startGatewayServer, statusForOutcome, type GatewayServer } from "./gateway-server.js";
import { GatewayEngine } from "../gateway/engine.js";
import { ScriptedAdapter, httpError, makeProvider, silentLogger } from "../gateway/testing.js";
import { failure, type Outcome } from "../gateway/types.js";

async function waitFor(condition: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

function readField(data: unknown, ...path: Array<string | number>): unknown {
  let current = data;
  for (const key of path) {
    if (typeof current !== "object" || current === null) return undefined;
    current = Object.getOwnPropertyDescriptor(current, key)?.value;
  }
  return current;
}

describe("GatewayServer", () => {
  let server: GatewayServer | null = null;
  let adapter: ScriptedAdapter;
  let engine: GatewayEngine;
  let baseUrl: string;

  beforeEach(() => {
    adapter = new ScriptedAdapter();
    engine = new GatewayEngine({
      providers: [
        makeProvider({ name: "a", priority: 1, apiKeys: ["a-key-1", "a-key-2"] }),
        makeProvider({ name: "b", priority: 2 }),
      ],
      adapters: { "bearer-json": adapter },
      logger: silentLogger,
    });
  });

  afterEach(async () => {
    if (server) {
      await server.stop();
      server = null;
    }
  });

  async function startServer(token?: string): Promise<void> {
    server = startGatewayServer({ port: 0, host: "127.0.0.1", token, engine, logger: silentLogger });
    await server.start();
    baseUrl = `http://127.0.0.1:${server.port}`;
  }

  function chat(body: unknown, headers: Record<string, string> = {}): Promise<Response> {
    return fetch(`${baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  }

  const HELLO = { messages: [{ role: "user", content: "Hello" }] };

  describe("auth", () => {
    it("serves /health without a token", async () => {
      await startServer("test-secret");
      const res = await fetch(`${baseUrl}/health`);
      assert.equal(res.status, 200);
      assert.deepEqual(await res.json(), { status: "ok" });
    });

    it("requires the bearer token elsewhere", async () => {
      await startServer("test-secret");

      const denied = await fetch(`${baseUrl}/api/status`);
      assert.equal(denied.status, 401);

      const allowed = await fetch(`${baseUrl}/api/status`, { headers: { Authorization: "Bearer test-secret" } });
      assert.equal(allowed.status, 200);
    });
  });

  describe("POST /v1/chat/completions", () => {
    it("answers in the chat completion shape", async () => {
      await startServer();
      const res = await chat(HELLO);
      const body: unknown = await res.json();

      assert.equal(res.status, 200);
      assert.equal(readField(body, "object"), "chat.completion");
      assert.equal(readField(body, "provider"), "a");
      assert.equal(readField(body, "model"), "a-model");
      assert.deepEqual(readField(body, "choices", 0, "message"), { role: "assistant", content: "ok from a" });
      assert.match(String(readField(body, "id")), /^chatcmpl-/);
    });

    it("rejects a malformed request", async () => {
      await startServer();
      const res = await chat({ messages: [] });
      assert.equal(res.status, 400);
      assert.equal(readField(await res.json(), "error", "type"), "bad_request");

      const notJson = await fetch(`${baseUrl}/v1/chat/completions`, { method: "POST", body: "{oops" });
      assert.equal(notJson.status, 400);
    });

    it("maps an aggregate failure to 503", async () => {
      await startServer();
      adapter.on("a", () => httpError(500, "Internal Server Error"));
      adapter.on("b", () => httpError(500, "Internal Server Error"));

      const res = await chat(HELLO);

      assert.equal(res.status, 503);
      assert.equal(readField(await res.json(), "error", "type"), "all_failed");
    });

    it("honors the preferred and forced provider headers", async () => {
      await startServer();

      const preferred = await chat(HELLO, { "X-Preferred-Provider": "b" });
      assert.equal(readField(await preferred.json(), "provider"), "b");

      engine.registry.flagProvider("b", Date.now() + 60_000, "server_error");
      const forced = await chat(HELLO, { "X-Preferred-Provider": "b", "X-Force-Provider": "true" });
      assert.equal(forced.status, 503);
      assert.equal(readField(await forced.json(), "error", "type"), "no_providers");
    });

    it("routes a known model to the provider serving it", async () => {
      await startServer();
      engine.modelCache.replace([{ provider: "b", model: "vendor/gpt-4" }]);

      const res = await chat({ ...HELLO, model: "GPT-4" });
      const body: unknown = await res.json();

      assert.equal(readField(body, "provider"), "b");
      assert.equal(readField(body, "model"), "gpt-4");
      assert.equal(adapter.calls[0].model, "gpt-4");
    });

    it("falls back to normal failover when the routed provider fails", async () => {
      await startServer();
      engine.modelCache.replace([{ provider: "b", model: "gpt-4" }]);
      adapter.on("b", () => httpError(503, "Service Unavailable"));

      const res = await chat({ ...HELLO, model: "gpt-4" });

      assert.equal(readField(await res.json(), "provider"), "a");
      assert.deepEqual(adapter.calls.map((c) => [c.provider, c.model]), [["b", "gpt-4"], ["a", undefined]]);
    });

    it("uses provider defaults for an unknown model", async () => {
      await startServer();
      const res = await chat({ ...HELLO, model: "mystery-model" });
      assert.equal(readField(await res.json(), "model"), "a-model");
    });

    it("aborts the engine call when the client goes away", async () => {
      await startServer();
      let aborted = false;
      adapter.on("a", (_provider, _credential, options) => new Promise<Outcome>((resolve) => {
        options.signal?.addEventListener("abort", () => {
          aborted = true;
          resolve(failure("cancelled", "Request cancelled by caller"));
        });
      }));

      const client = new AbortController();
      const pending = fetch(`${baseUrl}/v1/chat/completions`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(HELLO),
        signal: client.signal,
      }).catch(() => undefined);

      await waitFor(() => adapter.calls.length === 1);
      client.abort();
      await pending;
      await waitFor(() => aborted);

      assert.equal(engine.registry.usageOf("a")?.failures, 0);
      assert.deepEqual(adapter.calls.map((c) => c.provider), ["a"]);
    });
  });

  describe("management routes", () => {
    it("lists cached models", async () => {
      await startServer();
      engine.modelCache.replace([{ provider: "a", model: "llama-3" }]);

      const res = await fetch(`${baseUrl}/v1/models`);

      assert.deepEqual(await res.json(), {
        object: "list",
        data: [{ id: "llama-3", object: "model", owned_by: "a" }],
      });
    });

    it("reports status, statistics and providers", async () => {
      await startServer();
      await chat(HELLO);

      const status: unknown = await (await fetch(`${baseUrl}/api/status`)).json();
      assert.equal(readField(status, "currentProvider"), "a");
      assert.equal(readField(status, "totalProviders"), 2);

      const stats: unknown = await (await fetch(`${baseUrl}/api/statistics`)).json();
      assert.equal(readField(stats, "providers", 0, "successes"), 1);

      const providers: unknown = await (await fetch(`${baseUrl}/api/providers`)).json();
      assert.equal(readField(providers, "providers", 0, "keyCount"), 2);
    });

    it("reports keys and 404s unknown providers", async () => {
      await startServer();

      const keys = await fetch(`${baseUrl}/api/providers/a/keys`);
      assert.equal(keys.status, 200);
      assert.equal(readField(await keys.json(), "perCredential", "Key #2", "requests"), 0);

      const missing = await fetch(`${baseUrl}/api/providers/zzz/keys`);
      assert.equal(missing.status, 404);
    });

    it("toggles a provider explicitly or by flipping", async () => {
      await startServer();

      const off = await fetch(`${baseUrl}/api/providers/a/toggle`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ enabled: false }),
      });
      assert.deepEqual(await off.json(), { provider: "a", enabled: false });
      assert.deepEqual(engine.getStatus().topAvailable, ["b"]);

      const flipped = await fetch(`${baseUrl}/api/providers/a/toggle`, { method: "POST" });
      assert.deepEqual(await flipped.json(), { provider: "a", enabled: true });

      const missing = await fetch(`${baseUrl}/api/providers/zzz/toggle`, { method: "POST" });
      assert.equal(missing.status, 404);
    });

    it("rolls a key", async () => {
      await startServer();
      const res = await fetch(`${baseUrl}/api/providers/a/roll-key`, { method: "POST" });
      assert.deepEqual(await res.json(), { provider: "a", currentKey: 1 });
    });

    it("resolves a model name", async () => {
      await startServer();
      engine.modelCache.replace([{ provider: "b", model: "org/gpt-4" }]);

      const res = await fetch(`${baseUrl}/api/autodecide/gpt4`);

      assert.deepEqual(await res.json(), { model: "gpt4", providers: [{ provider: "b", model: "gpt-4" }] });
    });

    it("answers 400 for a malformed escape in the path", async () => {
      await startServer();

      const model = await fetch(`${baseUrl}/api/autodecide/%E0%A4%A`);
      assert.equal(model.status, 400);
      assert.deepEqual(await model.json(), { error: "Malformed path" });

      const keys = await fetch(`${baseUrl}/api/providers/%E0%A4%A/keys`);
      assert.equal(keys.status, 400);
    });

    it("returns 404 for unknown routes", async () => {
      await startServer();
      const res = await fetch(`${baseUrl}/nope`);
      assert.equal(res.status, 404);
    });
  });
});

describe("statusForOutcome", () => {
  it("maps engine kinds to HTTP statuses", () => {
    assert.equal(statusForOutcome("no_providers"), 503);
    assert.equal(statusForOutcome("all_failed"), 503);
    assert.equal(statusForOutcome("provider_flagged"), 503);
    assert.equal(statusForOutcome("provider_not_found"), 404);
    assert.equal(statusForOutcome("cancelled"), 499);
    assert.equal(statusForOutcome("config_error"), 500);
    assert.equal(statusForOutcome("unsupported_format"), 500);
    assert.equal(statusForOutcome("rate_limit"), 502);
  });
});
