import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { configSchema } from "./schema.js";
import { ConfigError, loadConfig, readProvidersFile, resolveProviders } from "./defaults.js";

const PROVIDER = {
  name: "groq",
  priority: 1,
  format: "bearer-json",
  endpoint: "https://groq.test/v1/chat/completions",
  model: "llama-3",
};

describe("configSchema", () => {
  it("fills defaults for optional fields", () => {
    const result = configSchema.parse({ providers: [PROVIDER] });

    assert.equal(result.providersFile, "./config/providers.json");
    assert.deepEqual(result.engine, {
      keyRotationEnabled: true,
      providerRotationEnabled: true,
      consecutiveFailureLimit: 5,
    });
    assert.deepEqual(result.server, { port: 8787, host: "127.0.0.1" });
    assert.deepEqual(result.modelCache, { file: "./data/model-cache.json", ttlMs: 1_800_000 });

    const [provider] = result.providers;
    assert.equal(provider.enabled, true);
    assert.equal(provider.timeoutMs, 60_000);
    assert.equal(provider.authRequired, true);
    assert.deepEqual(provider.apiKeyEnv, []);
    assert.equal(provider.padSystemMessage, false);
  });

  it("coerces numeric strings from the environment", () => {
    const result = configSchema.parse({
      providers: [],
      engine: { consecutiveFailureLimit: "3" },
      server: { port: "9000" },
    });
    assert.equal(result.engine.consecutiveFailureLimit, 3);
    assert.equal(result.server.port, 9000);
  });

  it("rejects an unknown format", () => {
    assert.throws(() => configSchema.parse({ providers: [{ ...PROVIDER, format: "smoke-signal" }] }));
  });

  it("rejects more than three key sources", () => {
    assert.throws(() => configSchema.parse({ providers: [{ ...PROVIDER, apiKeys: ["a", "b", "c", "d"] }] }));
  });

  it("rejects duplicate provider names", () => {
    assert.throws(() => configSchema.parse({ providers: [PROVIDER, PROVIDER] }), /Provider names must be unique/);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "switchyard-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function providersFile(content: unknown): Promise<string> {
    const path = join(dir, "providers.json");
    await writeFile(path, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
    return path;
  }

  it("reads providers and engine settings from the environment", async () => {
    const path = await providersFile([PROVIDER]);

    const config = loadConfig({
      GATEWAY_PROVIDERS_FILE: path,
      KEY_ROTATION_ENABLED: "false",
      CONSECUTIVE_FAILURE_LIMIT: "7",
      GATEWAY_PORT: "0",
      GATEWAY_TOKEN: "test-secret",
      MODEL_CACHE_TTL_MS: "60000",
    });

    assert.equal(config.providersFile, path);
    assert.equal(config.providers[0].name, "groq");
    assert.equal(config.engine.keyRotationEnabled, false);
    assert.equal(config.engine.providerRotationEnabled, true);
    assert.equal(config.engine.consecutiveFailureLimit, 7);
    assert.equal(config.server.port, 0);
    assert.equal(config.server.token, "test-secret");
    assert.equal(config.modelCache.ttlMs, 60_000);
  });

  it("accepts a wrapped providers object", async () => {
    const path = await providersFile({ providers: [PROVIDER] });
    assert.deepEqual(readProvidersFile(path), [PROVIDER]);
  });

  it("names the offending env var", async () => {
    const path = await providersFile([PROVIDER]);

    assert.throws(
      () => loadConfig({ GATEWAY_PROVIDERS_FILE: path, GATEWAY_PORT: "70000" }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.equal(err.issues.length, 1);
        assert.match(err.issues[0], /^Invalid GATEWAY_PORT: /);
        return true;
      },
    );
  });

  it("names the offending provider field", async () => {
    const path = await providersFile([{ ...PROVIDER, format: "smoke-signal" }, { name: "half" }]);

    assert.throws(
      () => loadConfig({ GATEWAY_PROVIDERS_FILE: path }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.match(err.issues[0], /^Invalid providers\[0\]\.format: must be one of: bearer-json, key-in-url/);
        assert.ok(err.issues.includes("Missing providers[1].endpoint"));
        return true;
      },
    );
  });

  it("reports a missing or malformed providers file", async () => {
    assert.throws(
      () => loadConfig({ GATEWAY_PROVIDERS_FILE: join(dir, "absent.json") }),
      /Cannot read providers file/,
    );

    const path = await providersFile("[{");
    assert.throws(() => loadConfig({ GATEWAY_PROVIDERS_FILE: path }), /is not valid JSON/);
  });
});

describe("resolveProviders", () => {
  it("collects inline keys then env keys, dropping blanks", () => {
    const { providers } = configSchema.parse({
      providers: [{ ...PROVIDER, apiKeys: ["inline-key"], apiKeyEnv: ["KEY_A", "KEY_B", "KEY_C"] }],
    });

    const [resolved] = resolveProviders(providers, { KEY_A: "env-key-a", KEY_B: "  ", KEY_C: "env-key-c" });

    assert.deepEqual(resolved.apiKeys, ["inline-key", "env-key-a", "env-key-c"]);
  });

  it("takes the account id from its env var", () => {
    const { providers } = configSchema.parse({
      providers: [{ ...PROVIDER, format: "templated-path", accountIdEnv: "ACCOUNT" }],
    });

    assert.equal(resolveProviders(providers, { ACCOUNT: "acct-1" })[0].accountId, "acct-1");
    assert.equal(resolveProviders(providers, {})[0].accountId, undefined);
  });
});
