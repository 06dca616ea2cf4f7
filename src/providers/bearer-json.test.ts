import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { bearerJsonAdapter, buildChatBody } from "./bearer-json.js";
import { performRequest } from "./adapter.js";
import { makeProvider } from "../gateway/testing.js";

function mockResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function headerRecord(init: RequestInit | undefined): Record<string, string> {
  const headers = init?.headers;
  const record: Record<string, string> = {};
  if (headers === undefined || headers instanceof Headers || Array.isArray(headers)) return record;
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "string") record[key] = value;
  }
  return record;
}

function completion(content: string): unknown {
  return { id: "chatcmpl-1", choices: [{ index: 0, message: { role: "assistant", content } }] };
}

describe("bearer-json adapter", () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it("sends bearer auth and an OpenAI-shaped body", async () => {
    let capturedUrl = "";
    let capturedInit: RequestInit | undefined;
    globalThis.fetch = async (input, init) => {
      capturedUrl = String(input);
      capturedInit = init;
      return mockResponse(completion("Hi there"));
    };

    const provider = makeProvider({ name: "groq", maxTokens: 256, temperature: 0.3 });
    await bearerJsonAdapter.send(provider, "test-secret", [{ role: "user", content: "Hi" }]);

    assert.equal(capturedUrl, "https://groq.test/v1/chat/completions");
    assert.equal(capturedInit?.method, "POST");
    assert.deepEqual(headerRecord(capturedInit), {
      "Content-Type": "application/json",
      "Authorization": "Bearer test-secret",
    });
    const body: unknown = JSON.parse(String(capturedInit?.body));
    assert.deepEqual(body, {
      model: "groq-model",
      messages: [{ role: "user", content: "Hi" }],
      max_tokens: 256,
      temperature: 0.3,
    });
  });

  it("returns the first choice's content", async () => {
    globalThis.fetch = async () => mockResponse(completion("Hi there"));

    const outcome = await bearerJsonAdapter.send(makeProvider({ name: "groq" }), "test-secret", [{ role: "user", content: "Hi" }]);

    assert.equal(outcome.success, true);
    assert.equal(outcome.content, "Hi there");
    assert.equal(outcome.statusCode, 200);
    assert.equal(outcome.errorKind, "none");
  });

  it("uses the model override", async () => {
    let sentModel: unknown;
    globalThis.fetch = async (_input, init) => {
      const body: unknown = JSON.parse(String(init?.body));
      sentModel = typeof body === "object" && body !== null && "model" in body ? body.model : undefined;
      return mockResponse(completion("ok"));
    };

    await bearerJsonAdapter.send(makeProvider({ name: "groq" }), "test-secret", [], { model: "override-model" });

    assert.equal(sentModel, "override-model");
  });

  it("omits the auth header without a credential", async () => {
    let capturedInit: RequestInit | undefined;
    globalThis.fetch = async (_input, init) => {
      capturedInit = init;
      return mockResponse(completion("ok"));
    };

    await bearerJsonAdapter.send(makeProvider({ name: "open", authRequired: false }), undefined, []);

    assert.deepEqual(headerRecord(capturedInit), { "Content-Type": "application/json" });
  });

  it("fails an empty completion", async () => {
    globalThis.fetch = async () => mockResponse(completion("   "));

    const outcome = await bearerJsonAdapter.send(makeProvider({ name: "groq" }), "test-secret", []);

    assert.equal(outcome.success, false);
    assert.equal(outcome.errorKind, "empty_response");
    assert.equal(outcome.errorMessage, "Empty response from groq");
    assert.equal(outcome.statusCode, 200);
  });

  it("returns an http_error carrying status and error body", async () => {
    const errorBody = { error: { message: "Rate limit reached", type: "rate_limit_exceeded" } };
    globalThis.fetch = async () => mockResponse(errorBody, 429);

    const outcome = await bearerJsonAdapter.send(makeProvider({ name: "groq" }), "test-secret", []);

    assert.equal(outcome.success, false);
    assert.equal(outcome.errorKind, "http_error");
    assert.equal(outcome.statusCode, 429);
    assert.equal(outcome.errorMessage, JSON.stringify(errorBody));
    assert.deepEqual(outcome.rawResponse, errorBody);
  });
});

describe("buildChatBody", () => {
  it("prepends a system turn to a lone message when padding is on", () => {
    const provider = makeProvider({ name: "router", padSystemMessage: true });
    const body = buildChatBody(provider, [{ role: "user", content: "Hi" }], "m");
    assert.deepEqual(body.messages, [
      { role: "system", content: "You are a helpful AI assistant." },
      { role: "user", content: "Hi" },
    ]);
  });

  it("leaves longer conversations alone", () => {
    const provider = makeProvider({ name: "router", padSystemMessage: true });
    const messages = [
      { role: "user" as const, content: "Hi" },
      { role: "assistant" as const, content: "Hello" },
    ];
    assert.deepEqual(buildChatBody(provider, messages, "m").messages, messages);
  });
});

describe("performRequest", () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function hangUntilAborted(): typeof globalThis.fetch {
    return (_input, init) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
    });
  }

  it("reports a timeout", async () => {
    globalThis.fetch = hangUntilAborted();
    // the timeout timer does not hold the event loop open on its own
    const keepAlive = setTimeout(() => {}, 5_000);
    try {
      const result = await performRequest("https://slow.test", { method: "GET" }, 20);
      assert.equal(result.ok, false);
      if (!result.ok) {
        assert.equal(result.outcome.errorKind, "timeout");
        assert.equal(result.outcome.errorMessage, "Request timeout after 20ms");
      }
    } finally {
      clearTimeout(keepAlive);
    }
  });

  it("reports caller cancellation", async () => {
    globalThis.fetch = hangUntilAborted();
    const controller = new AbortController();

    const pending = performRequest("https://slow.test", { method: "GET" }, 5_000, controller.signal);
    controller.abort();
    const result = await pending;

    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.outcome.errorKind, "cancelled");
  });

  it("does not call fetch when already cancelled", async () => {
    let called = false;
    globalThis.fetch = async () => {
      called = true;
      return mockResponse({});
    };
    const controller = new AbortController();
    controller.abort();

    const result = await performRequest("https://fast.test", { method: "GET" }, 5_000, controller.signal);

    assert.equal(called, false);
    assert.equal(result.ok, false);
  });

  it("maps thrown errors to request_exception", async () => {
    globalThis.fetch = async () => {
      throw new TypeError("fetch failed");
    };

    const result = await performRequest("https://down.test", { method: "GET" }, 5_000);

    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.outcome.errorKind, "request_exception");
      assert.equal(result.outcome.errorMessage, "fetch failed");
    }
  });
});
