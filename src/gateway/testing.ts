/**
 * Test doubles shared by the gateway, server and optimizer tests.
 */

import type { Logger } from "../logging/logger.js";
import type { FormatAdapter, SendOptions } from "../providers/adapter.js";
import type { ChatMessage, Clock, Outcome, ProviderConfig } from "./types.js";
import { failure, success } from "./types.js";

/** Clock that only moves when told to. Starts at 2026-03-02T12:00:00Z. */
export class ManualClock implements Clock {
  constructor(private current = Date.UTC(2026, 2, 2, 12, 0, 0)) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};

export function makeProvider(overrides: Partial<ProviderConfig> & { name: string }): ProviderConfig {
  return {
    priority: 1,
    format: "bearer-json",
    endpoint: `https://${overrides.name}.test/v1/chat/completions`,
    model: `${overrides.name}-model`,
    enabled: true,
    timeoutMs: 5_000,
    authRequired: true,
    apiKeys: [`${overrides.name}-test-key`],
    ...overrides,
  };
}

export interface RecordedCall {
  provider: string;
  credential: string | undefined;
  messages: ReadonlyArray<ChatMessage>;
  model: string | undefined;
}

export type Reply = (provider: ProviderConfig, credential: string | undefined, options: SendOptions) => Outcome | Promise<Outcome>;

/**
 * Bearer-JSON stand-in that answers per provider name. Providers without a
 * reply succeed with "ok from <name>".
 */
export class ScriptedAdapter implements FormatAdapter {
  readonly format = "bearer-json" as const;
  readonly calls: RecordedCall[] = [];
  private readonly replies = new Map<string, Reply>();

  on(provider: string, reply: Reply): this {
    this.replies.set(provider, reply);
    return this;
  }

  async send(
    provider: ProviderConfig,
    credential: string | undefined,
    messages: ReadonlyArray<ChatMessage>,
    options: SendOptions = {},
  ): Promise<Outcome> {
    this.calls.push({ provider: provider.name, credential, messages, model: options.model });
    const reply = this.replies.get(provider.name);
    if (!reply) return success(`ok from ${provider.name}`);
    return reply(provider, credential, options);
  }

  callsTo(provider: string): RecordedCall[] {
    return this.calls.filter((call) => call.provider === provider);
  }
}

export function httpError(status: number, text: string, body?: unknown): Outcome {
  return failure("http_error", text, { statusCode: status, rawResponse: body });
}
