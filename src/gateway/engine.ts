/**
 * Rotation & failover engine: tries eligible providers in priority order,
 * one at a time, and returns the first success or an aggregate failure.
 *
 * Shared state lives in the engine's own ProviderRegistry. State is read
 * before an adapter call and written after it; nothing is held across the
 * network await.
 */

import { performance } from "node:perf_hooks";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { ModelCache, type CachedModel, type ModelMatch } from "../models/model-cache.js";
import { resolveAdapter, type AdapterTable } from "../providers/index.js";
import { classifyError, isDailyLimit } from "./error-classifier.js";
import type { CredentialReport } from "./key-balancer.js";
import { ProviderRegistry } from "./provider-registry.js";
import { remediate } from "./remediation.js";
import type { ChatMessage, Clock, EngineSettings, FormatKind, Outcome, ProviderConfig } from "./types.js";
import { DEFAULT_ENGINE_SETTINGS, failure, systemClock } from "./types.js";

const TOP_AVAILABLE_COUNT = 5;
const MAX_ERROR_SNIPPET = 200;

export interface CompleteOptions {
  model?: string;
  preferredProvider?: string;
  /** With `preferredProvider`, use only that provider and never fall back. */
  forceProvider?: boolean;
  signal?: AbortSignal;
}

export interface GatewayEngineOptions {
  providers: ReadonlyArray<ProviderConfig>;
  settings?: Partial<EngineSettings>;
  clock?: Clock;
  /** Replaces the built-in adapter for a format. */
  adapters?: AdapterTable;
  modelCache?: ModelCache;
  logger?: Logger;
}

export interface EngineStatus {
  totalProviders: number;
  availableProviders: number;
  flaggedProviders: number;
  currentProvider: string | null;
  topAvailable: string[];
  flaggedList: string[];
}

export interface KeyReport {
  provider: string;
  currentKey: number;
  perCredential: Record<string, CredentialReport & { flaggedUntil: string | null }>;
}

export interface ProviderStatistics {
  name: string;
  priority: number;
  enabled: boolean;
  requests: number;
  successes: number;
  failures: number;
  averageResponseTimeSeconds: number;
  lastUsed: string | null;
  consecutiveFailures: number;
  flagged: boolean;
  flagReason: string | null;
  flaggedUntil: string | null;
}

export interface ProviderSummary {
  name: string;
  priority: number;
  format: FormatKind;
  model: string;
  enabled: boolean;
  keyCount: number;
  modelDiscovery: boolean;
}

export interface AttemptSummary {
  provider: string;
  errorKind: Outcome["errorKind"];
  statusCode: number;
  errorMessage: string;
}

function snippet(message: string): string {
  return message.length > MAX_ERROR_SNIPPET ? `${message.slice(0, MAX_ERROR_SNIPPET)}...` : message;
}

function formatClockTime(epochMs: number): string {
  return new Date(epochMs).toTimeString().slice(0, 8);
}

function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

export class GatewayEngine {
  readonly registry: ProviderRegistry;
  readonly modelCache: ModelCache;
  readonly settings: EngineSettings;

  private readonly adapters: AdapterTable;
  private readonly log: Logger;
  private current: string | null = null;

  constructor(options: GatewayEngineOptions) {
    const clock = options.clock ?? systemClock;
    this.log = options.logger ?? createLogger("engine");
    this.settings = { ...DEFAULT_ENGINE_SETTINGS, ...options.settings };
    this.adapters = options.adapters ?? {};
    this.registry = new ProviderRegistry(options.providers, clock, this.log.child({ component: "registry" }));
    this.modelCache = options.modelCache ?? new ModelCache({ clock });
  }

  get currentProvider(): string | null {
    return this.current;
  }

  async complete(messages: ReadonlyArray<ChatMessage>, options: CompleteOptions = {}): Promise<Outcome> {
    const candidates = this.candidates(options);
    if (candidates.length === 0) {
      return failure("no_providers", "No available providers");
    }

    const limit = this.settings.providerRotationEnabled ? candidates.length : 1;
    const attempts: AttemptSummary[] = [];

    for (const name of candidates.slice(0, limit)) {
      if (options.signal?.aborted) {
        return failure("cancelled", "Request cancelled by caller", { providerUsed: name });
      }

      this.log.debug("Trying provider", { provider: name });
      const outcome = await this.attempt(name, messages, options.model, options.signal);
      if (outcome.success || outcome.errorKind === "cancelled") return outcome;

      attempts.push({
        provider: name,
        errorKind: outcome.errorKind,
        statusCode: outcome.statusCode,
        errorMessage: snippet(outcome.errorMessage),
      });
    }

    const summary = attempts.map((a) => `${a.provider}: ${a.errorKind} (${a.errorMessage})`).join("; ");
    const last = attempts[attempts.length - 1];
    return failure("all_failed", `All providers failed: ${summary}`, {
      statusCode: last?.statusCode ?? 0,
      providerUsed: last?.provider ?? "",
      rawResponse: { attempts },
    });
  }

  /** Sends to one provider directly, bypassing priority order but not its flag. */
  async testProvider(name: string, message?: string): Promise<Outcome> {
    // disabled providers are invisible here, as they are to failover
    if (!this.registry.get(name)?.enabled) {
      const available = this.registry.all().filter((p) => p.enabled).map((p) => p.name);
      return failure(
        "provider_not_found",
        `Provider '${name}' not found. Available providers: ${available.join(", ")}`,
      );
    }

    const flag = this.registry.providerFlag(name);
    if (flag) {
      return failure(
        "provider_flagged",
        `Provider '${name}' is currently flagged due to ${flag.reason}. Retry available at ${formatClockTime(flag.flagUntil)}`,
        { providerUsed: name },
      );
    }

    const text = message ?? `Hello! Please respond with: '${name} test successful!'`;
    return this.attempt(name, [{ role: "user", content: text }]);
  }

  /**
   * Sends to one provider with its current key and records nothing. Used by
   * benchmarks that must not disturb health state.
   */
  async probe(name: string, messages: ReadonlyArray<ChatMessage>): Promise<Outcome> {
    const provider = this.registry.get(name);
    if (!provider) return failure("provider_not_found", `Provider '${name}' not found`);

    const started = performance.now();
    const outcome = await this.safeSend(provider, this.registry.peekCredential(name), messages);
    return this.stamp(outcome, provider, undefined, started);
  }

  getStatus(): EngineStatus {
    const eligible = this.registry.eligible();
    const flagged = this.registry.flaggedProviders();
    return {
      totalProviders: this.registry.size,
      availableProviders: eligible.length,
      flaggedProviders: flagged.length,
      currentProvider: this.current,
      topAvailable: eligible.slice(0, TOP_AVAILABLE_COUNT).map((p) => p.name),
      flaggedList: flagged.map(([name]) => name),
    };
  }

  getKeyReport(name: string): KeyReport | undefined {
    if (!this.registry.has(name)) return undefined;
    const perCredential: KeyReport["perCredential"] = {};
    this.registry.balancer.report(name).forEach((report, index) => {
      const flag = this.registry.credentialFlag(name, index);
      perCredential[`Key #${index + 1}`] = {
        ...report,
        flaggedUntil: flag ? toIso(flag.flagUntil) : null,
      };
    });
    return { provider: name, currentKey: this.registry.currentCredential(name), perCredential };
  }

  findModelProviders(modelName: string): ModelMatch[] {
    return this.modelCache.findProviders(modelName);
  }

  getModels(): CachedModel[] {
    return this.modelCache.getModels();
  }

  getStatistics(): ProviderStatistics[] {
    return this.registry.all().map((provider) => {
      const usage = this.registry.usageOf(provider.name);
      const flag = this.registry.providerFlag(provider.name);
      const requests = usage?.requests ?? 0;
      return {
        name: provider.name,
        priority: provider.priority,
        enabled: provider.enabled,
        requests,
        successes: usage?.successes ?? 0,
        failures: usage?.failures ?? 0,
        averageResponseTimeSeconds: requests > 0 ? (usage?.totalResponseTimeSeconds ?? 0) / requests : 0,
        lastUsed: toIso(usage?.lastUsed ?? null),
        consecutiveFailures: usage?.consecutiveFailures ?? 0,
        flagged: flag !== undefined,
        flagReason: flag?.reason ?? null,
        flaggedUntil: flag ? toIso(flag.flagUntil) : null,
      };
    });
  }

  listProviders(): ProviderSummary[] {
    return this.registry
      .all()
      .sort((a, b) => a.priority - b.priority)
      .map((provider) => ({
        name: provider.name,
        priority: provider.priority,
        format: provider.format,
        model: provider.model,
        enabled: provider.enabled,
        keyCount: provider.apiKeys.length,
        modelDiscovery: provider.modelEndpoint !== undefined,
      }));
  }

  setProviderEnabled(name: string, enabled: boolean): boolean {
    const changed = this.registry.setEnabled(name, enabled);
    if (changed) this.log.info("Provider toggled", { provider: name, enabled });
    return changed;
  }

  /** Operator key roll: penalizes the current key and moves to the next-best one. */
  rotateCredential(name: string): number | undefined {
    if (!this.registry.has(name)) return undefined;
    return this.registry.rotateCredential(name);
  }

  private candidates(options: CompleteOptions): string[] {
    const { preferredProvider, forceProvider } = options;

    if (preferredProvider && forceProvider) {
      return this.registry.isEligible(preferredProvider) ? [preferredProvider] : [];
    }

    const names = this.registry.eligible().map((p) => p.name);
    if (preferredProvider && names.includes(preferredProvider)) {
      return [preferredProvider, ...names.filter((name) => name !== preferredProvider)];
    }
    return names;
  }

  private async attempt(
    name: string,
    messages: ReadonlyArray<ChatMessage>,
    model?: string,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    const provider = this.registry.get(name);
    if (!provider) return failure("provider_not_found", `Provider '${name}' not found`);

    const credential = this.registry.acquireCredential(name);
    const started = performance.now();
    const sent = await this.safeSend(provider, credential?.key, messages, model, signal);
    const outcome = this.stamp(sent, provider, model, started);

    // An abandoned attempt counts as neither success nor failure.
    if (outcome.errorKind === "cancelled") return outcome;

    if (outcome.success) {
      this.registry.recordSuccess(name, credential?.index, outcome.responseTimeSeconds);
      this.current = name;
      this.log.info("Provider succeeded", {
        provider: name,
        key: credential ? credential.index + 1 : undefined,
        seconds: Number(outcome.responseTimeSeconds.toFixed(3)),
      });
      return outcome;
    }

    const kind = classifyError(outcome.errorMessage, outcome.statusCode, outcome.rawResponse);
    const consecutiveFailures = this.registry.recordFailure(name, credential?.index, outcome.responseTimeSeconds);
    const actions = remediate(this.registry, name, {
      kind,
      dailyLimit: isDailyLimit(outcome.errorMessage, outcome.rawResponse),
      consecutiveFailures,
      keyIndex: credential?.index,
    }, this.settings);

    this.log.warn("Provider failed", {
      provider: name,
      kind,
      status: outcome.statusCode,
      consecutiveFailures,
      actions: actions.map((a) => a.type),
    });

    if (outcome.errorKind === "http_error") outcome.errorKind = kind;
    return outcome;
  }

  private async safeSend(
    provider: ProviderConfig,
    credential: string | undefined,
    messages: ReadonlyArray<ChatMessage>,
    model?: string,
    signal?: AbortSignal,
  ): Promise<Outcome> {
    const adapter = resolveAdapter(provider.format, this.adapters);
    if (!adapter) return failure("unsupported_format", `Unsupported format: ${provider.format}`);
    try {
      return await adapter.send(provider, credential, messages, { model, signal });
    } catch (err) {
      if (signal?.aborted) return failure("cancelled", "Request cancelled by caller");
      return failure("request_exception", err instanceof Error ? err.message : String(err));
    }
  }

  private stamp(outcome: Outcome, provider: ProviderConfig, model: string | undefined, started: number): Outcome {
    return {
      ...outcome,
      responseTimeSeconds: (performance.now() - started) / 1000,
      providerUsed: provider.name,
      modelUsed: model ?? provider.model,
    };
  }
}
