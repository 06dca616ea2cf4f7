/**
 * Provider registry: the owned, per-engine home of all mutable health state:
 * provider configs, usage counters, consecutive failures, current-key pointers,
 * provider/credential flags and the key balancer.
 *
 * No method awaits, so each call is one critical section on the event loop.
 */

import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import { FlagStore, type FlagRecord } from "./flags.js";
import { KeyBalancer } from "./key-balancer.js";
import type { Clock, FlagReason, ProviderConfig } from "./types.js";

export const MAX_CREDENTIALS = 3;

export interface ProviderUsage {
  requests: number;
  successes: number;
  failures: number;
  totalResponseTimeSeconds: number;
  lastUsed: number | null;
  consecutiveFailures: number;
}

export interface AcquiredCredential {
  index: number;
  key: string;
}

function createUsage(): ProviderUsage {
  return {
    requests: 0,
    successes: 0,
    failures: 0,
    totalResponseTimeSeconds: 0,
    lastUsed: null,
    consecutiveFailures: 0,
  };
}

function validKeys(keys: ReadonlyArray<string>): string[] {
  return keys.filter((key) => key.trim() !== "").slice(0, MAX_CREDENTIALS);
}

export class ProviderRegistry {
  readonly balancer: KeyBalancer;
  readonly providerFlags: FlagStore;
  readonly keyFlags: FlagStore;

  private readonly providers = new Map<string, ProviderConfig>();
  private readonly usage = new Map<string, ProviderUsage>();
  private readonly currentKey = new Map<string, number>();
  private readonly log: Logger;

  constructor(configs: ReadonlyArray<ProviderConfig>, readonly clock: Clock, logger?: Logger) {
    this.log = logger ?? createLogger("registry");
    this.balancer = new KeyBalancer(clock);
    this.providerFlags = new FlagStore(clock);
    this.keyFlags = new FlagStore(clock);

    for (const config of configs) {
      if (this.providers.has(config.name)) {
        throw new Error(`Duplicate provider name "${config.name}"`);
      }
      const apiKeys = validKeys(config.apiKeys);
      if (config.authRequired && apiKeys.length === 0) {
        this.log.warn("Provider excluded: no valid API keys", { provider: config.name });
        continue;
      }
      this.providers.set(config.name, { ...config, apiKeys });
      this.usage.set(config.name, createUsage());
      this.currentKey.set(config.name, 0);
      this.balancer.register(config.name, apiKeys.length);
    }

    this.log.info("Providers loaded", { loaded: this.providers.size, configured: configs.length });
  }

  get size(): number {
    return this.providers.size;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  get(name: string): ProviderConfig | undefined {
    return this.providers.get(name);
  }

  /** All providers in configuration order. */
  all(): ProviderConfig[] {
    return [...this.providers.values()];
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  isEligible(name: string): boolean {
    const provider = this.providers.get(name);
    return provider !== undefined && provider.enabled && !this.providerFlags.isFlagged(name);
  }

  /** Enabled, unflagged providers, ascending priority; ties keep configuration order. */
  eligible(): ProviderConfig[] {
    return this.all()
      .filter((provider) => this.isEligible(provider.name))
      .sort((a, b) => a.priority - b.priority);
  }

  setEnabled(name: string, enabled: boolean): boolean {
    const provider = this.providers.get(name);
    if (!provider) return false;
    provider.enabled = enabled;
    return true;
  }

  setPriority(name: string, priority: number): boolean {
    const provider = this.providers.get(name);
    if (!provider) return false;
    provider.priority = priority;
    return true;
  }

  usageOf(name: string): Readonly<ProviderUsage> | undefined {
    return this.usage.get(name);
  }

  currentCredential(name: string): number {
    return this.currentKey.get(name) ?? 0;
  }

  /** Picks the best credential, records its usage and makes it current. */
  acquireCredential(name: string): AcquiredCredential | undefined {
    const provider = this.providers.get(name);
    if (!provider) return undefined;
    const index = this.balancer.acquire(name);
    if (index === undefined) return undefined;
    this.currentKey.set(name, index);
    return { index, key: provider.apiKeys[index] };
  }

  /** Key at the current pointer without touching usage counters. */
  peekCredential(name: string): string | undefined {
    return this.providers.get(name)?.apiKeys[this.currentCredential(name)];
  }

  /**
   * Penalizes `fromIndex` (default: current) and moves the pointer to the
   * next-best credential. Single-key providers keep their only key.
   */
  rotateCredential(name: string, fromIndex?: number): number | undefined {
    const keyCount = this.balancer.keyCount(name);
    if (keyCount === 0) return undefined;
    const from = fromIndex ?? this.currentCredential(name);
    this.balancer.markRateLimited(name, from);
    if (keyCount === 1) return from;

    const next = this.balancer.selectCredential(name);
    if (next !== undefined) {
      this.currentKey.set(name, next);
      this.log.info("Credential rotated", { provider: name, from: from + 1, to: next + 1 });
    }
    return next;
  }

  recordSuccess(name: string, keyIndex: number | undefined, latencySeconds: number): void {
    const usage = this.usage.get(name);
    if (!usage) return;
    usage.requests++;
    usage.successes++;
    usage.consecutiveFailures = 0;
    usage.totalResponseTimeSeconds += latencySeconds;
    usage.lastUsed = this.clock.now();
    if (keyIndex !== undefined) this.balancer.recordOutcome(name, keyIndex, true, latencySeconds);
    if (this.providerFlags.clear(name)) {
      this.log.info("Provider unflagged after success", { provider: name });
    }
  }

  /** Returns the provider's consecutive-failure count after this failure. */
  recordFailure(name: string, keyIndex: number | undefined, latencySeconds: number): number {
    const usage = this.usage.get(name);
    if (!usage) return 0;
    usage.requests++;
    usage.failures++;
    usage.consecutiveFailures++;
    usage.totalResponseTimeSeconds += latencySeconds;
    usage.lastUsed = this.clock.now();
    if (keyIndex !== undefined) this.balancer.recordOutcome(name, keyIndex, false, latencySeconds);
    return usage.consecutiveFailures;
  }

  flagProvider(name: string, flagUntil: number, reason: FlagReason): FlagRecord {
    const consecutive = this.usage.get(name)?.consecutiveFailures ?? 0;
    const record = this.providerFlags.flagUntil(name, flagUntil, reason, consecutive);
    this.log.info("Provider flagged", {
      provider: name,
      reason,
      until: new Date(flagUntil).toISOString(),
    });
    return record;
  }

  flagCredential(name: string, index: number, flagUntil: number, reason: FlagReason): FlagRecord {
    return this.keyFlags.flagUntil(credentialId(name, index), flagUntil, reason);
  }

  credentialFlag(name: string, index: number): FlagRecord | undefined {
    return this.keyFlags.get(credentialId(name, index));
  }

  providerFlag(name: string): FlagRecord | undefined {
    return this.providerFlags.get(name);
  }

  flaggedProviders(): Array<[string, FlagRecord]> {
    return this.providerFlags.entries();
  }
}

export function credentialId(provider: string, index: number): string {
  return `${provider}#${index}`;
}
