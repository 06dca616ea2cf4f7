/**
 * Key load balancer: per-provider credential usage, reputation weight and
 * rate-limit tracking, plus least-loaded credential selection.
 *
 * Every public method is a synchronous critical section: selection prunes the
 * request window, scores, and (in `acquire`) records usage without yielding.
 */

import type { Clock } from "./types.js";

const WINDOW_MS = 60_000;
const RATE_LIMIT_COOLDOWN_MS = 60_000;
const MIN_WEIGHT = 0.5;
const MAX_WEIGHT = 2.0;
const INITIAL_WEIGHT = 1.0;
const SUCCESS_DECAY = 0.95;
const FAILURE_GROWTH = 1.1;

export interface CredentialStats {
  requests: number;
  successes: number;
  failures: number;
  weight: number;
  rateLimited: boolean;
  rateLimitedAt: number | null;
  lastUsed: number | null;
  /** Request timestamps inside the sliding minute. */
  recentRequests: number[];
  totalLatencySeconds: number;
}

export interface CredentialReport {
  requests: number;
  successes: number;
  failures: number;
  requestsThisMinute: number;
  rateLimited: boolean;
  weight: number;
  lastUsed: string | null;
  /** Percentage, 0–100. */
  successRate: number;
}

function createStats(): CredentialStats {
  return {
    requests: 0,
    successes: 0,
    failures: 0,
    weight: INITIAL_WEIGHT,
    rateLimited: false,
    rateLimitedAt: null,
    lastUsed: null,
    recentRequests: [],
    totalLatencySeconds: 0,
  };
}

export class KeyBalancer {
  private readonly slots = new Map<string, CredentialStats[]>();

  constructor(private readonly clock: Clock) {}

  /** Registers a provider with `keyCount` credential slots. Re-registering resets them. */
  register(provider: string, keyCount: number): void {
    this.slots.set(provider, Array.from({ length: keyCount }, createStats));
  }

  keyCount(provider: string): number {
    return this.slots.get(provider)?.length ?? 0;
  }

  stats(provider: string, index: number): Readonly<CredentialStats> | undefined {
    return this.slots.get(provider)?.[index];
  }

  selectCredential(provider: string): number | undefined {
    const slots = this.slots.get(provider);
    if (!slots || slots.length === 0) return undefined;

    const now = this.clock.now();
    this.pruneWindow(slots, now);
    if (slots.length === 1) return 0;

    let bestIndex: number | undefined;
    let bestScore = Number.POSITIVE_INFINITY;

    slots.forEach((slot, index) => {
      if (slot.rateLimited) {
        // cooldown runs from the later of last use and the mark itself
        const since = Math.max(slot.lastUsed ?? 0, slot.rateLimitedAt ?? 0);
        if (now - since < RATE_LIMIT_COOLDOWN_MS) return;
        slot.rateLimited = false;
      }
      const score = this.loadScore(slot, now);
      // strict comparison keeps the lowest index on ties
      if (score < bestScore) {
        bestScore = score;
        bestIndex = index;
      }
    });

    return bestIndex ?? this.leastRecentlyUsed(slots);
  }

  /** Selects a credential and records its usage in one step. */
  acquire(provider: string): number | undefined {
    const index = this.selectCredential(provider);
    if (index !== undefined) this.recordUsage(provider, index);
    return index;
  }

  recordUsage(provider: string, index: number): void {
    const slot = this.slots.get(provider)?.[index];
    if (!slot) return;
    const now = this.clock.now();
    slot.requests++;
    slot.lastUsed = now;
    slot.recentRequests.push(now);
  }

  recordOutcome(provider: string, index: number, success: boolean, latencySeconds = 0): void {
    const slot = this.slots.get(provider)?.[index];
    if (!slot) return;

    if (success) {
      slot.successes++;
      slot.weight = Math.max(MIN_WEIGHT, slot.weight * SUCCESS_DECAY);
      slot.rateLimited = false;
    } else {
      slot.failures++;
      slot.weight = Math.min(MAX_WEIGHT, slot.weight * FAILURE_GROWTH);
    }
    slot.totalLatencySeconds += latencySeconds;
    slot.lastUsed = this.clock.now();
  }

  markRateLimited(provider: string, index: number): void {
    const slot = this.slots.get(provider)?.[index];
    if (!slot) return;
    slot.rateLimited = true;
    slot.rateLimitedAt = this.clock.now();
    slot.weight = MAX_WEIGHT;
  }

  report(provider: string): CredentialReport[] {
    const slots = this.slots.get(provider);
    if (!slots) return [];
    this.pruneWindow(slots, this.clock.now());

    return slots.map((slot) => ({
      requests: slot.requests,
      successes: slot.successes,
      failures: slot.failures,
      requestsThisMinute: slot.recentRequests.length,
      rateLimited: slot.rateLimited,
      weight: slot.weight,
      lastUsed: slot.lastUsed === null ? null : new Date(slot.lastUsed).toISOString(),
      successRate: (slot.successes / Math.max(1, slot.requests)) * 100,
    }));
  }

  private loadScore(slot: CredentialStats, now: number): number {
    const recencyBonus = slot.lastUsed === null
      ? 1.0
      : Math.min((now - slot.lastUsed) / 1000 / 60, 1.0);
    const successBonus = slot.requests > 0 ? slot.successes / slot.requests : 1.0;
    const score = slot.recentRequests.length * slot.weight - (recencyBonus + successBonus);
    return Math.max(0, score);
  }

  private pruneWindow(slots: CredentialStats[], now: number): void {
    const cutoff = now - WINDOW_MS;
    for (const slot of slots) {
      slot.recentRequests = slot.recentRequests.filter((ts) => ts > cutoff);
    }
  }

  /** Fallback when every credential is cooling down: the one idle the longest. */
  private leastRecentlyUsed(slots: CredentialStats[]): number {
    let oldest = 0;
    for (let i = 1; i < slots.length; i++) {
      const candidate = slots[i].lastUsed ?? Number.NEGATIVE_INFINITY;
      const current = slots[oldest].lastUsed ?? Number.NEGATIVE_INFINITY;
      if (candidate < current) oldest = i;
    }
    return oldest;
  }
}
