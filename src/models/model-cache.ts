/**
 * Model cache: one snapshot of discovered (provider, model) pairs with a
 * single staleness clock. Refreshes replace the whole snapshot at once, so a
 * reader never sees a half-written list.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import { createLogger } from "../logging/logger.js";
import type { Clock } from "../gateway/types.js";
import { systemClock } from "../gateway/types.js";

export const DEFAULT_CACHE_TTL_MS = 30 * 60 * 1000;

export interface CachedModel {
  provider: string;
  /** Model id as the provider reported it, possibly "vendor/model". */
  model: string;
}

export interface ModelMatch {
  provider: string;
  /** Model id with any "vendor/" prefix removed. */
  model: string;
}

export type DiscoveryFn = () => Promise<CachedModel[]>;

const snapshotSchema = z.object({
  cachedAt: z.number().nullable(),
  models: z.array(z.object({ provider: z.string(), model: z.string() })),
  providers: z.record(z.array(z.string())),
});

export type ModelCacheSnapshot = z.infer<typeof snapshotSchema>;

export interface ModelCacheOptions {
  clock?: Clock;
  ttlMs?: number;
  /** Period of the background refresh loop; defaults to the TTL. */
  refreshIntervalMs?: number;
  /** Snapshot file written after every successful refresh. */
  persistPath?: string;
  logger?: Logger;
}

/** Lower-case, with hyphens, underscores and dots removed. */
export function normalizeModelName(name: string): string {
  return name.toLowerCase().replace(/[-_.]/g, "");
}

export function stripVendorPrefix(modelId: string): string {
  const slash = modelId.indexOf("/");
  return slash === -1 ? modelId : modelId.slice(slash + 1);
}

function emptySnapshot(): ModelCacheSnapshot {
  return { cachedAt: null, models: [], providers: {} };
}

function buildSnapshot(models: ReadonlyArray<CachedModel>, cachedAt: number): ModelCacheSnapshot {
  const providers: Record<string, string[]> = {};
  for (const entry of models) {
    (providers[entry.provider] ??= []).push(entry.model);
  }
  return { cachedAt, models: models.map((m) => ({ ...m })), providers };
}

export class ModelCache {
  private snapshot: ModelCacheSnapshot = emptySnapshot();
  private refreshing: Promise<boolean> | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  private readonly clock: Clock;
  private readonly ttlMs: number;
  private readonly refreshIntervalMs: number;
  private readonly persistPath: string | undefined;
  private readonly log: Logger;

  constructor(options: ModelCacheOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.refreshIntervalMs = options.refreshIntervalMs ?? this.ttlMs;
    this.persistPath = options.persistPath;
    this.log = options.logger ?? createLogger("model-cache");
  }

  getModels(): CachedModel[] {
    return this.snapshot.models.map((m) => ({ ...m }));
  }

  getProviders(): Record<string, string[]> {
    const copy: Record<string, string[]> = {};
    for (const [provider, models] of Object.entries(this.snapshot.providers)) {
      copy[provider] = [...models];
    }
    return copy;
  }

  isValid(): boolean {
    const { cachedAt } = this.snapshot;
    if (cachedAt === null) return false;
    return this.clock.now() - cachedAt <= this.ttlMs;
  }

  getAgeMs(): number {
    const { cachedAt } = this.snapshot;
    return cachedAt === null ? Number.POSITIVE_INFINITY : this.clock.now() - cachedAt;
  }

  /**
   * Exact match after normalization only. "gpt-4-turbo" never matches "gpt-4";
   * results keep discovery order without duplicates.
   */
  findProviders(modelName: string): ModelMatch[] {
    const wanted = normalizeModelName(stripVendorPrefix(modelName));
    if (wanted === "") return [];

    const seen = new Set<string>();
    const matches: ModelMatch[] = [];
    for (const entry of this.snapshot.models) {
      const model = stripVendorPrefix(entry.model);
      if (normalizeModelName(model) !== wanted) continue;
      const key = `${entry.provider}\u0000${model}`;
      if (seen.has(key)) continue;
      seen.add(key);
      matches.push({ provider: entry.provider, model });
    }
    return matches;
  }

  replace(models: ReadonlyArray<CachedModel>): void {
    this.snapshot = buildSnapshot(models, this.clock.now());
  }

  /**
   * Runs `discover` and swaps in the result. Concurrent callers share one
   * in-flight refresh. On failure the previous snapshot stays.
   */
  refresh(discover: DiscoveryFn): Promise<boolean> {
    if (this.refreshing) return this.refreshing;

    this.refreshing = (async () => {
      try {
        const models = await discover();
        this.replace(models);
        this.log.info("Model cache refreshed", { models: models.length });
        if (this.persistPath) await this.persist(this.persistPath);
        return true;
      } catch (err) {
        this.log.error("Model cache refresh failed", {
          error: err instanceof Error ? err.message : String(err),
        });
        return false;
      } finally {
        this.refreshing = null;
      }
    })();

    return this.refreshing;
  }

  startAutoRefresh(discover: DiscoveryFn): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.refresh(discover);
    }, this.refreshIntervalMs);
    this.timer.unref();
    this.log.info("Model cache auto-refresh started", { intervalMs: this.refreshIntervalMs });
  }

  stopAutoRefresh(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get autoRefreshing(): boolean {
    return this.timer !== null;
  }

  /** Loads a persisted snapshot. Returns false when missing, unreadable or stale. */
  async load(path: string): Promise<boolean> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch {
      return false;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.log.warn("Model cache file is not valid JSON", { path });
      return false;
    }

    const result = snapshotSchema.safeParse(parsed);
    if (!result.success) {
      this.log.warn("Model cache file has an unexpected shape", { path });
      return false;
    }

    const { cachedAt } = result.data;
    if (cachedAt === null || this.clock.now() - cachedAt > this.ttlMs) {
      this.log.info("Model cache file expired", { path });
      return false;
    }

    this.snapshot = result.data;
    this.log.info("Model cache loaded", { path, models: result.data.models.length });
    return true;
  }

  private async persist(path: string): Promise<void> {
    try {
      await this.save(path);
    } catch (err) {
      this.log.warn("Model cache could not be saved", {
        path,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  async save(path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(this.snapshot, null, 2), "utf-8");
  }
}
