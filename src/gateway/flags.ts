/**
 * Flag store: time-boxed quarantine records for providers and credentials.
 * Expiry is lazy: a lookup past `flagUntil` removes the record and reports
 * the entity as available.
 */

import type { Clock, FlagReason } from "./types.js";

export interface FlagRecord {
  flaggedAt: number;
  flagUntil: number;
  reason: FlagReason;
  consecutiveFailures: number;
}

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

/** Cooldown lengths by remediation path. */
export const COOLDOWNS = {
  keyLevel: HOUR_MS,
  keyLevelDefault: 30 * MINUTE_MS,
  rotationDisabled: 15 * MINUTE_MS,
  outage: 10 * MINUTE_MS,
  consecutiveFailures: 30 * MINUTE_MS,
} as const;

/** Next local midnight after `now`. */
export function nextLocalMidnight(now: number): number {
  const date = new Date(now);
  date.setHours(24, 0, 0, 0);
  return date.getTime();
}

/**
 * Cooldown end for a key-level failure: one hour for rate limits and auth
 * errors, local midnight for daily limits, thirty minutes otherwise.
 */
export function keyLevelFlagUntil(reason: FlagReason, now: number): number {
  switch (reason) {
    case "rate_limit":
    case "auth_error":
      return now + COOLDOWNS.keyLevel;
    case "daily_limit":
      return nextLocalMidnight(now);
    default:
      return now + COOLDOWNS.keyLevelDefault;
  }
}

export class FlagStore {
  private readonly records = new Map<string, FlagRecord>();

  constructor(private readonly clock: Clock) {}

  /** Flags `id` until `flagUntil`, overwriting any existing record. */
  flagUntil(id: string, flagUntil: number, reason: FlagReason, consecutiveFailures = 0): FlagRecord {
    const record: FlagRecord = {
      flaggedAt: this.clock.now(),
      flagUntil,
      reason,
      consecutiveFailures,
    };
    this.records.set(id, record);
    return record;
  }

  flagFor(id: string, durationMs: number, reason: FlagReason, consecutiveFailures = 0): FlagRecord {
    return this.flagUntil(id, this.clock.now() + durationMs, reason, consecutiveFailures);
  }

  isFlagged(id: string): boolean {
    return this.get(id) !== undefined;
  }

  /** Returns the live record, dropping it first if it has expired. */
  get(id: string): FlagRecord | undefined {
    const record = this.records.get(id);
    if (!record) return undefined;
    if (this.clock.now() > record.flagUntil) {
      this.records.delete(id);
      return undefined;
    }
    return record;
  }

  /** Removes the flag. Returns false when there was none. */
  clear(id: string): boolean {
    return this.records.delete(id);
  }

  /** Live flags, expired ones swept on the way. */
  entries(): Array<[string, FlagRecord]> {
    const live: Array<[string, FlagRecord]> = [];
    for (const id of [...this.records.keys()]) {
      const record = this.get(id);
      if (record) live.push([id, record]);
    }
    return live;
  }
}
