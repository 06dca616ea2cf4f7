import { describe, it, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { COOLDOWNS, FlagStore, keyLevelFlagUntil, nextLocalMidnight } from "./flags.js";
import { ManualClock } from "./testing.js";

describe("FlagStore", () => {
  let clock: ManualClock;
  let flags: FlagStore;

  beforeEach(() => {
    clock = new ManualClock();
    flags = new FlagStore(clock);
  });

  it("stays flagged through the exact expiry instant", () => {
    flags.flagFor("groq", 1_000, "server_error");
    clock.advance(1_000);
    assert.equal(flags.isFlagged("groq"), true);
  });

  it("expires lazily once the clock passes flagUntil", () => {
    flags.flagFor("groq", 1_000, "server_error");
    clock.advance(1_001);
    assert.equal(flags.isFlagged("groq"), false);
    assert.equal(flags.entries().length, 0);
    // already gone, nothing left to clear
    assert.equal(flags.clear("groq"), false);
  });

  it("overwrites an existing record instead of stacking", () => {
    flags.flagFor("groq", 1_000, "rate_limit");
    flags.flagFor("groq", 5_000, "auth_error", 3);

    const entries = flags.entries();
    assert.equal(entries.length, 1);
    const [id, record] = entries[0];
    assert.equal(id, "groq");
    assert.equal(record.reason, "auth_error");
    assert.equal(record.flagUntil, clock.now() + 5_000);
    assert.equal(record.consecutiveFailures, 3);
  });

  it("treats clearing an unflagged id as a no-op", () => {
    assert.equal(flags.clear("never-flagged"), false);
    assert.equal(flags.isFlagged("never-flagged"), false);
  });

  it("records when the flag was set", () => {
    const record = flags.flagUntil("groq", clock.now() + 60_000, "network_error");
    assert.equal(record.flaggedAt, clock.now());
  });
});

describe("keyLevelFlagUntil", () => {
  const now = Date.UTC(2026, 2, 2, 12, 0, 0);

  it("uses one hour for rate limits and auth errors", () => {
    assert.equal(keyLevelFlagUntil("rate_limit", now), now + COOLDOWNS.keyLevel);
    assert.equal(keyLevelFlagUntil("auth_error", now), now + 3_600_000);
  });

  it("uses local midnight for daily limits", () => {
    assert.equal(keyLevelFlagUntil("daily_limit", now), nextLocalMidnight(now));
  });

  it("uses thirty minutes otherwise", () => {
    assert.equal(keyLevelFlagUntil("quota_exceeded", now), now + 1_800_000);
  });
});

describe("nextLocalMidnight", () => {
  it("returns the start of the next local day", () => {
    const now = Date.UTC(2026, 2, 2, 12, 30, 0);
    const midnight = nextLocalMidnight(now);
    const date = new Date(midnight);

    assert.ok(midnight > now);
    assert.ok(midnight - now <= 24 * 3_600_000);
    assert.equal(date.getHours(), 0);
    assert.equal(date.getMinutes(), 0);
    assert.equal(date.getSeconds(), 0);
  });
});
