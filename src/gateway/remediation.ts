/**
 * Remediation policy: turns a classified failure into flag and rotation
 * transitions on the registry.
 *
 *   rate_limit | auth_error | quota_exceeded
 *     rotation on  → penalize used key, reselect, flag provider (1h / midnight / 30m)
 *     rotation off → flag provider 15m
 *   service_unavailable | server_error | network_error → flag provider 10m
 *   consecutive failures ≥ limit → provider flagged ≥ 30m
 *   unknown, ≥ 2 consecutive, rotation on → rotate key only
 */

import { COOLDOWNS, keyLevelFlagUntil } from "./flags.js";
import type { ProviderRegistry } from "./provider-registry.js";
import type { ClassifiedErrorKind, EngineSettings, FlagReason } from "./types.js";

export type RemediationAction =
  | { type: "rotate_key"; from: number; to: number | undefined }
  | { type: "flag_key"; index: number; until: number; reason: FlagReason }
  | { type: "flag_provider"; until: number; reason: FlagReason };

export interface FailureContext {
  kind: ClassifiedErrorKind;
  /** The failure text names a per-day allowance. */
  dailyLimit: boolean;
  consecutiveFailures: number;
  /** Credential used by the failed attempt, if any. */
  keyIndex?: number;
}

const KEY_LEVEL_KINDS: ReadonlySet<ClassifiedErrorKind> = new Set([
  "rate_limit",
  "auth_error",
  "quota_exceeded",
]);

const OUTAGE_KINDS: ReadonlySet<ClassifiedErrorKind> = new Set([
  "service_unavailable",
  "server_error",
  "network_error",
]);

function rotate(
  registry: ProviderRegistry,
  name: string,
  keyIndex: number | undefined,
  actions: RemediationAction[],
): void {
  if (registry.balancer.keyCount(name) === 0) return;
  const from = keyIndex ?? registry.currentCredential(name);
  const to = registry.rotateCredential(name, from);
  actions.push({ type: "rotate_key", from, to });
}

export function remediate(
  registry: ProviderRegistry,
  name: string,
  failure: FailureContext,
  settings: EngineSettings,
): RemediationAction[] {
  const actions: RemediationAction[] = [];
  const now = registry.clock.now();
  const { kind, consecutiveFailures } = failure;

  if (KEY_LEVEL_KINDS.has(kind)) {
    if (settings.keyRotationEnabled) {
      rotate(registry, name, failure.keyIndex, actions);

      const reason: FlagReason = failure.dailyLimit ? "daily_limit" : kind;
      const until = keyLevelFlagUntil(reason, now);
      const keyIndex = failure.keyIndex ?? registry.currentCredential(name);
      if (registry.balancer.keyCount(name) > 0) {
        registry.flagCredential(name, keyIndex, until, reason);
        actions.push({ type: "flag_key", index: keyIndex, until, reason });
      }
      registry.flagProvider(name, until, reason);
      actions.push({ type: "flag_provider", until, reason });
    } else {
      const until = now + COOLDOWNS.rotationDisabled;
      registry.flagProvider(name, until, kind);
      actions.push({ type: "flag_provider", until, reason: kind });
    }
  } else if (OUTAGE_KINDS.has(kind)) {
    const until = now + COOLDOWNS.outage;
    registry.flagProvider(name, until, kind);
    actions.push({ type: "flag_provider", until, reason: kind });
  }

  if (consecutiveFailures >= settings.consecutiveFailureLimit) {
    // Extends a shorter flag; a longer one already in place stays.
    const until = now + COOLDOWNS.consecutiveFailures;
    const existing = registry.providerFlag(name);
    if (!existing || existing.flagUntil < until) {
      registry.flagProvider(name, until, "consecutive_failures");
      actions.push({ type: "flag_provider", until, reason: "consecutive_failures" });
    }
  } else if (kind === "unknown" && settings.keyRotationEnabled && consecutiveFailures >= 2) {
    if (registry.balancer.keyCount(name) > 1) {
      rotate(registry, name, failure.keyIndex, actions);
    }
  }

  return actions;
}
