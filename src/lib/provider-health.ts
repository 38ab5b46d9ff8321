/**
 * Provider Health Tracker
 *
 * Circuit breaker singleton tracking model provider health.
 * Uses globalThis persistence so every client in the process shares it.
 *
 * State machine per provider: CLOSED → OPEN → HALF_OPEN → CLOSED
 * - CLOSED: provider healthy, all calls proceed
 * - OPEN: provider down, the router prefers the fallback provider
 * - HALF_OPEN: next call is a probe (success → CLOSED, failure → OPEN)
 *
 * @module provider-health
 */

import type { ProviderId } from "./config-schemas";

export type CircuitState = "closed" | "open" | "half_open";

export type ProviderHealth = {
  state: CircuitState;
  consecutiveFailures: number;
  lastFailureTime: number | null;
  lastFailureMessage: string | null;
  lastSuccessTime: number | null;
};

export type HealthState = {
  providers: Partial<Record<ProviderId, ProviderHealth>>;
};

export const DEFAULT_CIRCUIT_BREAKER_THRESHOLD = 3;

declare global {
  // eslint-disable-next-line no-var
  var __sreProviderHealthState: HealthState | undefined;
}

function makeDefaultProviderHealth(): ProviderHealth {
  return {
    state: "closed",
    consecutiveFailures: 0,
    lastFailureTime: null,
    lastFailureMessage: null,
    lastSuccessTime: null,
  };
}

function getState(): HealthState {
  if (!globalThis.__sreProviderHealthState) {
    globalThis.__sreProviderHealthState = { providers: {} };
  }
  return globalThis.__sreProviderHealthState;
}

function getProvider(provider: ProviderId): ProviderHealth {
  const st = getState();
  const existing = st.providers[provider];
  if (existing) return existing;
  const created = makeDefaultProviderHealth();
  st.providers[provider] = created;
  return created;
}

/** Record a successful provider call.  Resets consecutive failure count. */
export function recordProviderSuccess(provider: ProviderId): void {
  const p = getProvider(provider);
  p.consecutiveFailures = 0;
  p.lastSuccessTime = Date.now();
  if (p.state === "half_open") {
    p.state = "closed";
    console.log(`[ProviderHealth] ${provider}: HALF_OPEN → CLOSED (probe succeeded)`);
  }
}

/**
 * Record a provider failure.
 *
 * @returns `{ circuitOpened: true }` if this failure just tripped the breaker
 *          from CLOSED → OPEN.
 */
export function recordProviderFailure(
  provider: ProviderId,
  message: string,
  threshold: number = DEFAULT_CIRCUIT_BREAKER_THRESHOLD,
  now: number = Date.now(),
): { circuitOpened: boolean } {
  const p = getProvider(provider);

  p.consecutiveFailures++;
  p.lastFailureTime = now;
  p.lastFailureMessage = message;

  if (p.state === "half_open") {
    p.state = "open";
    console.error(`[ProviderHealth] ${provider}: HALF_OPEN → OPEN (probe failed: ${message})`);
    return { circuitOpened: false };
  }

  if (p.state === "closed" && p.consecutiveFailures >= threshold) {
    p.state = "open";
    console.error(
      `[ProviderHealth] ${provider}: CLOSED → OPEN after ${p.consecutiveFailures} consecutive failures (threshold: ${threshold}). Last: ${message}`,
    );
    return { circuitOpened: true };
  }

  return { circuitOpened: false };
}

export function getCircuitState(provider: ProviderId): CircuitState {
  return getProvider(provider).state;
}

/**
 * Move OPEN → HALF_OPEN once the cooldown since the last failure has passed,
 * so the next call acts as a probe.
 *
 * @returns true when the provider may be called (closed or half-open).
 */
export function allowProbeAfterCooldown(provider: ProviderId, cooldownMs: number, now: number = Date.now()): boolean {
  const p = getProvider(provider);
  if (p.state !== "open") return true;
  if (p.lastFailureTime !== null && now - p.lastFailureTime >= cooldownMs) {
    p.state = "half_open";
    console.log(`[ProviderHealth] ${provider}: OPEN → HALF_OPEN (ready for probe)`);
    return true;
  }
  return false;
}

/** Reset every circuit to CLOSED. */
export function resetProviderHealth(): void {
  globalThis.__sreProviderHealthState = { providers: {} };
  console.log("[ProviderHealth] All circuits reset to CLOSED");
}
