import type { ProbeFailure } from "../errors.js";

export type ProbeOutcome = { ok: true; value: string } | { ok: false; error: ProbeFailure };

/**
 * A single bounded query against the external status channel.
 * Implementations never retry; the caller owns the retry policy.
 */
export interface HealthProbe {
  probe(channel: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome>;
}
