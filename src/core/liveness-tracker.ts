/**
 * Liveness Tracker — recency of the last successful health probe.
 *
 * Staleness is only ever reported after a timestamp has been recorded, which
 * gives the subsystem a grace period before its first reading.
 *
 * @module Health
 */
export class LivenessTracker {
  private lastSuccessAt: number | undefined;

  /** A probe succeeded at `now`. */
  recordSuccess(now: number): void {
    this.lastSuccessAt = now;
  }

  /** Start a fresh grace window at `now` (new polling phase or restart). */
  recordReset(now: number): void {
    this.lastSuccessAt = now;
  }

  /** Milliseconds since the last recorded success, or undefined before the first one. */
  elapsed(now: number): number | undefined {
    if (this.lastSuccessAt === undefined) return undefined;
    return Math.max(0, now - this.lastSuccessAt);
  }

  stale(now: number, thresholdMs: number): boolean {
    const elapsed = this.elapsed(now);
    return elapsed !== undefined && elapsed > thresholdMs;
  }

  get lastSuccess(): number | undefined {
    return this.lastSuccessAt;
  }
}
