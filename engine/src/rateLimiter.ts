// engine/src/rateLimiter.ts
// Minimum interval between generation requests, read from the profile itself.

import type { ProfileStore } from "./profileStore.js";

export type RateDecision = { allowed: true } | { allowed: false; waitSeconds: number };

export class RateLimiter {
  readonly windowMs: number;
  private readonly store: ProfileStore;

  constructor(opts: { windowSec: number; store: ProfileStore }) {
    this.windowMs = Math.max(0, opts.windowSec) * 1000;
    this.store = opts.store;
  }

  /** Decision for a dispatch at `now` given the last recorded dispatch time. */
  evaluate(lastGenerationAt: string | null, now: Date): RateDecision {
    if (!lastGenerationAt || this.windowMs === 0) return { allowed: true };
    const last = Date.parse(lastGenerationAt);
    if (Number.isNaN(last)) return { allowed: true };
    const elapsed = now.getTime() - last;
    if (elapsed >= this.windowMs) return { allowed: true };
    // a clock that moved backwards still leaves at most one full window to wait
    const remaining = Math.min(this.windowMs, this.windowMs - elapsed);
    return { allowed: false, waitSeconds: Math.max(1, Math.ceil(remaining / 1000)) };
  }

  /** Same as evaluate, reading the timestamp from the stored profile. */
  async check(userId: string, now: Date): Promise<RateDecision> {
    const profile = await this.store.load(userId);
    return this.evaluate(profile.lastGenerationAt, now);
  }
}
