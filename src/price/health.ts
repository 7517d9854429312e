export type ProviderHealth = {
  failureCount: number;
  windowStartedAt: number;
  cooldownUntil: number;
};

export type HealthOptions = {
  failThreshold: number;
  failWindowMs: number;
  cooldownMs: number;
};

/**
 * Per-provider circuit breaker. There is no half-open state: once the
 * cooldown has passed the provider is simply tried again, and enough new
 * failures inside a window open it again.
 */
export class HealthTracker {
  private states = new Map<string, ProviderHealth>();

  constructor(private opts: HealthOptions) {}

  isAvailable(provider: string): boolean {
    const state = this.states.get(provider);
    if (!state) return true;
    return Date.now() > state.cooldownUntil;
  }

  recordFailure(provider: string): ProviderHealth {
    const now = Date.now();
    let state = this.states.get(provider);
    if (!state) {
      state = { failureCount: 0, windowStartedAt: now, cooldownUntil: 0 };
      this.states.set(provider, state);
    }
    if (now - state.windowStartedAt > this.opts.failWindowMs) {
      state.failureCount = 0;
      state.windowStartedAt = now;
    }
    state.failureCount += 1;
    if (state.failureCount >= this.opts.failThreshold) {
      state.cooldownUntil = now + this.opts.cooldownMs;
    }
    return { ...state };
  }

  recordSuccess(provider: string): void {
    this.states.delete(provider);
  }

  snapshot(): Record<string, ProviderHealth> {
    const out: Record<string, ProviderHealth> = {};
    for (const [name, state] of this.states.entries()) {
      out[name] = { ...state };
    }
    return out;
  }
}
