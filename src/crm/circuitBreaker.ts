export type BreakerState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  resetTimeoutMs?: number;
  now?: () => number;
}

/**
 * Process-local breaker. Opens after `failureThreshold` consecutive failures,
 * lets a single trial call through once `resetTimeoutMs` has elapsed, and
 * rejects everything else while that trial is in flight.
 */
export class CircuitBreaker {
  private state: BreakerState = "closed";
  private failures = 0;
  private openedAt = 0;
  private trialInFlight = false;

  private readonly failureThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  get currentState(): BreakerState {
    return this.state;
  }

  get failureCount(): number {
    return this.failures;
  }

  canAttempt(): boolean {
    if (this.state === "closed") {
      return true;
    }

    if (this.state === "open") {
      if (this.now() - this.openedAt >= this.resetTimeoutMs) {
        this.state = "half_open";
        this.trialInFlight = true;
        return true;
      }
      return false;
    }

    if (this.trialInFlight) {
      return false;
    }
    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.state = "closed";
    this.failures = 0;
    this.trialInFlight = false;
  }

  recordFailure(): void {
    this.trialInFlight = false;
    if (this.state === "half_open") {
      this.open();
      return;
    }

    this.failures += 1;
    if (this.failures >= this.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    this.state = "open";
    this.openedAt = this.now();
  }
}
