import type { KeyValueStore } from "../storage/kv.js";

export type BudgetWindow = "minute" | "hour" | "day";

const WINDOW_SECONDS: Record<BudgetWindow, number> = {
  minute: 60,
  hour: 3600,
  day: 86400
};

export function bucketFor(window: BudgetWindow, now: Date): string {
  const iso = now.toISOString();
  if (window === "day") {
    return iso.slice(0, 10);
  }
  if (window === "hour") {
    return `${iso.slice(0, 13)}:00:00Z`;
  }
  return `${iso.slice(0, 16)}:00Z`;
}

export interface CounterResult {
  withinLimit: boolean;
  value: number;
}

/**
 * Counter scoped to the current minute/hour/day bucket.
 * Read, compare and increment are separate store calls, so concurrent callers
 * on the same bucket can overshoot the limit slightly. It is a soft limit.
 */
export class WindowedCounter {
  constructor(
    private readonly store: KeyValueStore,
    readonly name: string,
    readonly window: BudgetWindow,
    readonly limit: number,
    private readonly now: () => Date
  ) {}

  get ttlSeconds(): number {
    return WINDOW_SECONDS[this.window];
  }

  key(): string {
    return `budget:${this.name}:${this.window}:${bucketFor(this.window, this.now())}`;
  }

  async current(): Promise<number> {
    const raw = await this.store.get(this.key());
    const value = raw === null ? 0 : Number.parseInt(raw, 10);
    return Number.isFinite(value) ? value : 0;
  }

  async checkAndIncrement(amount: number): Promise<CounterResult> {
    const key = this.key();
    const current = await this.current();

    if (current + amount > this.limit) {
      await this.store.expire(key, this.ttlSeconds);
      return { withinLimit: false, value: current };
    }

    const value = await this.store.incrBy(key, amount);
    await this.store.expire(key, this.ttlSeconds);
    return { withinLimit: true, value };
  }

  /** Increments even past the limit; the limit then only gates later checks. */
  async increment(amount: number): Promise<CounterResult> {
    const key = this.key();
    const value = await this.store.incrBy(key, amount);
    await this.store.expire(key, this.ttlSeconds);
    return { withinLimit: value <= this.limit, value };
  }
}

export interface BudgetLimits {
  maxRequestsPerMinute: number;
  maxTokensPerHour: number;
  /** Major currency units (roubles). Tracked internally in kopecks. */
  maxCostPerDay: number;
  maxErrorsPerHour: number;
}

export type BudgetCheck = { ok: true } | { ok: false; reason: string };

export interface BudgetSnapshot {
  requestsPerMinute: number;
  tokensPerHour: number;
  costPerDay: number;
  errorsPerHour: number;
  breached: boolean;
}

export function toMinorUnits(amount: number): number {
  return Math.round(amount * 100);
}

export class BudgetGuard {
  readonly requests: WindowedCounter;
  readonly tokens: WindowedCounter;
  readonly cost: WindowedCounter;
  readonly errors: WindowedCounter;

  constructor(store: KeyValueStore, limits: BudgetLimits, now: () => Date = () => new Date()) {
    this.requests = new WindowedCounter(store, "requests", "minute", limits.maxRequestsPerMinute, now);
    this.tokens = new WindowedCounter(store, "tokens", "hour", limits.maxTokensPerHour, now);
    this.cost = new WindowedCounter(store, "cost", "day", toMinorUnits(limits.maxCostPerDay), now);
    this.errors = new WindowedCounter(store, "errors", "hour", limits.maxErrorsPerHour, now);
  }

  checkRequestsPerMinute(): Promise<CounterResult> {
    return this.requests.checkAndIncrement(1);
  }

  checkTokensPerHour(tokens: number): Promise<CounterResult> {
    return this.tokens.checkAndIncrement(tokens);
  }

  async checkCostPerDay(cost: number): Promise<CounterResult> {
    const result = await this.cost.checkAndIncrement(toMinorUnits(cost));
    return { withinLimit: result.withinLimit, value: result.value / 100 };
  }

  async recordError(): Promise<boolean> {
    return (await this.errors.increment(1)).withinLimit;
  }

  async errorsExhausted(): Promise<boolean> {
    return (await this.errors.current()) >= this.errors.limit;
  }

  /**
   * requests, then tokens, then cost; stops at the first breach. A counter
   * already incremented earlier in the same call is not rolled back.
   */
  async checkAll(tokens: number, cost: number): Promise<BudgetCheck> {
    if (!(await this.checkRequestsPerMinute()).withinLimit) {
      return { ok: false, reason: "MAX_REQUESTS_PER_MINUTE exceeded" };
    }
    if (!(await this.checkTokensPerHour(tokens)).withinLimit) {
      return { ok: false, reason: "MAX_TOKENS_PER_HOUR exceeded" };
    }
    if (!(await this.checkCostPerDay(cost)).withinLimit) {
      return { ok: false, reason: "MAX_COST_PER_DAY exceeded" };
    }
    return { ok: true };
  }

  async snapshot(): Promise<BudgetSnapshot> {
    const [requestsPerMinute, tokensPerHour, costMinor, errorsPerHour] = await Promise.all([
      this.requests.current(),
      this.tokens.current(),
      this.cost.current(),
      this.errors.current()
    ]);

    return {
      requestsPerMinute,
      tokensPerHour,
      costPerDay: costMinor / 100,
      errorsPerHour,
      breached:
        requestsPerMinute >= this.requests.limit ||
        tokensPerHour >= this.tokens.limit ||
        costMinor >= this.cost.limit ||
        errorsPerHour >= this.errors.limit
    };
  }

  async isBreached(): Promise<boolean> {
    return (await this.snapshot()).breached;
  }
}
