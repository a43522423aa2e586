import { BudgetGuard, bucketFor, type BudgetLimits } from "../src/llm/budgetGuard.js";
import { BudgetExceededError, estimateCostRub, estimateTokens, LlmRouter } from "../src/llm/router.js";
import { MemoryStore } from "../src/storage/memoryStore.js";
import { assert, assertDeepEqual, assertEqual, assertRejects } from "./helpers/assert.js";
import { FakeClock, RecordingAudit, ScriptedProvider } from "./helpers/fakes.js";
import { test } from "./helpers/runner.js";

const LIMITS: BudgetLimits = {
  maxRequestsPerMinute: 30,
  maxTokensPerHour: 100_000,
  maxCostPerDay: 900,
  maxErrorsPerHour: 50
};

function setup(limits: Partial<BudgetLimits> = {}) {
  const clock = new FakeClock();
  const store = new MemoryStore(clock.nowMs);
  const budget = new BudgetGuard(store, { ...LIMITS, ...limits }, clock.now);
  return { clock, store, budget };
}

test("budget: bucket keys per window", () => {
  const now = new Date("2026-10-18T03:07:45.123Z");
  assertEqual(bucketFor("minute", now), "2026-10-18T03:07:00Z", "minute bucket");
  assertEqual(bucketFor("hour", now), "2026-10-18T03:00:00Z", "hour bucket");
  assertEqual(bucketFor("day", now), "2026-10-18", "day bucket");
});

test("budget: token limit is inclusive at the boundary", async () => {
  const { budget } = setup();
  assertDeepEqual(await budget.checkTokensPerHour(99_999), { withinLimit: true, value: 99_999 }, "99,999 fits");
  assertDeepEqual(await budget.checkTokensPerHour(1), { withinLimit: true, value: 100_000 }, "exactly the limit fits");
  assertDeepEqual(await budget.checkTokensPerHour(1), { withinLimit: false, value: 100_000 }, "one over is refused");
});

test("budget: refused increments are not counted", async () => {
  const { budget } = setup();
  await budget.checkTokensPerHour(99_999);
  assertEqual((await budget.checkTokensPerHour(10)).withinLimit, false, "10 more is over");
  assertEqual(await budget.tokens.current(), 99_999, "counter untouched by the refused call");
});

test("budget: requests per minute reset with the next bucket", async () => {
  const { clock, budget, store } = setup({ maxRequestsPerMinute: 2 });
  assertDeepEqual(await budget.checkAll(10, 0.01), { ok: true }, "first");
  assertDeepEqual(await budget.checkAll(10, 0.01), { ok: true }, "second");
  assertDeepEqual(await budget.checkAll(10, 0.01), { ok: false, reason: "MAX_REQUESTS_PER_MINUTE exceeded" }, "third");
  assertEqual(store.ttl(budget.requests.key()), 60, "minute counter expires with its window");

  clock.advance(60_000);
  assertDeepEqual(await budget.checkAll(10, 0.01), { ok: true }, "new minute");
});

test("budget: cost is tracked in kopecks against the daily limit", async () => {
  const { budget } = setup({ maxCostPerDay: 1 });
  assertDeepEqual(await budget.checkCostPerDay(0.6), { withinLimit: true, value: 0.6 }, "60 kopecks");
  assertDeepEqual(await budget.checkCostPerDay(0.6), { withinLimit: false, value: 0.6 }, "120 > 100 refused");
  assertDeepEqual(await budget.checkAll(1, 0.41), { ok: false, reason: "MAX_COST_PER_DAY exceeded" }, "checkAll reports cost");
  assertEqual(await budget.requests.current(), 1, "request counter from the failed checkAll is kept");
});

test("budget: snapshot reports usage and breach", async () => {
  const { budget } = setup({ maxErrorsPerHour: 2 });
  await budget.checkAll(500, 0.2);
  let snapshot = await budget.snapshot();
  assertDeepEqual(
    snapshot,
    { requestsPerMinute: 1, tokensPerHour: 500, costPerDay: 0.2, errorsPerHour: 0, breached: false },
    "after one call"
  );
  assertEqual(await budget.isBreached(), false, "within limits");

  await budget.recordError();
  assertEqual(await budget.recordError(), true, "second error is still within the limit");
  snapshot = await budget.snapshot();
  assertEqual(snapshot.breached, true, "error limit reached");
  assertEqual(await budget.isBreached(), true, "isBreached mirrors the snapshot");
  assert(await budget.errorsExhausted(), "errors exhausted");
});

test("router: token and cost estimates", () => {
  assertEqual(estimateTokens([{ role: "user", content: "a".repeat(10) }]), 2, "floor(10/4)");
  assertEqual(estimateTokens([{ role: "system", content: "abcd" }, { role: "user", content: "efgh" }]), 2, "sums messages");
  assertEqual(estimateCostRub(1000), 0.41, "0.41 RUB per 1k tokens");
});

test("router: calls the provider and audits usage", async () => {
  const { store, budget } = setup();
  const provider = new ScriptedProvider('{"intent":"greeting"}');
  const audit = new RecordingAudit();
  const router = new LlmRouter(provider, budget, audit);

  const response = await router.call([{ role: "user", content: "x".repeat(400) }], "trace-1");
  assertEqual(response.text, '{"intent":"greeting"}', "provider text returned");
  assertEqual(provider.requests[0]?.temperature, 0, "deterministic temperature by default");
  assertEqual(audit.llm[0]?.promptTokens, 100, "estimated prompt tokens");
  assertEqual(audit.llm[0]?.totalTokens, 50, "reported tokens");
  assertEqual(await budget.tokens.current(), 100, "estimate counted against the hour");
  assertEqual(await store.get(budget.cost.key()), "4", "0.041 RUB rounds to 4 kopecks");
});

test("router: budget breach blocks the provider", async () => {
  const { budget } = setup({ maxTokensPerHour: 10 });
  const provider = new ScriptedProvider("unused");
  const audit = new RecordingAudit();
  const router = new LlmRouter(provider, budget, audit);

  await assertRejects(
    () => router.call([{ role: "user", content: "x".repeat(100) }], "trace-2"),
    /MAX_TOKENS_PER_HOUR exceeded/,
    "token limit"
  );
  assertEqual(provider.requests.length, 0, "provider not called");
  assertDeepEqual(audit.errors, [{ traceId: "trace-2", errorType: "BudgetBreach", message: "MAX_TOKENS_PER_HOUR exceeded" }], "breach audited");
});

test("router: provider errors count toward the hourly error limit", async () => {
  const { budget } = setup({ maxErrorsPerHour: 2 });
  const provider = new ScriptedProvider(new Error("upstream 500"), new Error("upstream 500"), "never");
  const router = new LlmRouter(provider, budget, new RecordingAudit());
  const messages = [{ role: "user" as const, content: "привет" }];

  await assertRejects(() => router.call(messages, "t1"), /upstream 500/, "first failure rethrown");
  await assertRejects(() => router.call(messages, "t2"), /upstream 500/, "second failure rethrown");

  let caught: unknown;
  try {
    await router.call(messages, "t3");
  } catch (err) {
    caught = err;
  }
  assert(caught instanceof BudgetExceededError, "third call refused by the budget");
  assertEqual(caught instanceof BudgetExceededError ? caught.reason : "", "MAX_ERRORS_PER_HOUR exceeded", "reason");
  assertEqual(provider.requests.length, 2, "provider not called a third time");
});
