import { Headers } from "undici";

import { CrmCache, cacheKey } from "../src/crm/cache.js";
import { CircuitBreaker } from "../src/crm/circuitBreaker.js";
import { backoffDelay, CrmClient, DEFAULT_RETRY } from "../src/crm/client.js";
import {
  CircuitOpenError,
  classifyCrmError,
  CrmHttpError,
  CrmNetworkError,
  CrmTimeoutError,
  isRetryable
} from "../src/crm/errors.js";
import { FALLBACK_QUEUE_KEY, FallbackQueue } from "../src/crm/fallbackQueue.js";
import { MemoryStore } from "../src/storage/memoryStore.js";
import { assert, assertDeepEqual, assertEqual, assertRejects } from "./helpers/assert.js";
import { createFakeCrm, FAKE_CRM_URL } from "./helpers/fakeCrm.js";
import { FakeClock, RecordingNotifier } from "./helpers/fakes.js";
import { createTestContext } from "./helpers/harness.js";
import { test } from "./helpers/runner.js";

test("crm: exponential backoff capped at 10s", () => {
  assertEqual(backoffDelay(1, DEFAULT_RETRY), 1000, "attempt 1");
  assertEqual(backoffDelay(2, DEFAULT_RETRY), 2000, "attempt 2");
  assertEqual(backoffDelay(3, DEFAULT_RETRY), 4000, "attempt 3");
  assertEqual(backoffDelay(5, DEFAULT_RETRY), 10_000, "capped");
});

test("crm: retryable errors", () => {
  assert(isRetryable(new CrmHttpError(502, "bad gateway")), "5xx");
  assert(isRetryable(new CrmTimeoutError(30_000)), "timeout");
  assert(isRetryable(new CrmNetworkError("ECONNRESET")), "network");
  assert(!isRetryable(new CrmHttpError(400, "bad request")), "4xx");
  assert(!isRetryable(new Error("boom")), "plain error");
});

test("crm: breaker opens after 5 failures and allows one trial after 60s", () => {
  const clock = new FakeClock();
  const breaker = new CircuitBreaker({ now: clock.nowMs });

  for (let i = 0; i < 4; i += 1) breaker.recordFailure();
  assertEqual(breaker.currentState, "closed", "4 failures keep it closed");
  breaker.recordFailure();
  assertEqual(breaker.currentState, "open", "5th failure opens");
  assert(!breaker.canAttempt(), "open rejects");

  clock.advance(59_999);
  assert(!breaker.canAttempt(), "still open just before the timeout");
  clock.advance(1);
  assert(breaker.canAttempt(), "trial allowed at exactly 60s");
  assertEqual(breaker.currentState, "half_open", "half open");
  assert(!breaker.canAttempt(), "only one trial at a time");

  breaker.recordSuccess();
  assertEqual(breaker.currentState, "closed", "trial success closes");
  assertEqual(breaker.failureCount, 0, "failures reset");
});

test("crm: failed half-open trial reopens the breaker", () => {
  const clock = new FakeClock();
  const breaker = new CircuitBreaker({ failureThreshold: 2, now: clock.nowMs });
  breaker.recordFailure();
  breaker.recordFailure();
  clock.advance(60_000);
  assert(breaker.canAttempt(), "trial");
  breaker.recordFailure();
  assertEqual(breaker.currentState, "open", "reopened");
  clock.advance(30_000);
  assert(!breaker.canAttempt(), "new timeout counts from the reopen");
});

test("crm: client retries 5xx three times and records one breaker failure", async () => {
  const crm = createFakeCrm();
  crm.down = true;
  const sleeps: number[] = [];
  const breaker = new CircuitBreaker();
  const client = new CrmClient({
    baseUrl: FAKE_CRM_URL,
    apiKey: "test-secret",
    breaker,
    fetchImpl: crm.fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    }
  });

  await assertRejects(() => client.list("group"), /CRM responded 503/, "503 surfaces after retries");
  assertEqual(crm.calls.length, 3, "three attempts");
  assertDeepEqual(sleeps, [1000, 2000], "backoff between attempts");
  assertEqual(breaker.failureCount, 1, "one failure per call");
});

test("crm: client does not retry 4xx and keeps the breaker closed", async () => {
  const crm = createFakeCrm();
  crm.failures.set("/group/list", 400);
  const breaker = new CircuitBreaker();
  const client = new CrmClient({ baseUrl: FAKE_CRM_URL, apiKey: "test-secret", breaker, fetchImpl: crm.fetchImpl });

  await assertRejects(() => client.list("group"), /CRM responded 400/, "400 surfaces");
  assertEqual(crm.calls.length, 1, "single attempt");
  assertEqual(breaker.failureCount, 0, "4xx is not a breaker failure");
});

test("crm: client sends auth and list body", async () => {
  const crm = createFakeCrm();
  const headers: string[] = [];
  const client = new CrmClient({
    baseUrl: `${FAKE_CRM_URL}/`,
    apiKey: "test-secret",
    fetchImpl: async (input, init) => {
      const auth = new Headers(init?.headers).get("authorization");
      headers.push(auth ?? "");
      return crm.fetchImpl(input, init);
    }
  });

  const groups = await client.list("group", { limit: 2 });
  assertEqual(groups.length, 2, "limit honoured");
  assertEqual(headers[0], `Basic ${Buffer.from("test-secret:").toString("base64")}`, "basic auth with the api key");
  assertDeepEqual(crm.calls[0], { method: "POST", path: "/group/list", body: { limit: 2, page: 1 } }, "request shape");
});

test("crm: failure classification", () => {
  assertEqual(classifyCrmError(new CrmHttpError(500, "oops")).kind, "unavailable", "5xx");
  assertEqual(classifyCrmError(new CrmHttpError(404, "")).kind, "not_found", "404");
  assertEqual(classifyCrmError(new CrmHttpError(401, "")).kind, "rejected", "401");
  assertEqual(classifyCrmError(new CrmHttpError(409, "Группа заполнена")).kind, "group_full", "409 with text");
  assertEqual(classifyCrmError(new CrmTimeoutError(30_000)).kind, "timeout", "timeout");
  assertEqual(classifyCrmError(new CircuitOpenError()).kind, "breaker_open", "breaker");
  assertEqual(classifyCrmError(new CrmNetworkError("ECONNREFUSED")).kind, "unavailable", "network");
  assertEqual(classifyCrmError(new Error("No seats left")).kind, "no_seats", "no seats");
  assertEqual(classifyCrmError(new Error("client already booked")).kind, "already_booked", "already booked");
  assertEqual(classifyCrmError(new Error("class is in the past")).kind, "class_passed", "past class");

  const unknown = classifyCrmError(new Error("boom"));
  assertEqual(unknown.kind, "unknown", "unknown");
  assertEqual(unknown.userMessage, "Произошла ошибка. Записал заявку — администратор подтвердит.", "unknown text");
  assert(unknown.enqueueFallback, "unknown goes to the fallback queue");
  assert(!classifyCrmError(new CrmHttpError(404, "")).enqueueFallback, "not_found does not");
});

test("crm: schedule is cached and invalidated by a booking", async () => {
  const { ctx, crm, store } = await createTestContext();
  const query = { dateFrom: "2026-10-19", dateTo: "2026-10-21" };
  const scheduleCalls = () => crm.calls.filter((call) => call.path === "/schedule/list").length;

  const first = await ctx.crm.getSchedule(query);
  assertDeepEqual(first.ok ? first.value.map((item) => item.id) : [], [501, 502, 503], "every day of the range");
  assertEqual(store.ttl(cacheKey("schedule", "2026-10-19_2026-10-21_any")), 900, "15 minute TTL");

  await ctx.crm.getSchedule(query);
  assertEqual(scheduleCalls(), 1, "second read served from cache");

  const booking = await ctx.crm.createBooking(1000, 501, "trace-1");
  assert(booking.ok && booking.value.schedule_id === 501, "reservation created");

  await ctx.crm.getSchedule(query);
  assertEqual(scheduleCalls(), 2, "cache cleared after booking");
});

test("crm: schedule filters by date range and group", async () => {
  const { ctx, crm } = await createTestContext();
  const byDate = await ctx.crm.getSchedule({ dateFrom: "2026-10-20", dateTo: "2026-10-20" });
  assertDeepEqual(byDate.ok ? byDate.value.map((item) => item.id) : [], [502], "single day");
  assertDeepEqual(crm.calls[0]?.body, { limit: 100, page: 1, columns: { date: "2026-10-20" } }, "single day filtered by the CRM");

  const range = await ctx.crm.getSchedule({ dateFrom: "2026-10-20", dateTo: "2026-10-26" });
  assertDeepEqual(range.ok ? range.value.map((item) => item.id) : [], [502, 503], "later days of the range included");
  assertDeepEqual(crm.calls[1]?.body, { limit: 100, page: 1, columns: {} }, "range sends no date column");

  const byGroup = await ctx.crm.getSchedule({ groupId: 1 });
  assertDeepEqual(byGroup.ok ? byGroup.value.map((item) => item.id) : [], [501, 503], "group 1 only");
});

test("crm: client lookup and creation", async () => {
  const { ctx, crm } = await createTestContext();
  const missing = await ctx.crm.findClient("+79001234567");
  assertDeepEqual(missing, { ok: true, value: undefined }, "not found yet");

  const created = await ctx.crm.createClient("Анна", "+79001234567");
  assertDeepEqual(created, { ok: true, value: { id: 1000, name: "Анна", phone: "+79001234567" } }, "created");

  const found = await ctx.crm.findClient("+79001234567");
  assert(found.ok && found.value?.id === 1000, "found after creation");
  assertDeepEqual(crm.calls[0]?.body, { limit: 1, page: 1, columns: { phone: "+79001234567" } }, "lookup by phone");
});

test("crm: teachers are cached for an hour", async () => {
  const { ctx, crm, store } = await createTestContext();
  const first = await ctx.crm.getTeachers();
  assertDeepEqual(
    first,
    {
      ok: true,
      value: [
        { id: 7, name: "Ирина", phone: "+79000000007" },
        { id: 8, name: "Максим" }
      ]
    },
    "teachers listed"
  );
  assertEqual(store.ttl(cacheKey("teachers", "all")), 3600, "1 hour TTL");

  await ctx.crm.getTeachers();
  assertEqual(crm.calls.filter((call) => call.path === "/teacher/list").length, 1, "second read served from cache");
});

test("crm: listBookings filters by client", async () => {
  const { ctx } = await createTestContext();
  await ctx.crm.createBooking(1000, 501);
  await ctx.crm.createBooking(2000, 503);

  const mine = await ctx.crm.listBookings({ clientId: 1000 });
  assertDeepEqual(mine.ok ? mine.value.map((item) => item.schedule_id) : [], [501], "own bookings only");
  const all = await ctx.crm.listBookings();
  assertEqual(all.ok ? all.value.length : -1, 2, "unfiltered");
});

test("crm: cancelBooking removes the reservation; unknown id is not_found", async () => {
  const { ctx, crm } = await createTestContext();
  const booking = await ctx.crm.createBooking(1000, 503);
  assert(booking.ok, "booked");
  const cancelled = await ctx.crm.cancelBooking(booking.ok ? booking.value.id : -1);
  assertDeepEqual(cancelled, { ok: true, value: true }, "cancelled");
  assertEqual(crm.reservations.length, 0, "removed");

  const missing = await ctx.crm.cancelBooking(9999);
  assert(!missing.ok && missing.failure.kind === "not_found", "404 classified");
  assertEqual(await ctx.fallback.size(), 0, "not_found is not queued");
});

test("crm: 6th call with the breaker open makes no request", async () => {
  const { ctx, crm } = await createTestContext();
  crm.down = true;

  for (let i = 0; i < 5; i += 1) {
    const result = await ctx.crm.getGroups();
    assert(!result.ok && result.failure.kind === "unavailable", `call ${i + 1} unavailable`);
  }
  assertEqual(crm.calls.length, 15, "5 calls x 3 attempts");
  assertEqual(ctx.breaker.currentState, "open", "breaker open");

  const sixth = await ctx.crm.getGroups();
  assert(!sixth.ok && sixth.failure.kind === "breaker_open", "breaker_open");
  assertEqual(crm.calls.length, 15, "no request while open");
  assertEqual(await ctx.fallback.size(), 0, "reads are never queued");
});

test("crm: failed booking is queued and the admin alerted", async () => {
  const { ctx, crm, notifier } = await createTestContext();
  crm.failures.set("/reservation/update", 503);

  const result = await ctx.crm.createBooking(1000, 501, "trace-9");
  assert(!result.ok, "booking failed");
  assertEqual(
    result.ok ? "" : result.failure.userMessage,
    "Технический сбой. Записал заявку — администратор подтвердит.",
    "user text"
  );
  assertEqual(await ctx.fallback.size(), 1, "queued");
  assert(notifier.sent[0]?.startsWith("⚠️ CRM недоступна, заявка сохранена в очередь\nДействие: createBooking"), "admin alerted");

  const item = await ctx.fallback.dequeue();
  assertEqual(item?.action, "createBooking", "action");
  assertDeepEqual(item?.payload, { client_id: 1000, schedule_id: 501 }, "payload");
  assertEqual(item?.traceId, "trace-9", "trace id");
  assertEqual(item?.createdAt, "2026-10-18T03:00:00.000Z", "timestamp from the clock");
});

test("fallback queue: FIFO, skips malformed entries, survives a failing notifier", async () => {
  const store = new MemoryStore();
  const notifier = new RecordingNotifier();
  notifier.failWith = new Error("telegram down");
  let id = 0;
  const queue = new FallbackQueue(store, notifier, { newId: () => `item-${++id}` });

  await queue.enqueue("createClient", { name: "Анна" }, "timeout");
  await store.pushLeft(FALLBACK_QUEUE_KEY, "garbage");
  await queue.enqueue("cancelBooking", { reservation_id: 7 }, "503");

  assertEqual(await queue.size(), 3, "three raw entries");
  assertEqual((await queue.dequeue())?.id, "item-1", "oldest first");
  assertEqual((await queue.dequeue())?.id, "item-2", "malformed skipped");
  assertEqual(await queue.dequeue(), undefined, "empty");
});

test("crm cache: entity invalidation only touches that entity", async () => {
  const store = new MemoryStore();
  const cache = new CrmCache(store);
  await cache.set("schedule", "a", [1]);
  await cache.set("schedule", "b", [2]);
  await cache.set("groups", "all", [3]);

  assertEqual(await cache.clearEntity("schedule"), 2, "two schedule keys removed");
  assertEqual(await cache.get("schedule", "a"), null, "gone");
  assertDeepEqual(await cache.get("groups", "all"), [3], "groups untouched");
  assertEqual(store.ttl(cacheKey("groups", "all")), 3600, "groups TTL 1h");
});
