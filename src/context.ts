import type { fetch } from "undici";
import type { Logger } from "pino";

import { PinoAuditSink, type AuditSink } from "./audit.js";
import type { AppConfig } from "./config.js";
import { IdempotencyGuard } from "./core/idempotency.js";
import { SessionStore } from "./core/sessionStore.js";
import { CrmAdapter } from "./crm/adapter.js";
import { CrmCache } from "./crm/cache.js";
import { CircuitBreaker } from "./crm/circuitBreaker.js";
import { CrmClient, crmBaseUrl } from "./crm/client.js";
import { FallbackQueue } from "./crm/fallbackQueue.js";
import { loadKnowledgeBase, type KnowledgeBase } from "./knowledge.js";
import { BudgetGuard } from "./llm/budgetGuard.js";
import { getLLMProvider } from "./llm/index.js";
import { LlmRouter } from "./llm/router.js";
import type { LLMProvider } from "./llm/types.js";
import { IntentResolver } from "./nlu/intentResolver.js";
import { TemporalParser } from "./nlu/temporal.js";
import { LogAdminNotifier, TelegramAdminNotifier, type AdminNotifier } from "./notifier.js";
import { BookingOrchestrator } from "./orchestrator.js";
import type { KeyValueStore } from "./storage/kv.js";
import { MemoryStore } from "./storage/memoryStore.js";
import { RedisStore } from "./storage/redisStore.js";

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  store: KeyValueStore;
  kb: KnowledgeBase;
  sessions: SessionStore;
  budget: BudgetGuard;
  idempotency: IdempotencyGuard;
  breaker: CircuitBreaker;
  crm: CrmAdapter;
  fallback: FallbackQueue;
  llm: LlmRouter;
  audit: AuditSink;
  notifier: AdminNotifier;
  orchestrator: BookingOrchestrator;
  close(): Promise<void>;
}

/** Seams for tests and local runs; anything omitted is built from config. */
export interface ContextOverrides {
  store?: KeyValueStore;
  kb?: KnowledgeBase;
  llmProvider?: LLMProvider;
  crmFetch?: typeof fetch;
  notifier?: AdminNotifier;
  audit?: AuditSink;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

function createStore(config: AppConfig, logger: Logger): KeyValueStore {
  if (config.REDIS_URL.startsWith("memory://")) {
    logger.warn("using in-process memory store; state is lost on restart");
    return new MemoryStore();
  }
  return new RedisStore(config.REDIS_URL, logger.child({ component: "redis" }));
}

function createNotifier(config: AppConfig, logger: Logger): AdminNotifier {
  if (config.TELEGRAM_BOT_TOKEN && config.ADMIN_TELEGRAM_CHAT_ID) {
    return new TelegramAdminNotifier(config.TELEGRAM_BOT_TOKEN, config.ADMIN_TELEGRAM_CHAT_ID, logger.child({ component: "notifier" }));
  }
  return new LogAdminNotifier(logger.child({ component: "notifier" }));
}

/** Builds every component once and wires them together. */
export async function createAppContext(config: AppConfig, logger: Logger, overrides: ContextOverrides = {}): Promise<AppContext> {
  const now = overrides.now ?? (() => new Date());
  const store = overrides.store ?? createStore(config, logger);
  const kb = overrides.kb ?? (await loadKnowledgeBase(config.KB_FILE_PATH));
  const audit = overrides.audit ?? new PinoAuditSink(logger);
  const notifier = overrides.notifier ?? createNotifier(config, logger);

  const sessions = new SessionStore(store, {
    defaultTtlSeconds: Math.round(config.SESSION_TTL_HOURS * 3600),
    now,
    logger: logger.child({ component: "sessions" })
  });

  const budget = new BudgetGuard(
    store,
    {
      maxRequestsPerMinute: config.MAX_REQUESTS_PER_MINUTE,
      maxTokensPerHour: config.MAX_TOKENS_PER_HOUR,
      maxCostPerDay: config.MAX_COST_PER_DAY_RUB,
      maxErrorsPerHour: config.MAX_ERRORS_PER_HOUR
    },
    now
  );

  const crmLogger = logger.child({ component: "crm" });
  const breaker = new CircuitBreaker({ now: () => now().getTime() });
  const client = new CrmClient({
    baseUrl: config.CRM_BASE_URL ?? crmBaseUrl(config.CRM_TENANT ?? ""),
    apiKey: config.CRM_API_KEY ?? "",
    breaker,
    fetchImpl: overrides.crmFetch,
    sleep: overrides.sleep,
    logger: crmLogger
  });
  const fallback = new FallbackQueue(store, notifier, { logger: crmLogger, now });
  const crm = new CrmAdapter(client, new CrmCache(store), fallback, crmLogger);

  const provider = overrides.llmProvider ?? getLLMProvider(config, kb.serviceNames(), logger.child({ component: "llm" }));
  const llm = new LlmRouter(provider, budget, audit, logger.child({ component: "llm" }));
  const temporal = new TemporalParser(config.TIMEZONE, now);
  const idempotency = new IdempotencyGuard(store);

  const orchestrator = new BookingOrchestrator({
    sessions,
    crm,
    idempotency,
    resolver: new IntentResolver(llm, kb),
    temporal,
    kb,
    audit,
    notifier,
    logger,
    timezone: config.TIMEZONE,
    now
  });

  return {
    config,
    logger,
    store,
    kb,
    sessions,
    budget,
    idempotency,
    breaker,
    crm,
    fallback,
    llm,
    audit,
    notifier,
    orchestrator,
    close: () => store.close()
  };
}
