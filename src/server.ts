import { randomUUID } from "node:crypto";
import Fastify from "fastify";
import rateLimit from "@fastify/rate-limit";
import type { Logger } from "pino";

import type { AppContext } from "./context.js";
import { isDuplicate, NON_TEXT_REPLY, shouldProcess } from "./core/dedup.js";
import { inboundMessageSchema } from "./schemas.js";

export function createHttpServer(ctx: AppContext, logger: Logger) {
  const fastify = Fastify({ loggerInstance: logger });

  fastify.register(rateLimit, { global: false });

  fastify.get("/", async () => ({
    service: "studio-booking-bot",
    health: "/health",
    messages: "/messages"
  }));

  fastify.get("/health", async (_request, reply) => {
    const [storeOk, crmOk, budget, fallbackSize] = await Promise.all([
      ctx.store.ping().catch(() => false),
      ctx.crm.healthCheck(),
      ctx.budget.snapshot().catch(() => undefined),
      ctx.fallback.size().catch(() => -1)
    ]);

    const healthy = storeOk && crmOk && budget !== undefined && !budget.breached;
    return reply.code(healthy ? 200 : 503).send({
      status: healthy ? "ok" : "degraded",
      store: storeOk ? "ok" : "down",
      crm: crmOk ? "ok" : "down",
      crm_breaker: ctx.breaker.currentState,
      budget: budget ?? "unknown",
      fallback_queue: fallbackSize
    });
  });

  fastify.post(
    "/messages",
    {
      config: {
        rateLimit: {
          max: 60,
          timeWindow: "1 minute",
          keyGenerator: (request: { ip: string }) => request.ip
        }
      }
    },
    async (request, reply) => {
      const apiKey = request.headers["x-api-key"];
      if (apiKey !== ctx.config.API_KEY) {
        return reply.code(401).send({ error: "Unauthorized" });
      }

      const parsed = inboundMessageSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.code(400).send({
          error: "Invalid message",
          issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        });
      }

      const message = parsed.data;
      const traceId = randomUUID();

      if (await isDuplicate(ctx.store, message)) {
        request.log.info({ trace_id: traceId, message_id: message.messageId }, "duplicate delivery dropped");
        return reply.send({ trace_id: traceId, response: null, duplicate: true });
      }

      if (!shouldProcess(message)) {
        return reply.send({ trace_id: traceId, response: NON_TEXT_REPLY });
      }

      const response = await ctx.orchestrator.processMessage(message, traceId);
      return reply.send({ trace_id: traceId, response });
    }
  );

  return fastify;
}
