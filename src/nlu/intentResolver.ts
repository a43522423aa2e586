import { z } from "zod";

import type { KnowledgeBase } from "../knowledge.js";
import type { LlmRouter } from "../llm/router.js";
import type { ChatMessage } from "../llm/types.js";
import type { Session } from "../types.js";
import { extractJson } from "./extractJson.js";

export const INTENTS = ["booking", "schedule_query", "price_query", "info", "greeting", "cancel", "admin"] as const;
export type Intent = (typeof INTENTS)[number];

export interface ExtractedSlots {
  group?: string;
  datetime?: string;
  clientName?: string;
  clientPhone?: string;
}

export interface IntentResult {
  intent: Intent;
  slots: ExtractedSlots;
  responseText: string;
}

/** Models like to echo the template: "...", "", "null". */
const slotValue = z
  .unknown()
  .transform((value) => (typeof value === "string" ? value.trim() : typeof value === "number" ? String(value) : ""))
  .transform((value) => (value === "" || value === "..." || value.toLowerCase() === "null" ? undefined : value));

const resolverOutputSchema = z.object({
  intent: z.enum(INTENTS).catch("info"),
  slots: z
    .object({
      group: slotValue,
      datetime: slotValue,
      client_name: slotValue,
      client_phone: slotValue
    })
    .partial()
    .catch({}),
  response: z.string().optional().catch(undefined)
});

export function normalizePhone(phone: string): string {
  return phone.replace(/[\s()-]/g, "");
}

function buildSystemPrompt(kb: KnowledgeBase, session: Session): string {
  const { messages: _history, ...slots } = session.slots;
  return `Ты — помощник студии танцев. Помогаешь клиентам записаться на занятия.

Контекст студии:
${kb.formatForPrompt()}

Текущее состояние диалога:
- Состояние: ${session.state}
- Заполненные слоты: ${JSON.stringify(slots)}

Правила:
1. Определи intent: ${INTENTS.join(", ")}
2. Извлеки слоты из сообщения: group, datetime, client_name, client_phone
3. Не придумывай расписание или цены — используй только данные из KB
4. Отвечай кратко (≤300 символов), дружелюбно, без корпоративного жаргона

Отвечай в формате JSON:
{"intent": "${INTENTS.join("|")}", "slots": {"group": "...", "datetime": "...", "client_name": "...", "client_phone": "..."}, "response": "текст ответа пользователю"}`;
}

/**
 * Intent classification and slot extraction only. Dates stay raw here; the
 * temporal parser resolves them.
 */
export class IntentResolver {
  constructor(
    private readonly router: LlmRouter,
    private readonly kb: KnowledgeBase
  ) {}

  async resolve(text: string, session: Session, traceId: string): Promise<IntentResult> {
    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemPrompt(this.kb, session) },
      ...session.slots.messages.slice(-10).map((entry) => ({ role: entry.role, content: entry.content })),
      { role: "user", content: text }
    ];

    const response = await this.router.call(messages, traceId);
    return parseResolverOutput(response.text);
  }
}

export function parseResolverOutput(raw: string): IntentResult {
  const json = extractJson(raw);
  if (!json) {
    return { intent: "info", slots: {}, responseText: raw };
  }

  const parsed = resolverOutputSchema.safeParse(json);
  if (!parsed.success) {
    return { intent: "info", slots: {}, responseText: raw };
  }

  const { intent, slots, response } = parsed.data;
  const extracted: ExtractedSlots = {};
  if (slots.group) extracted.group = slots.group;
  if (slots.datetime) extracted.datetime = slots.datetime;
  if (slots.client_name) extracted.clientName = slots.client_name;
  if (slots.client_phone) extracted.clientPhone = normalizePhone(slots.client_phone);

  return { intent, slots: extracted, responseText: response ?? "" };
}
