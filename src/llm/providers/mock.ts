import type { Logger } from "pino";

import type { CompletionRequest, CompletionResponse, LLMProvider } from "../types.js";

const INTENT_MATCHERS: Array<{ intent: string; pattern: RegExp }> = [
  { intent: "admin", pattern: /(администратор|админ|менеджер|живой человек)/i },
  { intent: "cancel", pattern: /(отмен|не смогу прийти)/i },
  { intent: "booking", pattern: /(запис|запиш|хочу на|забронир)/i },
  { intent: "schedule_query", pattern: /(расписани|когда занятия|во сколько)/i },
  { intent: "price_query", pattern: /(цен|стоим|сколько стоит|абонемент)/i },
  { intent: "greeting", pattern: /^(привет|здравствуй|добрый)/i }
];

const DAY_PATTERN =
  /(сегодня|послезавтра|завтра|(?:в|во|на)\s+(?:понедельник|вторник|среду|четверг|пятницу|субботу|воскресенье)|\d{1,2}(?:-е|-го)?\s+числа|\d{1,2}-е|\d{1,2}[./]\d{1,2}[./]\d{4}|\d{4}-\d{2}-\d{2})/i;
const TIME_PATTERN = /(\d{1,2}[:.]\d{2}|\d{1,2}\s+(?:часов|вечера|утра|дня)|вечером|утром|днём|днем)/i;
const PHONE_PATTERN = /(\+7|8)[\s-]?\(?\d{3}\)?[\s-]?\d{3}[\s-]?\d{2}[\s-]?\d{2}/;
const NAME_PATTERN = /(?:меня зовут|я\s*[-—]|зовут)\s+([А-ЯЁA-Z][а-яёa-z]+)/;

function lastUserText(request: CompletionRequest): string {
  for (let i = request.messages.length - 1; i >= 0; i -= 1) {
    const message = request.messages[i];
    if (message && message.role === "user") {
      return message.content;
    }
  }
  return "";
}

/**
 * Keyword extractor that answers in the same JSON shape the real model is
 * prompted for. Lets the bot run end to end without a paid backend.
 */
export class MockLLMProvider implements LLMProvider {
  public readonly providerName = "mock" as const;
  public readonly model = "keyword-rules";

  public constructor(
    private readonly groupNames: string[] = [],
    private readonly logger?: Logger
  ) {}

  public async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const text = lastUserText(request);
    const lower = text.toLowerCase();

    const intent = INTENT_MATCHERS.find((matcher) => matcher.pattern.test(text))?.intent ?? "info";
    const slots: Record<string, string> = {};

    const group = this.groupNames.find((name) => lower.includes(name.toLowerCase()));
    if (group) {
      slots.group = group;
    }

    const day = text.match(DAY_PATTERN)?.[0];
    const time = text.match(TIME_PATTERN)?.[0];
    if (day || time) {
      slots.datetime = [day, time ? `в ${time}` : undefined].filter(Boolean).join(" ");
    }

    const phone = text.match(PHONE_PATTERN)?.[0];
    if (phone) {
      slots.client_phone = phone.replace(/[\s()-]/g, "");
    }

    const name = text.match(NAME_PATTERN)?.[1];
    if (name) {
      slots.client_name = name;
    }

    const payload = { intent, slots, response: intent === "greeting" ? "Здравствуйте! Чем могу помочь?" : "" };
    this.logger?.debug({ provider: this.providerName, intent, slots }, "mock completion");

    const output = JSON.stringify(payload);
    return { text: output, tokensUsed: Math.ceil((text.length + output.length) / 4) };
  }
}
