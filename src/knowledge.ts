import { readFile } from "node:fs/promises";
import { z } from "zod";

const timeRegex = /^\d{2}:\d{2}$/;
const dateRegex = /^\d{4}-\d{2}-\d{2}$/;

const weekdays = ["monday", "tuesday", "wednesday", "thursday", "friday", "saturday", "sunday"] as const;

export const knowledgeBaseSchema = z.object({
  schema_version: z.literal("1.0"),
  studio: z.object({
    name: z.string().min(1),
    address: z.string().min(1),
    phone: z.string().min(1),
    schedule: z.string(),
    timezone: z.string().default("Asia/Vladivostok")
  }),
  tone: z.object({
    style: z.string(),
    pronouns: z.string(),
    emoji: z.boolean().default(true),
    language: z.string().default("ru")
  }),
  services: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        description: z.string(),
        price_single: z.number().positive().nullish()
      })
    )
    .min(1, "At least one service must be defined"),
  teachers: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        styles: z.array(z.string()).min(1),
        specialization: z.string()
      })
    )
    .min(1, "At least one teacher must be defined"),
  schedule: z
    .array(
      z.object({
        service_id: z.string(),
        teacher_id: z.string(),
        day: z.enum(weekdays),
        time: z.string().regex(timeRegex),
        duration_minutes: z.number().int().positive(),
        max_students: z.number().int().positive(),
        level: z.string(),
        room: z.string()
      })
    )
    .default([]),
  subscriptions: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        classes: z.number().int(),
        price: z.number().positive(),
        validity_days: z.number().int().positive()
      })
    )
    .default([]),
  policies: z
    .object({
      cancellation: z.string(),
      trial_class: z.string(),
      what_to_bring: z.string(),
      late_arrival: z.string()
    })
    .optional(),
  faq: z.array(z.object({ q: z.string(), a: z.string() })).default([]),
  holidays: z
    .array(
      z.object({
        from: z.string().regex(dateRegex),
        to: z.string().regex(dateRegex),
        name: z.string(),
        message: z.string()
      })
    )
    .default([]),
  escalation: z.object({ triggers: z.array(z.string()) })
});

export type KnowledgeBaseData = z.infer<typeof knowledgeBaseSchema>;

const DAY_NAMES_RU: Record<(typeof weekdays)[number], string> = {
  monday: "Понедельник",
  tuesday: "Вторник",
  wednesday: "Среда",
  thursday: "Четверг",
  friday: "Пятница",
  saturday: "Суббота",
  sunday: "Воскресенье"
};

export class KnowledgeBase {
  constructor(readonly data: KnowledgeBaseData) {}

  get studio(): KnowledgeBaseData["studio"] {
    return this.data.studio;
  }

  serviceNames(): string[] {
    return this.data.services.map((service) => service.name);
  }

  searchFaq(query: string): KnowledgeBaseData["faq"] {
    const needle = query.toLowerCase();
    return this.data.faq
      .map((entry) => ({ entry, position: entry.q.toLowerCase().indexOf(needle) }))
      .filter((item) => item.position >= 0)
      .sort((a, b) => a.position - b.position)
      .map((item) => item.entry);
  }

  /** Holiday in effect on the given yyyy-MM-dd date, if any. */
  holidayOn(date: string): KnowledgeBaseData["holidays"][number] | undefined {
    return this.data.holidays.find((holiday) => holiday.from <= date && date <= holiday.to);
  }

  isEscalationTrigger(text: string): boolean {
    const lower = text.toLowerCase();
    return this.data.escalation.triggers.some((trigger) => lower.includes(trigger.toLowerCase()));
  }

  formatSchedule(): string {
    if (this.data.schedule.length === 0) {
      return "Расписание пока не заполнено.";
    }

    const lines = ["Расписание занятий:"];
    for (const day of weekdays) {
      const entries = this.data.schedule.filter((entry) => entry.day === day).sort((a, b) => a.time.localeCompare(b.time));
      if (entries.length === 0) {
        continue;
      }
      lines.push(`${DAY_NAMES_RU[day]}:`);
      for (const entry of entries) {
        const service = this.data.services.find((item) => item.id === entry.service_id)?.name ?? entry.service_id;
        const teacher = this.data.teachers.find((item) => item.id === entry.teacher_id)?.name ?? entry.teacher_id;
        lines.push(`  ${entry.time} - ${service} (${entry.level}) - ${teacher} - ${entry.room}`);
      }
    }
    return lines.join("\n");
  }

  formatPrices(): string {
    const lines = this.data.services.map(
      (service) => `- ${service.name}: ${service.price_single ? `${service.price_single}₽` : "цена уточняется"}`
    );
    for (const sub of this.data.subscriptions) {
      const classes = sub.classes === -1 ? "безлимит" : `${sub.classes} занятий`;
      lines.push(`- ${sub.name}: ${sub.price}₽ (${classes}, ${sub.validity_days} дней)`);
    }
    return lines.join("\n");
  }

  /** Context block for the system prompt. */
  formatForPrompt(): string {
    const { studio } = this.data;
    const lines = [`Студия: ${studio.name}`, `Адрес: ${studio.address}`, `Телефон: ${studio.phone}`, "", "Направления:"];

    for (const service of this.data.services) {
      const price = service.price_single ? `${service.price_single}₽` : "цена уточняется";
      lines.push(`- ${service.name} (${service.id}): ${service.description}. Разовое занятие: ${price}`);
    }

    lines.push("", "Преподаватели:");
    for (const teacher of this.data.teachers) {
      lines.push(`- ${teacher.name} (${teacher.id}): ${teacher.styles.join(", ")}. ${teacher.specialization}`);
    }

    if (this.data.subscriptions.length > 0) {
      lines.push("", "Абонементы:");
      for (const sub of this.data.subscriptions) {
        const classes = sub.classes === -1 ? "безлимит" : `${sub.classes} занятий`;
        lines.push(`- ${sub.name}: ${sub.price}₽ (${classes}, действует ${sub.validity_days} дней)`);
      }
    }

    lines.push("", this.formatSchedule());

    const { policies } = this.data;
    if (policies) {
      lines.push(
        "",
        "Правила студии:",
        `- Отмена: ${policies.cancellation}`,
        `- Пробное занятие: ${policies.trial_class}`,
        `- Что взять с собой: ${policies.what_to_bring}`,
        `- Опоздание: ${policies.late_arrival}`
      );
    }

    if (this.data.faq.length > 0) {
      lines.push("", "Частые вопросы:");
      for (const entry of this.data.faq.slice(0, 5)) {
        lines.push(`Q: ${entry.q}`, `A: ${entry.a}`);
      }
    }
    return lines.join("\n");
  }
}

/** Refuses to start on a missing or invalid file. */
export async function loadKnowledgeBase(path: string): Promise<KnowledgeBase> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (err) {
    throw new Error(`Knowledge base file not found: ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Knowledge base is not valid JSON: ${path}`, { cause: err });
  }

  const parsed = knowledgeBaseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid knowledge base schema in ${path}: ${issues}`);
  }
  return new KnowledgeBase(parsed.data);
}
