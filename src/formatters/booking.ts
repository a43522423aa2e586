import type { Group, Schedule } from "../crm/models.js";
import { formatResolvedForDisplay } from "../nlu/temporal.js";
import type { SlotValues } from "../types.js";

export const RECEIPT_MAX_LENGTH = 300;

const NOT_SET = "не указано";

export interface ReceiptInput {
  group: string;
  datetimeResolved: string;
  clientName: string;
  clientPhone: string;
  address: string;
  reservationId: number | string;
}

/** Lengths are counted in code points so an emoji is never split in half. */
function charCount(text: string): number {
  return Array.from(text).length;
}

function sliceChars(text: string, end: number): string {
  return Array.from(text).slice(0, end).join("");
}

function truncate(text: string, max: number): string {
  if (charCount(text) <= max) {
    return text;
  }
  return `${sliceChars(text, Math.max(0, max - 3))}...`;
}

function formatDay(date: string): string {
  const match = date.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    return date;
  }
  const [, , mm, dd] = match;
  return `${dd}.${mm}`;
}

function renderReceipt(input: ReceiptInput, address: string): string {
  return [
    "✅ Запись подтверждена!",
    "",
    `Направление: ${input.group}`,
    `Дата и время: ${formatResolvedForDisplay(input.datetimeResolved)}`,
    `Имя: ${input.clientName}`,
    `Телефон: ${input.clientPhone}`,
    `Адрес: ${address}`,
    "",
    `Номер записи: ${input.reservationId}`,
    "Напомню за день до занятия!"
  ].join("\n");
}

/**
 * At most 300 characters (code points). The address gives way first; only if the rest of
 * the receipt is already too long is the whole text cut.
 */
export function formatReceipt(input: ReceiptInput): string {
  const full = renderReceipt(input, input.address);
  const fullLength = charCount(full);
  if (fullLength <= RECEIPT_MAX_LENGTH) {
    return full;
  }

  const withoutAddress = fullLength - charCount(input.address);
  const addressRoom = RECEIPT_MAX_LENGTH - withoutAddress - 3;
  if (addressRoom > 0) {
    return renderReceipt(input, `${sliceChars(input.address, addressRoom)}...`);
  }
  return truncate(full, RECEIPT_MAX_LENGTH);
}

export function formatConfirmationSummary(slots: SlotValues): string {
  const datetime = slots.datetimeResolved
    ? formatResolvedForDisplay(slots.datetimeResolved)
    : (slots.datetimeRaw ?? NOT_SET);

  return [
    "Подтвердите запись:",
    "",
    `Направление: ${slots.group ?? NOT_SET}`,
    `Дата и время: ${datetime}`,
    `Имя: ${slots.clientName ?? NOT_SET}`,
    `Телефон: ${slots.clientPhone ?? NOT_SET}`,
    "",
    "Подтверждаете? (да/нет)"
  ].join("\n");
}

/** Slot names still needed, in the order they are asked for. */
export function missingSlots(slots: SlotValues): string[] {
  const missing: string[] = [];
  if (!slots.group) missing.push("направление");
  if (!slots.datetimeResolved) missing.push("дата и время");
  if (!slots.clientName) missing.push("имя");
  if (!slots.clientPhone) missing.push("телефон");
  return missing;
}

export function formatMissingPrompt(missing: string[]): string {
  return `Нужна информация: ${missing.join(", ")}`;
}

export function formatScheduleOptions(entries: Schedule[], groups: Group[], limit = 8): string {
  const names = new Map(groups.map((group) => [group.id, group.name]));
  const lines = [...entries]
    .sort((a, b) => `${a.date} ${a.time}`.localeCompare(`${b.date} ${b.time}`))
    .slice(0, limit)
    .map((entry) => {
      const name = (typeof entry.group_id === "number" ? names.get(entry.group_id) : undefined) ?? "Занятие";
      const { max_students: max, current_students: taken } = entry;
      const seats = typeof max === "number" && typeof taken === "number" ? ` (свободно ${Math.max(0, max - taken)})` : "";
      return `• ${formatDay(entry.date)} ${entry.time} — ${name}${seats}`;
    });

  return ["Ближайшие занятия:", ...lines, "", "На какое занятие вас записать?"].join("\n");
}
