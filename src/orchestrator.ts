import { addDays, format, parseISO } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";
import type { Logger } from "pino";

import type { AuditSink, BookingOutcome } from "./audit.js";
import { canTransition, findPath } from "./core/fsm.js";
import { idempotencyKey, type IdempotencyGuard } from "./core/idempotency.js";
import type { SessionStore } from "./core/sessionStore.js";
import type { CrmAdapter } from "./crm/adapter.js";
import type { CrmResult } from "./crm/errors.js";
import type { Client } from "./crm/models.js";
import {
  formatConfirmationSummary,
  formatMissingPrompt,
  formatReceipt,
  formatScheduleOptions,
  missingSlots
} from "./formatters/booking.js";
import type { KnowledgeBase } from "./knowledge.js";
import { BudgetExceededError } from "./llm/router.js";
import type { IntentResolver, IntentResult } from "./nlu/intentResolver.js";
import type { TemporalParser } from "./nlu/temporal.js";
import type { AdminNotifier } from "./notifier.js";
import type { ConversationState, InboundMessage, Session } from "./types.js";

export const HISTORY_LIMIT = 10;

export const MESSAGES = {
  bookingInProgress: "Идёт обработка записи, подождите немного...",
  relayedToAdmin: "Ваше сообщение передано администратору.",
  handoff: "Передал ваш вопрос администратору — он скоро ответит здесь же.",
  cancelHandoff: "Передал запрос на отмену администратору — он свяжется с вами для подтверждения.",
  bookingCancelled: "Запись отменена. Чем ещё могу помочь?",
  noMatchingClass: "Не удалось найти подходящее занятие. Обратитесь к администратору.",
  incompleteSlots: "Не все данные заполнены. Пожалуйста, укажите направление и дату.",
  commitFailed: "Произошла ошибка при создании записи. Записал заявку — администратор подтвердит.",
  budgetExceeded: "Сейчас я перегружен и не могу ответить. Попробуйте чуть позже или напишите администратору.",
  unexpected: "Что-то пошло не так. Попробуйте ещё раз чуть позже.",
  bookingStart: "Помогу записаться на занятие! Какое направление вас интересует?",
  fallback: "Чем могу помочь?"
} as const;

const AFFIRMATIVE = new Set(["да", "yes", "подтверждаю", "согласен"]);
const NEGATIVE = new Set(["нет", "no", "отмена"]);

function normalizeAnswer(text: string): string {
  return text
    .toLowerCase()
    .replace(/[!.,?)]+/g, " ")
    .trim();
}

export interface OrchestratorDeps {
  sessions: SessionStore;
  crm: CrmAdapter;
  idempotency: IdempotencyGuard;
  resolver: IntentResolver;
  temporal: TemporalParser;
  kb: KnowledgeBase;
  audit: AuditSink;
  notifier: AdminNotifier;
  logger: Logger;
  timezone: string;
  now?: () => Date;
}

/**
 * One call per inbound message: load the session, dispatch on its state,
 * persist it. Every path returns text for the user.
 */
export class BookingOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.logger = deps.logger.child({ component: "orchestrator" });
    this.now = deps.now ?? (() => new Date());
  }

  async processMessage(message: InboundMessage, traceId: string): Promise<string> {
    this.deps.audit.logInbound(traceId, message);

    let session: Session;
    try {
      session = await this.deps.sessions.getOrCreate(traceId, message.channel, message.chatId);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger.error({ trace_id: traceId, err_message: detail }, "session load failed");
      this.deps.audit.logError(traceId, "SessionStoreError", detail);
      this.deps.audit.logOutbound(traceId, message, MESSAGES.unexpected);
      return MESSAGES.unexpected;
    }

    let response: string;
    try {
      response = await this.dispatch(session, message, traceId);
    } catch (err) {
      response = this.handleFailure(session, traceId, err);
    }

    session.slots.messages = [
      ...session.slots.messages,
      { role: "user" as const, content: message.text },
      { role: "assistant" as const, content: response }
    ].slice(-HISTORY_LIMIT);

    try {
      await this.deps.sessions.save(session);
    } catch (err) {
      this.logger.error(
        { trace_id: traceId, err_message: err instanceof Error ? err.message : String(err) },
        "session save failed"
      );
    }

    this.deps.audit.logOutbound(traceId, message, response);
    return response;
  }

  private handleFailure(session: Session, traceId: string, err: unknown): string {
    if (session.state === "booking_in_progress") {
      this.transition(session, "idle");
    }
    if (err instanceof BudgetExceededError) {
      this.logger.warn({ trace_id: traceId, reason: err.reason }, "budget exceeded, skipping generation");
      return MESSAGES.budgetExceeded;
    }

    const detail = err instanceof Error ? err.message : String(err);
    this.logger.error({ trace_id: traceId, state: session.state, err_message: detail }, "message processing failed");
    this.deps.audit.logError(traceId, "ProcessingError", detail);
    return MESSAGES.unexpected;
  }

  private async dispatch(session: Session, message: InboundMessage, traceId: string): Promise<string> {
    switch (session.state) {
      case "booking_in_progress":
        return MESSAGES.bookingInProgress;
      case "handoff_to_admin":
      case "admin_responding":
        return this.relayToAdmin(session, message);
      case "confirm_booking":
        return this.handleConfirmation(session, message, traceId);
      case "idle":
        return this.routeFromIdle(session, message, await this.resolve(session, message, traceId), traceId);
      case "booking_done":
        return this.handleAfterBooking(session, message, traceId);
      default:
        return this.handleCollecting(session, message, traceId);
    }
  }

  private async resolve(session: Session, message: InboundMessage, traceId: string): Promise<IntentResult> {
    if (this.deps.kb.isEscalationTrigger(message.text)) {
      return { intent: "admin", slots: {}, responseText: "" };
    }
    return this.deps.resolver.resolve(message.text, session, traceId);
  }

  private transition(session: Session, to: ConversationState): boolean {
    if (!canTransition(session.state, to)) {
      this.logger.warn({ trace_id: session.traceId, from: session.state, to }, "fsm transition rejected");
      return false;
    }
    session.state = to;
    return true;
  }

  /** Walks the shortest legal forward path, so one turn can skip slot states. */
  private advance(session: Session, to: ConversationState): boolean {
    const path = findPath(session.state, to);
    if (!path) {
      this.logger.warn({ trace_id: session.traceId, from: session.state, to }, "fsm transition rejected");
      return false;
    }
    for (const step of path) {
      session.state = step;
    }
    return true;
  }

  /** Escape hatches (cancel, admin) are reachable from anywhere via idle when not directly. */
  private escapeTo(session: Session, to: "cancel_flow" | "handoff_to_admin"): boolean {
    if (canTransition(session.state, to)) {
      return this.transition(session, to);
    }
    if (canTransition(session.state, "idle") && canTransition("idle", to)) {
      session.state = "idle";
      return this.transition(session, to);
    }
    return this.transition(session, to);
  }

  private async routeFromIdle(session: Session, message: InboundMessage, result: IntentResult, traceId: string): Promise<string> {
    switch (result.intent) {
      case "booking":
        this.transition(session, "collecting_intent");
        return this.collect(session, result, traceId);
      case "schedule_query":
        if (this.transition(session, "collecting_intent")) {
          this.transition(session, "browsing_schedule");
        }
        this.mergeSlots(session, result);
        return this.showSchedule(session, traceId);
      case "price_query":
        return result.responseText || `Цены:\n${this.deps.kb.formatPrices()}`;
      case "cancel":
        return this.startCancel(session, message);
      case "admin":
        return this.handoff(session, message);
      default:
        return result.responseText || MESSAGES.fallback;
    }
  }

  private async handleCollecting(session: Session, message: InboundMessage, traceId: string): Promise<string> {
    const result = await this.resolve(session, message, traceId);
    switch (result.intent) {
      case "cancel":
        return this.startCancel(session, message);
      case "admin":
        return this.handoff(session, message);
      case "schedule_query":
        this.mergeSlots(session, result);
        return this.showSchedule(session, traceId);
      default:
        return this.collect(session, result, traceId);
    }
  }

  private async handleConfirmation(session: Session, message: InboundMessage, traceId: string): Promise<string> {
    const answer = normalizeAnswer(message.text);
    if (AFFIRMATIVE.has(answer)) {
      return this.commitBooking(session, traceId);
    }
    if (NEGATIVE.has(answer)) {
      this.transition(session, "idle");
      return MESSAGES.bookingCancelled;
    }
    return this.handleCollecting(session, message, traceId);
  }

  private async handleAfterBooking(session: Session, message: InboundMessage, traceId: string): Promise<string> {
    const result = await this.resolve(session, message, traceId);
    if (result.intent === "booking") {
      this.transition(session, "serial_booking");
      this.transition(session, "collecting_group");
      const { clientName, clientPhone, messages } = session.slots;
      session.slots = { clientName, clientPhone, messages };
      return this.collect(session, result, traceId);
    }

    this.transition(session, "idle");
    return this.routeFromIdle(session, message, result, traceId);
  }

  /** Returns a user-facing note when the date could not be used. */
  private mergeSlots(session: Session, result: IntentResult): string | undefined {
    const { slots } = result;
    const target = session.slots;
    let note: string | undefined;

    if (slots.group && slots.group !== target.group) {
      target.group = slots.group;
      delete target.scheduleId;
    }
    if (slots.clientName) target.clientName = slots.clientName;
    if (slots.clientPhone) target.clientPhone = slots.clientPhone;

    if (slots.datetime) {
      target.datetimeRaw = slots.datetime;
      const resolved = this.deps.temporal.resolve(slots.datetime, this.now());
      if (!resolved.ok) {
        note = resolved.error;
      } else {
        const holiday = this.deps.kb.holidayOn(resolved.date);
        if (holiday) {
          note = holiday.message;
        } else if (resolved.iso !== target.datetimeResolved) {
          target.datetimeResolved = resolved.iso;
          delete target.scheduleId;
        }
      }
    }
    return note;
  }

  private async collect(session: Session, result: IntentResult, traceId: string): Promise<string> {
    const note = this.mergeSlots(session, result);
    const missing = missingSlots(session.slots);

    if (missing.length === 0) {
      if (session.state === "confirm_booking" || this.advance(session, "confirm_booking")) {
        return formatConfirmationSummary(session.slots);
      }
      this.logger.warn({ trace_id: traceId, state: session.state }, "slots complete but confirmation unreachable");
    } else {
      const next: ConversationState =
        missing[0] === "направление" ? "collecting_group" : missing[0] === "дата и время" ? "collecting_datetime" : "collecting_contact";
      if (session.state !== next) {
        // a backward move (e.g. contact -> group) is refused and the state kept
        this.advance(session, next);
      }
    }

    const prompt =
      result.responseText || (missing.length === 4 ? MESSAGES.bookingStart : formatMissingPrompt(missing));
    return note ? `${note}\n${prompt}` : prompt;
  }

  private async showSchedule(session: Session, traceId: string): Promise<string> {
    const today = formatInTimeZone(this.now(), this.deps.timezone, "yyyy-MM-dd");
    const pinned = session.slots.datetimeResolved?.slice(0, 10);
    const dateFrom = pinned ?? today;
    const dateTo = pinned ?? format(addDays(parseISO(today), 7), "yyyy-MM-dd");

    const schedule = await this.tool(traceId, "get_schedule", { dateFrom, dateTo }, () =>
      this.deps.crm.getSchedule({ dateFrom, dateTo })
    );
    if (!schedule.ok || schedule.value.length === 0) {
      return this.deps.kb.formatSchedule();
    }

    const groups = await this.tool(traceId, "get_groups", {}, () => this.deps.crm.getGroups());
    return formatScheduleOptions(schedule.value, groups.ok ? groups.value : []);
  }

  private async startCancel(session: Session, message: InboundMessage): Promise<string> {
    this.escapeTo(session, "cancel_flow");
    const { clientName, clientPhone } = session.slots;
    await this.notifyAdmin(
      [
        "🚫 Запрос на отмену записи",
        `Чат: ${message.channel}:${message.chatId}`,
        `Клиент: ${clientName ?? message.senderName ?? "-"} ${clientPhone ?? message.senderPhone ?? ""}`.trim(),
        `Сообщение: ${message.text}`
      ].join("\n")
    );
    this.transition(session, "handoff_to_admin");
    return MESSAGES.cancelHandoff;
  }

  private async handoff(session: Session, message: InboundMessage): Promise<string> {
    this.escapeTo(session, "handoff_to_admin");
    await this.notifyAdmin(
      ["🙋 Клиент просит администратора", `Чат: ${message.channel}:${message.chatId}`, `Сообщение: ${message.text}`].join("\n")
    );
    return MESSAGES.handoff;
  }

  private async relayToAdmin(session: Session, message: InboundMessage): Promise<string> {
    await this.notifyAdmin([`💬 ${message.channel}:${message.chatId}`, message.text].join("\n"));
    if (session.state === "handoff_to_admin") {
      this.transition(session, "admin_responding");
    }
    return MESSAGES.relayedToAdmin;
  }

  private async notifyAdmin(text: string): Promise<void> {
    try {
      await this.deps.notifier.notify(text);
    } catch (err) {
      this.logger.warn({ err_message: err instanceof Error ? err.message : String(err) }, "admin notification failed");
    }
  }

  private async tool<T>(
    traceId: string,
    name: string,
    params: Record<string, unknown>,
    call: () => Promise<CrmResult<T>>
  ): Promise<CrmResult<T>> {
    const startedAt = Date.now();
    const result = await call();
    this.deps.audit.logToolCall({
      traceId,
      tool: name,
      params,
      ok: result.ok,
      durationMs: Date.now() - startedAt,
      error: result.ok ? undefined : result.failure.detail
    });
    return result;
  }

  private async findOrCreateClient(name: string, phone: string, traceId: string): Promise<CrmResult<Client>> {
    const found = await this.tool(traceId, "find_client", { phone }, () => this.deps.crm.findClient(phone));
    if (!found.ok) {
      return found;
    }
    if (found.value) {
      return { ok: true, value: found.value };
    }
    return this.tool(traceId, "create_client", { name, phone }, () => this.deps.crm.createClient(name, phone, traceId));
  }

  /** First entry on the exact date and time (and group, when it maps to one) wins. */
  private async matchSchedule(group: string, datetimeResolved: string, traceId: string): Promise<CrmResult<number | undefined>> {
    const date = datetimeResolved.slice(0, 10);
    const time = datetimeResolved.slice(11, 16);

    const groups = await this.tool(traceId, "get_groups", {}, () => this.deps.crm.getGroups());
    if (!groups.ok) {
      return groups;
    }
    const wanted = group.toLowerCase();
    const groupId = groups.value.find((item) => item.name.toLowerCase() === wanted)?.id;

    const schedule = await this.tool(traceId, "get_schedule", { dateFrom: date, dateTo: date }, () =>
      this.deps.crm.getSchedule({ dateFrom: date, dateTo: date })
    );
    if (!schedule.ok) {
      return schedule;
    }

    const match = schedule.value.find(
      (entry) => entry.date === date && entry.time === time && (groupId === undefined || entry.group_id === groupId)
    );
    return { ok: true, value: match?.id };
  }

  private async commitBooking(session: Session, traceId: string): Promise<string> {
    const { group, datetimeResolved, clientName, clientPhone } = session.slots;
    if (!group || !datetimeResolved || !clientName || !clientPhone) {
      return MESSAGES.incompleteSlots;
    }

    this.transition(session, "booking_in_progress");
    await this.deps.sessions.save(session);

    let scheduleId = session.slots.scheduleId;
    if (scheduleId === undefined) {
      const matched = await this.matchSchedule(group, datetimeResolved, traceId);
      if (!matched.ok) {
        this.transition(session, "idle");
        this.logAttempt(session, traceId, "failed", { error: matched.failure.detail });
        return matched.failure.userMessage;
      }
      if (matched.value === undefined) {
        this.transition(session, "idle");
        this.logAttempt(session, traceId, "failed", { error: "no matching schedule entry" });
        return MESSAGES.noMatchingClass;
      }
      scheduleId = matched.value;
      session.slots.scheduleId = scheduleId;
    }

    // taken before any CRM write
    const lock = await this.deps.idempotency.acquire(clientPhone, scheduleId);
    if (!lock.isNew) {
      this.transition(session, "idle");
      this.logAttempt(session, traceId, "duplicate");
      return lock.message;
    }

    try {
      const client = await this.findOrCreateClient(clientName, clientPhone, traceId);
      if (!client.ok) {
        await this.deps.idempotency.release(clientPhone, scheduleId);
        this.transition(session, "idle");
        this.logAttempt(session, traceId, "failed", { error: client.failure.detail });
        return client.failure.userMessage;
      }

      const clientId = client.value.id;
      const booking = await this.tool(traceId, "create_booking", { client_id: clientId, schedule_id: scheduleId }, () =>
        this.deps.crm.createBooking(clientId, scheduleId, traceId)
      );
      if (!booking.ok) {
        await this.deps.idempotency.release(clientPhone, scheduleId);
        this.transition(session, "idle");
        this.logAttempt(session, traceId, "failed", { error: booking.failure.detail });
        return booking.failure.userMessage;
      }

      this.transition(session, "booking_done");
      this.logAttempt(session, traceId, "success", { reservationId: booking.value.id });
      return formatReceipt({
        group,
        datetimeResolved,
        clientName,
        clientPhone,
        address: this.deps.kb.studio.address,
        reservationId: booking.value.id
      });
    } catch (err) {
      await this.deps.idempotency.release(clientPhone, scheduleId);
      this.transition(session, "idle");
      const detail = err instanceof Error ? err.message : String(err);
      this.logAttempt(session, traceId, "failed", { error: detail });
      this.logger.error({ trace_id: traceId, err_message: detail }, "booking commit failed");
      return MESSAGES.commitFailed;
    }
  }

  /** Records whatever slot values were known at the time of the attempt. */
  private logAttempt(
    session: Session,
    traceId: string,
    outcome: BookingOutcome,
    details: { error?: string; reservationId?: number } = {}
  ): void {
    const { group, datetimeResolved, clientName, clientPhone, scheduleId } = session.slots;
    this.deps.audit.logBookingAttempt({
      traceId,
      channel: session.channel,
      chatId: session.chatId,
      group,
      datetime: datetimeResolved,
      clientName,
      phone: clientPhone ?? "",
      scheduleId,
      idempotencyKey: clientPhone && scheduleId !== undefined ? idempotencyKey(clientPhone, scheduleId) : undefined,
      outcome,
      reservationId: details.reservationId,
      error: details.error
    });
  }
}
