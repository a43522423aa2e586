import type { Logger } from "pino";
import { z } from "zod";

import { CrmCache } from "./cache.js";
import type { CrmClient } from "./client.js";
import { classifyCrmError, type CrmResult } from "./errors.js";
import type { FallbackQueue } from "./fallbackQueue.js";
import {
  clientSchema,
  groupSchema,
  reservationSchema,
  scheduleSchema,
  teacherSchema,
  type BookingQuery,
  type Client,
  type Group,
  type Reservation,
  type Schedule,
  type ScheduleQuery,
  type Teacher
} from "./models.js";

const MUTATING_ACTIONS = new Set(["createClient", "createBooking", "cancelBooking"]);

interface CallContext {
  action: string;
  payload: Record<string, unknown>;
  traceId?: string;
}

function paramsKey(...parts: Array<string | number | undefined>): string {
  return parts.map((part) => (part === undefined ? "any" : String(part))).join("_");
}

/**
 * The only entry point the orchestrator uses to talk to the CRM. Failures come
 * back as data: a classified `CrmFailure` with the text to show the user.
 */
export class CrmAdapter {
  constructor(
    private readonly client: CrmClient,
    private readonly cache: CrmCache,
    private readonly fallback: FallbackQueue,
    private readonly logger?: Logger
  ) {}

  async getSchedule(query: ScheduleQuery = {}): Promise<CrmResult<Schedule[]>> {
    const key = paramsKey(query.dateFrom, query.dateTo, query.groupId);
    return this.guarded({ action: "getSchedule", payload: { ...query } }, async () => {
      const cached = z.array(scheduleSchema).safeParse(await this.cache.get("schedule", key));
      if (cached.success) {
        return cached.data;
      }

      // The CRM only filters on an exact date; ranges are narrowed here.
      const columns: Record<string, unknown> = {};
      if (query.dateFrom && query.dateFrom === query.dateTo) columns.date = query.dateFrom;
      if (query.groupId !== undefined) columns.group_id = query.groupId;

      const items = z.array(scheduleSchema).parse(await this.client.list("schedule", { columns }));
      const filtered = items.filter(
        (item) =>
          (!query.dateFrom || item.date >= query.dateFrom) &&
          (!query.dateTo || item.date <= query.dateTo) &&
          (query.groupId === undefined || item.group_id === query.groupId)
      );
      await this.cache.set("schedule", key, filtered);
      return filtered;
    });
  }

  async getGroups(): Promise<CrmResult<Group[]>> {
    return this.guarded({ action: "getGroups", payload: {} }, async () => {
      const cached = z.array(groupSchema).safeParse(await this.cache.get("groups", "all"));
      if (cached.success) {
        return cached.data;
      }
      const groups = z.array(groupSchema).parse(await this.client.list("group"));
      await this.cache.set("groups", "all", groups);
      return groups;
    });
  }

  async getTeachers(): Promise<CrmResult<Teacher[]>> {
    return this.guarded({ action: "getTeachers", payload: {} }, async () => {
      const cached = z.array(teacherSchema).safeParse(await this.cache.get("teachers", "all"));
      if (cached.success) {
        return cached.data;
      }
      const teachers = z.array(teacherSchema).parse(await this.client.list("teacher"));
      await this.cache.set("teachers", "all", teachers);
      return teachers;
    });
  }

  async findClient(phone: string): Promise<CrmResult<Client | undefined>> {
    return this.guarded({ action: "findClient", payload: { phone } }, async () => {
      const items = z.array(clientSchema).parse(await this.client.list("client", { columns: { phone }, limit: 1 }));
      return items[0];
    });
  }

  async createClient(name: string, phone: string, traceId?: string): Promise<CrmResult<Client>> {
    return this.guarded({ action: "createClient", payload: { name, phone }, traceId }, async () =>
      clientSchema.parse(await this.client.update("client", { name, phone }))
    );
  }

  async createBooking(clientId: number, scheduleId: number, traceId?: string): Promise<CrmResult<Reservation>> {
    const payload = { client_id: clientId, schedule_id: scheduleId };
    return this.guarded({ action: "createBooking", payload, traceId }, async () => {
      const reservation = reservationSchema.parse(await this.client.update("reservation", payload));
      await this.cache.clearEntity("schedule");
      return reservation;
    });
  }

  async listBookings(query: BookingQuery = {}): Promise<CrmResult<Reservation[]>> {
    return this.guarded({ action: "listBookings", payload: { ...query } }, async () => {
      const columns: Record<string, unknown> = {};
      if (query.clientId !== undefined) columns.client_id = query.clientId;
      if (query.date) columns.date = query.date;
      return z.array(reservationSchema).parse(await this.client.list("reservation", { columns }));
    });
  }

  async cancelBooking(reservationId: number, traceId?: string): Promise<CrmResult<boolean>> {
    return this.guarded({ action: "cancelBooking", payload: { reservation_id: reservationId }, traceId }, async () => {
      await this.client.remove("reservation", reservationId);
      await this.cache.clearEntity("schedule");
      return true;
    });
  }

  /** Cheapest authenticated call; goes through the breaker like any other. */
  async healthCheck(): Promise<boolean> {
    try {
      await this.client.list("group", { limit: 1 });
      return true;
    } catch (err) {
      this.logger?.warn({ err_message: err instanceof Error ? err.message : String(err) }, "crm health check failed");
      return false;
    }
  }

  private async guarded<T>(ctx: CallContext, fn: () => Promise<T>): Promise<CrmResult<T>> {
    try {
      return { ok: true, value: await fn() };
    } catch (err) {
      const failure = classifyCrmError(err);
      this.logger?.warn(
        { action: ctx.action, kind: failure.kind, trace_id: ctx.traceId, err_message: failure.detail },
        "crm call failed"
      );

      if (MUTATING_ACTIONS.has(ctx.action) && failure.enqueueFallback) {
        try {
          await this.fallback.enqueue(ctx.action, ctx.payload, failure.detail, ctx.traceId);
        } catch (queueErr) {
          this.logger?.error(
            { action: ctx.action, err_message: queueErr instanceof Error ? queueErr.message : String(queueErr) },
            "fallback enqueue failed"
          );
        }
      }
      return { ok: false, failure };
    }
  }
}
