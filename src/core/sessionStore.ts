import { randomUUID } from "node:crypto";
import type { Logger } from "pino";

import { sessionSchema } from "../schemas.js";
import { getJson, setJson, type KeyValueStore } from "../storage/kv.js";
import type { Channel, ConversationState, Session } from "../types.js";
import { getTimeoutSeconds } from "./fsm.js";

export interface SessionStoreOptions {
  defaultTtlSeconds: number;
  now?: () => Date;
  newTraceId?: () => string;
  logger?: Logger;
}

export function sessionKey(channel: Channel, chatId: string): string {
  return `session:${channel}:${chatId}`;
}

/**
 * Last-write-wins persistence of one session per (channel, chat id).
 * There is no per-session lock: two concurrent messages for the same chat
 * both load, mutate and save, and the later save wins.
 */
export class SessionStore {
  private readonly now: () => Date;
  private readonly newTraceId: () => string;

  constructor(
    private readonly store: KeyValueStore,
    private readonly options: SessionStoreOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.newTraceId = options.newTraceId ?? randomUUID;
  }

  private ttlFor(state: ConversationState): number {
    return getTimeoutSeconds(state) ?? this.options.defaultTtlSeconds;
  }

  async load(channel: Channel, chatId: string): Promise<Session | undefined> {
    const raw = await getJson(this.store, sessionKey(channel, chatId));
    if (raw === null) {
      return undefined;
    }

    const parsed = sessionSchema.safeParse(raw);
    if (!parsed.success) {
      this.options.logger?.warn(
        { channel, chatId, issues: parsed.error.issues.length },
        "stored session is malformed, treating as absent"
      );
      return undefined;
    }
    return parsed.data;
  }

  async save(session: Session): Promise<void> {
    const now = this.now();
    const ttlSeconds = this.ttlFor(session.state);
    session.updatedAt = now.toISOString();
    session.expiresAt = new Date(now.getTime() + ttlSeconds * 1000).toISOString();
    await setJson(this.store, sessionKey(session.channel, session.chatId), session, ttlSeconds);
  }

  async create(
    traceId: string | undefined,
    channel: Channel,
    chatId: string,
    initialState: ConversationState = "idle"
  ): Promise<Session> {
    const now = this.now().toISOString();
    const session: Session = {
      traceId: traceId ?? this.newTraceId(),
      channel,
      chatId,
      state: initialState,
      slots: { messages: [] },
      createdAt: now,
      updatedAt: now,
      expiresAt: now
    };
    await this.save(session);
    return session;
  }

  isTimedOut(session: Session): boolean {
    const now = this.now().getTime();
    if (now > Date.parse(session.expiresAt)) {
      return true;
    }

    const stateTimeout = getTimeoutSeconds(session.state);
    if (stateTimeout !== undefined) {
      return now - Date.parse(session.updatedAt) > stateTimeout * 1000;
    }
    return false;
  }

  async resetToIdle(session: Session): Promise<void> {
    session.state = "idle";
    session.slots = { messages: [] };
    await this.save(session);
  }

  async getOrCreate(traceId: string | undefined, channel: Channel, chatId: string): Promise<Session> {
    const existing = await this.load(channel, chatId);
    if (!existing) {
      return this.create(traceId, channel, chatId);
    }

    if (this.isTimedOut(existing)) {
      this.options.logger?.info(
        { channel, chatId, state: existing.state, trace_id: existing.traceId },
        "session timed out, resetting to idle"
      );
      existing.traceId = traceId ?? this.newTraceId();
      await this.resetToIdle(existing);
    }
    return existing;
  }
}
