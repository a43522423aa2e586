import { z } from "zod";

import { CHANNELS, CONVERSATION_STATES, MESSAGE_TYPES } from "./types.js";

export const historyEntrySchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string()
});

export const slotValuesSchema = z.object({
  group: z.string().optional(),
  datetimeRaw: z.string().optional(),
  datetimeResolved: z.string().datetime({ offset: true }).optional(),
  clientName: z.string().optional(),
  clientPhone: z.string().optional(),
  scheduleId: z.number().int().optional(),
  messages: z.array(historyEntrySchema).max(10).default([])
});

export const sessionSchema = z.object({
  traceId: z.string().min(1),
  channel: z.enum(CHANNELS),
  chatId: z.string().min(1),
  state: z.enum(CONVERSATION_STATES),
  slots: slotValuesSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  expiresAt: z.string().datetime()
});

/** Channels send ids as numbers or strings; both are kept as strings. */
const idSchema = z.union([z.string().min(1), z.number().int()]).transform((value) => String(value));

export const inboundMessageSchema = z.object({
  channel: z.enum(CHANNELS),
  chatId: idSchema,
  messageId: idSchema,
  timestamp: z.string().datetime({ offset: true }).default(() => new Date().toISOString()),
  text: z.string().default(""),
  messageType: z.enum(MESSAGE_TYPES).default("text"),
  senderPhone: z.string().optional(),
  senderName: z.string().optional()
});

