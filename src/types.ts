export const CONVERSATION_STATES = [
  "idle",
  "collecting_intent",
  "browsing_schedule",
  "collecting_group",
  "collecting_datetime",
  "collecting_contact",
  "confirm_booking",
  "booking_in_progress",
  "booking_done",
  "cancel_flow",
  "serial_booking",
  "handoff_to_admin",
  "admin_responding"
] as const;

export type ConversationState = (typeof CONVERSATION_STATES)[number];

export const CHANNELS = ["telegram", "whatsapp"] as const;
export type Channel = (typeof CHANNELS)[number];

export const MESSAGE_TYPES = ["text", "voice", "sticker", "image", "other"] as const;
export type MessageType = (typeof MESSAGE_TYPES)[number];

export interface HistoryEntry {
  role: "user" | "assistant";
  content: string;
}

export interface SlotValues {
  group?: string;
  datetimeRaw?: string;
  /** ISO 8601 with the studio's UTC offset, e.g. 2026-10-19T19:00:00+10:00 */
  datetimeResolved?: string;
  clientName?: string;
  clientPhone?: string;
  scheduleId?: number;
  messages: HistoryEntry[];
}

export interface Session {
  traceId: string;
  channel: Channel;
  chatId: string;
  state: ConversationState;
  slots: SlotValues;
  createdAt: string;
  updatedAt: string;
  expiresAt: string;
}

export interface InboundMessage {
  channel: Channel;
  chatId: string;
  messageId: string;
  timestamp: string;
  text: string;
  messageType: MessageType;
  senderPhone?: string;
  senderName?: string;
}
