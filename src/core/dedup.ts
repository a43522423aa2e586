import type { KeyValueStore } from "../storage/kv.js";
import type { InboundMessage } from "../types.js";

const SEEN_TTL_SECONDS = 300;

/** True when this (channel, message id) was already delivered in the last 5 minutes. */
export async function isDuplicate(store: KeyValueStore, message: Pick<InboundMessage, "channel" | "messageId">): Promise<boolean> {
  const created = await store.setIfAbsent(`seen:${message.channel}:${message.messageId}`, "1", SEEN_TTL_SECONDS);
  return !created;
}

export const NON_TEXT_REPLY = "Я понимаю только текстовые сообщения 😊";

export function shouldProcess(message: Pick<InboundMessage, "messageType">): boolean {
  return message.messageType === "text";
}
