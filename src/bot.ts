import { randomUUID } from "node:crypto";
import { Telegraf } from "telegraf";
import type { Logger } from "pino";

import type { AppContext } from "./context.js";
import { isDuplicate, NON_TEXT_REPLY, shouldProcess } from "./core/dedup.js";
import type { InboundMessage, MessageType } from "./types.js";

/** The parts of a Telegram message the bot reads. */
export interface TelegramMessageLike {
  message_id: number;
  date: number;
  chat: { id: number };
  from?: { first_name?: string };
  text?: string;
  voice?: unknown;
  sticker?: unknown;
  photo?: unknown;
}

function detectType(message: TelegramMessageLike): MessageType {
  if (typeof message.text === "string") return "text";
  if (message.voice !== undefined) return "voice";
  if (message.sticker !== undefined) return "sticker";
  if (message.photo !== undefined) return "image";
  return "other";
}

export function toInboundMessage(message: TelegramMessageLike): InboundMessage {
  return {
    channel: "telegram",
    chatId: String(message.chat.id),
    messageId: String(message.message_id),
    timestamp: new Date(message.date * 1000).toISOString(),
    text: message.text ?? "",
    messageType: detectType(message),
    senderName: message.from?.first_name
  };
}

export function createTelegramBot(ctx: AppContext, token: string, logger: Logger): Telegraf {
  const bot = new Telegraf(token);
  const log = logger.child({ component: "telegram_bot" });

  bot.start(async (tgCtx) => {
    await tgCtx.reply(`Здравствуйте! Это ${ctx.kb.studio.name}. Помогу записаться на занятие или расскажу о расписании и ценах.`);
  });

  bot.on("message", async (tgCtx) => {
    const message = toInboundMessage(tgCtx.message);
    const traceId = randomUUID();

    if (await isDuplicate(ctx.store, message)) {
      log.info({ trace_id: traceId, message_id: message.messageId }, "duplicate update dropped");
      return;
    }

    if (!shouldProcess(message)) {
      await tgCtx.reply(NON_TEXT_REPLY);
      return;
    }

    await tgCtx.sendChatAction("typing");
    const response = await ctx.orchestrator.processMessage(message, traceId);
    await tgCtx.reply(response);
  });

  bot.catch((err, tgCtx) => {
    log.error(
      { update_id: tgCtx.update.update_id, err_message: err instanceof Error ? err.message : String(err) },
      "telegram handler failed"
    );
  });

  return bot;
}

export async function startBot(bot: Telegraf, logger: Logger): Promise<void> {
  try {
    const info = await bot.telegram.getWebhookInfo();
    if (info.url) {
      logger.info({ webhook_url: info.url }, "deleting webhook before polling");
      await bot.telegram.deleteWebhook({ drop_pending_updates: false });
    }
  } catch (err) {
    logger.warn({ err_message: err instanceof Error ? err.message : String(err) }, "failed to get/delete webhook info");
  }

  // launch() resolves only when polling stops
  bot.launch().catch((err: unknown) => {
    logger.error({ err_message: err instanceof Error ? err.message : String(err) }, "telegram polling stopped");
  });
}
